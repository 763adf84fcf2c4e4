// src/infra/http/errors.ts
export class HttpError extends Error {
  public readonly name = "HttpError";

  constructor(
    public readonly status: number,
    message: string,
    public readonly details?: unknown,
    public readonly cause?: unknown,
  ) {
    super(message);
  }
}

export const badRequest = (msg: string, details?: unknown) =>
  new HttpError(400, msg, details);

export const unauthorized = (msg: string, details?: unknown) =>
  new HttpError(401, msg, details);

export const forbidden = (msg: string, details?: unknown) =>
  new HttpError(403, msg, details);

export const notFound = (msg: string, details?: unknown) =>
  new HttpError(404, msg, details);

export const badGateway = (msg: string, details?: unknown, cause?: unknown) =>
  new HttpError(502, msg, details, cause);

/**
 * Normalize any thrown value into an HttpError.
 * Handles:
 * - HttpError
 * - JSON parse errors (SyntaxError)
 * - Fastify and plugin errors carrying statusCode/status
 */
export function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) return err;

  if (err instanceof SyntaxError) {
    return new HttpError(400, "INVALID_JSON", { message: err.message }, err);
  }

  if (typeof err === "object" && err !== null) {
    const statusRaw =
      "statusCode" in err ? err.statusCode : "status" in err ? err.status : undefined;
    const status = Number(statusRaw);

    // don't leak non-string messages
    const msg =
      "message" in err && typeof err.message === "string" && err.message.trim()
        ? err.message
        : undefined;

    const details =
      "details" in err
        ? err.details
        : "validation" in err
          ? err.validation
          : undefined;

    if (Number.isFinite(status) && status >= 400 && status <= 599) {
      return new HttpError(status, msg ?? "REQUEST_ERROR", details, err);
    }
  }

  return new HttpError(500, "INTERNAL_ERROR", undefined, err);
}
