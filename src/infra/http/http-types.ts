export const API_KEY_HEADER = "x-api-key";

/** Routes reachable without an API key. */
export const PUBLIC_PATHS: ReadonlySet<string> = new Set(["/", "/health"]);

export type ErrorPayload = Readonly<{
  error: string;
  details: unknown;
  requestId: string;
}>;
