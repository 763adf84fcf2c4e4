// src/infra/http/http-server.ts
import cors from "@fastify/cors";
import fastify, {
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
} from "fastify";

import type { AppEnv } from "../../config/env.js";
import type { Logger } from "../logger.js";
import { forbidden, toHttpError, unauthorized } from "./errors.js";
import { API_KEY_HEADER, PUBLIC_PATHS, type ErrorPayload } from "./http-types.js";

function pathOf(url: string): string {
  const i = url.indexOf("?");
  return i === -1 ? url : url.slice(0, i);
}

function headerValue(v: string | string[] | undefined): string {
  const s = Array.isArray(v) ? v[0] : v;
  return String(s ?? "").trim();
}

function errorPayload(req: FastifyRequest, error: string, details: unknown): ErrorPayload {
  return { error, details: details ?? null, requestId: req.id };
}

type ServerEnv = Pick<AppEnv, "host" | "port" | "logLevel" | "apiKeys" | "corsOrigins">;

export class HttpServer {
  public readonly app: FastifyInstance;
  private readonly apiKeys: ReadonlySet<string>;

  constructor(
    private readonly env: ServerEnv,
    private readonly logger: Logger,
  ) {
    this.apiKeys = new Set(env.apiKeys);

    this.app = fastify({
      logger: {
        level: env.logLevel,
        base: null,
        timestamp: () => `,"time":"${new Date().toISOString()}"`,
      },
    });

    void this.app.register(cors, {
      origin: env.corsOrigins.includes("*") ? "*" : [...env.corsOrigins],
    });

    // Always return request id for easier debugging
    this.app.addHook("onRequest", async (req, reply) => {
      reply.header("x-request-id", req.id);
    });

    this.app.setErrorHandler(
      (err: unknown, req: FastifyRequest, reply: FastifyReply) => {
        const httpErr = toHttpError(err);

        // never log the api key header
        const logBase = {
          reqId: req.id,
          method: req.method,
          url: req.url,
          status: httpErr.status,
        };

        if (httpErr.status >= 500) {
          this.logger.error({ ...logBase, err }, "Unhandled server error");
        } else {
          this.logger.warn({ ...logBase, err }, "Request error");
        }

        if (reply.sent) return;

        return reply
          .status(httpErr.status)
          .send(errorPayload(req, httpErr.message, httpErr.details));
      },
    );

    this.app.setNotFoundHandler((req, reply) => {
      return reply.status(404).send(errorPayload(req, "NOT_FOUND", { url: req.url }));
    });

    // API key auth
    this.app.addHook("preHandler", async (req) => {
      if (PUBLIC_PATHS.has(pathOf(req.url))) return;

      const key = headerValue(req.headers[API_KEY_HEADER]);
      if (!key) {
        throw unauthorized("Missing API Key. Please provide X-API-Key header.");
      }
      if (!this.apiKeys.has(key)) {
        throw forbidden("Invalid API Key");
      }
    });
  }

  async listen(): Promise<void> {
    const { host, port } = this.env;

    try {
      await this.app.listen({ host, port });
      this.logger.info({ host, port }, `✅ price-cache-api listening on http://${host}:${port}`);
    } catch (err) {
      // log bind errors clearly (EADDRINUSE, EACCES, etc.)
      this.logger.error({ err, host, port }, "❌ Failed to start HTTP server");
      throw err;
    }
  }

  async close(): Promise<void> {
    await this.app.close();
  }
}
