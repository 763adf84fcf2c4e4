// src/infra/http/routes.ts
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import type { PriceCache } from "../cache/price-cache.js";
import type { Logger } from "../logger.js";
import type { MarketDataService } from "../market/market-data-service.js";
import { normalizeSymbol } from "../market/quote-provider.js";
import type { QuoteService } from "../market/quote-service.js";
import { badRequest, notFound, toHttpError } from "./errors.js";

type Deps = {
  quotes: QuoteService;
  market: MarketDataService;
  cache: PriceCache;
  logger: Logger;
  appName: string;
  appVersion: string;
};

function field(source: unknown, name: string): unknown {
  if (typeof source !== "object" || source === null) return undefined;
  return Reflect.get(source, name);
}

function optField(source: unknown, name: string): string | undefined {
  const v = field(source, name);
  return typeof v === "string" ? v : undefined;
}

function mustSymbol(req: FastifyRequest): string {
  const symbol = normalizeSymbol(String(field(req.params, "symbol") ?? ""));
  if (!symbol) throw badRequest("symbol is required");
  return symbol;
}

/**
 * Wraps handlers with try/catch:
 * - normalizes unknown errors to HttpError
 * - logs with reqId + route (no headers, no keys)
 * - rethrows for global errorHandler to respond consistently
 */
function wrap(
  deps: Deps,
  routeName: string,
  handler: (req: FastifyRequest, reply: FastifyReply) => Promise<unknown>,
) {
  return async (req: FastifyRequest, reply: FastifyReply) => {
    try {
      return await handler(req, reply);
    } catch (err) {
      const httpErr = toHttpError(err);

      const logBase = {
        route: routeName,
        reqId: req.id,
        method: req.method,
        url: req.url,
        status: httpErr.status,
      };

      if (httpErr.status >= 500) {
        deps.logger.error({ ...logBase, err }, "Route failed (server)");
      } else {
        deps.logger.warn({ ...logBase, err }, "Route failed (client)");
      }

      throw httpErr;
    }
  };
}

export function registerRoutes(app: FastifyInstance, deps: Deps) {
  app.get(
    "/",
    wrap(deps, "root", async () => ({
      name: deps.appName,
      version: deps.appVersion,
      status: "running",
      authentication: "Required - Use X-API-Key header",
    })),
  );

  app.get(
    "/health",
    wrap(deps, "health", async () => ({
      status: "healthy",
      timestamp: new Date().toISOString(),
    })),
  );

  app.get(
    "/quote/:symbol",
    wrap(deps, "quote.get", async (req, reply) => {
      const { snapshot, source } = await deps.quotes.getQuote(mustSymbol(req));
      reply.header("x-cache", source === "cache" ? "HIT" : "MISS");
      return snapshot;
    }),
  );

  app.get(
    "/quotes",
    wrap(deps, "quotes.list", async (req) => {
      const raw = String(field(req.query, "symbols") ?? "");
      return deps.quotes.getQuotes(raw);
    }),
  );

  app.post(
    "/history",
    wrap(deps, "history", async (req) => {
      const symbol = optField(req.body, "symbol");
      if (!symbol) throw badRequest("symbol is required");
      return deps.market.history({
        symbol,
        period: optField(req.body, "period"),
        interval: optField(req.body, "interval"),
      });
    }),
  );

  app.get(
    "/info/:symbol",
    wrap(deps, "info.get", async (req) => deps.market.companyInfo(mustSymbol(req))),
  );

  app.get(
    "/dividends/:symbol",
    wrap(deps, "dividends.get", async (req) =>
      deps.market.dividends(mustSymbol(req), optField(req.query, "period")),
    ),
  );

  app.get(
    "/cache/stats",
    wrap(deps, "cache.stats", async () => deps.cache.getStats()),
  );

  app.get(
    "/cache/symbols/:symbol",
    wrap(deps, "cache.symbol", async (req) => {
      const symbol = mustSymbol(req);
      const info = deps.cache.getSymbolInfo(symbol);
      if (!info) throw notFound(`Symbol not cached: ${symbol}`);
      return info;
    }),
  );

  app.delete(
    "/cache/symbols/:symbol",
    wrap(deps, "cache.remove", async (req) => {
      const symbol = mustSymbol(req);
      return { symbol, removed: deps.cache.removeSymbol(symbol) };
    }),
  );

  app.delete(
    "/cache",
    wrap(deps, "cache.clear", async () => ({ cleared: deps.cache.clear() })),
  );

  app.post(
    "/cache/refresh",
    wrap(deps, "cache.refresh", async () => deps.cache.refreshAll()),
  );
}
