// src/infra/market/quote-service.ts
import type { PriceCache } from "../cache/price-cache.js";
import { badGateway, badRequest, notFound, toHttpError } from "../http/errors.js";
import type { Logger } from "../logger.js";
import {
  UpstreamError,
  hasUsablePrice,
  normalizeSymbol,
  type PriceSnapshot,
  type QuoteProvider,
} from "./quote-provider.js";

export const MAX_BATCH_SYMBOLS = 50;

export type QuoteSource = "cache" | "provider";

export type QuoteLookup = Readonly<{
  snapshot: PriceSnapshot;
  source: QuoteSource;
}>;

export type BatchItem =
  | (PriceSnapshot & Readonly<{ cached: boolean }>)
  | Readonly<{ symbol: string; error: string }>;

export type BatchResult = Readonly<{
  quotes: BatchItem[];
  count: number;
}>;

export function parseSymbolList(raw: string): string[] {
  const seen = new Set<string>();
  for (const part of raw.split(",")) {
    const sym = normalizeSymbol(part);
    if (sym) seen.add(sym);
  }
  return [...seen];
}

/** Cache-through quote lookups for request handlers. */
export class QuoteService {
  constructor(
    private readonly cache: PriceCache,
    private readonly provider: QuoteProvider,
    private readonly logger: Logger,
  ) {}

  async getQuote(symbol: string): Promise<QuoteLookup> {
    const sym = normalizeSymbol(symbol);
    if (!sym) throw badRequest("symbol is required");

    const cached = this.cache.get(sym);
    if (cached) return { snapshot: cached, source: "cache" };

    let fresh: PriceSnapshot | null;
    try {
      fresh = await this.provider.fetch(sym);
    } catch (err) {
      if (err instanceof UpstreamError) {
        throw badGateway(`Quote source unavailable for ${sym}`, { symbol: sym }, err);
      }
      throw err;
    }

    if (!hasUsablePrice(fresh)) {
      throw notFound(`No data found for symbol: ${sym}`);
    }

    this.cache.set(sym, fresh);
    return { snapshot: fresh, source: "provider" };
  }

  async getQuotes(raw: string): Promise<BatchResult> {
    const symbols = parseSymbolList(raw);

    if (symbols.length === 0) throw badRequest("No symbols provided");
    if (symbols.length > MAX_BATCH_SYMBOLS) {
      throw badRequest(`Maximum ${MAX_BATCH_SYMBOLS} symbols allowed`, {
        received: symbols.length,
      });
    }

    const quotes: BatchItem[] = [];
    for (const symbol of symbols) {
      try {
        const { snapshot, source } = await this.getQuote(symbol);
        quotes.push({ ...snapshot, cached: source === "cache" });
      } catch (err) {
        const httpErr = toHttpError(err);
        this.logger.warn({ symbol, status: httpErr.status, err }, "Batch quote failed");
        quotes.push({ symbol, error: httpErr.message });
      }
    }

    return { quotes, count: quotes.length };
  }
}
