// src/infra/market/yahoo-quote-provider.ts
import type { Logger } from "../logger.js";
import {
  UpstreamError,
  hasUsablePrice,
  normalizeSymbol,
  type PriceSnapshot,
  type QuoteProvider,
} from "./quote-provider.js";
import type { YahooClient, YahooQuote } from "./yahoo-client.js";

function numOrNull(v: number | undefined): number | null {
  return v !== undefined && Number.isFinite(v) ? v : null;
}

/**
 * Map a Yahoo quote payload onto a snapshot.
 * Returns null when the payload carries no usable market price.
 */
export function toSnapshot(
  symbol: string,
  quote: YahooQuote | undefined,
  capturedAt: Date = new Date(),
): PriceSnapshot | null {
  if (!quote) return null;

  const price = numOrNull(quote.regularMarketPrice);
  if (price === null) return null;

  const snapshot: PriceSnapshot = Object.freeze({
    symbol: normalizeSymbol(symbol),
    price,
    currency: quote.currency?.trim() ? quote.currency : null,
    change: numOrNull(quote.regularMarketChange),
    changePercent: numOrNull(quote.regularMarketChangePercent),
    volume: numOrNull(quote.regularMarketVolume),
    marketCap: numOrNull(quote.marketCap),
    previousClose: numOrNull(quote.regularMarketPreviousClose),
    open: numOrNull(quote.regularMarketOpen),
    dayHigh: numOrNull(quote.regularMarketDayHigh),
    dayLow: numOrNull(quote.regularMarketDayLow),
    timestamp: capturedAt.toISOString(),
  });

  return hasUsablePrice(snapshot) ? snapshot : null;
}

export class YahooQuoteProvider implements QuoteProvider {
  constructor(
    private readonly client: YahooClient,
    private readonly logger: Logger,
  ) {}

  async fetch(symbol: string): Promise<PriceSnapshot | null> {
    const sym = normalizeSymbol(symbol);

    let quote: YahooQuote | undefined;
    try {
      quote = await this.client.quote(sym);
    } catch (err) {
      this.logger.warn({ err, symbol: sym }, "Yahoo quote request failed");
      throw new UpstreamError(`Quote source failed for ${sym}`, sym, err);
    }

    const snapshot = toSnapshot(sym, quote);
    if (!snapshot) {
      this.logger.debug({ symbol: sym }, "Yahoo returned no usable price");
    }
    return snapshot;
  }
}
