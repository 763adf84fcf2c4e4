// src/infra/market/quote-provider.ts

/** One point-in-time quote for a symbol. */
export type PriceSnapshot = Readonly<{
  symbol: string;
  price: number;
  currency: string | null;
  change: number | null;
  changePercent: number | null;
  volume: number | null;
  marketCap: number | null;
  previousClose: number | null;
  open: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  /** ISO-8601 capture time */
  timestamp: string;
}>;

/**
 * Outbound market-data capability shared by on-demand lookups and the
 * background refresh.
 *
 * Resolves `null` when the source has no usable quote for the symbol and
 * rejects with {@link UpstreamError} when the source itself failed.
 */
export interface QuoteProvider {
  fetch(symbol: string): Promise<PriceSnapshot | null>;
}

export class UpstreamError extends Error {
  public readonly name = "UpstreamError";

  constructor(
    message: string,
    public readonly symbol: string,
    public readonly cause?: unknown,
  ) {
    super(message);
  }
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function hasUsablePrice(s: PriceSnapshot | null | undefined): s is PriceSnapshot {
  return !!s && Number.isFinite(s.price) && s.price > 0;
}
