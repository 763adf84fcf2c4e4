// src/infra/market/market-data-service.ts
import { badGateway, badRequest, notFound } from "../http/errors.js";
import type { Logger } from "../logger.js";
import { normalizeSymbol } from "./quote-provider.js";
import {
  CHART_INTERVALS,
  type ChartInterval,
  type YahooChart,
  type YahooClient,
  type YahooSummary,
} from "./yahoo-client.js";

export const HISTORY_PERIODS = [
  "1d",
  "5d",
  "1mo",
  "3mo",
  "6mo",
  "1y",
  "2y",
  "5y",
  "10y",
  "ytd",
  "max",
] as const;

export type HistoryPeriod = (typeof HISTORY_PERIODS)[number];

export const MAX_DIVIDENDS = 100;

export type HistoryRequest = Readonly<{
  symbol: string;
  period?: string | undefined;
  interval?: string | undefined;
}>;

export type HistoryRow = Readonly<{
  /** UTC, `YYYY-MM-DD HH:MM:SS` */
  date: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
}>;

export type HistoryResult = Readonly<{
  symbol: string;
  period: HistoryPeriod;
  interval: ChartInterval;
  data: HistoryRow[];
}>;

export type CompanyInfo = Readonly<{
  symbol: string;
  name: string | null;
  sector: string | null;
  industry: string | null;
  website: string | null;
  description: string | null;
  country: string | null;
  employees: number | null;
  marketCap: number | null;
}>;

export type Dividend = Readonly<{
  /** `YYYY-MM-DD` */
  date: string;
  amount: number;
}>;

export type DividendResult = Readonly<{
  symbol: string;
  period: HistoryPeriod;
  dividends: Dividend[];
  message?: string;
}>;

function oneOf<T extends string>(
  name: string,
  value: string,
  allowed: readonly T[],
): T {
  const hit = allowed.find((a) => a === value);
  if (!hit) {
    throw badRequest(`Invalid ${name}: ${value}`, { allowed: [...allowed] });
  }
  return hit;
}

/** Start of the window `period` reaches back from `now`. */
export function periodStart(period: HistoryPeriod, now: Date): Date {
  const d = new Date(now.getTime());
  switch (period) {
    case "1d":
      d.setUTCDate(d.getUTCDate() - 1);
      break;
    case "5d":
      d.setUTCDate(d.getUTCDate() - 5);
      break;
    case "1mo":
      d.setUTCMonth(d.getUTCMonth() - 1);
      break;
    case "3mo":
      d.setUTCMonth(d.getUTCMonth() - 3);
      break;
    case "6mo":
      d.setUTCMonth(d.getUTCMonth() - 6);
      break;
    case "1y":
      d.setUTCFullYear(d.getUTCFullYear() - 1);
      break;
    case "2y":
      d.setUTCFullYear(d.getUTCFullYear() - 2);
      break;
    case "5y":
      d.setUTCFullYear(d.getUTCFullYear() - 5);
      break;
    case "10y":
      d.setUTCFullYear(d.getUTCFullYear() - 10);
      break;
    case "ytd":
      return new Date(Date.UTC(now.getUTCFullYear(), 0, 1));
    case "max":
      return new Date(0);
  }
  return d;
}

function numOrNull(v: number | null | undefined): number | null {
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

function strOrNull(v: string | null | undefined): string | null {
  return typeof v === "string" && v.trim() ? v : null;
}

/**
 * Uncached market data: price history, company profile and dividends.
 * Reads go straight to Yahoo; nothing here touches the price cache.
 */
export class MarketDataService {
  constructor(
    private readonly client: YahooClient,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async history(req: HistoryRequest): Promise<HistoryResult> {
    const symbol = normalizeSymbol(req.symbol);
    if (!symbol) throw badRequest("symbol is required");

    const period = oneOf("period", req.period ?? "1mo", HISTORY_PERIODS);
    const interval = oneOf("interval", req.interval ?? "1d", CHART_INTERVALS);

    const chart = await this.chart(symbol, {
      period1: periodStart(period, this.now()),
      interval,
      events: "div,splits",
    });

    const data = chart.quotes.map((bar) => ({
      date: bar.date.toISOString().slice(0, 19).replace("T", " "),
      open: numOrNull(bar.open),
      high: numOrNull(bar.high),
      low: numOrNull(bar.low),
      close: numOrNull(bar.close),
      volume: numOrNull(bar.volume),
    }));

    if (data.length === 0) {
      throw notFound(`No historical data found for ${symbol}`);
    }

    this.logger.debug({ symbol, period, interval, rows: data.length }, "History fetched");
    return { symbol, period, interval, data };
  }

  async companyInfo(raw: string): Promise<CompanyInfo> {
    const symbol = normalizeSymbol(raw);
    if (!symbol) throw badRequest("symbol is required");

    let summary: YahooSummary;
    try {
      summary = await this.client.quoteSummary(symbol, {
        modules: ["assetProfile", "price"],
      });
    } catch (err) {
      this.logger.warn({ err, symbol }, "Yahoo quoteSummary request failed");
      throw badGateway(`Failed to fetch company info for ${symbol}`, undefined, err);
    }

    const profile = summary.assetProfile;
    const price = summary.price;
    if (!profile && !price) {
      throw notFound(`No company info found for symbol: ${symbol}`);
    }

    return {
      symbol,
      name: strOrNull(price?.longName) ?? strOrNull(price?.shortName),
      sector: strOrNull(profile?.sector),
      industry: strOrNull(profile?.industry),
      website: strOrNull(profile?.website),
      description: strOrNull(profile?.longBusinessSummary),
      country: strOrNull(profile?.country),
      employees: numOrNull(profile?.fullTimeEmployees),
      marketCap: numOrNull(price?.marketCap),
    };
  }

  async dividends(raw: string, rawPeriod = "1y"): Promise<DividendResult> {
    const symbol = normalizeSymbol(raw);
    if (!symbol) throw badRequest("symbol is required");

    const period = oneOf("period", rawPeriod, HISTORY_PERIODS);
    const chart = await this.chart(symbol, {
      period1: periodStart(period, this.now()),
      interval: "1d",
      events: "div,splits",
    });

    const dividends = (chart.events?.dividends ?? [])
      .filter((d) => Number.isFinite(d.amount))
      .sort((a, b) => a.date.getTime() - b.date.getTime())
      .slice(-MAX_DIVIDENDS)
      .map((d) => ({
        date: d.date.toISOString().slice(0, 10),
        amount: d.amount,
      }));

    if (dividends.length === 0) {
      return { symbol, period, dividends, message: "No dividend data available" };
    }
    return { symbol, period, dividends };
  }

  private async chart(
    symbol: string,
    query: Parameters<YahooClient["chart"]>[1],
  ): Promise<YahooChart> {
    try {
      return await this.client.chart(symbol, query);
    } catch (err) {
      this.logger.warn({ err, symbol }, "Yahoo chart request failed");
      throw badGateway(`Failed to fetch chart data for ${symbol}`, undefined, err);
    }
  }
}
