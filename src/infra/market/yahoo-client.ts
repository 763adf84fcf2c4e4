// src/infra/market/yahoo-client.ts
import YahooFinance from "yahoo-finance2";

/** Fields of the yahoo-finance2 `Quote` this service reads. */
export type YahooQuote = {
  currency?: string;
  regularMarketPrice?: number;
  regularMarketChange?: number;
  regularMarketChangePercent?: number;
  regularMarketVolume?: number;
  marketCap?: number;
  regularMarketPreviousClose?: number;
  regularMarketOpen?: number;
  regularMarketDayHigh?: number;
  regularMarketDayLow?: number;
};

export const CHART_INTERVALS = [
  "1m",
  "2m",
  "5m",
  "15m",
  "30m",
  "60m",
  "90m",
  "1h",
  "1d",
  "5d",
  "1wk",
  "1mo",
  "3mo",
] as const;

export type ChartInterval = (typeof CHART_INTERVALS)[number];

export type ChartQuery = {
  period1: Date;
  interval: ChartInterval;
  events: string;
};

export type YahooChartBar = {
  date: Date;
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  volume?: number | null;
};

export type YahooDividend = {
  date: Date;
  amount: number;
};

export type YahooChart = {
  quotes: YahooChartBar[];
  events?: {
    dividends?: YahooDividend[];
  };
};

export type SummaryModule = "assetProfile" | "price";

export type YahooSummary = {
  assetProfile?: {
    sector?: string;
    industry?: string;
    website?: string;
    longBusinessSummary?: string;
    country?: string;
    fullTimeEmployees?: number;
  };
  price?: {
    longName?: string | null;
    shortName?: string | null;
    marketCap?: number;
  };
};

/** The slice of the yahoo-finance2 client this service talks to. */
export interface YahooClient {
  quote(symbol: string): Promise<YahooQuote | undefined>;
  chart(symbol: string, query: ChartQuery): Promise<YahooChart>;
  quoteSummary(
    symbol: string,
    query: { modules: SummaryModule[] },
  ): Promise<YahooSummary>;
}

export function createYahooClient(): YahooClient {
  const yf = new YahooFinance();
  return {
    quote: (symbol) => yf.quote(symbol),
    chart: (symbol, query) => yf.chart(symbol, query),
    quoteSummary: (symbol, query) => yf.quoteSummary(symbol, query),
  };
}
