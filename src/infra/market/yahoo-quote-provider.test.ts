import { describe, expect, it } from "vitest";

import { FakeYahooClient, silentLogger } from "../../testing/fakes.js";
import { UpstreamError } from "./quote-provider.js";
import type { YahooQuote } from "./yahoo-client.js";
import { YahooQuoteProvider, toSnapshot } from "./yahoo-quote-provider.js";

const CAPTURED = new Date("2026-01-05T15:00:00.000Z");

const QUOTE: YahooQuote = {
  currency: "USD",
  regularMarketPrice: 195.5,
  regularMarketChange: 2.3,
  regularMarketChangePercent: 1.19,
  regularMarketVolume: 51_000_000,
  marketCap: 3_000_000_000_000,
  regularMarketPreviousClose: 193.2,
  regularMarketOpen: 194,
  regularMarketDayHigh: 196.1,
  regularMarketDayLow: 193.8,
};

describe("toSnapshot", () => {
  it("maps the Yahoo quote fields", () => {
    expect(toSnapshot("aapl", QUOTE, CAPTURED)).toEqual({
      symbol: "AAPL",
      price: 195.5,
      currency: "USD",
      change: 2.3,
      changePercent: 1.19,
      volume: 51_000_000,
      marketCap: 3_000_000_000_000,
      previousClose: 193.2,
      open: 194,
      dayHigh: 196.1,
      dayLow: 193.8,
      timestamp: "2026-01-05T15:00:00.000Z",
    });
  });

  it("nulls out missing or malformed optional fields", () => {
    const snap = toSnapshot("X", { regularMarketPrice: 10, marketCap: Number.NaN, currency: " " }, CAPTURED);

    expect(snap?.marketCap).toBeNull();
    expect(snap?.currency).toBeNull();
    expect(snap?.volume).toBeNull();
  });

  it("returns null without a usable price", () => {
    expect(toSnapshot("X", undefined, CAPTURED)).toBeNull();
    expect(toSnapshot("X", { currency: "USD" }, CAPTURED)).toBeNull();
    expect(toSnapshot("X", { regularMarketPrice: -3 }, CAPTURED)).toBeNull();
    expect(toSnapshot("X", { regularMarketPrice: 0 }, CAPTURED)).toBeNull();
    expect(toSnapshot("X", { regularMarketPrice: Number.NaN }, CAPTURED)).toBeNull();
  });
});

describe("YahooQuoteProvider", () => {
  it("queries the normalized symbol", async () => {
    const client = new FakeYahooClient().withQuote("AAPL", QUOTE);

    const snap = await new YahooQuoteProvider(client, silentLogger()).fetch(" aapl ");

    expect(client.calls).toEqual(["quote:AAPL"]);
    expect(snap?.price).toBe(195.5);
  });

  it("resolves null when Yahoo has no quote", async () => {
    const client = new FakeYahooClient();
    expect(await new YahooQuoteProvider(client, silentLogger()).fetch("NOPE")).toBeNull();
  });

  it("wraps client failures in UpstreamError", async () => {
    const client = new FakeYahooClient().failWith(new Error("socket hang up"));

    await expect(new YahooQuoteProvider(client, silentLogger()).fetch("AAPL")).rejects.toBeInstanceOf(
      UpstreamError,
    );
  });
});
