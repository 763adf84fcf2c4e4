import { describe, expect, it } from "vitest";

import { PriceCache } from "../cache/price-cache.js";
import { HttpError } from "../http/errors.js";
import { FakeQuoteProvider, silentLogger, snapshot } from "../../testing/fakes.js";
import { UpstreamError } from "./quote-provider.js";
import { QuoteService, parseSymbolList } from "./quote-service.js";

function setup(enabled = true) {
  const provider = new FakeQuoteProvider();
  const logger = silentLogger();
  const cache = new PriceCache(
    { enabled, ttlDays: 7, refreshIntervalMinutes: 30, refreshDelayMs: 0 },
    provider,
    logger,
  );
  return { provider, cache, service: new QuoteService(cache, provider, logger) };
}

async function statusOf(p: Promise<unknown>): Promise<number | undefined> {
  try {
    await p;
    return undefined;
  } catch (err) {
    return err instanceof HttpError ? err.status : -1;
  }
}

describe("parseSymbolList", () => {
  it("normalizes, drops blanks and de-duplicates in order", () => {
    expect(parseSymbolList(" aapl, MSFT,,aapl ,tsla")).toEqual(["AAPL", "MSFT", "TSLA"]);
  });
});

describe("QuoteService.getQuote", () => {
  it("fetches on a miss, then serves from the cache", async () => {
    const { provider, service, cache } = setup();
    provider.respond("AAPL", snapshot("AAPL", 195.5));

    const first = await service.getQuote("aapl");
    const second = await service.getQuote("AAPL");

    expect(first.source).toBe("provider");
    expect(second.source).toBe("cache");
    expect(second.snapshot.price).toBe(195.5);
    expect(provider.calls).toEqual(["AAPL"]);
    expect(cache.getStats()).toMatchObject({ cacheHits: 1, cacheMisses: 1, cachedSymbols: 1 });
  });

  it("fetches every time when the cache is disabled", async () => {
    const { provider, service } = setup(false);
    provider.respond("AAPL", snapshot("AAPL", 195.5));

    await service.getQuote("AAPL");
    const again = await service.getQuote("AAPL");

    expect(again.source).toBe("provider");
    expect(provider.calls).toEqual(["AAPL", "AAPL"]);
  });

  it("answers 404 when the source has no usable price", async () => {
    const { provider, service, cache } = setup();
    provider.respond("ZERO", snapshot("ZERO", 0));

    expect(await statusOf(service.getQuote("NOPE"))).toBe(404);
    expect(await statusOf(service.getQuote("ZERO"))).toBe(404);
    expect(cache.getStats().cachedSymbols).toBe(0);
  });

  it("answers 502 when the source fails", async () => {
    const { provider, service } = setup();
    provider.respond("AAPL", new UpstreamError("timeout", "AAPL"));

    expect(await statusOf(service.getQuote("AAPL"))).toBe(502);
  });

  it("rejects a blank symbol", async () => {
    const { service } = setup();
    expect(await statusOf(service.getQuote("   "))).toBe(400);
  });
});

describe("QuoteService.getQuotes", () => {
  it("reports failures per symbol without failing the batch", async () => {
    const { provider, service } = setup();
    provider.respond("AAPL", snapshot("AAPL", 195.5));

    const res = await service.getQuotes("aapl,MSFT");

    expect(res.count).toBe(2);
    expect(res.quotes[0]).toEqual({ ...snapshot("AAPL", 195.5), cached: false });
    expect(res.quotes[1]).toEqual({ symbol: "MSFT", error: "No data found for symbol: MSFT" });
  });

  it("marks quotes served from the cache", async () => {
    const { provider, service } = setup();
    provider.respond("AAPL", snapshot("AAPL", 195.5));
    await service.getQuote("AAPL");

    const res = await service.getQuotes("AAPL");
    expect(res.quotes).toEqual([{ ...snapshot("AAPL", 195.5), cached: true }]);
  });

  it("rejects empty and oversized batches", async () => {
    const { service } = setup();
    const tooMany = Array.from({ length: 51 }, (_, i) => `S${i}`).join(",");

    expect(await statusOf(service.getQuotes(" , "))).toBe(400);
    expect(await statusOf(service.getQuotes(tooMany))).toBe(400);
  });
});
