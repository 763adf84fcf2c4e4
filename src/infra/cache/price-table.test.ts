import { describe, expect, it } from "vitest";

import { T0, snapshot } from "../../testing/fakes.js";
import { PriceTable } from "./price-table.js";

/** Every symbol with a metadata row; a cutoff nothing predates evicts nothing. */
const tracked = (table: PriceTable) => table.partition(Number.NEGATIVE_INFINITY).live;

describe("PriceTable", () => {
  it("touch creates metadata without a snapshot", () => {
    const table = new PriceTable();

    expect(table.touch("AAPL", T0)).toBeUndefined();
    expect(table.size).toBe(0);
    expect(tracked(table)).toEqual(["AAPL"]);
    expect(table.inspect("AAPL")).toBeUndefined();
  });

  it("touch keeps lastRefreshed and moves lastRequested", () => {
    const table = new PriceTable();
    table.put("AAPL", snapshot("AAPL", 195.5), T0);

    table.touch("AAPL", T0 + 10);

    expect(table.inspect("AAPL")?.meta).toEqual({ lastRequested: T0 + 10, lastRefreshed: T0 });
  });

  it("commitRefresh only writes tracked symbols", () => {
    const table = new PriceTable();
    table.touch("MSFT", T0);

    expect(table.commitRefresh("MSFT", snapshot("MSFT", 410), T0 + 5)).toBe(true);
    expect(table.commitRefresh("TSLA", snapshot("TSLA", 250), T0 + 5)).toBe(false);

    expect(table.inspect("MSFT")?.meta).toEqual({ lastRequested: T0, lastRefreshed: T0 + 5 });
    expect(table.symbols()).toEqual(["MSFT"]);
  });

  it("partition evicts expired rows from both tables", () => {
    const table = new PriceTable();
    table.put("OLD", snapshot("OLD", 1), T0);
    table.touch("SEEN", T0 + 100);
    table.put("NEW", snapshot("NEW", 2), T0 + 200);

    expect(table.partition(T0 + 100)).toEqual({ live: ["NEW"], expired: ["OLD", "SEEN"] });
    expect(table.symbols()).toEqual(["NEW"]);
    expect(tracked(table)).toEqual(["NEW"]);
  });

  it("delete drops a cached symbol from both tables", () => {
    const table = new PriceTable();
    table.put("AAPL", snapshot("AAPL", 195.5), T0);

    expect(table.delete("AAPL")).toBe(true);
    expect(table.symbols()).toEqual([]);
    expect(tracked(table)).toEqual([]);
  });

  it("delete leaves a visited but uncached symbol tracked", () => {
    const table = new PriceTable();
    table.touch("NVDA", T0);

    expect(table.delete("NVDA")).toBe(false);
    expect(tracked(table)).toEqual(["NVDA"]);
    expect(table.partition(T0 - 1)).toEqual({ live: ["NVDA"], expired: [] });
  });

  it("keeps every snapshot paired with metadata under interleaved async callers", async () => {
    const table = new PriceTable();
    const symbols = Array.from({ length: 50 }, (_, i) => `SYM${i}`);

    await Promise.all(
      symbols.flatMap((symbol, i) => [
        (async () => {
          await Promise.resolve();
          table.touch(symbol, T0 + i);
          await Promise.resolve();
          table.put(symbol, snapshot(symbol, i + 1), T0 + i);
        })(),
        (async () => {
          await Promise.resolve();
          table.touch(symbol, T0 + i + 1);
          if (i % 5 === 0) table.delete(symbol);
        })(),
      ]),
    );

    const trackedSet = new Set(tracked(table));
    for (const symbol of table.symbols()) {
      expect(trackedSet.has(symbol)).toBe(true);
      expect(table.inspect(symbol)?.snapshot.symbol).toBe(symbol);
    }
    expect(table.size).toBe(50);
  });
});
