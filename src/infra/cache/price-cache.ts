// src/infra/cache/price-cache.ts
import { setTimeout as delay } from "node:timers/promises";

import type { CacheConfig } from "../../config/env.js";
import type { Logger } from "../logger.js";
import {
  hasUsablePrice,
  normalizeSymbol,
  type PriceSnapshot,
  type QuoteProvider,
} from "../market/quote-provider.js";
import { PriceTable } from "./price-table.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export type CacheStatsView = Readonly<{
  enabled: boolean;
  cachedSymbols: number;
  totalRequests: number;
  cacheHits: number;
  cacheMisses: number;
  hitRatePercent: number;
  totalRefreshes: number;
  refreshErrors: number;
  ttlDays: number;
  refreshIntervalMinutes: number;
  symbols: string[];
}>;

export type SymbolInfo = Readonly<{
  symbol: string;
  price: number;
  cached: true;
  lastRequested: string;
  lastRefreshed: string | null;
  data: PriceSnapshot;
}>;

export type RefreshSummary = Readonly<{
  total: number;
  refreshed: number;
  failed: number;
  /** removed from the cache while their fetch was in flight */
  skipped: number;
}>;

export type PriceCacheOptions = Readonly<{
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}>;

const EMPTY_SUMMARY: RefreshSummary = Object.freeze({
  total: 0,
  refreshed: 0,
  failed: 0,
  skipped: 0,
});

export function hitRatePercent(hits: number, misses: number): number {
  const total = hits + misses;
  if (total === 0) return 0;
  return Math.round((hits / total) * 100 * 100) / 100;
}

/**
 * In-memory quote cache keyed by ticker.
 *
 * Lookups (hits and misses) mark a symbol as wanted; `refreshAll` re-fetches
 * every symbol wanted within the TTL window and evicts the rest.
 */
export class PriceCache {
  private readonly table = new PriceTable();
  private readonly stats = { hits: 0, misses: 0, refreshes: 0, errors: 0 };
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private inflight: Promise<RefreshSummary> | null = null;

  constructor(
    private readonly config: CacheConfig,
    private readonly provider: QuoteProvider,
    private readonly logger: Logger,
    opts: PriceCacheOptions = {},
  ) {
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? ((ms) => delay(ms));

    this.logger.info(
      {
        enabled: config.enabled,
        ttlDays: config.ttlDays,
        refreshIntervalMinutes: config.refreshIntervalMinutes,
      },
      "Price cache initialized",
    );
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  get refreshIntervalMs(): number {
    return this.config.refreshIntervalMinutes * 60 * 1000;
  }

  get(symbol: string): PriceSnapshot | null {
    if (!this.config.enabled) return null;

    const sym = normalizeSymbol(symbol);
    if (!sym) return null;

    const snap = this.table.touch(sym, this.now());

    if (snap) {
      this.stats.hits++;
      this.logger.debug({ symbol: sym }, "Cache HIT");
      return snap;
    }

    this.stats.misses++;
    this.logger.debug({ symbol: sym }, "Cache MISS");
    return null;
  }

  set(symbol: string, snapshot: PriceSnapshot): void {
    if (!this.config.enabled) return;

    const sym = normalizeSymbol(symbol);
    if (!sym) return;

    this.table.put(sym, snapshot, this.now());
    this.logger.debug({ symbol: sym }, "Cached quote");
  }

  getSymbolsToRefresh(): string[] {
    if (!this.config.enabled) return [];

    const cutoff = this.now() - this.config.ttlDays * DAY_MS;
    const { live, expired } = this.table.partition(cutoff);

    for (const symbol of expired) {
      this.logger.info({ symbol }, "Removing expired symbol from cache");
    }
    return live;
  }

  /**
   * Re-fetch every symbol still inside the TTL window, one at a time.
   * A call made while a pass is running shares that pass.
   */
  refreshAll(): Promise<RefreshSummary> {
    if (!this.config.enabled) return Promise.resolve(EMPTY_SUMMARY);
    if (this.inflight) return this.inflight;

    const pass = this.runRefresh().finally(() => {
      this.inflight = null;
    });
    this.inflight = pass;
    return pass;
  }

  private async runRefresh(): Promise<RefreshSummary> {
    const symbols = this.getSymbolsToRefresh();
    if (symbols.length === 0) {
      this.logger.debug({}, "No symbols to refresh");
      return EMPTY_SUMMARY;
    }

    this.logger.info(
      { count: symbols.length, symbols },
      "Refreshing cached symbols",
    );

    let refreshed = 0;
    let failed = 0;
    let skipped = 0;

    for (const [i, symbol] of symbols.entries()) {
      if (i > 0) await this.sleep(this.config.refreshDelayMs);

      let snap: PriceSnapshot | null = null;
      let threw = false;
      try {
        snap = await this.provider.fetch(symbol);
      } catch (err) {
        threw = true;
        this.logger.warn({ err, symbol }, "Error refreshing symbol");
      }

      // prior snapshot, if any, is kept
      if (!hasUsablePrice(snap)) {
        failed++;
        this.stats.errors++;
        if (!threw) this.logger.warn({ symbol }, "Failed to refresh: no data returned");
        continue;
      }

      if (this.table.commitRefresh(symbol, snap, this.now())) {
        refreshed++;
        this.stats.refreshes++;
        this.logger.debug({ symbol, price: snap.price }, "Refreshed symbol");
      } else {
        skipped++;
        this.logger.debug({ symbol }, "Symbol removed during refresh");
      }
    }

    const summary: RefreshSummary = Object.freeze({
      total: symbols.length,
      refreshed,
      failed,
      skipped,
    });
    this.logger.info(summary, "Refresh completed");
    return summary;
  }

  getStats(): CacheStatsView {
    const { hits, misses, refreshes, errors } = this.stats;

    return {
      enabled: this.config.enabled,
      cachedSymbols: this.table.size,
      totalRequests: hits + misses,
      cacheHits: hits,
      cacheMisses: misses,
      hitRatePercent: hitRatePercent(hits, misses),
      totalRefreshes: refreshes,
      refreshErrors: errors,
      ttlDays: this.config.ttlDays,
      refreshIntervalMinutes: this.config.refreshIntervalMinutes,
      symbols: this.table.symbols(),
    };
  }

  getSymbolInfo(symbol: string): SymbolInfo | null {
    if (!this.config.enabled) return null;

    const sym = normalizeSymbol(symbol);
    const row = this.table.inspect(sym);
    if (!row) return null;

    return {
      symbol: sym,
      price: row.snapshot.price,
      cached: true,
      lastRequested: new Date(row.meta.lastRequested).toISOString(),
      lastRefreshed:
        row.meta.lastRefreshed === null
          ? null
          : new Date(row.meta.lastRefreshed).toISOString(),
      data: row.snapshot,
    };
  }

  clear(): number {
    if (!this.config.enabled) return 0;

    const count = this.table.clear();
    this.logger.info({ count }, "Cache cleared");
    return count;
  }

  removeSymbol(symbol: string): boolean {
    if (!this.config.enabled) return false;

    const sym = normalizeSymbol(symbol);
    const removed = this.table.delete(sym);
    if (removed) this.logger.info({ symbol: sym }, "Removed symbol from cache");
    return removed;
  }
}
