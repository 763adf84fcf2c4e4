// src/infra/cache/price-table.ts
import type { PriceSnapshot } from "../market/quote-provider.js";

export type SymbolMetadata = Readonly<{
  /** epoch ms of the most recent client lookup */
  lastRequested: number;
  /** epoch ms of the most recent successful write, null if never written */
  lastRefreshed: number | null;
}>;

export type TableRow = Readonly<{
  snapshot: PriceSnapshot;
  meta: SymbolMetadata;
}>;

export type Partition = Readonly<{
  live: string[];
  expired: string[];
}>;

/**
 * Snapshot and metadata tables for the price cache.
 *
 * Every method is synchronous and never yields, so each call is one atomic
 * step for all other callers on the event loop. Both maps change only inside
 * these methods; a snapshot row never exists without its metadata row.
 */
export class PriceTable {
  private readonly snapshots = new Map<string, PriceSnapshot>();
  private readonly metadata = new Map<string, SymbolMetadata>();

  get size(): number {
    return this.snapshots.size;
  }

  /** Record a lookup at `at` and return a copy of the snapshot, if any. */
  touch(symbol: string, at: number): PriceSnapshot | undefined {
    const prev = this.metadata.get(symbol);
    this.metadata.set(symbol, {
      lastRequested: at,
      lastRefreshed: prev?.lastRefreshed ?? null,
    });

    const snap = this.snapshots.get(symbol);
    return snap ? { ...snap } : undefined;
  }

  /** Store a snapshot written on behalf of a client (counts as a request). */
  put(symbol: string, snapshot: PriceSnapshot, at: number): void {
    this.snapshots.set(symbol, { ...snapshot });
    this.metadata.set(symbol, { lastRequested: at, lastRefreshed: at });
  }

  /**
   * Store a background-refreshed snapshot. Leaves lastRequested alone and
   * refuses symbols that are no longer tracked.
   */
  commitRefresh(symbol: string, snapshot: PriceSnapshot, at: number): boolean {
    const prev = this.metadata.get(symbol);
    if (!prev) return false;

    this.snapshots.set(symbol, { ...snapshot });
    this.metadata.set(symbol, { lastRequested: prev.lastRequested, lastRefreshed: at });
    return true;
  }

  /**
   * Split tracked symbols by `lastRequested > cutoff` and evict the rest
   * from both tables.
   */
  partition(cutoff: number): Partition {
    const live: string[] = [];
    const expired: string[] = [];

    for (const [symbol, meta] of this.metadata) {
      if (meta.lastRequested > cutoff) live.push(symbol);
      else expired.push(symbol);
    }

    for (const symbol of expired) {
      this.snapshots.delete(symbol);
      this.metadata.delete(symbol);
    }

    return { live, expired };
  }

  /** Read one cached row without recording a lookup. */
  inspect(symbol: string): TableRow | undefined {
    const snap = this.snapshots.get(symbol);
    const meta = this.metadata.get(symbol);
    if (!snap || !meta) return undefined;
    return { snapshot: { ...snap }, meta };
  }

  /**
   * Drop a cached symbol from both tables. A symbol with no snapshot keeps
   * its metadata row and stays eligible for refresh.
   */
  delete(symbol: string): boolean {
    if (!this.snapshots.delete(symbol)) return false;
    this.metadata.delete(symbol);
    return true;
  }

  clear(): number {
    const count = this.snapshots.size;
    this.snapshots.clear();
    this.metadata.clear();
    return count;
  }

  /** Symbols with a cached snapshot. */
  symbols(): string[] {
    return [...this.snapshots.keys()];
  }
}
