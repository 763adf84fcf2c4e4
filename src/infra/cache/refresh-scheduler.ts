// src/infra/cache/refresh-scheduler.ts
import { setTimeout as delay } from "node:timers/promises";

import type { Logger } from "../logger.js";

export interface Refreshable {
  readonly enabled: boolean;
  readonly refreshIntervalMs: number;
  refreshAll(): Promise<unknown>;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

const abortableDelay: Sleep = (ms, signal) => delay(ms, undefined, { signal });

/**
 * Background worker: wait one interval, refresh, repeat until stopped.
 * A failed pass is logged and the loop carries on at the same interval.
 */
export class RefreshScheduler {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly target: Refreshable,
    private readonly logger: Logger,
    private readonly sleep: Sleep = abortableDelay,
  ) {}

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.running) return;
    if (!this.target.enabled) {
      this.logger.info({}, "Cache disabled, refresh scheduler not started");
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);

    this.logger.info(
      { intervalMs: this.target.refreshIntervalMs },
      "Refresh scheduler started",
    );
  }

  /** Abort the pending wait and resolve once the loop has exited. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop || !this.controller) return;

    this.controller.abort();
    await loop;

    this.controller = null;
    this.loop = null;
    this.logger.info({}, "Refresh scheduler stopped");
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.sleep(this.target.refreshIntervalMs, signal);
      } catch (err) {
        if (signal.aborted) break;
        this.logger.error({ err }, "Refresh scheduler timer failed");
        continue;
      }

      try {
        await this.target.refreshAll();
      } catch (err) {
        this.logger.error({ err }, "Error in cache refresh pass");
      }
    }
  }
}
