// src/app.ts
import type { AppEnv } from "./config/env.js";
import type { Logger } from "./infra/logger.js";

import { PriceCache } from "./infra/cache/price-cache.js";
import { RefreshScheduler } from "./infra/cache/refresh-scheduler.js";
import { MarketDataService } from "./infra/market/market-data-service.js";
import type { QuoteProvider } from "./infra/market/quote-provider.js";
import { QuoteService } from "./infra/market/quote-service.js";
import {
  createYahooClient,
  type YahooClient,
} from "./infra/market/yahoo-client.js";
import { YahooQuoteProvider } from "./infra/market/yahoo-quote-provider.js";

import { HttpServer } from "./infra/http/http-server.js";
import { registerRoutes } from "./infra/http/routes.js";

export class CacheNotInitializedError extends Error {
  public readonly name = "CacheNotInitializedError";

  constructor() {
    super("Price cache not initialized. Call App.init() or App.start() first.");
  }
}

type Running = Readonly<{
  cache: PriceCache;
  scheduler: RefreshScheduler;
  server: HttpServer;
}>;

export class App {
  private running: Running | null = null;

  constructor(
    private readonly env: AppEnv,
    private readonly logger: Logger,
    private readonly yahoo: YahooClient = createYahooClient(),
    private readonly provider: QuoteProvider = new YahooQuoteProvider(
      yahoo,
      logger,
    ),
  ) {}

  get cache(): PriceCache {
    return this.runningOrThrow().cache;
  }

  get server(): HttpServer {
    return this.runningOrThrow().server;
  }

  /** Build the cache, routes and scheduler without binding a port. */
  init(): void {
    if (this.running) return;

    const cache = new PriceCache(this.env.cache, this.provider, this.logger);
    const scheduler = new RefreshScheduler(cache, this.logger);
    const quotes = new QuoteService(cache, this.provider, this.logger);
    const market = new MarketDataService(this.yahoo, this.logger);

    const server = new HttpServer(this.env, this.logger);
    registerRoutes(server.app, {
      quotes,
      market,
      cache,
      logger: this.logger,
      appName: this.env.appName,
      appVersion: this.env.appVersion,
    });

    this.running = Object.freeze({ cache, scheduler, server });
  }

  async start(): Promise<void> {
    this.logger.info({}, "✅ App.start()");
    this.init();

    const { scheduler, server } = this.runningOrThrow();
    scheduler.start();
    await server.listen();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    const { scheduler, server } = this.running;

    await scheduler.stop();
    await server.close();
    this.running = null;
    this.logger.info({}, "App stopped");
  }

  private runningOrThrow(): Running {
    if (!this.running) throw new CacheNotInitializedError();
    return this.running;
  }
}
