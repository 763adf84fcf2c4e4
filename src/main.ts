// src/main.ts
import "dotenv/config"; // MUST be first

import { Env } from "./config/env.js";
import { Logger } from "./infra/logger.js";
import { App } from "./app.js";

async function bootstrap() {
  const env = Env.load(); // reads process.env (now dotenv already loaded)
  const logger = Logger.create(env);

  logger.info({ env: env.nodeEnv, port: env.port, cache: env.cache }, "✅ Booting");

  const app = new App(env, logger);
  await app.start();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    app
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.fatal({ err }, "Shutdown failed");
        process.exit(1);
      });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

bootstrap().catch((err) => {
  console.error("FATAL:", err);
  process.exit(1);
});
