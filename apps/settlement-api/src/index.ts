import { createEngine } from "@stagepay/core";
import { createLedgerStore, type LedgerStore } from "@stagepay/db";
import type express from "express";
import type { Logger } from "pino";
import { createApp } from "./app.js";
import { type AppConfig, loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { buildLedgerDefaults, buildPolicy } from "./setup.js";

export { createApp } from "./app.js";

async function openStore(config: AppConfig, logger: Logger): Promise<LedgerStore> {
  const defaults = buildLedgerDefaults(config);
  const store = createLedgerStore(defaults, config.databaseUrl);
  try {
    await store.init();
    return store;
  } catch (error) {
    if (!config.databaseUrl || !config.dbFallbackToMemory) {
      throw error;
    }
    logger.error({ err: error }, "failed to initialize postgres store, falling back to memory store");
    await store.close();
    const fallback = createLedgerStore(defaults);
    await fallback.init();
    return fallback;
  }
}

export async function bootstrap(config: AppConfig = loadConfig()): Promise<{ app: express.Express; store: LedgerStore; logger: Logger }> {
  const logger = createLogger(config.logLevel);
  const store = await openStore(config, logger);
  const engine = createEngine({ store, policy: buildPolicy(config), logger });

  const app = createApp({
    engine,
    logger,
    keys: { adminApiKey: config.adminApiKey, organizerApiKey: config.organizerApiKey },
    rateLimit: { windowMs: config.rateLimitWindowMs, maxRequests: config.rateLimitMax }
  });
  logger.info({ storeMode: store.mode }, "ledger store ready");
  return { app, store, logger };
}

async function startLocalServer(): Promise<void> {
  const config = loadConfig();
  const { app, store, logger } = await bootstrap(config);
  const server = app.listen(config.port);
  logger.info({ port: config.port }, "settlement-api listening");

  const shutdown = (): void => {
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, "failed to close ledger store");
          process.exit(1);
        }
      );
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

if (process.env.NODE_ENV !== "test" && !process.env.VITEST) {
  startLocalServer().catch((err: unknown) => {
    console.error("Failed to start settlement-api:", err);
    process.exit(1);
  });
}
