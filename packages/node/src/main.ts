/**
 * @ledgersync/node: Entry point.
 *
 * Bootstraps the Hono app, loads config and data files, assigns the
 * transitory account, starts the HTTP server, and handles graceful
 * shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { buildPrecision, loadConfig } from "./config.js";
import { loadAccounts, loadPriceHistory } from "./data-files.js";
import { createApp } from "./app.js";

// =============================================================================
// Re-exports (package public API)
// =============================================================================

export { loadConfig, parseCurrencyPrecision, buildPrecision, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export {
  loadAccounts,
  loadPriceHistory,
  parseAccounts,
  parsePriceHistory,
} from "./data-files.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const [accounts, prices] = await Promise.all([
    loadAccounts(config.ACCOUNTS_FILE),
    loadPriceHistory(config.PRICE_HISTORY_FILE),
  ]);

  const { app, service } = createApp({
    serviceConfig: {
      reportingCurrency: config.REPORTING_CURRENCY,
      precision: buildPrecision(config),
      accounts,
      prices,
      logger,
    },
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  if (config.TRANSITORY_ACCOUNT !== undefined) {
    const transitory = await service.setTransitoryAccount(config.TRANSITORY_ACCOUNT);
    logger.info(transitory, "Transitory account assigned");
  } else {
    logger.warn("TRANSITORY_ACCOUNT is not set; sanitization requests will fail until assigned");
  }

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      reportingCurrency: config.REPORTING_CURRENCY,
      accounts: accounts.length,
      priceCurrencies: service.prices.currencies,
    },
    "Ledger sanitizer started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

// Only run when executed directly (not when imported)
main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
