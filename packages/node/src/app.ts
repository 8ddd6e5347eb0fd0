/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Tests create the app through this factory without starting
 * the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { SanitizerService } from "./services/sanitizer-service.js";
import type { SanitizerServiceConfig } from "./services/sanitizer-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createErrorEnvelope } from "./types/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createSanitizeRoutes } from "./routes/sanitize.js";
import { createRateRoutes } from "./routes/rates.js";
import { createJournalRoutes } from "./routes/journal.js";
import { createAccountRoutes } from "./routes/accounts.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: SanitizerServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: SanitizerService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new SanitizerService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/api/v1/sanitize", createSanitizeRoutes());
  app.route("/api/v1/rates", createRateRoutes());
  app.route("/api/v1/journal", createJournalRoutes());
  app.route("/api/v1", createAccountRoutes());

  return { app, service };
}

export { SanitizerService } from "./services/sanitizer-service.js";
export type {
  SanitizerServiceConfig,
  SanitizeOverrides,
  SanitizeResult,
  RateResult,
  Readiness,
} from "./services/sanitizer-service.js";
export type { AppEnv } from "./types/api-contract.js";
