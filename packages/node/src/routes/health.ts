/**
 * Health check routes.
 *
 * GET /health - Liveness probe (always 200 if server is running)
 * GET /ready  - Readiness probe (200 once the transitory account resolves)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const readiness = await c.get("service").readiness();
    const timestamp = new Date().toISOString();

    if (!readiness.ready) {
      return c.json({ status: "not_ready", reason: readiness.reason, timestamp }, 503);
    }
    return c.json(
      { status: "ready", transitoryAccount: readiness.transitoryAccount, timestamp },
      200,
    );
  });

  return routes;
}
