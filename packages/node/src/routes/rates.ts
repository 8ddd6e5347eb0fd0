/**
 * Exchange rate routes.
 *
 * POST /api/v1/rates/resolve - Currency and eight-digit rate of one transaction
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ResolveRateRequestSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createRateRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/resolve", validateBody(ResolveRateRequestSchema), (c) => {
    const body = c.get("validatedBody");
    return c.json(c.get("service").resolveRate(body.lines, body.mode));
  });

  return routes;
}
