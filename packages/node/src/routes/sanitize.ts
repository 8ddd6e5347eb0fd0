/**
 * Sanitization route.
 *
 * POST /api/v1/sanitize - Sanitize ledger rows for the remote ledger
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SanitizeRequestSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createSanitizeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(SanitizeRequestSchema), async (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const result = await service.sanitize(body.lines, {
      reportingCurrency: body.reportingCurrency,
      transitoryAccount: body.transitoryAccount,
    });
    return c.json(result);
  });

  return routes;
}
