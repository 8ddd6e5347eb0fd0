/**
 * Account chart and transitory account routes.
 *
 * GET /api/v1/accounts           - List the account chart
 * GET /api/v1/transitory-account - Validated transitory account (409 when misconfigured)
 * PUT /api/v1/transitory-account - Assign, provisioning the account when missing
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { TransitoryAccountRequestSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/accounts", async (c) => {
    const accounts = await c.get("service").listAccounts();
    return c.json({ accounts });
  });

  routes.get("/transitory-account", async (c) => {
    return c.json(await c.get("service").getTransitoryAccount());
  });

  routes.put("/transitory-account", validateBody(TransitoryAccountRequestSchema), async (c) => {
    const body = c.get("validatedBody");
    return c.json(await c.get("service").setTransitoryAccount(body.account));
  });

  return routes;
}
