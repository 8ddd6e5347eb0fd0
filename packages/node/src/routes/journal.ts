/**
 * Journal routes.
 *
 * POST /api/v1/journal/preview - Sanitize, then map to remote journal entries
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { JournalPreviewRequestSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createJournalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/preview", validateBody(JournalPreviewRequestSchema), async (c) => {
    const body = c.get("validatedBody");
    const entries = await c.get("service").previewJournal(body.lines);
    return c.json({ entries });
  });

  return routes;
}
