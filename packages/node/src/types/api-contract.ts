/**
 * Hono environment shared by every route and middleware.
 */

import type { SanitizerService } from "../services/sanitizer-service.js";

export type AppEnv = {
  Variables: {
    requestId: string;
    service: SanitizerService;
  };
};
