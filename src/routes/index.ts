/**
 * API Route Index
 *
 * All routes are mounted under the /api prefix (set in app.ts).
 *
 * ┌─────────────────────────┬────────┬───────────────────────────────────────────────┐
 * │ Endpoint                │ Method │ Description                                   │
 * ├─────────────────────────┼────────┼───────────────────────────────────────────────┤
 * │ /api/health             │ GET    │ Liveness, uptime and memory usage             │
 * ├─────────────────────────┼────────┼───────────────────────────────────────────────┤
 * │ /api/generate-image     │ POST   │ Generate; first image returned as image/png   │
 * │ /api/estimate-cost      │ POST   │ Normalized size and Anlas cost of a request   │
 * ├─────────────────────────┼────────┼───────────────────────────────────────────────┤
 * │ /api/director/:tool     │ POST   │ Run a director tool; result as image/png      │
 * └─────────────────────────┴────────┴───────────────────────────────────────────────┘
 *
 * Error responses follow the shape: { error: { message, code, details? } }
 */

import { Router } from "express";
import type { ImageGenerationClient } from "../services/client";
import { healthRouter } from "./health";
import { createGenerationRouter } from "./generation";
import { createDirectorRouter } from "./director";

export interface ApiDependencies {
  client: ImageGenerationClient;
  /** Default for `is_opus` in cost estimates. */
  isOpus?: boolean;
  /** When set, every returned image is also written here. */
  outputDir?: string;
}

export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();

  // Health check
  router.use("/health", healthRouter);

  // Generation and cost estimate
  router.use("/", createGenerationRouter(deps));

  // Director tools
  router.use("/director", createDirectorRouter(deps));

  return router;
}
