import "express-async-errors"; // Must be imported before any route handlers
import express, { Express, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import { createApiRouter, type ApiDependencies } from "./routes/index";
import { errorHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import { generalLimiter } from "./middleware/rateLimiter";
import { sanitizeBody } from "./middleware/sanitize";
import { env } from "./config/env";

/** Base64 images travel in JSON bodies. */
const JSON_BODY_LIMIT = "25mb";

function createApp(deps: ApiDependencies): Express {
  const app = express();

  // Trust proxy headers (X-Forwarded-For, etc.) when running behind nginx/load balancer.
  // Required for accurate IP detection in rate limiting and request logging.
  if (env.TRUST_PROXY) {
    app.set("trust proxy", 1);
  }

  // Security headers
  app.use(helmet());

  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      exposedHeaders: ["X-Request-Id", "X-Image-Filename"],
    })
  );

  // Body parsing
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  // Input sanitization (trim, enforce prompt length limits)
  app.use(sanitizeBody);

  // Request logging
  app.use(requestLogger);

  // General rate limiting
  app.use(generalLimiter);

  // API routes
  app.use("/api", createApiRouter(deps));

  // Catch-all 404 for any /api route that was not matched above
  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({
      error: {
        message: "Not found",
        code: "NOT_FOUND",
      },
    });
  });

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}

export { createApp };
