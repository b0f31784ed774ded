import crypto from "crypto";
import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";

/**
 * Request logging middleware with request ID correlation.
 *
 * Assigns a unique UUID to each request (available as req.requestId and
 * X-Request-Id response header), then logs structured data on response finish:
 *   - requestId, method, path, statusCode, durationMs
 */
function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = crypto.randomUUID();
  const start = Date.now();

  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);

  res.on("finish", () => {
    const durationMs = Date.now() - start;

    logger.info("http", `${req.method} ${req.originalUrl} ${res.statusCode}`, {
      requestId,
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      durationMs,
    });
  });

  next();
}

export { requestLogger };
