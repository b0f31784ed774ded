import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { ValidationFailure } from "../services/errors";

/**
 * Anything thrown from a route: the library's GatewayError subclasses, or
 * body-parser errors, which carry `statusCode` as well.
 */
interface AppError extends Error {
  statusCode?: number;
  code?: string;
}

function errorHandler(
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = err.statusCode || 500;
  const message = statusCode === 500 ? "Internal server error" : err.message;
  const code = err.code || (statusCode < 500 ? "BAD_REQUEST" : "INTERNAL_ERROR");
  const requestId = req.requestId;

  // Log the error with request context
  if (statusCode >= 500) {
    logger.error("server", statusCode === 500 ? "Unhandled error" : `${statusCode} - ${err.message}`, {
      requestId,
      statusCode,
      code,
      error: err.message,
      ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
    });
  } else {
    logger.warn("server", `${statusCode} - ${err.message}`, {
      requestId,
      statusCode,
      code,
    });
  }

  res.status(statusCode).json({
    error: {
      message,
      code,
      requestId,
      ...(err instanceof ValidationFailure && {
        details: [{ field: err.field, message: err.message }],
      }),
      ...(process.env.NODE_ENV === "development" && {
        stack: err.stack,
      }),
    },
  });
}

export { errorHandler };
export type { AppError };
