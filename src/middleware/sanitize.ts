/**
 * Input sanitization middleware.
 *
 * - Trims whitespace from all string fields in `req.body`.
 * - Enforces maximum lengths for free-text fields:
 *     prompt           -> 8000 chars
 *     negative_prompt  -> 8000 chars
 *     emotion          -> 32 chars
 *
 * Prompt text is sent upstream verbatim, so markup is not stripped here:
 * characters such as `{`, `[` and `<` carry weighting syntax.
 *
 * Apply after body parsing and before route handlers.
 */

import { Request, Response, NextFunction } from "express";

// ---------------------------------------------------------------------------
// Known field length limits
// ---------------------------------------------------------------------------

const FIELD_MAX_LENGTHS: Record<string, number> = {
  prompt: 8000,
  negative_prompt: 8000,
  emotion: 32,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Recursively sanitize all string values.
 * - Trims whitespace
 * - Truncates known fields to their max length
 */
function sanitizeValue(key: string, value: unknown): unknown {
  if (typeof value === "string") {
    let sanitized = value.trim();

    const maxLen = FIELD_MAX_LENGTHS[key];
    if (maxLen && sanitized.length > maxLen) {
      sanitized = sanitized.slice(0, maxLen);
    }

    return sanitized;
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => sanitizeValue(String(index), item));
  }

  if (isPlainObject(value)) {
    return sanitizeObject(value);
  }

  return value;
}

function sanitizeObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(obj)) {
    result[key] = sanitizeValue(key, val);
  }
  return result;
}

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

/**
 * Express middleware that sanitizes `req.body` in place.
 * Should be mounted after `express.json()`.
 */
export function sanitizeBody(req: Request, _res: Response, next: NextFunction): void {
  const body: unknown = req.body;
  if (isPlainObject(body)) {
    req.body = sanitizeObject(body);
  }
  next();
}
