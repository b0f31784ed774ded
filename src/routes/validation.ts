/**
 * Request body helpers shared by the route modules.
 */

import { Response } from "express";

export interface ValidationError {
  field: string;
  message: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Body as a plain object; anything else reads as empty. */
export function bodyOf(body: unknown): Record<string, unknown> {
  return isRecord(body) ? body : {};
}

export function sendValidationErrors(res: Response, errors: ValidationError[]): void {
  res.status(400).json({
    error: {
      message: "Validation failed",
      code: "VALIDATION_ERROR",
      details: errors,
    },
  });
}

/** Optional string field; records an error when present with another type. */
export function optionalString(
  body: Record<string, unknown>,
  field: string,
  errors: ValidationError[]
): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    errors.push({ field, message: `${field} must be a string` });
    return undefined;
  }
  return value;
}

/** Optional finite number; range checks are left to the normalizer. */
export function optionalNumber(
  body: Record<string, unknown>,
  field: string,
  errors: ValidationError[]
): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    errors.push({ field, message: `${field} must be a number` });
    return undefined;
  }
  return value;
}
