/**
 * Rate limiting middleware using express-rate-limit.
 *
 * Every generation call spends the account's credits upstream, so the whole
 * /api surface sits behind one per-IP limiter. The default in-memory store
 * keeps counters per process.
 */

import rateLimit, { ipKeyGenerator } from "express-rate-limit";
import { Request } from "express";
import { env } from "../config/env";

const isTest = process.env.NODE_ENV === "test";

/** In test mode, set limits high enough to avoid interfering with test suites. */
const testMax = 10000;

/**
 * General API rate limiter.
 * Defaults: 300 requests per 15 minutes (900000ms) per IP.
 * Configurable via RATE_LIMIT_MAX and RATE_LIMIT_WINDOW_MS env vars.
 *
 * With TRUST_PROXY=true, req.ip comes from X-Forwarded-For, so clients behind
 * a reverse proxy get separate counters.
 */
export const generalLimiter = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  max: isTest ? testMax : env.RATE_LIMIT_MAX,
  standardHeaders: true, // Return rate limit info in RateLimit-* headers
  legacyHeaders: false, // Disable X-RateLimit-* headers
  // ipKeyGenerator collapses IPv6 addresses to /56 subnets to prevent bypass.
  keyGenerator: (req: Request) => ipKeyGenerator(req.ip || "unknown"),
  message: {
    error: {
      message: "Too many requests, please try again later.",
      code: "RATE_LIMIT_EXCEEDED",
    },
  },
});
