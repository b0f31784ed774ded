/**
 * Centralized environment configuration for the web API.
 * Validates required variables when first imported and exports a typed config.
 *
 * The library modules under services/ never read this file; everything they
 * need is passed in through constructor options.
 */

import dotenv from "dotenv";
import * as path from "path";

// Auto-load .env from the project root
dotenv.config({ path: path.resolve(__dirname, "../../.env") });

interface EnvConfig {
  /** Bearer token for the image service */
  NAI_TOKEN: string;
  /** Host serving generation, director and vibe endpoints */
  NAI_IMAGE_HOST: string;
  /** Per-request timeout towards the image service, in milliseconds (default: 30000) */
  REQUEST_TIMEOUT_MS: number;
  /** Web API port (default: 8000) */
  PORT: number;
  /** Node environment (default: development) */
  NODE_ENV: string;
  /** CORS origin for browser clients (default: http://localhost:5173) */
  CORS_ORIGIN: string;
  /** Minimum log level: debug, info, warn, error (default: info) */
  LOG_LEVEL: string;
  /** Whether to trust X-Forwarded-* headers (default: false) */
  TRUST_PROXY: boolean;
  /** Rate limit window in milliseconds (default: 900000 = 15 minutes) */
  RATE_LIMIT_WINDOW_MS: number;
  /** Maximum requests per window per IP (default: 300) */
  RATE_LIMIT_MAX: number;
  /** Log payloads and estimated cost for each generation (default: false) */
  VERBOSE: boolean;
  /** Whether the account is on the tier with free generations (default: false) */
  IS_OPUS: boolean;
  /** Directory the server writes generated images to; unset or empty turns saving off */
  IMAGE_OUTPUT_DIR?: string;
}

const REQUIRED_VARS = ["NAI_TOKEN"] as const;

function readFlag(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

/**
 * Throws a descriptive error listing every missing required variable.
 */
function validateEnv(): void {
  const missing: string[] = [];

  for (const varName of REQUIRED_VARS) {
    const value = process.env[varName];
    if (value === undefined || value.trim() === "") {
      missing.push(varName);
    }
  }

  if (missing.length > 0) {
    const message = [
      "",
      "=== Missing Required Environment Variables ===",
      "",
      ...missing.map((v) => `  - ${v}`),
      "",
      "Please set these variables in your .env file or environment.",
      "See .env.example for reference.",
      "",
    ].join("\n");

    throw new Error(message);
  }
}

function loadEnvConfig(): EnvConfig {
  validateEnv();

  return {
    NAI_TOKEN: process.env.NAI_TOKEN || "",
    NAI_IMAGE_HOST: process.env.NAI_IMAGE_HOST || "https://image.novelai.net",
    REQUEST_TIMEOUT_MS: parseInt(process.env.REQUEST_TIMEOUT_MS || "30000", 10),
    PORT: parseInt(process.env.PORT || "8000", 10),
    NODE_ENV: process.env.NODE_ENV || "development",
    CORS_ORIGIN: process.env.CORS_ORIGIN || "http://localhost:5173",
    LOG_LEVEL: (process.env.LOG_LEVEL || "info").toLowerCase(),
    TRUST_PROXY: readFlag(process.env.TRUST_PROXY),
    RATE_LIMIT_WINDOW_MS: parseInt(process.env.RATE_LIMIT_WINDOW_MS || "900000", 10),
    RATE_LIMIT_MAX: parseInt(process.env.RATE_LIMIT_MAX || "300", 10),
    VERBOSE: readFlag(process.env.VERBOSE),
    IS_OPUS: readFlag(process.env.IS_OPUS),
    IMAGE_OUTPUT_DIR: process.env.IMAGE_OUTPUT_DIR || undefined,
  };
}

const env = loadEnvConfig();

export { env };
export type { EnvConfig };
