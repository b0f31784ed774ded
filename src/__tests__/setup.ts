/**
 * Test setup file for vitest.
 *
 * Sets environment variables BEFORE any application module is imported.
 * This prevents the env validation in config/env.ts from throwing when
 * NAI_TOKEN is not set in the shell environment. No test talks to the real
 * image service: clients get an in-process `fetch`.
 */

process.env.NAI_TOKEN = process.env.NAI_TOKEN || "test-token";
process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = "error";
