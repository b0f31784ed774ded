import dotenv from "dotenv";

// Load environment variables before anything else
dotenv.config();

// Import env config (validates required vars immediately)
import { env } from "./config/env";
import { logger } from "./config/logger";
import { createApp } from "./app";
import { ImageGenerationClient } from "./services/client";

async function start(): Promise<void> {
  const client = new ImageGenerationClient({
    token: env.NAI_TOKEN,
    host: env.NAI_IMAGE_HOST,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
    verbose: env.VERBOSE,
    isOpus: env.IS_OPUS,
  });

  const app = createApp({
    client,
    isOpus: env.IS_OPUS,
    outputDir: env.IMAGE_OUTPUT_DIR,
  });

  const server = app.listen(env.PORT, () => {
    logger.info("server", `Server is running on http://localhost:${env.PORT}`, {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      imageHost: env.NAI_IMAGE_HOST,
    });
    logger.info("server", `Health check: http://localhost:${env.PORT}/api/health`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info("server", `${signal} received. Shutting down gracefully...`);
    server.close(() => {
      logger.info("server", "Server shut down.");
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((err: unknown) => {
  logger.error("server", "Failed to start", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
