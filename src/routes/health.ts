/**
 * Health check endpoint.
 *
 * Response shape:
 *   {
 *     status: "ok",
 *     timestamp: string,
 *     uptime: number,
 *     memory: { rss, heapUsed, heapTotal, external } (all in MB)
 *   }
 *
 * The image service is not probed: every call to it costs credits.
 */

import { Router, Request, Response } from "express";

const healthRouter = Router();

healthRouter.get("/", (_req: Request, res: Response) => {
  const mem = process.memoryUsage();
  const toMB = (bytes: number) => Math.round((bytes / 1024 / 1024) * 100) / 100;

  res.json({
    status: "ok",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    memory: {
      rss: toMB(mem.rss),
      heapUsed: toMB(mem.heapUsed),
      heapTotal: toMB(mem.heapTotal),
      external: toMB(mem.external),
    },
  });
});

export { healthRouter };
