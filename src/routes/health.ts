import { Router } from "express";
import { getEnv } from "../config/env.js";
import type { CatalogCache } from "../services/catalogCache.js";

export function createHealthRouter(catalog: CatalogCache): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    const env = getEnv();
    const stats = catalog.stats();
    const lastRefreshed = stats.lastRefreshed ? Date.parse(stats.lastRefreshed) : null;

    res.json({
      status: stats.size > 0 ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: env.NODE_ENV,
      catalog: {
        state: stats.state,
        size: stats.size,
        ageSeconds: lastRefreshed === null ? null : Math.round((Date.now() - lastRefreshed) / 1000),
        lastError: stats.lastError,
      },
      memory: {
        used: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
        total: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
      },
      version: process.env.npm_package_version ?? "0.1.0",
    });
  });

  router.get("/health/ready", (_req, res) => {
    const stats = catalog.stats();
    res.status(stats.size > 0 ? 200 : 503).json({
      ready: stats.size > 0,
      catalogState: stats.state,
      timestamp: new Date().toISOString(),
    });
  });

  router.get("/health/live", (_req, res) => {
    res.json({
      alive: true,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
