import express from "express";
import { createHelmet } from "./middleware/helmet.js";
import { createCors } from "./middleware/cors.js";
import { createApiRateLimiter } from "./middleware/rateLimit.js";
import { errorHandler, notFoundHandler } from "./middleware/error.js";
import { logger } from "./utils/logger.js";
import { createHealthRouter } from "./routes/health.js";
import { createV1Router } from "./routes/v1/index.js";
import type { CatalogCache } from "./services/catalogCache.js";

declare global {
  namespace Express {
    interface Request {
      requestTime?: number;
    }
  }
}

export function createApp(catalog: CatalogCache): express.Express {
  const app = express();

  app.use(express.json({ limit: "16kb" }));

  app.use(createHelmet());
  app.use(createCors());

  app.use((req, res, next) => {
    req.requestTime = Date.now();
    logger.info({
      msg: "Incoming request",
      method: req.method,
      url: req.url,
      ip: req.ip,
    });
    res.on("finish", () => {
      logger.info({
        msg: "Request completed",
        method: req.method,
        url: req.url,
        statusCode: res.statusCode,
        responseTimeMs: Date.now() - (req.requestTime ?? Date.now()),
      });
    });
    next();
  });

  app.use(createHealthRouter(catalog));
  app.use("/api/v1", createApiRateLimiter(), createV1Router(catalog));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
