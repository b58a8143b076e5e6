import { initEnv } from "./config/env.js";
import { createApp } from "./app.js";
import { logger } from "./utils/logger.js";
import { CatalogAggregator } from "./services/catalogAggregator.js";
import { CatalogCache } from "./services/catalogCache.js";
import { createWineSources } from "./services/wineSources/registry.js";

const env = initEnv();

const aggregator = new CatalogAggregator({
  sources: createWineSources(env),
  timeoutMs: env.SOURCE_TIMEOUT_MS,
  standardLimit: env.STANDARD_LIMIT_PER_QUERY,
  premiumLimit: env.PREMIUM_LIMIT_PER_QUERY,
});

const catalog = new CatalogCache({
  load: (postalCode) => aggregator.aggregate(postalCode),
  ttlMs: env.CATALOG_TTL_SECONDS * 1000,
  retryAfterMs: env.CATALOG_RETRY_AFTER_SECONDS * 1000,
  defaultPostalCode: env.CATALOG_DEFAULT_POSTAL_CODE,
});

const app = createApp(catalog);

if (env.CATALOG_PREWARM) {
  logger.info({
    msg: "Pre-warming wine catalog",
    postalCode: env.CATALOG_DEFAULT_POSTAL_CODE,
  });
  catalog.forceRefresh().then(
    () => {
      logger.info({ msg: "Catalog pre-warm finished", ...catalog.stats() });
    },
    (error: unknown) => {
      logger.error({
        msg: "Catalog pre-warm failed",
        error: error instanceof Error ? error.message : String(error),
      });
    }
  );
}

const server = app.listen(env.PORT, () => {
  logger.info({
    msg: "Server started",
    port: env.PORT,
    environment: env.NODE_ENV,
  });
});

function gracefulShutdown(signal: string) {
  logger.info({
    msg: "Graceful shutdown initiated",
    signal,
  });

  server.close((err) => {
    if (err) {
      logger.error({
        msg: "Error during shutdown",
        error: err.message,
      });
      process.exit(1);
    }

    logger.info({
      msg: "Server closed gracefully",
    });
    process.exit(0);
  });

  setTimeout(() => {
    logger.error({
      msg: "Forced shutdown after timeout",
    });
    process.exit(1);
  }, 10000).unref();
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

export default app;
