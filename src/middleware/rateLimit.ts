import rateLimit from "express-rate-limit";
import { getEnv } from "../config/env.js";

export function createApiRateLimiter() {
  const env = getEnv();

  return rateLimit({
    windowMs: env.API_RATE_WINDOW_MS,
    limit: env.API_RATE_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: "rate_limited",
      message: "Too many requests, please try again later",
      retryInSeconds: Math.ceil(env.API_RATE_WINDOW_MS / 1000),
    },
    keyGenerator: (req) => {
      const forwarded = req.headers["x-forwarded-for"];
      if (typeof forwarded === "string") {
        return forwarded.split(",")[0]?.trim() || "unknown";
      }
      return req.ip ?? "unknown";
    },
  });
}

// Manual refreshes hit all four stores at once.
export function createRefreshRateLimiter() {
  const env = getEnv();

  return rateLimit({
    windowMs: env.API_RATE_WINDOW_MS,
    limit: 2,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: "rate_limited",
      message: "Catalog refresh was requested too often",
      retryInSeconds: Math.ceil(env.API_RATE_WINDOW_MS / 1000),
    },
  });
}
