import helmet from "helmet";
import { getEnv } from "../config/env.js";

// JSON-only API: nothing is ever rendered, so the policy denies everything.
export function createHelmet() {
  const env = getEnv();

  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    crossOriginResourcePolicy: { policy: "cross-origin" },
    hsts: env.NODE_ENV === "production" ? {
      maxAge: 31536000,
      includeSubDomains: true,
    } : false,
  });
}
