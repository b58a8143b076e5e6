import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().min(1).max(65535).default(8080),

  // Catalog cache
  CATALOG_TTL_SECONDS: z.coerce.number().positive().default(30 * 60),
  CATALOG_RETRY_AFTER_SECONDS: z.coerce.number().min(0).default(60),
  CATALOG_DEFAULT_POSTAL_CODE: z.string().regex(/^\d{5}$/).default("46001"),
  CATALOG_PREWARM: z
    .string()
    .transform((val) => val !== "false")
    .default("true"),

  // Store sources
  SOURCE_TIMEOUT_MS: z.coerce.number().min(500).default(15_000),
  STANDARD_LIMIT_PER_QUERY: z.coerce.number().int().positive().default(80),
  PREMIUM_LIMIT_PER_QUERY: z.coerce.number().int().positive().default(40),
  SOURCE_USER_AGENT: z
    .string()
    .default("Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15 Mobile/15E148"),
  MERCADONA_ALGOLIA_APP_ID: z.string().optional(),
  MERCADONA_ALGOLIA_API_KEY: z.string().optional(),
  MERCADONA_DEFAULT_WAREHOUSE: z.string().default("vlc1"),

  // Rate limiting
  API_RATE_WINDOW_MS: z.coerce.number().default(60_000),
  API_RATE_MAX: z.coerce.number().default(120),

  // CORS
  CORS_ORIGIN: z.string().default("*"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_PRETTY: z.string().transform((val) => val === "true").default("true"),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function getEnv(): Env {
  if (env) {
    return env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  env = result.data;
  return env;
}

export function initEnv(): Env {
  const e = getEnv();

  if (e.NODE_ENV === "development") {
    console.log("Running in development mode");
    console.log("Port:", e.PORT);
  }

  return e;
}
