import pino, { type Logger } from "pino";
import { getEnv } from "../config/env.js";

const env = getEnv();
const isTest = env.NODE_ENV === "test";

export const logger = pino({
  level: isTest ? "silent" : env.LOG_LEVEL,
  transport: env.LOG_PRETTY && !isTest
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
});

export type { Logger };

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
