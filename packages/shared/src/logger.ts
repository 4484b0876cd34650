import pino from "pino";

/**
 * Minimal structured logger for the api and worker processes.
 * Job payloads and uploaded content never reach the logs.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: undefined,
  redact: {
    paths: ["payload", "content", "*.payload", "*.content"],
    censor: "[redacted]",
  },
});
