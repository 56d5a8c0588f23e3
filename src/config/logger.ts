import winston from "winston";

/**
 * Process-wide structured logger.
 *
 * Console transport only; the supervisor collects stdout. Silent under
 * NODE_ENV=test so vitest output stays readable.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "instance-identity" },
  transports: [new winston.transports.Console({ silent: process.env.NODE_ENV === "test" })],
});
