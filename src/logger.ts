import winston from "winston";
import { ENV } from "./env";

export const logger = winston.createLogger({
  level: ENV.LOG_LEVEL,
  silent: ENV.NODE_ENV === "test",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    ENV.NODE_ENV === "production"
      ? winston.format.json()
      : winston.format.printf(({ level, message, timestamp, ...meta }) => {
          return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ""}`;
        })
  ),
  transports: [new winston.transports.Console()],
});

/** Error metadata for log entries; `Error` objects serialize to `{}` otherwise. */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.stack ?? e.message : String(e);
}
