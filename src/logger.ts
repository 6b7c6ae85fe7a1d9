/**
 * Process-wide logger.
 *
 * Uses winston with a console transport. Level comes from LOG_LEVEL;
 * output is silenced under NODE_ENV=test.
 */

import winston from "winston";

export type LogLevel = "debug" | "info" | "warn" | "error";

const lineFormat = winston.format.printf(({ level, message, timestamp }) => `${timestamp} ${level} ${message}`);

export function createLogger(level: string = process.env.LOG_LEVEL || "info"): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(winston.format.timestamp(), winston.format.colorize(), lineFormat),
    transports: [new winston.transports.Console({ silent: process.env.NODE_ENV === "test" })],
  });
}

export const logger = createLogger();
