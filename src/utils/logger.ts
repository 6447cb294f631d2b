import pino, { type Logger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const loggers: Logger[] = [];

function initialLevel(): string {
  return process.env.LOG_LEVEL ?? "info";
}

/** Named module logger. Level follows LOG_LEVEL and later `setLogLevel` calls. */
export function createLogger(name: string): Logger {
  const logger = pino({ name, level: initialLevel() });
  loggers.push(logger);
  return logger;
}

/** Applies a level to every logger created so far (e.g. after `.env` is read). */
export function setLogLevel(level: LogLevel): void {
  for (const logger of loggers) logger.level = level;
}
