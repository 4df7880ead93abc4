import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export const LOG_LEVEL_ENV = "WEB_ARCHIVE_LOG_LEVEL";

let defaultLogger: Logger | undefined;

// Logs go to stderr so stdout stays free for the archived document.
export const createLogger = (level = process.env[LOG_LEVEL_ENV] ?? "warn"): Logger =>
  pino({ name: "web-archive", level }, pino.destination(2));

export const getDefaultLogger = () => {
  defaultLogger ??= createLogger();
  return defaultLogger;
};
