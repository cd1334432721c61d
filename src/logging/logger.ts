import { appendFileSync } from "node:fs";
import { Logger, type ILogObj } from "tslog";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["silly", "trace", "debug", "info", "warn", "error", "fatal"];

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const MASKED_KEYS = [
  "apiKey",
  "api_key",
  "adminKey",
  "authorization",
  "x-api-key",
  "password",
  "secret",
  "token",
  "databaseUrl",
];

const loggers = new Set<Logger<ILogObj>>();
let currentLevel: LogLevel = "info";
let logFile: string | undefined;

function fileTransport(logObj: ILogObj): void {
  if (!logFile) return;
  appendFileSync(logFile, JSON.stringify(logObj) + "\n");
}

/**
 * Named logger. Every logger created here follows `setLogLevel` and
 * `setLogFile`, including the ones created at module load.
 */
export function createLogger(name: string): Logger<ILogObj> {
  const logger = new Logger<ILogObj>({
    name,
    type: "pretty",
    minLevel: LOG_LEVEL_MAP[currentLevel],
    maskValuesOfKeys: MASKED_KEYS,
    maskPlaceholder: "[REDACTED]",
  });
  logger.attachTransport(fileTransport);
  loggers.add(logger);
  return logger;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  for (const logger of loggers) {
    logger.settings.minLevel = LOG_LEVEL_MAP[level];
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Mirror every log line as JSON into `path`; `undefined` turns it off. */
export function setLogFile(path: string | undefined): void {
  logFile = path;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
