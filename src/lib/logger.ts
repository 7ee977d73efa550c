import fs from "fs";
import path from "path";
import { Logger } from "tslog";
import type { ILogObj, ILogObjMeta } from "tslog";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOGGER_NAME = "usage-meter";

const LEVEL_TO_MIN_LEVEL: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_TO_MIN_LEVEL, value);
}

export function normalizeLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const candidate = value?.trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : fallback;
}

interface LoggingState {
  level: LogLevel;
  console: boolean;
  file: string | undefined;
  cachedLogger: Logger<ILogObj> | null;
}

const loggingState: LoggingState = {
  level: normalizeLogLevel(process.env.USAGE_METER_LOG_LEVEL),
  console: false,
  file: undefined,
  cachedLogger: null,
};

type LogRecord = ILogObj & ILogObjMeta;

function formatArg(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

/** `WARN [fetch] Rate limited (429)` */
export function formatConsoleLine(logObj: LogRecord): string {
  const meta = logObj._meta;
  const args = Object.keys(logObj)
    .filter((key) => /^\d+$/.test(key))
    .sort((a, b) => Number(a) - Number(b))
    .map((key) => {
      const value: unknown = logObj[key];
      return formatArg(value);
    });
  return `${meta.logLevelName} [${meta.name ?? LOGGER_NAME}] ${args.join(" ")}`;
}

function buildLogger(state: LoggingState): Logger<ILogObj> {
  const logger = new Logger<ILogObj>({
    name: LOGGER_NAME,
    type: "hidden",
    minLevel: LEVEL_TO_MIN_LEVEL[state.level],
  });

  const file = state.file;
  if (file) {
    logger.attachTransport((logObj) => {
      try {
        fs.appendFileSync(file, `${JSON.stringify(logObj)}\n`, { encoding: "utf8", mode: 0o600 });
      } catch {
        // never block on logging failures
      }
    });
  }

  if (state.console) {
    logger.attachTransport((logObj) => {
      process.stderr.write(`${formatConsoleLine(logObj)}\n`);
    });
  }

  return logger;
}

/** Root logger for the current settings; rebuilt after any setting changes. */
export function getLogger(): Logger<ILogObj> {
  if (!loggingState.cachedLogger) {
    loggingState.cachedLogger = buildLogger(loggingState);
  }
  return loggingState.cachedLogger;
}

/**
 * Sub-loggers copy their parent's transports when created, so callers ask for one at the
 * point of logging instead of holding on to it.
 */
export function getChildLogger(name: string): Logger<ILogObj> {
  return getLogger().getSubLogger({ name });
}

/** Mirrors records to stderr. */
export function setConsoleOutput(enabled: boolean): void {
  loggingState.console = enabled;
  loggingState.cachedLogger = null;
}

export function setLogLevel(level: LogLevel): void {
  loggingState.level = level;
  loggingState.cachedLogger = null;
}

/** Appends one JSON line per log record. */
export function attachFileTransport(file: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  loggingState.file = file;
  loggingState.cachedLogger = null;
}

export function resetLogging(): void {
  loggingState.level = normalizeLogLevel(process.env.USAGE_METER_LOG_LEVEL);
  loggingState.console = false;
  loggingState.file = undefined;
  loggingState.cachedLogger = null;
}
