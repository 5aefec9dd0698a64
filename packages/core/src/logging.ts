import type { LogLevel } from "@steplog/contracts";

export type LogMeta = Record<string, unknown>;

export interface SubsystemLogger {
  readonly subsystem: string;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

let activeSink: LogSink = consoleSink;
let thresholdOverride: LogLevel | null = null;

function threshold(): LogLevel {
  if (thresholdOverride) return thresholdOverride;
  const fromEnv = (process.env.STEPLOG_LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

/** Replaces the output sink. Returns the previous one so callers can restore it. */
export function setLogSink(sink: LogSink | null): LogSink {
  const previous = activeSink;
  activeSink = sink ?? consoleSink;
  return previous;
}

export function setLogLevel(level: LogLevel | null): void {
  thresholdOverride = level;
}

function renderMeta(meta: LogMeta | undefined): string {
  if (!meta || Object.keys(meta).length === 0) return "";
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return " [unserializable meta]";
  }
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const write = (level: Exclude<LogLevel, "silent">, message: string, meta?: LogMeta): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold()]) return;
    activeSink(level, `[${subsystem}] ${message}${renderMeta(meta)}`);
  };
  return {
    subsystem,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
  };
}
