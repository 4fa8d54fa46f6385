export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

/** Receives every formatted line that passes the level filter. */
export type LogSink = (level: LogLevel, line: string) => void;

export type Logger = {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  /** Logger whose lines are prefixed with `[scope]`. */
  child(scope: string): Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

let currentLevel: LogLevel = "info";
let sink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Replace the output sink. Passing nothing restores console output. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? consoleSink;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMsg(level: LogLevel, msg: string, data?: LogData, scope?: string): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase()}]${scope ? ` [${scope}]` : ""} ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

function createLogger(scope?: string): Logger {
  const write = (level: LogLevel, msg: string, data?: LogData): void => {
    if (shouldLog(level)) sink(level, formatMsg(level, msg, data, scope));
  };
  return {
    debug: (msg, data) => write("debug", msg, data),
    info: (msg, data) => write("info", msg, data),
    warn: (msg, data) => write("warn", msg, data),
    error: (msg, data) => write("error", msg, data),
    child: (name) => createLogger(scope ? `${scope}:${name}` : name),
  };
}

export const log: Logger = createLogger();
