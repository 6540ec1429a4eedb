export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** 出力先。既定は console */
  sink?: LogSink;
}

export type LogSink = (level: LogLevel, line: string) => void;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

/** stdout をプロトコルに使うモード（MCP stdio）向け */
export const stderrSink: LogSink = (_level, line) => {
  console.error(line);
};

let defaultLevel: LogLevel = "info";
let defaultSink: LogSink = consoleSink;

export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export function setDefaultLogSink(sink: LogSink): void {
  defaultSink = sink;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function formatLogLine(
  level: LogLevel,
  context: string,
  message: string,
  data?: LogData,
): string {
  const ctx = context ? ` (${context})` : "";
  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
  return `[${level}]${ctx} ${message}${suffix}`;
}

/**
 * コンテキスト付きロガーを生成する。
 * level / sink を省略した場合は既定値を出力時点で参照する。
 */
export function createLogger(context: string, options: LoggerOptions = {}): Logger {
  const shouldLog = (level: LogLevel): boolean =>
    levelPriority[level] >= levelPriority[options.level ?? defaultLevel];

  const emit = (level: LogLevel, message: string, data?: LogData): void => {
    if (shouldLog(level)) {
      (options.sink ?? defaultSink)(level, formatLogLine(level, context, message, data));
    }
  };

  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
