export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export const LOG_FORMATS = ["text", "json"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export type LogData = Record<string, unknown>;

export interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  message: string;
  timestamp: string;
  data?: LogData;
}

export interface Logger {
  level: LogLevel;
  format: LogFormat;
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
}

export type LogSink = {
  write: (line: string) => unknown;
};

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  output?: LogSink;
  time?: () => string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

const shouldLog = (configLevel: LogLevel, entryLevel: LogLevel): boolean => {
  if (configLevel === "silent") {
    return entryLevel === "error";
  }
  return LEVEL_ORDER[entryLevel] >= LEVEL_ORDER[configLevel];
};

const formatTextEntry = (entry: LogEntry): string => {
  const base = `${entry.timestamp} ${entry.level.toUpperCase()} ${entry.message}`;
  if (!entry.data || Object.keys(entry.data).length === 0) {
    return base;
  }
  return `${base} ${JSON.stringify(entry.data)}`;
};

export const createLogger = (options: LoggerOptions): Logger => {
  // stdout belongs to command output
  const output = options.output ?? process.stderr;
  const time = options.time ?? (() => new Date().toISOString());

  const write = (level: Exclude<LogLevel, "silent">, message: string, data?: LogData): void => {
    if (!shouldLog(options.level, level)) {
      return;
    }
    const entry: LogEntry = { level, message, timestamp: time() };
    if (data && Object.keys(data).length > 0) {
      entry.data = data;
    }
    const line = options.format === "json" ? JSON.stringify(entry) : formatTextEntry(entry);
    output.write(`${line}\n`);
  };

  return {
    level: options.level,
    format: options.format,
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
};

export const silentLogger = (): Logger =>
  createLogger({ level: "silent", format: "text", output: { write: () => true } });
