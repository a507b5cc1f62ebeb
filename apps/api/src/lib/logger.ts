import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export type LoggerConfig = {
  level?: LogLevel;
  base?: Record<string, unknown>;
};

const DEFAULT_CONFIG: Required<LoggerConfig> = {
  level: "info",
  base: { service: "devsession-api" },
};

export function createLogger(config: LoggerConfig = {}): Logger {
  const merged = { ...DEFAULT_CONFIG, ...config };
  const options: LoggerOptions = {
    level: merged.level,
    base: merged.base,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return pino(options);
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
