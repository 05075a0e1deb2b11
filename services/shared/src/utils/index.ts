import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

type EnvSource = Record<string, string | undefined>;

export function env(
  name: string,
  defaultValue?: string,
  source: EnvSource = process.env
): string {
  const v = source[name];
  if (v == null || v === "") {
    if (defaultValue !== undefined) return defaultValue;
    throw new Error(`Missing required env var: ${name}`);
  }
  return v;
}

export function envInt(
  name: string,
  defaultValue: number,
  source: EnvSource = process.env
): number {
  const raw = env(name, String(defaultValue), source);
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Env var ${name} must be a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

export const LogLevel = {
  TRACE: "trace",
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
  FATAL: "fatal",
  SILENT: "silent",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LEVELS: ReadonlySet<string> = new Set(Object.values(LogLevel));

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.has(value);
}

export interface LoggerConfig {
  level: LogLevel;
  serviceName: string;
  base?: Record<string, unknown>;
}

export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      service: config.serviceName,
      ...config.base,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
  return pino(options);
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
