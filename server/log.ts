export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL;
let threshold: number = isLogLevel(envLevel) ? LEVELS[envLevel] : LEVELS.info;

export function setLogLevel(level: LogLevel): void {
  threshold = LEVELS[level];
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= threshold;
}

/**
 * Thin console wrapper. Messages keep the emoji prefixes used across the
 * CLI and API output; the level only decides whether a line is printed.
 */
export const log = {
  debug(message: string, ...details: unknown[]): void {
    if (enabled("debug")) console.debug(`🔎 ${message}`, ...details);
  },
  info(message: string, ...details: unknown[]): void {
    if (enabled("info")) console.log(message, ...details);
  },
  warn(message: string, ...details: unknown[]): void {
    if (enabled("warn")) console.warn(`⚠️ ${message}`, ...details);
  },
  error(message: string, ...details: unknown[]): void {
    if (enabled("error")) console.error(`❌ ${message}`, ...details);
  },
};
