/**
 * Logger Configuration
 */

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type LogFormat = "json" | "pretty";

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  source?: string;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: "info",
  format: "pretty",
};

/**
 * Create logger configuration with defaults
 */
export function createLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  return { ...DEFAULT_CONFIG, ...config };
}

export function isValidLogLevel(level: string): level is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(level);
}

/**
 * Parse log level from environment
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return DEFAULT_CONFIG.level;
  if (isValidLogLevel(level)) return level;
  console.warn(`Invalid log level "${level}", using default "${DEFAULT_CONFIG.level}"`);
  return DEFAULT_CONFIG.level;
}

/**
 * Parse log format from environment
 */
export function parseLogFormat(format: string | undefined): LogFormat {
  if (!format) return DEFAULT_CONFIG.format;
  if (format === "json" || format === "pretty") return format;
  console.warn(`Invalid log format "${format}", using default "${DEFAULT_CONFIG.format}"`);
  return DEFAULT_CONFIG.format;
}
