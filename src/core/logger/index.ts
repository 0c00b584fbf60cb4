/**
 * Pino-based structured logging.
 * Pretty output for terminals, JSON lines otherwise. A destination stream can
 * be injected to send lines anywhere (tests capture them in memory).
 */

import pino from "pino";
import pinoPretty from "pino-pretty";
import { types } from "util";
import { LoggerConfig, LogLevel, createLoggerConfig } from "./config";

export type { LoggerConfig, LogLevel, LogFormat } from "./config";
export { createLoggerConfig, parseLogLevel, parseLogFormat, isValidLogLevel } from "./config";

export type LoggerContext = Record<string, unknown>;

export class Logger {
  private pinoLogger: pino.Logger;
  private config: LoggerConfig;
  private destination?: pino.DestinationStream;

  constructor(config: Partial<LoggerConfig> = {}, destination?: pino.DestinationStream) {
    this.config = createLoggerConfig(config);
    this.destination = destination;
    this.pinoLogger = this.createPinoLogger();
  }

  private createPinoLogger(): pino.Logger {
    const source = this.config.source;
    const options: pino.LoggerOptions = {
      level: this.config.level,
      formatters: {
        level: (label) => ({ level: label }),
        log: (obj) => (source ? { ...obj, source } : obj),
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
    };

    if (this.destination) {
      return pino(options, this.destination);
    }

    if (this.config.format === "pretty") {
      return pino(
        options,
        pinoPretty({
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,source",
        })
      );
    }

    return pino(options, pino.destination({ dest: 1, sync: true }));
  }

  /**
   * Logger for a specific component
   */
  static forSource(source: string, config: Partial<LoggerConfig> = {}, destination?: pino.DestinationStream): Logger {
    return new Logger({ ...config, source }, destination);
  }

  child(bindings: LoggerContext): Logger {
    const childLogger = new Logger(this.config, this.destination);
    childLogger.pinoLogger = this.pinoLogger.child(bindings);
    return childLogger;
  }

  trace(message: string, context?: LoggerContext): void {
    this.pinoLogger.trace(context ?? {}, message);
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context ?? {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context ?? {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context ?? {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = types.isNativeError(message) ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    const error = types.isNativeError(message) ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pinoLogger.isLevelEnabled(level);
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }
}

let globalLogger: Logger | null = null;

export function initializeLogger(config: Partial<LoggerConfig> = {}, destination?: pino.DestinationStream): Logger {
  globalLogger = new Logger(config, destination);
  return globalLogger;
}

/**
 * Process-wide logger; falls back to the defaults if never initialized.
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}
