import pino, { type Logger, type LoggerOptions } from 'pino';
import { isLogLevel, type LoggerPort, type LogLevel } from './logger.port';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  prettyPrint?: boolean;
  traceErrors?: boolean;
}

export class PinoLogger implements LoggerPort {
  private logger: Logger;
  private name: string;
  private traceErrors: boolean;

  constructor(config: LoggerConfig, existingLogger?: Logger) {
    this.name = config.name;
    this.traceErrors = config.traceErrors ?? false;

    if (existingLogger) {
      this.logger = existingLogger;
      return;
    }

    const options: LoggerOptions = {
      name: config.name,
      level: config.level,
    };

    if (config.prettyPrint) {
      options.transport = {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      };
    }

    this.logger = pino(options);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.logger.trace(context, message);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context, message);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context, message);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.error(this.withError(error, context), message);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.fatal(this.withError(error, context), message);
  }

  child(bindings: Record<string, unknown>): LoggerPort {
    const childLogger = this.logger.child(bindings);
    return new PinoLogger({ name: this.name, level: this.getLevel(), traceErrors: this.traceErrors }, childLogger);
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  getLevel(): LogLevel {
    const level = this.logger.level;
    return isLogLevel(level) ? level : 'info';
  }

  private withError(error: Error | undefined, context?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!error) {
      return context;
    }
    return {
      ...context,
      err: this.traceErrors ? { message: error.message, stack: error.stack } : { message: error.message },
    };
  }
}

export function createPinoLogger(config?: Partial<LoggerConfig>): LoggerPort {
  const envLevel = process.env.LOG_LEVEL ?? 'info';

  const fullConfig: LoggerConfig = {
    level: isLogLevel(envLevel) ? envLevel : 'info',
    name: 'chain-sync-progress',
    prettyPrint: process.env.NODE_ENV !== 'production',
    ...config,
  };

  return new PinoLogger(fullConfig);
}
