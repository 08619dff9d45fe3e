import { loadConfig } from '@pbr/config';
import { ROOT_LOGGER_NAME } from '@pbr/relay/infrastructure/constants';
import pino, { type Logger, type LoggerOptions } from 'pino';
import type { LoggerPort, LogLevel } from './logger.port';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  prettyPrint?: boolean;
  traceErrors?: boolean;
}

const REDACTED_PATHS = [
  'accessToken',
  '*.accessToken',
  'encryptionPassword',
  '*.encryptionPassword',
  'credentials',
  '*.credentials',
  'key',
  '*.key',
];

export class PinoLogger implements LoggerPort {
  private logger: Logger;
  private name: string;
  private traceErrors: boolean;
  private readonly children = new Set<PinoLogger>();

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
      redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
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
    const child = new PinoLogger({ name: this.name, level: this.getLevel(), traceErrors: this.traceErrors }, childLogger);
    this.children.add(child);
    return child;
  }

  /** Applies to this logger and every child it has handed out. */
  setLevel(level: LogLevel): void {
    this.logger.level = level;
    for (const child of this.children) {
      child.setLevel(level);
    }
  }

  setTraceErrors(traceErrors: boolean): void {
    this.traceErrors = traceErrors;
    for (const child of this.children) {
      child.setTraceErrors(traceErrors);
    }
  }

  getLevel(): LogLevel {
    const level = this.logger.level;
    return isLogLevel(level) ? level : 'info';
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.logger.isLevelEnabled(level);
  }

  private withError(
    error: Error | undefined,
    context: Record<string, unknown> | undefined,
  ): Record<string, unknown> | undefined {
    if (!error) {
      return context;
    }
    return {
      ...context,
      err: this.traceErrors
        ? { type: error.name, message: error.message, stack: error.stack }
        : { type: error.name, message: error.message },
    };
  }
}

function isLogLevel(value: string): value is LogLevel {
  return ['trace', 'debug', 'info', 'warn', 'error', 'fatal'].includes(value);
}

let globalRootLogger: PinoLogger | null = null;

export function createPinoLogger(config: { name: string; logLevel?: LogLevel; traceErrors?: boolean }): void {
  const nodeEnv = process.env.NODE_ENV;

  globalRootLogger = new PinoLogger({
    name: config.name,
    level: config.logLevel ?? 'info',
    traceErrors: config.traceErrors,
    prettyPrint: nodeEnv !== 'production' && nodeEnv !== 'test',
  });
}

function initializeRootLogger(): void {
  try {
    const { config } = loadConfig();
    createPinoLogger({
      name: ROOT_LOGGER_NAME,
      logLevel: config.telemetry.logLevel,
      traceErrors: config.telemetry.traceErrors,
    });
  } catch {
    // Config errors are reported by the entry point once it loads the config itself.
    createPinoLogger({ name: ROOT_LOGGER_NAME, logLevel: process.env.NODE_ENV === 'test' ? 'fatal' : 'info' });
  }
}

/**
 * Re-applies telemetry settings after the entry point has parsed its flags.
 * Loggers created at import time follow along.
 */
export function configureRootLogger(options: { logLevel: LogLevel; traceErrors: boolean }): void {
  const root = getRootLogger();
  root.setLevel(options.logLevel);
  root.setTraceErrors(options.traceErrors);
}

function getRootLogger(): PinoLogger {
  if (!globalRootLogger) {
    initializeRootLogger();
  }
  if (!globalRootLogger) {
    throw new Error('Logger not initialized');
  }
  return globalRootLogger;
}

export function createChildLogger(name: string): LoggerPort {
  return getRootLogger().child({ name });
}
