/**
 * @fileoverview Structured logging framework using Pino for mcpfleet
 */

import pino from 'pino';
import type { Logger as PinoLogger, LoggerOptions } from 'pino';
import { hostname } from 'os';
import { LogLevel } from '@mcpfleet/core';
import { Environment } from '../config';

/**
 * Log context interface for structured logging
 */
export interface LogContext {
  readonly component?: string;
  readonly operation?: string;
  readonly requestId?: string;
  readonly server?: string;
  readonly pool?: string;
  readonly sessionId?: string;
  readonly phase?: string;
  readonly duration?: number;
  readonly [key: string]: unknown;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  readonly level: LogLevel;
  readonly environment: Environment;
  readonly serviceName: string;
  readonly serviceVersion: string;
  readonly prettyPrint?: boolean;
  readonly enableRedaction?: boolean;
  readonly redactPaths?: string[];
}

type EmitLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Structured logger wrapping a pino instance
 */
export class Logger {
  private instance: PinoLogger;
  private baseContext: LogContext;
  private config: LoggerConfig;

  constructor(config: LoggerConfig, baseContext: LogContext = {}, instance?: PinoLogger) {
    this.config = config;
    this.baseContext = baseContext;
    this.instance = instance ?? Logger.createPinoLogger(config).child(baseContext);
  }

  /**
   * Create and configure Pino logger instance
   */
  private static createPinoLogger(config: LoggerConfig): PinoLogger {
    const options: LoggerOptions = {
      name: config.serviceName,
      level: config.level,
      base: {
        service: config.serviceName,
        version: config.serviceVersion,
        environment: config.environment,
        pid: process.pid,
        hostname: process.env.HOSTNAME || hostname()
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label })
      }
    };

    // Configure redaction for sensitive data
    if (config.enableRedaction) {
      options.redact = {
        paths: ['password', 'token', 'apiKey', 'secret', 'authorization', 'cookie', ...(config.redactPaths ?? [])],
        censor: '[REDACTED]'
      };
    }

    // Configure pretty printing for development
    if (config.prettyPrint && config.environment === Environment.DEVELOPMENT) {
      options.transport = {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          errorProps: 'stack,cause'
        }
      };
    }

    return pino(options);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const mergedContext = { ...this.baseContext, ...context };
    return new Logger(this.config, mergedContext, this.instance.child(context));
  }

  /**
   * Underlying pino instance, handed to Fastify so request logs share the sink
   */
  pino(): PinoLogger {
    return this.instance;
  }

  trace(message: string, context?: LogContext): void;
  trace(error: Error, message: string, context?: LogContext): void;
  trace(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log('trace', messageOrError, messageOrContext, context);
  }

  debug(message: string, context?: LogContext): void;
  debug(error: Error, message: string, context?: LogContext): void;
  debug(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log('debug', messageOrError, messageOrContext, context);
  }

  info(message: string, context?: LogContext): void;
  info(error: Error, message: string, context?: LogContext): void;
  info(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log('info', messageOrError, messageOrContext, context);
  }

  warn(message: string, context?: LogContext): void;
  warn(error: Error, message: string, context?: LogContext): void;
  warn(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log('warn', messageOrError, messageOrContext, context);
  }

  error(message: string, context?: LogContext): void;
  error(error: Error, message?: string, context?: LogContext): void;
  error(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log('error', messageOrError, messageOrContext, context);
  }

  fatal(message: string, context?: LogContext): void;
  fatal(error: Error, message?: string, context?: LogContext): void;
  fatal(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log('fatal', messageOrError, messageOrContext, context);
  }

  private log(
    level: EmitLevel,
    messageOrError: string | Error,
    messageOrContext?: string | LogContext,
    context?: LogContext
  ): void {
    const entry: Record<string, unknown> = {
      ...(typeof messageOrContext === 'object' ? messageOrContext : {}),
      ...context
    };

    let message: string;
    if (messageOrError instanceof Error) {
      message = typeof messageOrContext === 'string' ? messageOrContext : messageOrError.message;
      entry.error = {
        name: messageOrError.name,
        message: messageOrError.message,
        stack: messageOrError.stack,
        ...(messageOrError.cause ? { cause: messageOrError.cause } : {})
      };
    } else {
      message = messageOrError;
    }

    this.instance[level](entry, message);
  }

  /**
   * Flush all pending log entries (useful before process exit)
   */
  flush(): Promise<void> {
    return new Promise((resolve) => {
      this.instance.flush(() => resolve());
    });
  }
}

/**
 * Default logger configuration
 */
export const defaultLoggerConfig: Omit<LoggerConfig, 'serviceName'> = {
  level: LogLevel.INFO,
  environment: Environment.PRODUCTION,
  serviceVersion: '0.1.0',
  prettyPrint: true,
  enableRedaction: true
};

/**
 * Logger factory for creating service-specific loggers
 */
export class LoggerFactory {
  private static loggers = new Map<string, Logger>();

  /**
   * Create or get a logger for a specific service
   */
  static createLogger(
    serviceName: string,
    config: Partial<Omit<LoggerConfig, 'serviceName'>> = {},
    baseContext?: LogContext
  ): Logger {
    const merged = { ...defaultLoggerConfig, ...config };
    const key = `${serviceName}-${JSON.stringify(merged)}-${JSON.stringify(baseContext ?? {})}`;

    const existing = this.loggers.get(key);
    if (existing) {
      return existing;
    }
    const logger = new Logger({ ...merged, serviceName }, baseContext);
    this.loggers.set(key, logger);
    return logger;
  }

  static createControllerLogger(config: Partial<Omit<LoggerConfig, 'serviceName'>> = {}): Logger {
    return this.createLogger('mcpfleet-controller', config, { component: 'controller' });
  }

  static createGatewayLogger(config: Partial<Omit<LoggerConfig, 'serviceName'>> = {}): Logger {
    return this.createLogger('mcpfleet-gateway', config, { component: 'gateway' });
  }

  /**
   * Logger that drops everything; used by tests and embedders that bring their own sink
   */
  static silent(): Logger {
    return this.createLogger('mcpfleet', { level: LogLevel.SILENT, prettyPrint: false });
  }

  static clear(): void {
    this.loggers.clear();
  }
}
