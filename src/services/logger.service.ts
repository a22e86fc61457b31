/**
 * Structured Logger Service
 *
 * Provides structured JSON logging for the token lifecycle.
 *
 * Fields per event:
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - event: machine-readable event name
 * - installationId: installation identifier (when applicable)
 * - issuer: App identifier (when applicable)
 * - http_status: HTTP status code (when applicable)
 * - error_code: error kind (when applicable)
 * - message: human-readable message
 *
 * Tokens are never logged in full, see maskToken().
 */

import pino from 'pino';
import { config } from '../config/env.js';

/**
 * Log context for token events
 */
export interface TokenLogContext {
  installationId?: number;
  issuer?: string | number;
  http_status?: number;
  error_code?: string;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Create base logger instance
 */
const baseLogger = pino({
  level: config.logLevel,

  formatters: {
    level: (label) => {
      return { level: label };
    },
  },

  // Base fields included in every log
  base: {
    service: 'app-token-service',
    environment: config.nodeEnv,
  },

  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

  // Pretty print in development
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,
});

/**
 * Masks token for logging (shows first 6 and last 4 characters)
 */
export function maskToken(token: string): string {
  if (token.length <= 10) {
    return '***';
  }
  return `${token.substring(0, 6)}...${token.substring(token.length - 4)}`;
}

/**
 * Structured Logger
 */
export class StructuredLogger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger = baseLogger) {
    this.logger = logger;
  }

  /**
   * Creates a child logger with additional context
   */
  child(bindings: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger(this.logger.child(bindings));
  }

  /**
   * Logs App JWT regeneration
   */
  appJwtRenewed(context: { issuer: string | number; token: string; issuedAt: Date; expiresAt: Date }) {
    this.logger.info({
      event: 'app_jwt.renewed',
      issuer: context.issuer,
      token: maskToken(context.token),
      issuedAt: context.issuedAt.toISOString(),
      expiresAt: context.expiresAt.toISOString(),
      message: `App JWT renewed (expires: ${context.expiresAt.toISOString()})`,
    });
  }

  appJwtRenewalFailed(context: { issuer: string | number; error: string; error_code?: string }) {
    this.logger.error({
      event: 'app_jwt.renewal_failed',
      issuer: context.issuer,
      error_code: context.error_code,
      error: context.error,
      message: `App JWT renewal failed: ${context.error}`,
    });
  }

  /**
   * Logs installation list refresh
   */
  installationsRefreshed(context: { count: number; duration: number }) {
    this.logger.info({
      event: 'installations.refreshed',
      count: context.count,
      duration: context.duration,
      message: `Installation list refreshed (${context.count} installations)`,
    });
  }

  /**
   * Logs a successful access token exchange
   */
  installationTokenExchanged(context: { installationId: number; token: string; expiresAt?: Date; duration: number }) {
    this.logger.info({
      event: 'installation_token.exchanged',
      installationId: context.installationId,
      token: maskToken(context.token),
      expiresAt: context.expiresAt?.toISOString(),
      duration: context.duration,
      message: `Access token obtained for installation ${context.installationId}`,
    });
  }

  installationTokenExchangeFailed(context: { installationId: number; error: string; http_status?: number }) {
    this.logger.warn({
      event: 'installation_token.exchange_failed',
      installationId: context.installationId,
      http_status: context.http_status,
      error_code: 'ExchangeFailed',
      error: context.error,
      message: `Access token exchange failed for installation ${context.installationId}: ${context.error}`,
    });
  }

  /**
   * Generic info log
   */
  info(message: string, context?: TokenLogContext) {
    this.logger.info({ ...context, message });
  }

  /**
   * Generic warn log
   */
  warn(message: string, context?: TokenLogContext) {
    this.logger.warn({ ...context, message });
  }

  /**
   * Generic error log
   */
  error(message: string, context?: TokenLogContext & { error?: unknown }) {
    const error = context?.error;
    this.logger.error({
      ...context,
      error: error instanceof Error ? error.message : error,
      stack: error instanceof Error ? error.stack : undefined,
      message,
    });
  }

  /**
   * Generic debug log
   */
  debug(message: string, context?: TokenLogContext) {
    this.logger.debug({ ...context, message });
  }

  /**
   * Gets the underlying Pino logger
   */
  getPinoLogger(): pino.Logger {
    return this.logger;
  }
}

/**
 * Global logger instance
 */
export const logger = new StructuredLogger();

/**
 * Creates a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>): StructuredLogger {
  return logger.child(context);
}
