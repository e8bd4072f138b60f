// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
  silent?: boolean;
}

const SENSITIVE_KEYS = ['accessToken', 'refreshToken', 'password', 'clientSecret', 'authorization'];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      silent: config.silent ?? false,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const redacted = { ...obj };

    for (const key of SENSITIVE_KEYS) {
      if (key in redacted) redacted[key] = '[REDACTED]';
    }

    // Nested token snapshot
    const token = redacted.token;
    if (token && typeof token === 'object') {
      const copy: Record<string, unknown> = { ...token };
      if ('accessToken' in copy) copy.accessToken = '[REDACTED]';
      if ('refreshToken' in copy) copy.refreshToken = '[REDACTED]';
      redacted.token = copy;
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ? this.redactSensitive(meta) : {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ? this.redactSensitive(meta) : {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ? this.redactSensitive(meta) : {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ? this.redactSensitive(meta) : {});
  }
}
