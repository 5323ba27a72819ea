/**
 * Logger Utility
 *
 * Leveled console logging with redaction of client addresses in production.
 * Also adapts the logger to the ChatEventSink interface the core reports
 * structured events through.
 */

import type { ChatEvent, ChatEventSink } from '../types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerConfig {
  level: LogLevel;
  redactSensitive: boolean;
  environment: 'development' | 'production';
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

/**
 * Redact an IP address for logging
 * For IPv4: shows first octet only
 * For IPv6: shows first segment only
 * A trailing `:port` on IPv4 addresses is dropped.
 */
export function redactIp(ip: string): string {
  if (!ip) return '****';

  // IPv4 (optionally with port)
  if (ip.includes('.')) {
    const parts = ip.split('.');
    return `${parts[0]}.*.*.*`;
  }

  // IPv6
  if (ip.includes(':')) {
    const parts = ip.split(':');
    return `${parts[0]}:****:****`;
  }

  return '****';
}

class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const nodeEnv = process.env['NODE_ENV'] || 'development';
    const isProduction = nodeEnv === 'production';
    const envLevel = process.env['LOG_LEVEL'];

    this.config = {
      level: isLogLevel(envLevel) ? envLevel : (isProduction ? 'info' : 'debug'),
      redactSensitive: process.env['REDACT_LOGS'] !== 'false' && isProduction,
      environment: isProduction ? 'production' : 'development',
      ...config,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  get shouldRedact(): boolean {
    return this.config.redactSensitive;
  }

  /**
   * Redact IP address based on environment
   */
  ip(ip: string): string {
    return this.config.redactSensitive ? redactIp(ip) : ip;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      if (meta) {
        console.debug(`[DEBUG] ${message}`, meta);
      } else {
        console.debug(`[DEBUG] ${message}`);
      }
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      if (meta) {
        console.log(`[INFO] ${message}`, meta);
      } else {
        console.log(`[INFO] ${message}`);
      }
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      if (meta) {
        console.warn(`[WARN] ${message}`, meta);
      } else {
        console.warn(`[WARN] ${message}`);
      }
    }
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      if (error && meta) {
        console.error(`[ERROR] ${message}`, error, meta);
      } else if (error) {
        console.error(`[ERROR] ${message}`, error);
      } else if (meta) {
        console.error(`[ERROR] ${message}`, meta);
      } else {
        console.error(`[ERROR] ${message}`);
      }
    }
  }

  /**
   * Log a structured chat event with automatic address redaction
   */
  chatEvent(event: ChatEvent): void {
    switch (event.type) {
      case 'connect':
        this.info('[Client] connected', { sessionId: event.sessionId, address: this.ip(event.address) });
        break;
      case 'disconnect':
        this.info('[Client] disconnected', {
          sessionId: event.sessionId,
          address: this.ip(event.address),
          username: event.username,
          reason: event.reason,
        });
        break;
      case 'reject':
        this.warn('[Gate] rejected connection', { address: this.ip(event.address), reason: event.reason });
        break;
      case 'throttle':
        this.warn('[RateLimit] throttled session', { sessionId: event.sessionId, address: this.ip(event.address) });
        break;
      case 'protocol_error':
        this.warn('[Protocol] closing session', {
          sessionId: event.sessionId,
          address: this.ip(event.address),
          detail: event.detail,
        });
        break;
      case 'validation_error':
        this.debug(`[Validation] rejected ${event.field}`, { sessionId: event.sessionId, detail: event.detail });
        break;
      case 'rename':
        this.info('[Client] renamed', { sessionId: event.sessionId, from: event.from, to: event.to });
        break;
      case 'shutdown_timeout':
        this.error('[Shutdown] connection did not close in time, destroyed', undefined, {
          sessionId: event.sessionId,
          address: this.ip(event.address),
        });
        break;
    }
  }
}

/**
 * Route structured events through a logger.
 */
export function createLoggerSink(target: Logger = logger): ChatEventSink {
  return {
    emit: (event) => target.chatEvent(event),
  };
}

// Export a singleton instance
export const logger = new Logger();

// Also export the class for testing or custom configurations
export { Logger };
