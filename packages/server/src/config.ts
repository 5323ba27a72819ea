/**
 * Configuration management for the linechat server
 */

import { config as loadEnv } from 'dotenv';
import type { ServerConfig } from './types.js';
import { ConfigurationError } from './errors.js';
import {
  NETWORK,
  CONNECTION_LIMITS,
  RATE_LIMIT,
  MESSAGE,
  USERNAME,
  PROTOCOL,
  TIMEOUTS,
} from './constants.js';

export type { ServerConfig };

loadEnv();

function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function envOptionalNumber(key: string): number | null {
  const value = process.env[key];
  if (!value) return null;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? null : parsed;
}

export function loadConfig(): ServerConfig {
  return {
    network: {
      host: envString('CHAT_SERVER_HOST', NETWORK.DEFAULT_HOST),
      port: envNumber('CHAT_SERVER_PORT', NETWORK.DEFAULT_PORT),
    },

    limits: {
      maxClients: envNumber('CHAT_MAX_CLIENTS', CONNECTION_LIMITS.MAX_TOTAL_CONNECTIONS),
      maxConnectionsPerIp: envNumber('CHAT_MAX_CONNECTIONS_PER_IP', CONNECTION_LIMITS.MAX_CONNECTIONS_PER_IP),
      maxConnectionsPerMinute: envNumber('CHAT_MAX_CONNECTIONS_PER_MINUTE', CONNECTION_LIMITS.MAX_CONNECTIONS_PER_MINUTE),
      blockDurationMs: envNumber('CHAT_IP_BLOCK_DURATION_MS', CONNECTION_LIMITS.BLOCK_DURATION_MS),
    },

    rateLimit: {
      capacity: envNumber('CHAT_RATE_LIMIT_CAPACITY', RATE_LIMIT.CAPACITY),
      refillPerMinute: envNumber('CHAT_RATE_LIMIT_PER_MINUTE', RATE_LIMIT.REFILL_PER_MINUTE),
    },

    messages: {
      historySize: envNumber('CHAT_HISTORY_SIZE', MESSAGE.DEFAULT_HISTORY_SIZE),
      maxMessageLength: envNumber('CHAT_MAX_MESSAGE_LENGTH', MESSAGE.MAX_MESSAGE_LENGTH),
      maxUsernameLength: envNumber('CHAT_MAX_USERNAME_LENGTH', USERNAME.MAX_LENGTH),
      maxLineBytes: envNumber('CHAT_MAX_LINE_BYTES', PROTOCOL.MAX_LINE_BYTES),
    },

    timeouts: {
      idleMs: envNumber('CHAT_IDLE_TIMEOUT_MS', TIMEOUTS.IDLE_MS),
      writeMs: envNumber('CHAT_WRITE_TIMEOUT_MS', TIMEOUTS.WRITE_MS),
      shutdownMs: envNumber('CHAT_SHUTDOWN_TIMEOUT_MS', TIMEOUTS.SHUTDOWN_MS),
      cleanupIntervalMs: envNumber('CHAT_CLEANUP_INTERVAL_MS', TIMEOUTS.CLEANUP_INTERVAL_MS),
    },

    admin: {
      host: envString('CHAT_ADMIN_HOST', NETWORK.DEFAULT_ADMIN_HOST),
      port: envOptionalNumber('CHAT_ADMIN_PORT'),
    },
  };
}

function isPort(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 65535;
}

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Check a merged configuration. Throws ConfigurationError listing every
 * problem found.
 */
export function validateConfig(config: ServerConfig): void {
  const problems: string[] = [];

  if (!config.network.host.trim()) problems.push('network.host must be a non-empty string');
  if (!isPort(config.network.port)) problems.push('network.port must be an integer between 0 and 65535');

  if (!isPositiveInt(config.limits.maxClients)) problems.push('limits.maxClients must be a positive integer');
  if (!isPositiveInt(config.limits.maxConnectionsPerIp)) {
    problems.push('limits.maxConnectionsPerIp must be a positive integer');
  }
  if (!Number.isInteger(config.limits.maxConnectionsPerMinute) || config.limits.maxConnectionsPerMinute < 0) {
    problems.push('limits.maxConnectionsPerMinute must be a non-negative integer');
  }
  if (config.limits.blockDurationMs < 0) problems.push('limits.blockDurationMs must not be negative');

  if (!isPositiveInt(config.rateLimit.capacity)) problems.push('rateLimit.capacity must be a positive integer');
  if (!(config.rateLimit.refillPerMinute > 0)) problems.push('rateLimit.refillPerMinute must be positive');

  if (!Number.isInteger(config.messages.historySize) || config.messages.historySize < 0) {
    problems.push('messages.historySize must be a non-negative integer');
  }
  if (!isPositiveInt(config.messages.maxMessageLength)) {
    problems.push('messages.maxMessageLength must be a positive integer');
  }
  if (!isPositiveInt(config.messages.maxUsernameLength)) {
    problems.push('messages.maxUsernameLength must be a positive integer');
  }
  if (!isPositiveInt(config.messages.maxLineBytes)) problems.push('messages.maxLineBytes must be a positive integer');

  if (!isPositiveInt(config.timeouts.idleMs)) problems.push('timeouts.idleMs must be a positive integer');
  if (!isPositiveInt(config.timeouts.writeMs)) problems.push('timeouts.writeMs must be a positive integer');
  if (!isPositiveInt(config.timeouts.shutdownMs)) problems.push('timeouts.shutdownMs must be a positive integer');
  if (!isPositiveInt(config.timeouts.cleanupIntervalMs)) {
    problems.push('timeouts.cleanupIntervalMs must be a positive integer');
  }

  if (config.admin.port !== null) {
    if (!isPort(config.admin.port)) problems.push('admin.port must be an integer between 0 and 65535');
    if (config.admin.port !== 0 && config.admin.port === config.network.port) {
      problems.push('admin.port and network.port cannot be the same');
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid server configuration: ${problems.join('; ')}`, problems);
  }
}

/**
 * Merge per-section overrides onto a base configuration.
 */
export type ServerConfigOverrides = {
  [K in keyof ServerConfig]?: Partial<ServerConfig[K]>;
};

export function mergeConfig(base: ServerConfig, overrides: ServerConfigOverrides = {}): ServerConfig {
  return {
    network: { ...base.network, ...overrides.network },
    limits: { ...base.limits, ...overrides.limits },
    rateLimit: { ...base.rateLimit, ...overrides.rateLimit },
    messages: { ...base.messages, ...overrides.messages },
    timeouts: { ...base.timeouts, ...overrides.timeouts },
    admin: { ...base.admin, ...overrides.admin },
  };
}
