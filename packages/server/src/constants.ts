/**
 * Centralized constants for the linechat server.
 *
 * Defaults here are what `loadConfig()` falls back to when the matching
 * environment variable is unset.
 */

// =============================================================================
// PROTOCOL CONSTANTS
// =============================================================================

export const PROTOCOL = {
  /** Separator between frame type and payload */
  SEPARATOR: '|',

  /** Frame terminator */
  DELIMITER: '\n',

  /** Separator between roster entries in a ULIST payload */
  ROSTER_SEPARATOR: ',',

  /** Longest inbound line accepted before the connection is dropped (bytes) */
  MAX_LINE_BYTES: 4096,
} as const;

// =============================================================================
// NETWORK DEFAULTS
// =============================================================================

export const NETWORK = {
  DEFAULT_HOST: '0.0.0.0',
  DEFAULT_PORT: 8080,
  DEFAULT_ADMIN_HOST: '127.0.0.1',
} as const;

// =============================================================================
// CONNECTION LIMITS
// =============================================================================

export const CONNECTION_LIMITS = {
  /** Maximum concurrent sessions across all clients */
  MAX_TOTAL_CONNECTIONS: 100,

  /** Maximum concurrent sessions from a single IP address */
  MAX_CONNECTIONS_PER_IP: 5,

  /** Admissions per IP within RATE_WINDOW_MS before the IP is blocked (0 disables) */
  MAX_CONNECTIONS_PER_MINUTE: 10,

  /** Window for the per-IP connection rate */
  RATE_WINDOW_MS: 60 * 1000,

  /** How long an IP stays blocked after exceeding the connection rate */
  BLOCK_DURATION_MS: 5 * 60 * 1000,
} as const;

// =============================================================================
// RATE LIMITING
// =============================================================================

export const RATE_LIMIT = {
  /** Bucket capacity (burst allowance) */
  CAPACITY: 60,

  /** Sustained refill rate, tokens per minute */
  REFILL_PER_MINUTE: 60,
} as const;

// =============================================================================
// MESSAGE LIMITS
// =============================================================================

export const MESSAGE = {
  /** Default number of chat messages kept for newcomers */
  DEFAULT_HISTORY_SIZE: 50,

  /** Upper bound for the configured history size */
  MAX_HISTORY_SIZE: 2000,

  MAX_MESSAGE_LENGTH: 1000,
} as const;

// =============================================================================
// USERNAMES
// =============================================================================

export const USERNAME = {
  MAX_LENGTH: 50,

  /** Characters that would corrupt a frame or a roster entry */
  FORBIDDEN_CHARS: /[|,()]/,

  CONTROL_CHARS: /[\u0000-\u001F\u007F-\u009F]/,

  /** Names reserved for server notices (compared case-insensitively) */
  RESERVED: ['server', 'system', 'admin'],

  /** Prefix of the display name given to sessions that never set a name */
  ANONYMOUS_PREFIX: 'User_',

  /** Sender name used for server notices */
  SERVER_SENDER: 'Server',
} as const;

// =============================================================================
// TIMEOUTS
// =============================================================================

export const TIMEOUTS = {
  /** Close a session that sends no valid frame for this long */
  IDLE_MS: 30 * 60 * 1000,

  /** Longest wait for a congested socket to drain */
  WRITE_MS: 10 * 1000,

  /** Longest wait for connection workers to finish during shutdown */
  SHUTDOWN_MS: 5 * 1000,

  /** Interval of the idle-session sweep */
  CLEANUP_INTERVAL_MS: 60 * 1000,
} as const;
