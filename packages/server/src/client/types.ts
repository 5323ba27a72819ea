/**
 * Client-side interfaces shared by the connection worker and the session
 * handler.
 */

import type { DisconnectReason } from '../types.js';
import type { ProtocolError } from '../errors.js';

export interface ChatConnectionOptions {
  maxLineBytes: number;
  idleTimeoutMs: number;
  writeTimeoutMs: number;
}

export interface ChatConnectionEvents {
  /** One decoded, non-blank line (may still end in `\r`) */
  line: (line: string) => void;
  'protocol-error': (error: ProtocolError) => void;
  /** Teardown started; emitted once */
  closing: (reason: DisconnectReason, error?: Error) => void;
  /** Socket fully closed; emitted once */
  closed: (reason: DisconnectReason) => void;
}

export interface SessionHandlerConfig {
  idleTimeoutMs: number;
}
