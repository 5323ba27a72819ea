/**
 * Core types for the linechat server
 */

// Wire frames
export type FrameType = 'MSG' | 'SRV' | 'ULIST' | 'CMD_USER' | 'CMD_QUIT';

export interface Frame {
  type: FrameType;
  payload: string;
}

// Messages kept by the broker
export type MessageType = 'CHAT' | 'SERVER' | 'USERLIST' | 'COMMAND';

export interface ChatMessage {
  readonly sender: string;
  readonly content: string;
  readonly timestamp: number;
  readonly type: MessageType;
}

// Lifecycle states
export type ServerState = 'INIT' | 'LISTENING' | 'SHUTTING_DOWN' | 'STOPPED';

export type ConnectionState = 'ADMITTED' | 'AUTHENTICATING' | 'ACTIVE' | 'CLOSING';

export type DisconnectReason =
  | 'client_closed'
  | 'quit'
  | 'idle_timeout'
  | 'protocol_error'
  | 'network_error'
  | 'write_timeout'
  | 'shutdown';

export type RejectReason = 'server_full' | 'ip_limit' | 'ip_blocked';

/**
 * Outbound side of a session, as seen by the registry and broker.
 * `send` takes an already-encoded frame and returns false when the
 * write could not be queued.
 */
export interface SessionTransport {
  send(line: string): boolean;
  close(reason: DisconnectReason, notice?: string): void;
}

// Structured events for the injected sink
export type ChatEvent =
  | { type: 'connect'; sessionId: string; address: string }
  | {
      type: 'disconnect';
      sessionId: string;
      address: string;
      username: string | null;
      reason: DisconnectReason;
    }
  | { type: 'reject'; address: string; reason: RejectReason }
  | { type: 'throttle'; sessionId: string; address: string }
  | { type: 'protocol_error'; sessionId: string; address: string; detail: string }
  | {
      type: 'validation_error';
      sessionId: string;
      field: 'username' | 'message';
      detail: string;
    }
  | { type: 'rename'; sessionId: string; from: string | null; to: string }
  | { type: 'shutdown_timeout'; sessionId: string; address: string };

export interface ChatEventSink {
  emit(event: ChatEvent): void;
}

// Configuration
export interface ServerConfig {
  network: {
    host: string;
    port: number;
  };

  limits: {
    maxClients: number;
    maxConnectionsPerIp: number;
    maxConnectionsPerMinute: number;
    blockDurationMs: number;
  };

  rateLimit: {
    capacity: number;
    refillPerMinute: number;
  };

  messages: {
    historySize: number;
    maxMessageLength: number;
    maxUsernameLength: number;
    maxLineBytes: number;
  };

  timeouts: {
    idleMs: number;
    writeMs: number;
    shutdownMs: number;
    cleanupIntervalMs: number;
  };

  admin: {
    host: string;
    port: number | null;    // null disables the stats endpoint
  };
}
