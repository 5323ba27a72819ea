/**
 * Session Handler
 *
 * Drives a session from join to departure: the join sequence (history,
 * welcome, join notice, roster), frame dispatch for nickname changes, chat
 * and quit, and the departure notices when a session ends.
 *
 * Per-frame failures become notices to the sender only; the connection
 * stays open except on protocol errors.
 */

import { EventEmitter } from 'events';
import { decodeLine } from '../protocol/codec.js';
import { ProtocolError, RateExceededError, ValidationError } from '../errors.js';
import { displayName, type ClientRegistry } from '../registry/client-registry.js';
import type { MessageBroker } from '../broker/message-broker.js';
import type { RateLimiter } from '../security/rate-limiter.js';
import type { InputValidator } from '../security/validator.js';
import type { ChatEventSink, DisconnectReason, SessionTransport } from '../types.js';
import { logger } from '../utils/logger.js';
import type { SessionHandlerConfig } from './types.js';

export const NOTICES = {
  THROTTLED: 'You are sending messages too quickly. Please slow down.',
  LINE_TOO_LONG: 'Message too long. Disconnecting.',
  SHUTTING_DOWN: 'Server is shutting down.',
} as const;

export interface SessionHandlerDeps {
  registry: ClientRegistry;
  broker: MessageBroker;
  rateLimiter: RateLimiter;
  validator: InputValidator;
  events: ChatEventSink;
}

export interface SessionHandlerEvents {
  'session-joined': (sessionId: string) => void;
  'session-left': (sessionId: string, reason: DisconnectReason) => void;
  'handler-error': (sessionId: string, error: Error) => void;
}

export interface SessionHandler {
  on<K extends keyof SessionHandlerEvents>(event: K, listener: SessionHandlerEvents[K]): this;
  once<K extends keyof SessionHandlerEvents>(event: K, listener: SessionHandlerEvents[K]): this;
  off<K extends keyof SessionHandlerEvents>(event: K, listener: SessionHandlerEvents[K]): this;
  emit<K extends keyof SessionHandlerEvents>(event: K, ...args: Parameters<SessionHandlerEvents[K]>): boolean;
}

export class SessionHandler extends EventEmitter {
  private readonly registry: ClientRegistry;
  private readonly broker: MessageBroker;
  private readonly rateLimiter: RateLimiter;
  private readonly validator: InputValidator;
  private readonly events: ChatEventSink;
  private readonly config: SessionHandlerConfig;

  constructor(deps: SessionHandlerDeps, config: SessionHandlerConfig) {
    super();
    this.registry = deps.registry;
    this.broker = deps.broker;
    this.rateLimiter = deps.rateLimiter;
    this.validator = deps.validator;
    this.events = deps.events;
    this.config = config;
  }

  /**
   * Register an admitted connection and run the join sequence.
   * Returns the new session ID.
   */
  handleConnection(transport: SessionTransport, address: string): string {
    const sessionId = this.registry.register(transport, address);
    this.events.emit({ type: 'connect', sessionId, address });

    this.broker.sendWelcome(sessionId);
    this.registry.setState(sessionId, 'AUTHENTICATING');

    const session = this.registry.get(sessionId);
    if (session) {
      this.broker.announce(`${displayName(session)} has joined the chat.`, sessionId);
    }
    this.broker.broadcastRoster();

    this.emit('session-joined', sessionId);
    return sessionId;
  }

  /**
   * Handle one inbound line. Returns true when the frame was accepted.
   */
  handleLine(sessionId: string, line: string): boolean {
    const session = this.registry.get(sessionId);
    if (!session || session.state === 'CLOSING') return false;

    const frame = decodeLine(line);

    try {
      switch (frame.type) {
        case 'CMD_USER':
          this.checkRate(sessionId);
          this.handleSetUsername(sessionId, frame.payload);
          break;

        case 'MSG':
          this.checkRate(sessionId);
          this.handleChat(sessionId, frame.payload);
          break;

        case 'CMD_QUIT':
          session.transport.close('quit');
          return true;

        case 'SRV':
        case 'ULIST':
          // Server-to-client frames; nothing to do when a client sends one
          logger.debug('[Client] ignoring server-only frame', { sessionId, type: frame.type });
          return false;
      }
    } catch (error) {
      return this.handleFrameError(sessionId, error);
    }

    this.registry.setState(sessionId, 'ACTIVE');
    return true;
  }

  /**
   * An inbound line exceeded the byte ceiling: notify and close.
   */
  handleProtocolError(sessionId: string, error: ProtocolError): void {
    const session = this.registry.get(sessionId);
    if (!session) return;

    this.events.emit({ type: 'protocol_error', sessionId, address: session.address, detail: error.message });
    session.transport.close('protocol_error', NOTICES.LINE_TOO_LONG);
  }

  /**
   * Remove a session and tell everyone else. Safe to call more than once;
   * only the first call has any effect.
   */
  handleDisconnect(sessionId: string, reason: DisconnectReason): void {
    this.registry.setState(sessionId, 'CLOSING');
    const session = this.registry.unregister(sessionId);
    if (!session) return;

    this.rateLimiter.remove(sessionId);

    this.events.emit({
      type: 'disconnect',
      sessionId,
      address: session.address,
      username: session.username,
      reason,
    });

    if (reason !== 'shutdown') {
      this.broker.announce(`${displayName(session)} has left the chat.`);
      this.broker.broadcastRoster();
    }

    this.emit('session-left', sessionId, reason);
  }

  /**
   * Close sessions idle for longer than the idle timeout. Returns how many
   * were closed.
   */
  sweepIdle(now: number = Date.now()): number {
    const idle = this.registry.findIdle(now, this.config.idleTimeoutMs);
    for (const session of idle) {
      session.transport.close('idle_timeout');
    }
    return idle.length;
  }

  get sessionCount(): number {
    return this.registry.size;
  }

  // ---------------------------------------------------------------------------
  // Frame handlers
  // ---------------------------------------------------------------------------

  private handleSetUsername(sessionId: string, requested: string): void {
    const before = this.registry.get(sessionId);
    if (!before) return;
    const oldName = displayName(before);

    const result = this.registry.setUsername(sessionId, requested);
    if (!result.ok) {
      if (result.reason === 'unknown_session') return;
      const notice =
        result.reason === 'duplicate'
          ? `Username '${requested.trim()}' is already taken.`
          : `Invalid username: ${result.detail}`;
      throw new ValidationError(notice, 'username');
    }

    this.registry.touch(sessionId);
    if (!result.changed) return;

    this.events.emit({ type: 'rename', sessionId, from: result.previous, to: result.username });
    this.broker.announce(`${oldName} is now known as ${result.username}.`);
    this.broker.broadcastRoster();
  }

  private handleChat(sessionId: string, text: string): void {
    const validation = this.validator.validateMessage(text);
    if (!validation.valid) {
      throw new ValidationError(`Message rejected: ${validation.error}`, 'message');
    }

    this.registry.recordMessage(sessionId);
    this.broker.publishChat(sessionId, validation.value);
  }

  /**
   * Throws RateExceededError when the session is over its rate. Only the
   * first denial of an episode is marked for a notice.
   */
  private checkRate(sessionId: string): void {
    const decision = this.rateLimiter.check(sessionId);
    if (decision === 'allowed') return;

    throw new RateExceededError(NOTICES.THROTTLED, decision === 'throttled');
  }

  private handleFrameError(sessionId: string, error: unknown): false {
    const session = this.registry.get(sessionId);
    if (!session) return false;

    if (error instanceof ValidationError) {
      this.events.emit({ type: 'validation_error', sessionId, field: error.field, detail: error.message });
      this.broker.notify(sessionId, error.message);
      return false;
    }

    if (error instanceof RateExceededError) {
      if (error.episodeStart) {
        this.events.emit({ type: 'throttle', sessionId, address: session.address });
        this.broker.notify(sessionId, error.message);
      }
      return false;
    }

    const failure = error instanceof Error ? error : new Error(String(error));
    logger.error('[Client] unexpected error handling frame', failure, { sessionId });
    this.emit('handler-error', sessionId, failure);
    return false;
  }
}
