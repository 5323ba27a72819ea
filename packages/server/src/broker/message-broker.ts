/**
 * Message Broker
 *
 * Fans messages out to every live session and keeps a bounded history of
 * chat messages for newcomers.
 *
 * Each broadcast encodes the frame once and writes it to every recipient
 * in a single synchronous loop, so no other broadcast can interleave and
 * every session sees broadcasts in the same order. A recipient whose write
 * fails is reported through `delivery-failed` on a later tick; delivery to
 * the rest continues.
 */

import { EventEmitter } from 'events';
import { MESSAGE, USERNAME } from '../constants.js';
import { encodeFrame, encodeRoster } from '../protocol/codec.js';
import { displayName, type ClientRegistry, type SessionView } from '../registry/client-registry.js';
import type { ChatMessage, MessageType } from '../types.js';
import { logger } from '../utils/logger.js';
import { RingBuffer } from './ring-buffer.js';

export interface MessageBrokerOptions {
  historySize?: number;
  now?: () => number;
}

export interface MessageBrokerEvents {
  'delivery-failed': (sessionId: string) => void;
}

export interface MessageBrokerStats {
  historySize: number;
  historyCapacity: number;
  totalBroadcasts: number;
  totalDelivered: number;
  deliveryFailures: number;
}

/**
 * Encode a message as its wire frame.
 */
export function encodeMessage(message: ChatMessage): string {
  switch (message.type) {
    case 'CHAT':
      return encodeFrame('MSG', `${message.sender}: ${message.content}`);
    case 'USERLIST':
      return encodeFrame('ULIST', message.content);
    case 'SERVER':
    case 'COMMAND':
      return encodeFrame('SRV', message.content);
  }
}

export function createMessage(sender: string, content: string, type: MessageType, timestamp: number): ChatMessage {
  return Object.freeze({ sender, content, timestamp, type });
}

export interface MessageBroker {
  on<K extends keyof MessageBrokerEvents>(event: K, listener: MessageBrokerEvents[K]): this;
  once<K extends keyof MessageBrokerEvents>(event: K, listener: MessageBrokerEvents[K]): this;
  off<K extends keyof MessageBrokerEvents>(event: K, listener: MessageBrokerEvents[K]): this;
  emit<K extends keyof MessageBrokerEvents>(event: K, ...args: Parameters<MessageBrokerEvents[K]>): boolean;
}

export class MessageBroker extends EventEmitter {
  private readonly history: RingBuffer<ChatMessage>;
  private readonly now: () => number;
  private stopped = false;

  private totalBroadcasts = 0;
  private totalDelivered = 0;
  private deliveryFailures = 0;

  constructor(
    private readonly registry: ClientRegistry,
    options: MessageBrokerOptions = {}
  ) {
    super();
    const requested = options.historySize ?? MESSAGE.DEFAULT_HISTORY_SIZE;
    this.history = new RingBuffer(Math.max(0, Math.min(requested, MESSAGE.MAX_HISTORY_SIZE)));
    this.now = options.now ?? Date.now;
  }

  /**
   * Deliver a message to every live session except `excludeSessionId`.
   * Returns the number of sessions the frame was queued for.
   */
  broadcast(message: ChatMessage, excludeSessionId?: string): number {
    if (this.stopped) return 0;

    const frame = encodeMessage(message);
    const recipients = this.registry.recipients(excludeSessionId);
    let delivered = 0;

    this.totalBroadcasts++;
    for (const session of recipients) {
      if (this.write(session, frame)) delivered++;
    }
    return delivered;
  }

  /**
   * Deliver a message to one session
   */
  sendDirect(sessionId: string, message: ChatMessage): boolean {
    if (this.stopped) return false;

    const session = this.registry.get(sessionId);
    if (!session || session.state === 'CLOSING') return false;
    return this.write(session, encodeMessage(message));
  }

  /**
   * Record a message in history. Only chat messages are kept.
   */
  historyAppend(message: ChatMessage): boolean {
    if (message.type !== 'CHAT') return false;
    this.history.push(message);
    return true;
  }

  /** History oldest first */
  historySnapshot(): ChatMessage[] {
    return this.history.toArray();
  }

  /**
   * Record and broadcast validated chat text from a session, the sender
   * included. Returns undefined when the session is gone.
   */
  publishChat(sessionId: string, text: string): ChatMessage | undefined {
    const session = this.registry.get(sessionId);
    if (!session) return undefined;

    const message = createMessage(displayName(session), text, 'CHAT', this.now());
    this.historyAppend(message);
    this.broadcast(message);
    return message;
  }

  /**
   * Broadcast a server notice
   */
  announce(text: string, excludeSessionId?: string): number {
    return this.broadcast(createMessage(USERNAME.SERVER_SENDER, text, 'SERVER', this.now()), excludeSessionId);
  }

  /**
   * Send a server notice to one session
   */
  notify(sessionId: string, text: string): boolean {
    return this.sendDirect(sessionId, createMessage(USERNAME.SERVER_SENDER, text, 'SERVER', this.now()));
  }

  /**
   * Broadcast the current roster to everyone
   */
  broadcastRoster(): number {
    const roster = encodeRoster(this.registry.snapshotUsers());
    return this.broadcast(createMessage(USERNAME.SERVER_SENDER, roster, 'USERLIST', this.now()));
  }

  /**
   * Replay history to a new session, then greet it.
   */
  sendWelcome(sessionId: string): boolean {
    const session = this.registry.get(sessionId);
    if (!session) return false;

    for (const message of this.history.toArray()) {
      if (!this.sendDirect(sessionId, message)) return false;
    }
    return this.notify(sessionId, `Welcome to the chat, ${displayName(session)}!`);
  }

  getStats(): MessageBrokerStats {
    return {
      historySize: this.history.size,
      historyCapacity: this.history.capacity,
      totalBroadcasts: this.totalBroadcasts,
      totalDelivered: this.totalDelivered,
      deliveryFailures: this.deliveryFailures,
    };
  }

  /**
   * Stop delivering and drop history
   */
  shutdown(): void {
    this.stopped = true;
    this.history.clear();
  }

  private write(session: SessionView, frame: string): boolean {
    let ok: boolean;
    try {
      ok = session.transport.send(frame);
    } catch (error) {
      logger.debug('[Broker] write threw', { sessionId: session.id, error: String(error) });
      ok = false;
    }

    if (ok) {
      this.totalDelivered++;
      return true;
    }

    this.deliveryFailures++;
    const sessionId = session.id;
    setImmediate(() => this.emit('delivery-failed', sessionId));
    return false;
  }
}
