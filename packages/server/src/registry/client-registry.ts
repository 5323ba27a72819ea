/**
 * Client Registry
 *
 * Owns every live session: its transport, address, username and activity
 * counters. Usernames are unique by exact match among live sessions; the
 * check and the insert into the username index happen in one synchronous
 * call, so two sessions can never both claim a name.
 *
 * Callers get read-only views and point-in-time copies; the underlying maps
 * stay private.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { USERNAME } from '../constants.js';
import { InputValidator } from '../security/validator.js';
import type { ConnectionState, SessionTransport } from '../types.js';
import type { RosterEntry } from '../protocol/codec.js';

export interface Session {
  readonly id: string;
  readonly transport: SessionTransport;
  readonly address: string;
  readonly connectedAt: number;
  username: string | null;
  lastActivity: number;
  messageCount: number;
  state: ConnectionState;
}

export type SessionView = Readonly<Session>;

export type UsernameRejection = 'duplicate' | 'invalid_format' | 'unknown_session';

export type UsernameResult =
  | { ok: true; username: string; previous: string | null; changed: boolean }
  | { ok: false; reason: UsernameRejection; detail: string };

export interface ClientRegistryEvents {
  'session-registered': (session: SessionView) => void;
  'session-renamed': (session: SessionView, previous: string | null) => void;
  'session-unregistered': (session: SessionView) => void;
}

export interface ClientRegistryOptions {
  validator?: InputValidator;
  now?: () => number;
}

export interface ClientRegistryStats {
  totalSessions: number;
  namedSessions: number;
  anonymousSessions: number;
  totalMessages: number;
  byState: Record<ConnectionState, number>;
}

/**
 * Name shown for a session: its username, or `User_<address>` until one is set.
 */
export function displayName(session: Pick<Session, 'username' | 'address'>): string {
  return session.username ?? `${USERNAME.ANONYMOUS_PREFIX}${session.address}`;
}

export interface ClientRegistry {
  on<K extends keyof ClientRegistryEvents>(event: K, listener: ClientRegistryEvents[K]): this;
  once<K extends keyof ClientRegistryEvents>(event: K, listener: ClientRegistryEvents[K]): this;
  off<K extends keyof ClientRegistryEvents>(event: K, listener: ClientRegistryEvents[K]): this;
  emit<K extends keyof ClientRegistryEvents>(event: K, ...args: Parameters<ClientRegistryEvents[K]>): boolean;
}

export class ClientRegistry extends EventEmitter {
  private sessions: Map<string, Session> = new Map();
  private usernames: Map<string, string> = new Map(); // username -> sessionId
  private readonly validator: InputValidator;
  private readonly now: () => number;

  constructor(options: ClientRegistryOptions = {}) {
    super();
    this.validator = options.validator ?? new InputValidator();
    this.now = options.now ?? Date.now;
  }

  /**
   * Track a newly admitted connection and return its session ID
   */
  register(transport: SessionTransport, address: string): string {
    const now = this.now();
    const session: Session = {
      id: randomUUID(),
      transport,
      address,
      connectedAt: now,
      username: null,
      lastActivity: now,
      messageCount: 0,
      state: 'ADMITTED',
    };

    this.sessions.set(session.id, session);
    this.emit('session-registered', session);
    return session.id;
  }

  /**
   * Claim or change a session's username.
   */
  setUsername(sessionId: string, requested: string): UsernameResult {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return { ok: false, reason: 'unknown_session', detail: 'Session is not registered' };
    }

    const validation = this.validator.validateUsername(requested);
    if (!validation.valid) {
      return { ok: false, reason: 'invalid_format', detail: validation.error };
    }

    const username = validation.value;
    const previous = session.username;

    if (previous === username) {
      return { ok: true, username, previous, changed: false };
    }

    const holder = this.usernames.get(username);
    if ((holder !== undefined && holder !== sessionId) || this.isAnonymousName(username, sessionId)) {
      return { ok: false, reason: 'duplicate', detail: `Username '${username}' is already taken` };
    }

    if (previous !== null) {
      this.usernames.delete(previous);
    }
    this.usernames.set(username, sessionId);
    session.username = username;

    this.emit('session-renamed', session, previous);
    return { ok: true, username, previous, changed: true };
  }

  /**
   * Remove a session. Returns the removed session, or undefined when it
   * was already gone.
   */
  unregister(sessionId: string): SessionView | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;

    this.sessions.delete(sessionId);
    if (session.username !== null && this.usernames.get(session.username) === sessionId) {
      this.usernames.delete(session.username);
    }

    this.emit('session-unregistered', session);
    return session;
  }

  get(sessionId: string): SessionView | undefined {
    return this.sessions.get(sessionId);
  }

  getByUsername(username: string): SessionView | undefined {
    const sessionId = this.usernames.get(username);
    return sessionId === undefined ? undefined : this.sessions.get(sessionId);
  }

  isUsernameTaken(username: string): boolean {
    return this.usernames.has(username);
  }

  /**
   * Record activity on a session (resets its idle clock)
   */
  touch(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.lastActivity = this.now();
    return true;
  }

  recordMessage(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.messageCount++;
    session.lastActivity = this.now();
    return true;
  }

  setState(sessionId: string, state: ConnectionState): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.state = state;
    return true;
  }

  /**
   * Roster in connection order. Unnamed sessions appear under their
   * display name.
   */
  snapshotUsers(): RosterEntry[] {
    const entries: RosterEntry[] = [];
    for (const session of this.sessions.values()) {
      entries.push({ username: displayName(session), address: session.address });
    }
    return entries;
  }

  /**
   * Copy of the live sessions, optionally leaving one out
   */
  recipients(excludeSessionId?: string): SessionView[] {
    const result: SessionView[] = [];
    for (const session of this.sessions.values()) {
      if (session.id === excludeSessionId) continue;
      if (session.state === 'CLOSING') continue;
      result.push(session);
    }
    return result;
  }

  /**
   * Sessions with no activity for longer than `idleMs`
   */
  findIdle(now: number, idleMs: number): SessionView[] {
    const idle: SessionView[] = [];
    for (const session of this.sessions.values()) {
      if (now - session.lastActivity > idleMs) {
        idle.push(session);
      }
    }
    return idle;
  }

  get size(): number {
    return this.sessions.size;
  }

  getStats(): ClientRegistryStats {
    const byState: Record<ConnectionState, number> = {
      ADMITTED: 0,
      AUTHENTICATING: 0,
      ACTIVE: 0,
      CLOSING: 0,
    };
    let totalMessages = 0;

    for (const session of this.sessions.values()) {
      byState[session.state]++;
      totalMessages += session.messageCount;
    }

    return {
      totalSessions: this.sessions.size,
      namedSessions: this.usernames.size,
      anonymousSessions: this.sessions.size - this.usernames.size,
      totalMessages,
      byState,
    };
  }

  /**
   * Whether `name` is the display name of another session that has not
   * set a username yet
   */
  private isAnonymousName(name: string, exceptSessionId: string): boolean {
    for (const session of this.sessions.values()) {
      if (session.id !== exceptSessionId && session.username === null && displayName(session) === name) {
        return true;
      }
    }
    return false;
  }

  /**
   * Clear all entries (for shutdown)
   */
  clear(): void {
    this.sessions.clear();
    this.usernames.clear();
  }
}
