/**
 * Connection Gate
 *
 * Admission control for new TCP connections: a global ceiling, a per-IP
 * ceiling and a per-IP connection-rate block. `admit()` checks and
 * increments in one synchronous pass; the returned ticket releases the slot
 * exactly once however many times it is called.
 */

import { CONNECTION_LIMITS } from '../constants.js';
import type { RejectReason } from '../types.js';

export interface ConnectionGateConfig {
  maxClients: number;
  maxConnectionsPerIp: number;
  /** Admissions allowed per IP per window; 0 disables the rate block */
  maxConnectionsPerMinute: number;
  blockDurationMs: number;
  windowMs: number;
  now: () => number;
}

export interface AdmissionTicket {
  readonly ip: string;
  readonly released: boolean;
  release(): void;
}

export type AdmissionResult =
  | { allowed: true; ticket: AdmissionTicket }
  | { allowed: false; reason: RejectReason };

export interface ConnectionGateStats {
  activeConnections: number;
  distinctIps: number;
  totalAdmitted: number;
  totalRejected: number;
  rejectedByReason: Record<RejectReason, number>;
  blockedIps: number;
}

interface ConnectionRecord {
  active: number;
  /** Admission timestamps inside the current window */
  recent: number[];
  blockedUntil: number | null;
}

export class ConnectionGate {
  private records: Map<string, ConnectionRecord> = new Map();
  private active = 0;
  private readonly config: ConnectionGateConfig;

  private totalAdmitted = 0;
  private rejectedByReason: Record<RejectReason, number> = {
    server_full: 0,
    ip_limit: 0,
    ip_blocked: 0,
  };

  constructor(config: Partial<ConnectionGateConfig> = {}) {
    this.config = {
      maxClients: CONNECTION_LIMITS.MAX_TOTAL_CONNECTIONS,
      maxConnectionsPerIp: CONNECTION_LIMITS.MAX_CONNECTIONS_PER_IP,
      maxConnectionsPerMinute: CONNECTION_LIMITS.MAX_CONNECTIONS_PER_MINUTE,
      blockDurationMs: CONNECTION_LIMITS.BLOCK_DURATION_MS,
      windowMs: CONNECTION_LIMITS.RATE_WINDOW_MS,
      now: Date.now,
      ...config,
    };
  }

  /**
   * Decide whether a connection from `ip` may be accepted.
   */
  admit(ip: string): AdmissionResult {
    const now = this.config.now();
    const record = this.records.get(ip);

    if (record?.blockedUntil != null) {
      if (now < record.blockedUntil) {
        return this.reject('ip_blocked');
      }
      record.blockedUntil = null;
      record.recent = [];
    }

    if (this.active >= this.config.maxClients) {
      return this.reject('server_full');
    }

    if (record && record.active >= this.config.maxConnectionsPerIp) {
      return this.reject('ip_limit');
    }

    const entry = record ?? { active: 0, recent: [], blockedUntil: null };

    if (this.config.maxConnectionsPerMinute > 0) {
      const windowStart = now - this.config.windowMs;
      entry.recent = entry.recent.filter((t) => t > windowStart);

      if (entry.recent.length >= this.config.maxConnectionsPerMinute) {
        entry.blockedUntil = now + this.config.blockDurationMs;
        entry.recent = [];
        this.records.set(ip, entry);
        return this.reject('ip_blocked');
      }
      entry.recent.push(now);
    }

    entry.active++;
    this.active++;
    this.totalAdmitted++;
    this.records.set(ip, entry);

    return { allowed: true, ticket: this.createTicket(ip) };
  }

  /**
   * Free one slot held by `ip`. No-op when the IP holds none.
   */
  release(ip: string): void {
    const record = this.records.get(ip);
    if (!record || record.active === 0) return;

    record.active--;
    this.active--;
    this.prune(ip, record, this.config.now());
  }

  activeFor(ip: string): number {
    return this.records.get(ip)?.active ?? 0;
  }

  isBlocked(ip: string): boolean {
    const blockedUntil = this.records.get(ip)?.blockedUntil;
    return blockedUntil != null && this.config.now() < blockedUntil;
  }

  get activeConnections(): number {
    return this.active;
  }

  /**
   * Drop records with no live connections, no block in force and no
   * admissions left inside the rate window.
   */
  cleanup(): number {
    const now = this.config.now();
    let removed = 0;
    for (const [ip, record] of this.records) {
      if (this.prune(ip, record, now)) removed++;
    }
    return removed;
  }

  getStats(): ConnectionGateStats {
    const now = this.config.now();
    let distinctIps = 0;
    let blockedIps = 0;

    for (const record of this.records.values()) {
      if (record.active > 0) distinctIps++;
      if (record.blockedUntil !== null && now < record.blockedUntil) blockedIps++;
    }

    const { server_full, ip_limit, ip_blocked } = this.rejectedByReason;

    return {
      activeConnections: this.active,
      distinctIps,
      totalAdmitted: this.totalAdmitted,
      totalRejected: server_full + ip_limit + ip_blocked,
      rejectedByReason: { ...this.rejectedByReason },
      blockedIps,
    };
  }

  clear(): void {
    this.records.clear();
    this.active = 0;
  }

  private reject(reason: RejectReason): AdmissionResult {
    this.rejectedByReason[reason]++;
    return { allowed: false, reason };
  }

  private prune(ip: string, record: ConnectionRecord, now: number): boolean {
    if (record.active > 0) return false;
    if (record.blockedUntil !== null && now < record.blockedUntil) return false;

    const windowStart = now - this.config.windowMs;
    if (record.recent.some((t) => t > windowStart)) return false;

    this.records.delete(ip);
    return true;
  }

  private createTicket(ip: string): AdmissionTicket {
    let released = false;
    return {
      ip,
      get released() {
        return released;
      },
      release: () => {
        if (released) return;
        released = true;
        this.release(ip);
      },
    };
  }
}
