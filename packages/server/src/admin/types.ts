/**
 * Admin endpoint types
 */

import type { ServerState } from '../types.js';
import type { ServerStats } from '../server/orchestrator.js';

/**
 * JSON envelope for every admin response
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface HealthReport {
  status: 'healthy' | 'stopping';
  state: ServerState;
  uptime: number;
  timestamp: string;
}

/**
 * What the admin endpoint reads from the running server
 */
export interface StatsSource {
  readonly state: ServerState;
  getStats(): ServerStats;
}

export interface AdminServerOptions {
  host: string;
  port: number;
  source: StatsSource;
}
