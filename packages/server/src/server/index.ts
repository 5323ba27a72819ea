/**
 * Server Module Exports
 */

export {
  ChatServer,
  type BoundAddress,
  type ChatServerDeps,
  type ChatServerEvents,
  type ServerStats,
} from './orchestrator.js';
