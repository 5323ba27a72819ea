/**
 * Security Module Exports
 */

export { InputValidator, type ValidationResult, type ValidatorOptions } from './validator.js';
export {
  RateLimiter,
  TokenBucket,
  type RateDecision,
  type RateLimiterConfig,
  type RateLimiterStats,
} from './rate-limiter.js';
export {
  ConnectionGate,
  type AdmissionResult,
  type AdmissionTicket,
  type ConnectionGateConfig,
  type ConnectionGateStats,
} from './connection-gate.js';
