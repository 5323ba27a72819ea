/**
 * Protocol Module Exports
 */

export {
  encodeFrame,
  decodeLine,
  encodeRoster,
  parseRoster,
  sanitizePayload,
  isFrameType,
  LineDecoder,
  type DecodeResult,
  type RosterEntry,
} from './codec.js';
