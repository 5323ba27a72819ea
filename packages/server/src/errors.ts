/**
 * Error classes for the chat server.
 *
 * Every error carries a stable code from `ErrorCodes`. None of the messages
 * are sent to clients; client-facing notices live in the handler.
 */

import type { RejectReason } from './types.js';

export const ErrorCodes = {
  ADMISSION_REJECTED: 'ADMISSION_REJECTED',
  PROTOCOL_ERROR: 'PROTOCOL_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  RATE_EXCEEDED: 'RATE_EXCEEDED',
  NETWORK_ERROR: 'NETWORK_ERROR',
  SHUTDOWN_TIMEOUT: 'SHUTDOWN_TIMEOUT',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  BIND_FAILED: 'BIND_FAILED',
  INVALID_STATE: 'INVALID_STATE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class ChatServerError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChatServerError';
    this.code = code;
  }
}

export class AdmissionRejectedError extends ChatServerError {
  constructor(
    message: string,
    public readonly reason: RejectReason
  ) {
    super(message, ErrorCodes.ADMISSION_REJECTED);
    this.name = 'AdmissionRejectedError';
  }
}

export class ProtocolError extends ChatServerError {
  constructor(message: string) {
    super(message, ErrorCodes.PROTOCOL_ERROR);
    this.name = 'ProtocolError';
  }
}

export class ValidationError extends ChatServerError {
  constructor(
    message: string,
    public readonly field: 'username' | 'message'
  ) {
    super(message, ErrorCodes.VALIDATION_ERROR);
    this.name = 'ValidationError';
  }
}

export class RateExceededError extends ChatServerError {
  constructor(
    message: string,
    /** True for the first denial of a violation episode */
    public readonly episodeStart: boolean
  ) {
    super(message, ErrorCodes.RATE_EXCEEDED);
    this.name = 'RateExceededError';
  }
}

export class NetworkError extends ChatServerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCodes.NETWORK_ERROR, options);
    this.name = 'NetworkError';
  }
}

export class ShutdownError extends ChatServerError {
  constructor(
    message: string,
    public readonly sessionId: string
  ) {
    super(message, ErrorCodes.SHUTDOWN_TIMEOUT);
    this.name = 'ShutdownError';
  }
}

export class ConfigurationError extends ChatServerError {
  constructor(
    message: string,
    public readonly problems: string[] = []
  ) {
    super(message, ErrorCodes.CONFIGURATION_ERROR);
    this.name = 'ConfigurationError';
  }
}

/**
 * Narrow an unknown thrown value to a Node system error with a `code`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
