import type { GuardRejectionReason } from './accessGuard.js';

export type EngineErrorKind =
  | 'SecurityViolation'
  | 'PoolExhausted'
  | 'AuthFailed'
  | 'Unreachable'
  | 'SizeExceeded'
  | 'SourceUnavailable'
  | 'SourceNotFound';

/**
 * Base class for every failure the engine reports. `status` is the HTTP status
 * the route layer answers with when the error escapes to a request.
 */
export class EngineError extends Error {
  readonly kind: EngineErrorKind;
  readonly status: number;

  constructor(kind: EngineErrorKind, status: number, message: string) {
    super(message);
    this.name = `${kind}Error`;
    this.kind = kind;
    this.status = status;
  }
}

export class SecurityViolationError extends EngineError {
  readonly reason: GuardRejectionReason;

  constructor(reason: GuardRejectionReason, message: string) {
    super('SecurityViolation', 403, message);
    this.reason = reason;
  }
}

export class PoolExhaustedError extends EngineError {
  constructor(hostId: string, waitedMs: number) {
    super('PoolExhausted', 503, `no session available for ${hostId} after ${waitedMs}ms`);
  }
}

export class AuthFailedError extends EngineError {
  constructor(hostId: string, detail: string) {
    super('AuthFailed', 502, `authentication to ${hostId} failed: ${detail}`);
  }
}

export class UnreachableError extends EngineError {
  constructor(hostId: string, detail: string) {
    super('Unreachable', 502, `${hostId} unreachable: ${detail}`);
  }
}

export class SizeExceededError extends EngineError {
  constructor(observedSize: number, maxSize: number) {
    super('SizeExceeded', 413, `file too large: ${observedSize} bytes (max: ${maxSize})`);
  }
}

export class SourceUnavailableError extends EngineError {
  constructor(sourceId: string, detail: string) {
    super('SourceUnavailable', 503, `${sourceId} unavailable: ${detail}`);
  }
}

export class SourceNotFoundError extends EngineError {
  constructor(sourceId: string) {
    super('SourceNotFound', 404, `unknown source: ${sourceId}`);
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/** Connection-level failures are retried by a tailer; everything else is final. */
export function isRetryable(error: unknown): boolean {
  if (!isEngineError(error)) {
    return true;
  }
  return error.kind === 'AuthFailed' || error.kind === 'Unreachable' || error.kind === 'PoolExhausted';
}
