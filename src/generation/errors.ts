/**
 * Error kinds a generation request can end with.
 *
 * `exhausted` means the failover loop ran out of credential attempts; the
 * message then carries the last underlying failure.
 */
export type GenerationErrorKind =
  | 'validation'
  | 'pool_exhausted'
  | 'credential_invalid'
  | 'rate_limited'
  | 'transport'
  | 'bad_request'
  | 'server_error'
  | 'exhausted';

export class GenerationError extends Error {
  constructor(public readonly kind: GenerationErrorKind, message: string) {
    super(message);
    this.name = 'GenerationError';
  }
}

export class ValidationError extends GenerationError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

export class PoolExhaustedError extends GenerationError {
  constructor(message = 'No credential with remaining quota is available; add credentials or wait for the daily reset') {
    super('pool_exhausted', message);
    this.name = 'PoolExhaustedError';
  }
}
