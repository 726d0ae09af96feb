import type { FailureKind } from '../backend/adapter.js';
import type { GenerationErrorKind } from './errors.js';

/**
 * What the orchestrator does after a failed backend call.
 *
 * - `retry`: call again with the same credential after a delay; when the
 *   per-credential budget runs out, fail over.
 * - `failover`: stop using this credential for this attempt, pick another.
 * - `failover_exclude`: as failover, and never pick this credential again
 *   within the same request.
 * - `abort`: the request itself is at fault; end it now.
 */
export type FailureAction = 'retry' | 'failover' | 'failover_exclude' | 'abort';

export const FAILURE_POLICY: Readonly<Record<FailureKind, FailureAction>> = {
  rate_limited: 'retry',
  transport: 'retry',
  auth_invalid: 'failover_exclude',
  server_error: 'failover',
  bad_request: 'abort',
};

export const FAILURE_ERROR_KIND: Readonly<Record<FailureKind, GenerationErrorKind>> = {
  rate_limited: 'rate_limited',
  transport: 'transport',
  auth_invalid: 'credential_invalid',
  server_error: 'server_error',
  bad_request: 'bad_request',
};

export function actionFor(kind: FailureKind): FailureAction {
  return FAILURE_POLICY[kind];
}

/** Delay before the next same-credential call, after `attempt` (1-based) calls */
export function retryDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * attempt;
}
