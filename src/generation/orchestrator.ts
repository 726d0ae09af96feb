/**
 * GenerationOrchestrator: turns one generation request into backend calls.
 *
 * Two nested loops, driven by the FAILURE_POLICY table:
 *   outer: pick a credential from the scheduler (failover), up to
 *          `retry.maxCredentialAttempts` credentials per request;
 *   inner: call the backend with that credential, retrying transient
 *          failures in place up to `retry.maxAttemptsPerCredential` calls.
 *
 * Each pass of the outer loop is one credential attempt: it records exactly
 * one outcome on the credential and writes exactly one attempt-log entry,
 * however many inner calls it took.
 */

import type { BackendAdapter, BackendFailure, GenerationParams, ImageResult } from '../backend/adapter.js';
import type { LimitsConfig, RetryConfig } from '../config/schema.js';
import type { Credential } from '../credentials/credential.js';
import type { CredentialScheduler } from '../pool/scheduler.js';
import type { AttemptLogger } from './attempt-log.js';
import type { GenerationErrorKind } from './errors.js';
import { GenerationError, PoolExhaustedError } from './errors.js';
import type { FailureAction } from './policy.js';
import { actionFor, FAILURE_ERROR_KIND, retryDelay } from './policy.js';
import type { GenerationRequest, RequestDefaults } from './validate.js';
import { validateRequest } from './validate.js';
import { sleep as defaultSleep } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('generate');

export type GenerationResult =
  | { ok: true; imageUrl?: string; imageBase64?: string }
  | { ok: false; error: string; code: GenerationErrorKind };

export interface OrchestratorOptions {
  retry: RetryConfig;
  limits: LimitsConfig;
  defaults: RequestDefaults;
  /** Injected so tests can observe backoff without waiting */
  sleep?: (ms: number) => Promise<void>;
}

/** Result of the inner loop for one credential */
type CredentialAttempt =
  | { ok: true; image: ImageResult; calls: number }
  | { ok: false; failure: BackendFailure; action: Exclude<FailureAction, 'retry'>; calls: number };

function failed(error: GenerationError): GenerationResult {
  return { ok: false, error: error.message, code: error.kind };
}

export class GenerationOrchestrator {
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private scheduler: CredentialScheduler,
    private adapter: BackendAdapter,
    private attempts: AttemptLogger,
    private options: OrchestratorOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    let params: GenerationParams;
    try {
      params = validateRequest(request, this.options.limits, this.options.defaults);
    } catch (err) {
      if (err instanceof GenerationError) return failed(err);
      throw err;
    }

    const maxCredentials = this.options.retry.maxCredentialAttempts;
    const excluded = new Set<string>();
    let lastFailure: BackendFailure | null = null;

    for (let round = 1; round <= maxCredentials; round++) {
      const credential = await this.scheduler.selectCredential({ exclude: excluded });
      if (!credential) {
        // Nothing left to fail over to: report what went wrong last, if anything did
        if (!lastFailure) return failed(new PoolExhaustedError());
        break;
      }

      const attempt = await this.runCredentialAttempt(credential, params);
      await this.settle(credential, params, attempt);

      if (attempt.ok) {
        return { ok: true, imageUrl: attempt.image.imageUrl, imageBase64: attempt.image.imageBase64 };
      }

      lastFailure = attempt.failure;
      if (attempt.action === 'abort') {
        return { ok: false, error: attempt.failure.message, code: FAILURE_ERROR_KIND[attempt.failure.kind] };
      }
      if (attempt.action === 'failover_exclude') {
        excluded.add(credential.id);
      }
      log.warn(`Credential attempt ${round}/${maxCredentials} failed (${attempt.failure.kind}): ${attempt.failure.message}`);
    }

    if (!lastFailure) return failed(new PoolExhaustedError());
    return {
      ok: false,
      error: `All credential attempts failed: ${lastFailure.message}`,
      code: 'exhausted',
    };
  }

  /** Inner loop: same credential, transient failures retried after a growing delay */
  private async runCredentialAttempt(credential: Credential, params: GenerationParams): Promise<CredentialAttempt> {
    const maxCalls = this.options.retry.maxAttemptsPerCredential;

    for (let call = 1; ; call++) {
      const result = await this.adapter.call(credential, params);
      if (result.ok) {
        return { ok: true, image: result.image, calls: call };
      }

      const action = actionFor(result.failure.kind);
      if (action !== 'retry') {
        return { ok: false, failure: result.failure, action, calls: call };
      }
      if (call >= maxCalls) {
        return { ok: false, failure: result.failure, action: 'failover', calls: call };
      }

      const delay = retryDelay(this.options.retry.retryDelayMs, call);
      log.warn(`${result.failure.message}; retrying in ${delay}ms (${call}/${maxCalls})`);
      await this.sleep(delay);
    }
  }

  /** Record the attempt's outcome on the credential and in the attempt log */
  private async settle(credential: Credential, params: GenerationParams, attempt: CredentialAttempt): Promise<void> {
    try {
      await this.scheduler.recordOutcome(credential.id, attempt.ok);
    } catch (err) {
      log.error(`Failed to record outcome for credential ${credential.id}: ${err instanceof Error ? err.message : String(err)}`);
    }

    try {
      this.attempts.record({
        prompt: params.prompt,
        width: params.width,
        height: params.height,
        credentialId: credential.id,
        outcome: attempt.ok ? 'success' : 'failure',
        errorKind: attempt.ok ? undefined : attempt.failure.kind,
        errorMessage: attempt.ok ? undefined : attempt.failure.message,
        imageRef: attempt.ok
          ? attempt.image.imageUrl ?? (attempt.image.imageBase64 ? 'base64' : undefined)
          : undefined,
      });
    } catch (err) {
      log.warn(`Attempt log rejected an entry: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
