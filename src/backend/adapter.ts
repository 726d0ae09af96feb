import type { Credential } from '../credentials/credential.js';

/** How a backend call failed, as far as retry policy is concerned */
export type FailureKind =
  | 'rate_limited'
  | 'auth_invalid'
  | 'bad_request'
  | 'transport'
  | 'server_error';

export interface BackendFailure {
  kind: FailureKind;
  message: string;
  /** HTTP status when the backend answered at all */
  status?: number;
}

export interface ImageResult {
  imageUrl?: string;
  imageBase64?: string;
  /** MIME type reported by the backend, e.g. image/png */
  mimeType?: string;
}

export type BackendResult =
  | { ok: true; image: ImageResult }
  | { ok: false; failure: BackendFailure };

export interface GenerationParams {
  prompt: string;
  width: number;
  height: number;
  steps: number;
  model: string;
  negativePrompt?: string;
}

/**
 * One outbound call to the image backend with one credential.
 *
 * Implementations route through the credential's proxy when it has one,
 * apply a single fixed timeout, never throw and never retry.
 */
export interface BackendAdapter {
  readonly name: string;
  call(credential: Credential, params: GenerationParams): Promise<BackendResult>;
}

export function failure(kind: FailureKind, message: string, status?: number): BackendResult {
  return { ok: false, failure: { kind, message, status } };
}
