import { fetch, type Dispatcher } from 'undici';
import type { Credential } from '../credentials/credential.js';
import type { BackendAdapter, BackendResult, GenerationParams } from './adapter.js';
import { failure } from './adapter.js';
import { createProxyDispatcher, redactProxy } from './proxy.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('backend');

const MAX_ERROR_BODY = 500;

export interface HttpBackendOptions {
  baseUrl: string;
  endpoint: string;
  requestTimeoutMs: number;
  userAgent: string;
  /** Dispatcher for credentials without a proxy; undici's global one by default */
  dispatcher?: Dispatcher;
  /** Builds the dispatcher for a proxy URL */
  proxyDispatcher?: (proxy: string) => Dispatcher;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function truncate(text: string): string {
  return text.length > MAX_ERROR_BODY ? text.slice(0, MAX_ERROR_BODY) + '…' : text;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Pull a human-readable message out of an error body: `{error: {message}}`, `{message}`, or raw text */
export function extractErrorMessage(body: string): string {
  const data = parseJson(body);
  if (isRecord(data)) {
    if (isRecord(data.error) && typeof data.error.message === 'string') return data.error.message;
    if (typeof data.error === 'string') return data.error;
    if (typeof data.message === 'string') return data.message;
  }
  return truncate(body.trim()) || 'no response body';
}

/**
 * Map an HTTP response from the generations endpoint to a result.
 * Expected success body: `{ created, data: [{ b64_json?, url?, type? }] }`.
 */
export function classifyResponse(status: number, body: string): BackendResult {
  if (status >= 200 && status < 300) {
    const data = parseJson(body);
    if (!isRecord(data) || !Array.isArray(data.data) || data.data.length === 0) {
      return failure('server_error', 'Backend returned an unexpected response format', status);
    }
    const first: unknown = data.data[0];
    if (!isRecord(first)) {
      return failure('server_error', 'Backend returned an unexpected response format', status);
    }
    const imageBase64 = typeof first.b64_json === 'string' && first.b64_json ? first.b64_json : undefined;
    const imageUrl = typeof first.url === 'string' && first.url ? first.url : undefined;
    if (!imageBase64 && !imageUrl) {
      return failure('server_error', 'Backend response contained no image', status);
    }
    const mimeType = typeof first.type === 'string' ? first.type : undefined;
    return { ok: true, image: { imageUrl, imageBase64, mimeType } };
  }

  switch (status) {
    case 429:
      return failure('rate_limited', 'Backend rate limit reached', status);
    case 401:
    case 403:
      return failure('auth_invalid', 'Credential was rejected by the backend (invalid or expired token)', status);
    case 400:
    case 422:
      return failure('bad_request', `Invalid request: ${extractErrorMessage(body)}`, status);
    default:
      return failure('server_error', `Backend error: HTTP ${status}`, status);
  }
}

/** Thrown fetch errors are connection problems or the per-call timeout */
export function classifyError(err: unknown): BackendResult {
  if (err instanceof Error) {
    if (err.name === 'TimeoutError' || err.name === 'AbortError') {
      return failure('transport', 'Request to backend timed out');
    }
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return failure('transport', `Request to backend failed: ${err.message}${cause}`);
  }
  return failure('transport', `Request to backend failed: ${String(err)}`);
}

export class HttpBackendAdapter implements BackendAdapter {
  readonly name = 'http';
  private proxies = new Map<string, Dispatcher>();

  constructor(private options: HttpBackendOptions) {}

  get url(): string {
    return `${this.options.baseUrl}${this.options.endpoint}`;
  }

  private dispatcherFor(credential: Credential): Dispatcher | undefined {
    if (!credential.proxy) return this.options.dispatcher;
    let dispatcher = this.proxies.get(credential.proxy);
    if (!dispatcher) {
      const build = this.options.proxyDispatcher ?? createProxyDispatcher;
      dispatcher = build(credential.proxy);
      this.proxies.set(credential.proxy, dispatcher);
    }
    return dispatcher;
  }

  async call(credential: Credential, params: GenerationParams): Promise<BackendResult> {
    let dispatcher: Dispatcher | undefined;
    try {
      dispatcher = this.dispatcherFor(credential);
    } catch (err) {
      const proxy = credential.proxy ? redactProxy(credential.proxy) : 'direct';
      log.warn(`Cannot use proxy ${proxy} for credential ${credential.label}: ${err instanceof Error ? err.message : String(err)}`);
      return failure('transport', `Proxy configuration error for ${proxy}`);
    }

    const payload: Record<string, unknown> = {
      prompt: params.prompt,
      model: params.model,
      size: `${params.width}x${params.height}`,
      num_inference_steps: params.steps,
    };
    if (params.negativePrompt) {
      payload.negative_prompt = params.negativePrompt;
    }

    log.info(`Sending generation request: model=${params.model}, size=${params.width}x${params.height}` +
      (credential.proxy ? `, via ${redactProxy(credential.proxy)}` : ''));

    try {
      const res = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${credential.secret}`,
          'User-Agent': this.options.userAgent,
        },
        body: JSON.stringify(payload),
        dispatcher,
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
      const body = await res.text();
      log.debug(`Backend response [${res.status}]: ${truncate(body)}`);

      const result = classifyResponse(res.status, body);
      if (!result.ok && result.failure.kind === 'server_error') {
        log.error(`Backend error ${res.status}: ${truncate(body)}`);
      }
      return result;
    } catch (err) {
      const result = classifyError(err);
      if (!result.ok) log.warn(result.failure.message);
      return result;
    }
  }

  /** Close proxy connections opened for credentials */
  async close(): Promise<void> {
    const closing = Array.from(this.proxies.values()).map(d => d.close());
    this.proxies.clear();
    await Promise.all(closing);
  }
}
