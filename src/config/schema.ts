import type { LogLevel } from '../utils/logger.js';

export interface ServerConfig {
  host: string;
  port: number;
}

export interface ModelInfo {
  id: string;
  name: string;
  description: string;
}

export interface BackendConfig {
  /** Origin of the image generation service, without trailing slash */
  baseUrl: string;
  /** Path of the generations endpoint */
  endpoint: string;
  defaultModel: string;
  defaultSteps: number;
  /** Per-call timeout; a timeout counts as a transport failure */
  requestTimeoutMs: number;
  userAgent: string;
  models: ModelInfo[];
}

export interface PoolConfig {
  /** Successful generations allowed per credential per calendar day */
  dailyQuota: number;
  /** How long the active-credential list is reused before reloading */
  cacheTtlMs: number;
  /** Lifetime error count at which a credential is reported as suspicious */
  errorWarnThreshold: number;
}

export interface RetryConfig {
  /** Outer loop: how many credentials a request may go through */
  maxCredentialAttempts: number;
  /** Inner loop: how many calls one credential gets for a transient failure */
  maxAttemptsPerCredential: number;
  /** Delay before inner retry n is `retryDelayMs * n` */
  retryDelayMs: number;
}

export interface LimitsConfig {
  minImageSize: number;
  maxImageSize: number;
  maxPromptLength: number;
  maxNegativePromptLength: number;
  minSteps: number;
  maxSteps: number;
}

/** Aspect ratio label (e.g. "16:9") to [width, height] pairs */
export type SizePresets = Record<string, Array<[number, number]>>;

export interface ImageRelayConfig {
  server: ServerConfig;
  backend: BackendConfig;
  pool: PoolConfig;
  retry: RetryConfig;
  limits: LimitsConfig;
  presets: SizePresets;
  /** Where credentials.json and attempts.jsonl live */
  dataDir: string;
  logLevel: LogLevel;
  jsonOutput: boolean;
}
