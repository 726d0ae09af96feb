import type { ImageRelayConfig } from '../config/schema.js';
import { loadConfig } from '../config/config.js';
import { FileCredentialStore } from '../credentials/file-store.js';
import { CredentialScheduler } from '../pool/scheduler.js';
import { HttpBackendAdapter } from '../backend/http-adapter.js';
import { FileAttemptLog } from '../generation/attempt-log.js';
import { GenerationOrchestrator } from '../generation/orchestrator.js';
import { setLogLevel } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { setJsonOutput } from './output.js';

export interface AppContext {
  config: ImageRelayConfig;
  store: FileCredentialStore;
  scheduler: CredentialScheduler;
  adapter: HttpBackendAdapter;
  attempts: FileAttemptLog;
  orchestrator: GenerationOrchestrator;
}

/** Wire one instance of every component; nothing here is a global */
export async function createContext(config: ImageRelayConfig, clock: Clock = systemClock): Promise<AppContext> {
  const store = new FileCredentialStore(config.dataDir, clock);
  await store.load();

  const scheduler = new CredentialScheduler(store, {
    dailyQuota: config.pool.dailyQuota,
    cacheTtlMs: config.pool.cacheTtlMs,
    errorWarnThreshold: config.pool.errorWarnThreshold,
    clock,
  });
  const adapter = new HttpBackendAdapter({
    baseUrl: config.backend.baseUrl,
    endpoint: config.backend.endpoint,
    requestTimeoutMs: config.backend.requestTimeoutMs,
    userAgent: config.backend.userAgent,
  });
  const attempts = new FileAttemptLog(config.dataDir, clock);
  const orchestrator = new GenerationOrchestrator(scheduler, adapter, attempts, {
    retry: config.retry,
    limits: config.limits,
    defaults: {
      width: 1024,
      height: 1024,
      model: config.backend.defaultModel,
      steps: config.backend.defaultSteps,
    },
  });

  return { config, store, scheduler, adapter, attempts, orchestrator };
}

/** Set from global command-line flags; these win over the loaded config */
export interface CliOverrides {
  logLevel?: LogLevel;
  jsonOutput?: boolean;
}

let overrides: CliOverrides = {};

export function setCliOverrides(next: CliOverrides): void {
  overrides = { ...overrides, ...next };
}

export function resetCliOverrides(): void {
  overrides = {};
}

/** Apply the config's logging and output settings, letting flags take precedence */
export function applyCliSettings(config: ImageRelayConfig): void {
  setLogLevel(overrides.logLevel ?? config.logLevel);
  setJsonOutput(overrides.jsonOutput ?? config.jsonOutput);
}

let cachedContext: AppContext | null = null;

export async function getContext(): Promise<AppContext> {
  if (cachedContext) return cachedContext;

  const config = await loadConfig();
  applyCliSettings(config);

  cachedContext = await createContext(config);
  return cachedContext;
}

/** Let in-flight writes land and close proxy connections */
export async function closeContext(ctx: AppContext): Promise<void> {
  await ctx.attempts.flush();
  await ctx.adapter.close();
}
