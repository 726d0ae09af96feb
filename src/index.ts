// Core types
export type {
  Credential,
  CredentialPatch,
  DailyUsage,
  NewCredentialInput,
} from './credentials/credential.js';
export type { CredentialStore } from './credentials/store.js';
export type {
  BackendAdapter,
  BackendFailure,
  BackendResult,
  FailureKind,
  GenerationParams,
  ImageResult,
} from './backend/adapter.js';
export type { AttemptLogger, AttemptLogEntry, AttemptRecord, AttemptOutcome } from './generation/attempt-log.js';
export type { GenerationResult, OrchestratorOptions } from './generation/orchestrator.js';
export type { GenerationRequest, ValidatedRequest, RequestDefaults } from './generation/validate.js';
export type { GenerationErrorKind } from './generation/errors.js';
export type { FailureAction } from './generation/policy.js';
export type { PoolStats, SchedulerOptions, SelectOptions } from './pool/scheduler.js';
export type { ImageRelayConfig, BackendConfig, PoolConfig, RetryConfig, LimitsConfig } from './config/schema.js';
export type { Clock } from './utils/clock.js';

// Classes
export { FileCredentialStore } from './credentials/file-store.js';
export { CredentialNotFoundError, InvalidCredentialError } from './credentials/store.js';
export { CredentialScheduler } from './pool/scheduler.js';
export { HttpBackendAdapter, classifyResponse, classifyError } from './backend/http-adapter.js';
export { createProxyDispatcher } from './backend/proxy.js';
export { GenerationOrchestrator } from './generation/orchestrator.js';
export { FileAttemptLog } from './generation/attempt-log.js';
export { GenerationError, ValidationError, PoolExhaustedError } from './generation/errors.js';
export { FAILURE_POLICY, actionFor, retryDelay } from './generation/policy.js';
export { validateRequest } from './generation/validate.js';

// Config
export { loadConfig, resetConfigCache, getGlobalConfigDir, ConfigError } from './config/config.js';
export { DEFAULT_CONFIG } from './config/defaults.js';

// Server
export { createApp, startServer } from './server/app.js';
export { createContext } from './cli/context.js';

// Utils
export { systemClock, ManualClock } from './utils/clock.js';
export { logger, setLogLevel, createLogger } from './utils/logger.js';
export { maskSecret, toCredentialView } from './credentials/credential.js';
