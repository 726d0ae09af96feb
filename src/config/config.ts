import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import JSON5 from 'json5';
import type { ImageRelayConfig, ModelInfo, SizePresets } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { logger, isLogLevel } from '../utils/logger.js';

const GLOBAL_CONFIG_DIR = join(homedir(), '.imagerelay');
const GLOBAL_CONFIG_FILE = join(GLOBAL_CONFIG_DIR, 'config.json');
const LOCAL_CONFIG_FILE = join('.imagerelay', 'config.json');
const CONFIG_ENV = 'IMAGERELAY_CONFIG';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Directory the local config and a relative dataDir resolve against */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Override for ~/.imagerelay/config.json */
  globalConfigFile?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

async function loadJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw new ConfigError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  try {
    return JSON5.parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid JSON5 in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Plain objects are merged key by key; arrays and primitives replace. */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override === undefined || override === null ? base : override;
  }
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(override)) {
    const val = override[key];
    if (isRecord(val) && isRecord(result[key])) {
      result[key] = deepMerge(result[key], val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

// ─── Validation ──────────────────────────────────────────────────────────────

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = data[key];
  if (!isRecord(value)) throw new ConfigError(`"${key}" must be an object`);
  return value;
}

function str(data: Record<string, unknown>, key: string, path: string): string {
  const value = data[key];
  if (typeof value !== 'string') throw new ConfigError(`"${path}.${key}" must be a string`);
  return value;
}

function int(data: Record<string, unknown>, key: string, path: string, min = 0): number {
  const value = data[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`"${path}.${key}" must be an integer >= ${min}`);
  }
  return value;
}

function parseModels(value: unknown): ModelInfo[] {
  if (!Array.isArray(value)) throw new ConfigError('"backend.models" must be an array');
  return value.map((entry, i) => {
    if (!isRecord(entry)) throw new ConfigError(`"backend.models[${i}]" must be an object`);
    const path = `backend.models[${i}]`;
    return {
      id: str(entry, 'id', path),
      name: str(entry, 'name', path),
      description: str(entry, 'description', path),
    };
  });
}

function parsePresets(value: unknown): SizePresets {
  if (!isRecord(value)) throw new ConfigError('"presets" must be an object');
  const presets: SizePresets = {};
  for (const [ratio, sizes] of Object.entries(value)) {
    if (!Array.isArray(sizes)) throw new ConfigError(`"presets.${ratio}" must be an array`);
    presets[ratio] = sizes.map((pair): [number, number] => {
      if (
        !Array.isArray(pair) || pair.length !== 2 ||
        typeof pair[0] !== 'number' || typeof pair[1] !== 'number'
      ) {
        throw new ConfigError(`"presets.${ratio}" entries must be [width, height] pairs`);
      }
      return [pair[0], pair[1]];
    });
  }
  return presets;
}

/** Turn merged, untyped config data into a checked config object */
export function validateConfig(data: unknown): ImageRelayConfig {
  if (!isRecord(data)) throw new ConfigError('Config must be a JSON object');

  const server = section(data, 'server');
  const backend = section(data, 'backend');
  const pool = section(data, 'pool');
  const retry = section(data, 'retry');
  const limits = section(data, 'limits');

  const logLevel = str(data, 'logLevel', 'config');
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`"logLevel" must be one of debug, info, warn, error, silent`);
  }
  if (typeof data.jsonOutput !== 'boolean') {
    throw new ConfigError('"jsonOutput" must be a boolean');
  }

  const config: ImageRelayConfig = {
    server: {
      host: str(server, 'host', 'server'),
      port: int(server, 'port', 'server'),
    },
    backend: {
      baseUrl: str(backend, 'baseUrl', 'backend').replace(/\/+$/, ''),
      endpoint: str(backend, 'endpoint', 'backend'),
      defaultModel: str(backend, 'defaultModel', 'backend'),
      defaultSteps: int(backend, 'defaultSteps', 'backend', 1),
      requestTimeoutMs: int(backend, 'requestTimeoutMs', 'backend', 1),
      userAgent: str(backend, 'userAgent', 'backend'),
      models: parseModels(backend.models),
    },
    pool: {
      dailyQuota: int(pool, 'dailyQuota', 'pool'),
      cacheTtlMs: int(pool, 'cacheTtlMs', 'pool'),
      errorWarnThreshold: int(pool, 'errorWarnThreshold', 'pool', 1),
    },
    retry: {
      maxCredentialAttempts: int(retry, 'maxCredentialAttempts', 'retry', 1),
      maxAttemptsPerCredential: int(retry, 'maxAttemptsPerCredential', 'retry', 1),
      retryDelayMs: int(retry, 'retryDelayMs', 'retry'),
    },
    limits: {
      minImageSize: int(limits, 'minImageSize', 'limits', 1),
      maxImageSize: int(limits, 'maxImageSize', 'limits', 1),
      maxPromptLength: int(limits, 'maxPromptLength', 'limits', 1),
      maxNegativePromptLength: int(limits, 'maxNegativePromptLength', 'limits'),
      minSteps: int(limits, 'minSteps', 'limits', 1),
      maxSteps: int(limits, 'maxSteps', 'limits', 1),
    },
    presets: parsePresets(data.presets),
    dataDir: str(data, 'dataDir', 'config'),
    logLevel,
    jsonOutput: data.jsonOutput,
  };

  if (config.limits.minImageSize > config.limits.maxImageSize) {
    throw new ConfigError('"limits.minImageSize" must not exceed "limits.maxImageSize"');
  }
  if (config.limits.minSteps > config.limits.maxSteps) {
    throw new ConfigError('"limits.minSteps" must not exceed "limits.maxSteps"');
  }
  return config;
}

// ─── Environment ─────────────────────────────────────────────────────────────

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`Environment variable ${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

/**
 * Apply the environment variables operators set on a deployment.
 * REQUEST_TIMEOUT and RETRY_DELAY are given in seconds.
 */
export function applyEnvOverrides(config: ImageRelayConfig, env: NodeJS.ProcessEnv): ImageRelayConfig {
  const port = envNumber(env, 'PORT');
  const timeoutSec = envNumber(env, 'REQUEST_TIMEOUT');
  const maxRetries = envNumber(env, 'MAX_RETRIES');
  const retryDelaySec = envNumber(env, 'RETRY_DELAY');
  const dailyQuota = envNumber(env, 'DAILY_QUOTA');

  const logLevel = env.LOG_LEVEL;
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigError(`Environment variable LOG_LEVEL must be one of debug, info, warn, error, silent`);
  }

  return {
    ...config,
    server: {
      host: env.HOST || config.server.host,
      port: port !== undefined ? Math.floor(port) : config.server.port,
    },
    backend: {
      ...config.backend,
      baseUrl: env.BACKEND_BASE_URL ? env.BACKEND_BASE_URL.replace(/\/+$/, '') : config.backend.baseUrl,
      requestTimeoutMs: timeoutSec !== undefined ? Math.round(timeoutSec * 1000) : config.backend.requestTimeoutMs,
    },
    pool: {
      ...config.pool,
      dailyQuota: dailyQuota !== undefined ? Math.floor(dailyQuota) : config.pool.dailyQuota,
    },
    retry: {
      ...config.retry,
      maxAttemptsPerCredential: maxRetries !== undefined ? Math.max(1, Math.floor(maxRetries)) : config.retry.maxAttemptsPerCredential,
      retryDelayMs: retryDelaySec !== undefined ? Math.round(retryDelaySec * 1000) : config.retry.retryDelayMs,
    },
    dataDir: env.DATA_DIR || config.dataDir,
    logLevel: logLevel ?? config.logLevel,
  };
}

let cachedConfig: ImageRelayConfig | null = null;

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ImageRelayConfig> {
  if (cachedConfig) return cachedConfig;

  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  let merged: unknown = DEFAULT_CONFIG;

  // Load global config
  const globalPath = options.globalConfigFile ?? GLOBAL_CONFIG_FILE;
  const globalConfig = await loadJsonFile(globalPath);
  if (globalConfig !== null) {
    logger.debug('Loaded global config from ' + globalPath);
    merged = deepMerge(merged, globalConfig);
  }

  // Load local config (or the file named by IMAGERELAY_CONFIG)
  const localPath = resolve(cwd, env[CONFIG_ENV] ?? LOCAL_CONFIG_FILE);
  const localConfig = await loadJsonFile(localPath);
  if (localConfig !== null) {
    logger.debug('Loaded local config from ' + localPath);
    merged = deepMerge(merged, localConfig);
  }

  const config = applyEnvOverrides(validateConfig(merged), env);

  // Resolve default data dir
  config.dataDir = config.dataDir
    ? resolve(cwd, config.dataDir)
    : join(GLOBAL_CONFIG_DIR, 'data');

  cachedConfig = config;
  return config;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}
