import type { ImageRelayConfig } from './schema.js';

export const DEFAULT_CONFIG: ImageRelayConfig = {
  server: {
    host: '0.0.0.0',
    port: 8000,
  },
  backend: {
    baseUrl: 'https://ai.gitee.com',
    endpoint: '/v1/images/generations',
    defaultModel: 'z-image-turbo',
    defaultSteps: 9,
    requestTimeoutMs: 120_000,
    userAgent: 'imagerelay/0.1',
    models: [
      {
        id: 'z-image-turbo',
        name: 'Z-Image Turbo',
        description: 'Fast generation model, 9 steps recommended',
      },
    ],
  },
  pool: {
    dailyQuota: 100,
    cacheTtlMs: 30_000,
    errorWarnThreshold: 10,
  },
  retry: {
    maxCredentialAttempts: 3,
    maxAttemptsPerCredential: 3,
    retryDelayMs: 1000,
  },
  limits: {
    minImageSize: 256,
    maxImageSize: 2048,
    maxPromptLength: 4000,
    maxNegativePromptLength: 2000,
    minSteps: 1,
    maxSteps: 50,
  },
  presets: {
    '1:1': [[512, 512], [1024, 1024]],
    '4:3': [[512, 384], [1024, 768]],
    '3:4': [[384, 512], [768, 1024]],
    '16:9': [[512, 288], [1024, 576], [1920, 1080]],
    '9:16': [[288, 512], [576, 1024], [1080, 1920]],
    '3:2': [[512, 341], [1024, 683]],
    '2:3': [[341, 512], [683, 1024]],
  },
  dataDir: '',  // resolved at runtime to ~/.imagerelay/data
  logLevel: 'info',
  jsonOutput: false,
};
