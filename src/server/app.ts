import express, { type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import type { ImageRelayConfig } from '../config/schema.js';
import type { GenerationOrchestrator, GenerationResult } from '../generation/orchestrator.js';
import type { GenerationErrorKind } from '../generation/errors.js';
import type { GenerationRequest } from '../generation/validate.js';
import type { CredentialScheduler } from '../pool/scheduler.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http');

export interface ServerDeps {
  config: ImageRelayConfig;
  orchestrator: GenerationOrchestrator;
  scheduler: CredentialScheduler;
}

interface GenerateResponseBody {
  success: boolean;
  image_url?: string;
  image_base64?: string;
  error?: string;
}

class BodyError extends Error {}

function optionalNumber(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') throw new BodyError(`${key} must be a number`);
  return value;
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new BodyError(`${key} must be a string`);
  return value;
}

/** Read the snake_case request body into a GenerationRequest */
export function parseGenerateBody(body: unknown): GenerationRequest {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    throw new BodyError('Request body must be a JSON object');
  }
  const fields: Record<string, unknown> = { ...body };
  const prompt = fields.prompt;
  if (typeof prompt !== 'string') throw new BodyError('prompt is required');

  return {
    prompt,
    negativePrompt: optionalString(fields, 'negative_prompt'),
    width: optionalNumber(fields, 'width'),
    height: optionalNumber(fields, 'height'),
    model: optionalString(fields, 'model'),
    steps: optionalNumber(fields, 'num_inference_steps'),
  };
}

export function statusForError(code: GenerationErrorKind): number {
  switch (code) {
    case 'validation':
    case 'bad_request':
      return 400;
    case 'pool_exhausted':
      return 503;
    default:
      return 502;
  }
}

function toResponseBody(result: GenerationResult): GenerateResponseBody {
  if (result.ok) {
    return { success: true, image_url: result.imageUrl, image_base64: result.imageBase64 };
  }
  return { success: false, error: result.error };
}

export function createApp(deps: ServerDeps): express.Express {
  const { config, orchestrator, scheduler } = deps;
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    let request: GenerationRequest;
    try {
      request = parseGenerateBody(req.body);
    } catch (err) {
      if (err instanceof BodyError) {
        res.status(400).json({ success: false, error: err.message } satisfies GenerateResponseBody);
        return;
      }
      next(err);
      return;
    }

    try {
      const result = await orchestrator.generate(request);
      res.status(result.ok ? 200 : statusForError(result.code)).json(toResponseBody(result));
    } catch (err) {
      next(err);
    }
  });

  router.get('/presets', (_req: Request, res: Response) => {
    res.json({
      presets: config.presets,
      max_size: config.limits.maxImageSize,
      min_size: config.limits.minImageSize,
    });
  });

  router.get('/models', (_req: Request, res: Response) => {
    res.json({ models: config.backend.models, default: config.backend.defaultModel });
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', service: 'image-generator' });
  });

  app.use('/api/generate', router);

  app.get('/api/pool', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await scheduler.getStats();
      res.json({ ...stats, daily_quota: scheduler.getQuota() });
    } catch (err) {
      next(err);
    }
  });

  // Malformed JSON from express.json() and anything thrown by a route
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, error: 'Request body is not valid JSON' } satisfies GenerateResponseBody);
      return;
    }
    log.error(`Unhandled error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    res.status(500).json({ success: false, error: 'Internal server error' } satisfies GenerateResponseBody);
  });

  return app;
}

export function startServer(app: express.Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      log.info(`Listening on http://${host}:${port}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
