import type { LimitsConfig } from '../config/schema.js';
import { ValidationError } from './errors.js';

export interface GenerationRequest {
  prompt: string;
  width?: number;
  height?: number;
  negativePrompt?: string;
  model?: string;
  steps?: number;
}

export interface ValidatedRequest {
  prompt: string;
  width: number;
  height: number;
  negativePrompt?: string;
  model: string;
  steps: number;
}

export interface RequestDefaults {
  width: number;
  height: number;
  model: string;
  steps: number;
}

function checkInteger(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${name} must be an integer`);
  }
  if (value < min || value > max) {
    throw new ValidationError(`${name} must be between ${min} and ${max}, got ${value}`);
  }
}

/** Apply defaults and check bounds. Throws ValidationError. */
export function validateRequest(
  request: GenerationRequest,
  limits: LimitsConfig,
  defaults: RequestDefaults,
): ValidatedRequest {
  const prompt = request.prompt.trim();
  if (!prompt) {
    throw new ValidationError('prompt must not be empty');
  }
  if (prompt.length > limits.maxPromptLength) {
    throw new ValidationError(`prompt must be at most ${limits.maxPromptLength} characters`);
  }

  const width = request.width ?? defaults.width;
  const height = request.height ?? defaults.height;
  checkInteger('width', width, limits.minImageSize, limits.maxImageSize);
  checkInteger('height', height, limits.minImageSize, limits.maxImageSize);

  const steps = request.steps ?? defaults.steps;
  checkInteger('steps', steps, limits.minSteps, limits.maxSteps);

  const negativePrompt = request.negativePrompt?.trim() || undefined;
  if (negativePrompt && negativePrompt.length > limits.maxNegativePromptLength) {
    throw new ValidationError(`negative prompt must be at most ${limits.maxNegativePromptLength} characters`);
  }

  const model = request.model?.trim() || defaults.model;

  return { prompt, width, height, negativePrompt, model, steps };
}
