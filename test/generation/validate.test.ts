import { describe, it, expect } from 'vitest';
import { validateRequest } from '../../src/generation/validate.js';
import type { RequestDefaults } from '../../src/generation/validate.js';
import { ValidationError } from '../../src/generation/errors.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';

const limits = DEFAULT_CONFIG.limits;
const defaults: RequestDefaults = { width: 1024, height: 1024, model: 'z-image-turbo', steps: 9 };

describe('validateRequest', () => {
  it('should fill in defaults and trim the prompt', () => {
    expect(validateRequest({ prompt: '  a lighthouse at dusk ' }, limits, defaults)).toEqual({
      prompt: 'a lighthouse at dusk',
      width: 1024,
      height: 1024,
      negativePrompt: undefined,
      model: 'z-image-turbo',
      steps: 9,
    });
  });

  it('should keep explicit values', () => {
    const result = validateRequest(
      { prompt: 'x', width: 768, height: 1344, steps: 20, model: 'other-model', negativePrompt: ' blurry ' },
      limits,
      defaults,
    );
    expect(result).toEqual({
      prompt: 'x',
      width: 768,
      height: 1344,
      negativePrompt: 'blurry',
      model: 'other-model',
      steps: 20,
    });
  });

  it('should reject an empty prompt', () => {
    expect(() => validateRequest({ prompt: '   ' }, limits, defaults)).toThrow('prompt must not be empty');
  });

  it('should reject an over-long prompt', () => {
    expect(() => validateRequest({ prompt: 'a'.repeat(4001) }, limits, defaults))
      .toThrow('prompt must be at most 4000 characters');
  });

  it('should accept sizes on the bounds', () => {
    const result = validateRequest({ prompt: 'x', width: 256, height: 2048 }, limits, defaults);
    expect([result.width, result.height]).toEqual([256, 2048]);
  });

  it('should reject sizes outside the bounds', () => {
    expect(() => validateRequest({ prompt: 'x', width: 255 }, limits, defaults))
      .toThrow('width must be between 256 and 2048, got 255');
    expect(() => validateRequest({ prompt: 'x', height: 4096 }, limits, defaults))
      .toThrow('height must be between 256 and 2048, got 4096');
  });

  it('should reject fractional sizes and steps', () => {
    expect(() => validateRequest({ prompt: 'x', width: 512.5 }, limits, defaults)).toThrow('width must be an integer');
    expect(() => validateRequest({ prompt: 'x', steps: 2.5 }, limits, defaults)).toThrow('steps must be an integer');
  });

  it('should reject steps out of range', () => {
    expect(() => validateRequest({ prompt: 'x', steps: 0 }, limits, defaults))
      .toThrow('steps must be between 1 and 50, got 0');
  });

  it('should drop a blank negative prompt and reject an over-long one', () => {
    expect(validateRequest({ prompt: 'x', negativePrompt: '  ' }, limits, defaults).negativePrompt).toBeUndefined();
    expect(() => validateRequest({ prompt: 'x', negativePrompt: 'n'.repeat(2001) }, limits, defaults))
      .toThrow('negative prompt must be at most 2000 characters');
  });

  it('should throw ValidationError with the validation kind', () => {
    try {
      validateRequest({ prompt: '' }, limits, defaults);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err instanceof ValidationError && err.kind).toBe('validation');
    }
  });
});
