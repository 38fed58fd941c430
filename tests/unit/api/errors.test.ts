import { describe, it, expect } from 'vitest';
import { GatewayError, toGatewayError, zodErrorToGatewayError } from '../../../src/api/errors.js';
import { GatewayRequestSchema } from '../../../src/types/schemas/request.js';

describe('GatewayError', () => {
  it('maps request-shape codes to 400 and server-side codes to 500', () => {
    expect(new GatewayError('InvalidJson', 'x').httpStatus).toBe(400);
    expect(new GatewayError('EmptyPrompt', 'x').httpStatus).toBe(400);
    expect(new GatewayError('InvalidPromptFormat', 'x').httpStatus).toBe(400);
    expect(new GatewayError('StreamingWithMultiplePromptsUnsupported', 'x').httpStatus).toBe(400);
    expect(new GatewayError('ValidationError', 'x').httpStatus).toBe(400);
    expect(new GatewayError('ChatProcessorNotFound', 'x').httpStatus).toBe(500);
    expect(new GatewayError('BackendGenerationFailure', 'x').httpStatus).toBe(500);
  });

  it('serializes to a plain object', () => {
    const error = new GatewayError('EmptyPrompt', 'Empty prompt is not supported.', { field: 'text' });

    expect(error.isRequestError).toBe(true);
    expect(error.toObject()).toEqual({
      code: 'EmptyPrompt',
      message: 'Empty prompt is not supported.',
      details: { field: 'text' },
    });
  });
});

describe('toGatewayError', () => {
  it('returns gateway errors unchanged', () => {
    const original = new GatewayError('InvalidJson', 'bad');

    expect(toGatewayError(original)).toBe(original);
  });

  it('wraps plain errors with the fallback code', () => {
    const wrapped = toGatewayError(new TypeError('nope'));

    expect(wrapped.code).toBe('BackendGenerationFailure');
    expect(wrapped.message).toBe('nope');
    expect(wrapped.details).toEqual({ cause: 'TypeError' });
  });

  it('wraps non-error values', () => {
    expect(toGatewayError('weird', 'ValidationError').message).toBe('Unknown error: weird');
  });
});

describe('zodErrorToGatewayError', () => {
  it('names the first offending field', () => {
    const parsed = GatewayRequestSchema.safeParse({ text: 'hi', stream: 'yes' });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const error = zodErrorToGatewayError(parsed.error);

    expect(error.code).toBe('ValidationError');
    expect(error.message).toBe("Validation error on field 'stream': stream must be a boolean");
    expect(error.details).toMatchObject({ field: 'stream' });
  });
});
