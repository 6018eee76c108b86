import { describe, it, expect } from 'vitest';
import { AppError, ExternalApiError, MissingFieldError, ValidationError } from '../src/utils/errors';

describe('errors', () => {
  it('prefixes external API errors with the service name', () => {
    const error = new ExternalApiError('Echo Nest', 'Invalid key', 400);

    expect(error.message).toBe('Echo Nest API error: Invalid key');
    expect(error.code).toBe('EXTERNAL_API_ERROR');
    expect(error.status).toBe(400);
    expect(error).toBeInstanceOf(AppError);
  });

  it('describes missing result fields', () => {
    const error = new MissingFieldError('audio', 'artist');

    expect(error.message).toBe('audio result has no field "artist"');
    expect(error.code).toBe('MISSING_FIELD');
    expect(error.details).toEqual({ kind: 'audio', field: 'artist' });
  });

  it('marks validation errors as client errors', () => {
    const error = new ValidationError('ECHO_NEST_API_KEY is not set');

    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.status).toBe(400);
    expect(error.name).toBe('ValidationError');
  });
});
