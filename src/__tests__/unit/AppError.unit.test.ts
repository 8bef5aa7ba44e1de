/**
 * Unit Tests — AppError Hierarchy
 *
 * The error handler relies on statusCode, isOperational and instanceof to
 * decide between the error's own answer and a generic 500.
 */
import { AppError, ConfigurationError, ValidationError } from '@shared/errors/AppError';

describe('AppError', () => {
  it('should set message and default statusCode to 500', () => {
    const error = new AppError('something broke');

    expect(error.message).toBe('something broke');
    expect(error.statusCode).toBe(500);
    expect(error.isOperational).toBe(true);
  });

  it('should accept a custom statusCode and operational flag', () => {
    const error = new AppError('fatal crash', 503, false);

    expect(error.statusCode).toBe(503);
    expect(error.isOperational).toBe(false);
  });

  it('should be an instance of both Error and AppError and capture a stack', () => {
    const error = new AppError('traced');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(AppError);
    expect(error.stack).toContain('AppError');
  });
});

describe('ValidationError', () => {
  it('should be an operational 400', () => {
    const error = new ValidationError('format must not be empty');

    expect(error).toBeInstanceOf(AppError);
    expect(error.message).toBe('format must not be empty');
    expect(error.statusCode).toBe(400);
    expect(error.isOperational).toBe(true);
  });
});

describe('ConfigurationError', () => {
  it('should be a non-operational 500', () => {
    const error = new ConfigurationError('Access logger requires a format');

    expect(error).toBeInstanceOf(AppError);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.statusCode).toBe(500);
    expect(error.isOperational).toBe(false);
  });
});
