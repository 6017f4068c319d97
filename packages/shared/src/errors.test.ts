import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  ValidationError,
  NetworkError,
  RateLimitError,
  NotFoundError,
  UnexpectedStatusError,
  IOError,
  ParseError,
  ProviderError,
  exitCodeFor,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('NetworkError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('ProviderError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('user-correctable errors', () => {
  it('should tag config, usage and validation errors', () => {
    expect(new ConfigError('bad yaml').code).toBe('ConfigError');
    expect(new UsageError('missing flag').code).toBe('UsageError');
    const validation = new ValidationError('user cannot be empty');
    expect(validation.code).toBe('ValidationError');
    expect(validation.name).toBe('ValidationError');
  });
});

describe('RateLimitError', () => {
  it('should carry the rate-limit headers as fields and details', () => {
    const error = new RateLimitError('API rate limit reached', {
      used: '60',
      remaining: '0',
      reset: '1700000000',
    });
    expect(error.code).toBe('RateLimitError');
    expect(error.used).toBe('60');
    expect(error.remaining).toBe('0');
    expect(error.reset).toBe('1700000000');
    expect(error.details).toEqual({ used: '60', remaining: '0', reset: '1700000000' });
  });

  it('should leave absent headers undefined', () => {
    const error = new RateLimitError('API rate limit reached');
    expect(error.used).toBeUndefined();
    expect(error.remaining).toBeUndefined();
  });
});

describe('UnexpectedStatusError', () => {
  it('should include the status in the message', () => {
    const error = new UnexpectedStatusError(502);
    expect(error.code).toBe('HttpError');
    expect(error.status).toBe(502);
    expect(error.message).toBe('Unexpected HTTP status code: 502');
  });
});

describe('IOError', () => {
  it('should record the path', () => {
    const error = new IOError('/tmp/stars.json', 'permission denied');
    expect(error.code).toBe('IOError');
    expect(error.path).toBe('/tmp/stars.json');
  });
});

describe('runtime errors', () => {
  it('should tag not-found, network, parse and provider errors', () => {
    expect(new NotFoundError('no such user').code).toBe('NotFoundError');
    expect(new NetworkError('socket hang up').code).toBe('NetworkError');
    expect(new ParseError('not an array').code).toBe('ParseError');
    expect(new ProviderError('gh failed').code).toBe('ProviderError');
  });
});

describe('exitCodeFor', () => {
  it('returns 2 for user-correctable errors', () => {
    expect(exitCodeFor(new UsageError('x'))).toBe(2);
    expect(exitCodeFor(new ConfigError('x'))).toBe(2);
    expect(exitCodeFor(new ValidationError('x'))).toBe(2);
  });

  it('returns 1 for runtime and unknown errors', () => {
    expect(exitCodeFor(new NotFoundError('x'))).toBe(1);
    expect(exitCodeFor(new UnexpectedStatusError(500))).toBe(1);
    expect(exitCodeFor(new Error('plain'))).toBe(1);
    expect(exitCodeFor('string')).toBe(1);
  });
});
