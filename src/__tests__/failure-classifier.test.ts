import { describe, it, expect } from 'vitest';
import { classifyFailure, describeCategory } from '../control-plane/failure-classifier.js';

describe('classifyFailure', () => {
  it('reads provider error codes first', () => {
    expect(classifyFailure({ message: 'You exceeded your current quota', code: 'insufficient_quota' })).toBe('quota');
    expect(classifyFailure({ message: 'slow down', code: 'rate_limit_exceeded', httpStatus: 401 })).toBe('rate_limit');
    expect(classifyFailure({ message: 'bad key', code: 'invalid_api_key' })).toBe('credential');
  });

  it('falls back to the HTTP status', () => {
    expect(classifyFailure({ message: 'request failed', httpStatus: 401 })).toBe('credential');
    expect(classifyFailure({ message: 'request failed', httpStatus: 429 })).toBe('rate_limit');
    expect(classifyFailure({ message: 'request failed', httpStatus: 504 })).toBe('timeout');
    expect(classifyFailure({ message: 'request failed', httpStatus: 400 })).toBe('input_validation');
  });

  it('matches the message when there is no code or status', () => {
    expect(classifyFailure({ message: 'Rate limit reached for requests' })).toBe('rate_limit');
    expect(classifyFailure({ message: 'poll failed: timed out after 600s' })).toBe('timeout');
    expect(classifyFailure({ message: 'batch expired before completing' })).toBe('timeout');
    expect(classifyFailure({ message: 'no valid requests' })).toBe('input_validation');
    expect(classifyFailure({ message: 'Billing hard limit has been reached' })).toBe('quota');
  });

  it('ignores unrecognised codes and statuses', () => {
    expect(classifyFailure({ message: 'boom', code: 'server_error', httpStatus: 500 })).toBe('unknown');
  });
});

describe('describeCategory', () => {
  it('gives a short human description', () => {
    expect(describeCategory('quota')).toBe('API quota or billing limit');
    expect(describeCategory('input_validation')).toBe('input rejected');
  });
});
