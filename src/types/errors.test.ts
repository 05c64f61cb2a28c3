import { describe, it, expect } from 'vitest';
import {
  ArchiveErrorClassification,
  ArchiveErrorType,
  ArchiveOperationError,
  classifyError,
  getErrorMessage,
  isRateLimitError,
  isRetryableError,
} from './errors.js';

function systemError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyError', () => {
  it('should classify socket error codes as transient', () => {
    for (const code of ['EPIPE', 'ECONNRESET', 'ECONNABORTED', 'EIO']) {
      const classified = classifyError(systemError(code, 'write failed'));

      expect(classified.type).toBe(ArchiveErrorType.NETWORK_ERROR);
      expect(classified.classification).toBe(
        ArchiveErrorClassification.TRANSIENT
      );
      expect(classified.retryable).toBe(true);
    }
  });

  it('should classify transient message fragments', () => {
    expect(isRetryableError(new Error('[Errno 32] Broken pipe'))).toBe(true);
    expect(isRetryableError(new Error('Connection aborted.'))).toBe(true);
    expect(classifyError(new Error('socket timeout')).type).toBe(
      ArchiveErrorType.TIMEOUT
    );
  });

  it('should classify rate limits', () => {
    const classified = classifyError({ status: 429, message: 'slow down' });

    expect(classified.classification).toBe(
      ArchiveErrorClassification.RATE_LIMIT
    );
    expect(classified.statusCode).toBe(429);
    expect(isRateLimitError(new Error('rate limit reached'))).toBe(true);
  });

  it('should classify HTTP client errors as permanent', () => {
    expect(classifyError({ status: 401 }).type).toBe(
      ArchiveErrorType.AUTHENTICATION_FAILED
    );
    expect(classifyError({ status: 403 }).type).toBe(
      ArchiveErrorType.PERMISSION_DENIED
    );
    expect(classifyError({ status: 404 }).type).toBe(
      ArchiveErrorType.RESOURCE_NOT_FOUND
    );
    expect(isRetryableError({ status: 403 })).toBe(false);
  });

  it('should treat unknown errors as permanent and keep the message', () => {
    const classified = classifyError(new Error('quota exceeded'));

    expect(classified.type).toBe(ArchiveErrorType.UNKNOWN);
    expect(classified.message).toBe('quota exceeded');
    expect(classified.retryable).toBe(false);
  });

  it('should return ArchiveOperationError instances unchanged', () => {
    const original = new ArchiveOperationError(
      'already classified',
      ArchiveErrorType.TIMEOUT,
      ArchiveErrorClassification.TRANSIENT
    );

    expect(classifyError(original)).toBe(original);
  });
});

describe('getErrorMessage', () => {
  it('should read messages from errors, strings and plain values', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain text')).toBe('plain text');
    expect(getErrorMessage({ reason: 'x' })).toBe('{"reason":"x"}');
  });
});
