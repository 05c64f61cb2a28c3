import { describe, it, expect, vi } from 'vitest';
import { ApiError, toApiError } from '../errorHandler.js';
import {
  invalidRequest,
  notFound,
  upstreamFailure,
} from '../../services/archive/index.js';

vi.mock('../../utils/logger.js', () => ({
  default: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('toApiError', () => {
  it('should map each failure reason to its status', () => {
    const cases = [
      { result: invalidRequest('Bad ids', { unknownChannelIds: ['7'] }), status: 400, error: 'Bad Request' },
      { result: notFound('Guild 9 not found'), status: 404, error: 'Not Found' },
      { result: upstreamFailure('Failed to list guilds', new Error('ECONNRESET')), status: 502, error: 'Bad Gateway' },
    ];

    for (const { result, status, error } of cases) {
      if (result.success) throw new Error('expected a failure');
      const apiError = toApiError(result.error);
      expect(apiError).toBeInstanceOf(ApiError);
      expect(apiError.statusCode).toBe(status);
      expect(apiError.error).toBe(error);
      expect(apiError.message).toBe(result.error.message);
    }
  });

  it('should carry the cause of an upstream failure in its details', () => {
    const result = upstreamFailure('Failed to list guilds', new Error('ECONNRESET'));
    if (result.success) throw new Error('expected a failure');

    expect(toApiError(result.error).details).toEqual({ error: 'ECONNRESET' });
  });
});
