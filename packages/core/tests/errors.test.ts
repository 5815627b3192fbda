import { describe, expect, it, vi } from 'vitest';
import { createErrorResponse, isErrorResponse } from '../src/errors/error-response.js';
import { MdmError, wrapError } from '../src/errors/mdm-error.js';
import { withRetries, type RetryContext } from '../src/utils/retry.js';

describe('createErrorResponse', () => {
  it('maps the code key to its status and keeps only safe detail keys', () => {
    expect(
      createErrorResponse('RESOURCE_NOT_FOUND', 'Entity with ID abc123 not found', {
        field: 'entity_id',
        error_type: 'LOOKUP',
        token: 'test-secret',
      })
    ).toEqual({
      error: {
        code: 404,
        code_key: 'RESOURCE_NOT_FOUND',
        message: 'Entity with ID abc123 not found',
        details: { field: 'entity_id', error_type: 'LOOKUP' },
      },
    });
  });

  it('falls back to 500 for an unknown code key', () => {
    expect(createErrorResponse('SOMETHING_ELSE', 'x').error.code).toBe(500);
  });

  it('is recognized by isErrorResponse', () => {
    expect(isErrorResponse(createErrorResponse('VALIDATION_ERROR', 'bad'))).toBe(true);
    expect(isErrorResponse({ error: 'bad' })).toBe(false);
    expect(isErrorResponse('error')).toBe(false);
  });
});

describe('wrapError', () => {
  it('returns MdmError instances unchanged', () => {
    const original = new MdmError({ code: 'TIMEOUT_ERROR', message: 'slow' });
    expect(wrapError(original)).toBe(original);
  });

  it('wraps other errors under the default code', () => {
    const wrapped = wrapError(new Error('boom'), 'AUTHENTICATION_ERROR');
    expect(wrapped.code).toBe('AUTHENTICATION_ERROR');
    expect(wrapped.message).toBe('boom');
  });
});

describe('withRetries', () => {
  it('retries retryable failures until an attempt succeeds', async () => {
    const fn = vi
      .fn<(ctx: RetryContext) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');

    await expect(withRetries(fn, { attempts: 3, isRetryable: () => true })).resolves.toBe('ok');
    expect(fn.mock.calls.map(([ctx]) => ctx.attempt)).toEqual([1, 2, 3]);
  });

  it('rethrows the last error once attempts run out', async () => {
    const fn = vi
      .fn<(ctx: RetryContext) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(withRetries(fn, { attempts: 2, isRetryable: () => true })).rejects.toThrow('second');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('rethrows a non-retryable error after one attempt', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('fatal'));

    await expect(withRetries(fn, { attempts: 3, isRetryable: () => false })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
