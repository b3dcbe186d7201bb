import { describe, it, expect, vi } from 'vitest';
import { ApiError, fetchWithRetry, isRetryable } from '../../services/utils/retry';

describe('fetchWithRetry', () => {
    it('should retry until the call succeeds', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(new ApiError('NETWORK', 'reset'))
            .mockResolvedValueOnce('payload');

        await expect(fetchWithRetry(fn, { delayMs: 0 })).resolves.toBe('payload');
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should give up after the last retry', async () => {
        const fn = vi.fn().mockRejectedValue(new ApiError('RATE_LIMIT', 'slow down'));

        await expect(fetchWithRetry(fn, { maxRetries: 2, delayMs: 0 })).rejects.toThrow('slow down');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should not retry errors that cannot succeed', async () => {
        const fn = vi.fn().mockRejectedValue(new ApiError('NOT_FOUND', 'no such file'));

        await expect(fetchWithRetry(fn, { delayMs: 0 })).rejects.toBeInstanceOf(ApiError);
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should classify errors', () => {
        expect(isRetryable(new ApiError('MISSING_KEY', 'x'))).toBe(false);
        expect(isRetryable(new ApiError('NETWORK', 'x'))).toBe(true);
        expect(isRetryable(new Error('socket hang up'))).toBe(true);
    });
});
