/**
 * Tests for retry policy
 */

import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_RETRY_OPTIONS, resolveRetryOptions, retryDelay, withRetry } from '../retry.js';

describe('withRetry', () => {
    it('should return the first successful result', async () => {
        const fn = vi.fn().mockResolvedValue('ok');

        await expect(withRetry(fn, { initialDelayMs: 0 })).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry until the operation succeeds', async () => {
        const fn = vi
            .fn<[], Promise<string>>()
            .mockRejectedValueOnce(new Error('first'))
            .mockRejectedValueOnce(new Error('second'))
            .mockResolvedValueOnce('third time lucky');

        await expect(withRetry(fn, { initialDelayMs: 0 })).resolves.toBe('third time lucky');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should re-throw the last error after three attempts by default', async () => {
        const fn = vi
            .fn<[], Promise<string>>()
            .mockRejectedValueOnce(new Error('attempt 1'))
            .mockRejectedValueOnce(new Error('attempt 2'))
            .mockRejectedValueOnce(new Error('attempt 3'));

        await expect(withRetry(fn, { initialDelayMs: 0 })).rejects.toThrow('attempt 3');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should honour maxAttempts', async () => {
        const fn = vi.fn<[], Promise<string>>().mockRejectedValue(new Error('down'));

        await expect(withRetry(fn, { maxAttempts: 5, initialDelayMs: 0 })).rejects.toThrow('down');
        expect(fn).toHaveBeenCalledTimes(5);
    });

    it('should stop immediately when shouldRetry rejects the error', async () => {
        const fn = vi.fn<[], Promise<string>>().mockRejectedValue(new Error('permanent'));
        const shouldRetry = vi.fn().mockReturnValue(false);

        await expect(withRetry(fn, { initialDelayMs: 0, shouldRetry })).rejects.toThrow('permanent');
        expect(fn).toHaveBeenCalledTimes(1);
        expect(shouldRetry).toHaveBeenCalledTimes(1);
    });

    it('should keep the default attempt count when maxAttempts is undefined', async () => {
        const fn = vi.fn<[], Promise<string>>().mockRejectedValue(new Error('down'));

        await expect(
            withRetry(fn, { maxAttempts: undefined, initialDelayMs: 0 })
        ).rejects.toThrow('down');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should use the default attempt count when maxAttempts is not finite', async () => {
        const fn = vi.fn<[], Promise<string>>().mockRejectedValue(new Error('down'));

        await expect(withRetry(fn, { maxAttempts: Infinity, initialDelayMs: 0 })).rejects.toThrow('down');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should wait between attempts', async () => {
        vi.useFakeTimers();
        try {
            const fn = vi
                .fn<[], Promise<string>>()
                .mockRejectedValueOnce(new Error('busy'))
                .mockResolvedValueOnce('done');

            const promise = withRetry(fn, { initialDelayMs: 1500 });
            await vi.advanceTimersByTimeAsync(1499);
            expect(fn).toHaveBeenCalledTimes(1);

            await vi.advanceTimersByTimeAsync(1);
            await expect(promise).resolves.toBe('done');
            expect(fn).toHaveBeenCalledTimes(2);
        } finally {
            vi.useRealTimers();
        }
    });
});

describe('retryDelay', () => {
    it('should start at 1.5 seconds and double by default', () => {
        expect(DEFAULT_RETRY_OPTIONS.initialDelayMs).toBe(1500);
        expect(retryDelay(1)).toBe(1500);
        expect(retryDelay(2)).toBe(3000);
        expect(retryDelay(3)).toBe(6000);
    });

    it('should cap the delay at maxDelayMs', () => {
        expect(retryDelay(4)).toBe(10000);
        expect(retryDelay(3, { initialDelayMs: 1000, maxDelayMs: 2500 })).toBe(2500);
    });

    it('should ignore undefined and non-finite values', () => {
        expect(retryDelay(1, { initialDelayMs: undefined })).toBe(1500);
        expect(retryDelay(2, { backoffFactor: undefined, maxDelayMs: NaN })).toBe(3000);
        expect(resolveRetryOptions({ maxAttempts: undefined, initialDelayMs: undefined })).toEqual(
            DEFAULT_RETRY_OPTIONS
        );
    });

    it('should keep a fixed delay with a backoff factor of 1', () => {
        expect(retryDelay(1, { backoffFactor: 1 })).toBe(1500);
        expect(retryDelay(3, { backoffFactor: 1 })).toBe(1500);
    });
});
