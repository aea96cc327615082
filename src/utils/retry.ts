import type { Logger } from 'winston';
import { createLogger } from './logger.js';

export interface RetryOptions {
    maxAttempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt; 1 keeps it fixed. */
    backoffFactor?: number;
    shouldRetry?: (error: unknown) => boolean;
    logger?: Logger;
}

export const DEFAULT_RETRY_OPTIONS: Required<Omit<RetryOptions, 'shouldRetry' | 'logger'>> = {
    maxAttempts: 3,
    initialDelayMs: 1500,
    maxDelayMs: 10000,
    backoffFactor: 2,
};

const defaultLogger = createLogger('retry');

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

type ResolvedRetryOptions = typeof DEFAULT_RETRY_OPTIONS;

function finiteOr(value: number | undefined, fallback: number): number {
    return value !== undefined && Number.isFinite(value) ? value : fallback;
}

/**
 * Fills in defaults field by field, so an explicit `undefined` keeps the default
 */
export function resolveRetryOptions(options: RetryOptions = {}): ResolvedRetryOptions {
    return {
        maxAttempts: Math.max(1, Math.floor(finiteOr(options.maxAttempts, DEFAULT_RETRY_OPTIONS.maxAttempts))),
        initialDelayMs: Math.max(0, finiteOr(options.initialDelayMs, DEFAULT_RETRY_OPTIONS.initialDelayMs)),
        maxDelayMs: Math.max(0, finiteOr(options.maxDelayMs, DEFAULT_RETRY_OPTIONS.maxDelayMs)),
        backoffFactor: Math.max(1, finiteOr(options.backoffFactor, DEFAULT_RETRY_OPTIONS.backoffFactor)),
    };
}

/**
 * Delays execution for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the retry that follows the given (1-based) failed attempt
 */
export function retryDelay(attempt: number, options: RetryOptions = {}): number {
    const opts = resolveRetryOptions(options);
    const delay = opts.initialDelayMs * Math.pow(opts.backoffFactor, attempt - 1);
    return Math.min(delay, opts.maxDelayMs);
}

/**
 * Runs an async operation, retrying failed attempts with backoff.
 * Re-throws the last error once attempts are exhausted or `shouldRetry` says no.
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const opts = resolveRetryOptions(options);
    const log = options.logger ?? defaultLogger;
    const { maxAttempts } = opts;

    let attempt = 1;
    for (;;) {
        try {
            return await fn();
        } catch (error) {
            const retryable = options.shouldRetry ? options.shouldRetry(error) : true;

            if (!retryable || attempt >= maxAttempts) {
                log.error('Operation failed', {
                    attempt,
                    maxAttempts,
                    retryable,
                    error: errorMessage(error),
                });
                throw error;
            }

            const delayMs = retryDelay(attempt, options);
            log.warn('Operation failed, retrying', {
                attempt,
                maxAttempts,
                delayMs,
                error: errorMessage(error),
            });

            await sleep(delayMs);
            attempt++;
        }
    }
}
