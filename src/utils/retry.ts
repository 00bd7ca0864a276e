/**
 * Retry Utility
 *
 * Bounded retries around an async operation with:
 * - Configurable attempt count
 * - Exponential or fixed delay (multiplier 1, jitter off)
 * - Custom error classification
 * - Injectable sleep so callers can run retries without wall-clock waits
 */

import { logger } from './logger.js';
import { sleep as defaultSleep, type Sleeper } from './time.js';
import { toError } from './errors.js';

export interface RetryOptions {
    /** Maximum number of attempts, the first one included (default: 3) */
    maxAttempts: number;
    /** Delay before the second attempt in milliseconds (default: 1000) */
    initialDelay: number;
    /** Maximum delay cap in milliseconds (default: 30000) */
    maxDelay: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier: number;
    /** Randomize each delay by ±25% (default: true) */
    jitter: boolean;
    /** Function to determine if error is retryable (default: all errors) */
    isRetryable?: (error: Error) => boolean;
    /** Callback on each retry attempt */
    onRetry?: (attempt: number, error: Error, nextDelay: number) => void;
    /** Operation name for logging */
    operationName?: string;
    sleep?: Sleeper;
}

const DEFAULT_OPTIONS: RetryOptions = {
    maxAttempts: 3,
    initialDelay: 1000,
    maxDelay: 30000,
    backoffMultiplier: 2,
    jitter: true,
};

/**
 * Delay before attempt `attempt + 1`
 */
export function calculateDelay(
    attempt: number,
    options: Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'backoffMultiplier' | 'jitter'>,
    random: () => number = Math.random,
): number {
    const exponentialDelay = options.initialDelay * Math.pow(options.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, options.maxDelay);
    if (!options.jitter) {
        return Math.floor(cappedDelay);
    }
    return Math.floor(cappedDelay * (0.75 + random() * 0.5));
}

/**
 * Execute a function with retry logic
 *
 * @example
 * ```typescript
 * const messageId = await withRetry(
 *   () => deliverOnce(message),
 *   { maxAttempts: 3, initialDelay: 5000, backoffMultiplier: 1, jitter: false },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: Partial<RetryOptions> = {},
): Promise<T> {
    const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };
    const { maxAttempts, isRetryable, onRetry } = opts;
    const opName = opts.operationName || 'operation';
    const wait = opts.sleep ?? defaultSleep;

    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            lastError = toError(error);

            const shouldRetry = isRetryable ? isRetryable(lastError) : true;

            if (!shouldRetry || attempt >= maxAttempts) {
                logger.warn(`${opName} failed after ${attempt} attempt(s): ${lastError.message}`);
                throw lastError;
            }

            const delay = calculateDelay(attempt, opts);

            logger.warn(`${opName} attempt ${attempt}/${maxAttempts} failed: ${lastError.message}`);
            logger.debug(`Retrying ${opName} in ${(delay / 1000).toFixed(1)}s`);

            if (onRetry) {
                onRetry(attempt, lastError, delay);
            }

            await wait(delay);
        }
    }

    // Only reachable when maxAttempts < 1
    throw lastError || new Error(`${opName} was not attempted`);
}
