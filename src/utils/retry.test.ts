import { describe, expect, it } from 'vitest';
import { calculateDelay, withRetry } from './retry.js';

const noWait = async (): Promise<void> => {};

describe('calculateDelay', () => {
    it('grows exponentially up to the cap', () => {
        const options = { initialDelay: 1000, maxDelay: 5000, backoffMultiplier: 2, jitter: false };

        expect([1, 2, 3, 4].map((attempt) => calculateDelay(attempt, options))).toEqual([1000, 2000, 4000, 5000]);
    });

    it('stays flat with a multiplier of one', () => {
        const options = { initialDelay: 5000, maxDelay: 5000, backoffMultiplier: 1, jitter: false };

        expect(calculateDelay(3, options)).toBe(5000);
    });

    it('spreads jittered delays between 75% and 125%', () => {
        const options = { initialDelay: 1000, maxDelay: 30000, backoffMultiplier: 2, jitter: true };

        expect(calculateDelay(1, options, () => 0)).toBe(750);
        expect(calculateDelay(1, options, () => 1)).toBe(1250);
    });
});

describe('withRetry', () => {
    it('returns the first successful result', async () => {
        const attempts: number[] = [];

        const result = await withRetry(
            async (attempt) => {
                attempts.push(attempt);
                if (attempt < 3) throw new Error(`attempt ${attempt} failed`);
                return 'done';
            },
            { maxAttempts: 3, sleep: noWait },
        );

        expect(result).toBe('done');
        expect(attempts).toEqual([1, 2, 3]);
    });

    it('throws the last error once attempts run out', async () => {
        const retries: number[] = [];

        await expect(
            withRetry(
                async (attempt) => {
                    throw new Error(`attempt ${attempt} failed`);
                },
                { maxAttempts: 2, jitter: false, sleep: noWait, onRetry: (attempt) => retries.push(attempt) },
            ),
        ).rejects.toThrow('attempt 2 failed');
        expect(retries).toEqual([1]);
    });

    it('stops at errors that are not retryable', async () => {
        let calls = 0;

        await expect(
            withRetry(
                async () => {
                    calls++;
                    throw new TypeError('bad input');
                },
                { maxAttempts: 5, sleep: noWait, isRetryable: (error) => !(error instanceof TypeError) },
            ),
        ).rejects.toBeInstanceOf(TypeError);
        expect(calls).toBe(1);
    });

    it('waits the computed delay between attempts', async () => {
        const waits: number[] = [];

        await withRetry(
            async (attempt) => {
                if (attempt === 1) throw new Error('transient');
                return attempt;
            },
            {
                initialDelay: 5000,
                maxDelay: 5000,
                backoffMultiplier: 1,
                jitter: false,
                sleep: async (ms) => {
                    waits.push(ms);
                },
            },
        );

        expect(waits).toEqual([5000]);
    });
});
