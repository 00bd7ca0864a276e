import { quotaGroupOf, type QuotaGroup, type SendCategory } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { sleep as defaultSleep, type Sleeper } from '../../utils/time.js';

export interface DelayRange {
    minSeconds: number;
    maxSeconds: number;
}

export type PacingRanges = Record<QuotaGroup, DelayRange>;

export const DEFAULT_PACING: PacingRanges = {
    filler: { minSeconds: 60, maxSeconds: 180 },
    outreach: { minSeconds: 30, maxSeconds: 120 },
};

/**
 * Wait between two sends. Returns the milliseconds waited.
 */
export interface Pacer {
    pause(category: SendCategory, signal?: AbortSignal): Promise<number>;
}

/**
 * Uniform whole-second delay, bounds inclusive, range picked by traffic group.
 * This is a mandatory anti-abuse rate limit, not a tuning knob.
 */
export class RandomPacer implements Pacer {
    constructor(
        private readonly ranges: PacingRanges = DEFAULT_PACING,
        private readonly random: () => number = Math.random,
        private readonly sleep: Sleeper = defaultSleep,
    ) {}

    delayFor(category: SendCategory): number {
        const { minSeconds, maxSeconds } = this.ranges[quotaGroupOf(category)];
        const seconds = Math.floor(this.random() * (maxSeconds - minSeconds + 1)) + minSeconds;
        return seconds * 1000;
    }

    async pause(category: SendCategory, signal?: AbortSignal): Promise<number> {
        const ms = this.delayFor(category);
        logger.info(`⏱️  Pacing delay after ${category}: ${ms / 1000}s`);
        await this.sleep(ms, signal);
        return ms;
    }
}
