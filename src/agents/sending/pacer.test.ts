import { describe, expect, it } from 'vitest';
import { DEFAULT_PACING, RandomPacer } from './pacer.js';

describe('RandomPacer', () => {
    it('uses the filler range for filler traffic, bounds inclusive', () => {
        expect(new RandomPacer(DEFAULT_PACING, () => 0).delayFor('filler')).toBe(60_000);
        expect(new RandomPacer(DEFAULT_PACING, () => 0.999999).delayFor('filler')).toBe(180_000);
    });

    it('uses the outreach range for first touch and follow-ups', () => {
        expect(new RandomPacer(DEFAULT_PACING, () => 0).delayFor('first_touch')).toBe(30_000);
        expect(new RandomPacer(DEFAULT_PACING, () => 0.999999).delayFor('follow_up')).toBe(120_000);
        expect(new RandomPacer(DEFAULT_PACING, () => 0.5).delayFor('first_touch')).toBe(75_000);
    });

    it('waits whole seconds and reports the delay', async () => {
        const waited: number[] = [];
        const pacer = new RandomPacer({ filler: { minSeconds: 2, maxSeconds: 2 }, outreach: { minSeconds: 1, maxSeconds: 1 } }, Math.random, async (ms) => {
            waited.push(ms);
        });

        await expect(pacer.pause('first_touch')).resolves.toBe(1000);
        await expect(pacer.pause('filler')).resolves.toBe(2000);
        expect(waited).toEqual([1000, 2000]);
    });
});
