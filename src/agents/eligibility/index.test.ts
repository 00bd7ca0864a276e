import { describe, expect, it } from 'vitest';
import { makeEntry, MemoryLedger, MutableClock } from '../../tests/fakes.js';
import { assessEligibility, DEFAULT_FOLLOW_UP_POLICY, EligibilityCalculator, foldHistories } from './index.js';

const NOW = new Date('2024-03-20T12:00:00.000Z');

describe('foldHistories', () => {
    it('ignores failed attempts', async () => {
        const histories = await foldHistories([makeEntry({ outcome: 'failed' })]);
        expect(histories.size).toBe(0);
    });

    it('tracks the highest follow-up and the latest outreach per recipient', async () => {
        const histories = await foldHistories([
            makeEntry({ timestamp: '2024-03-01T12:00:00.000Z' }),
            makeEntry({ timestamp: '2024-03-08T12:00:00.000Z', category: 'follow_up', sequence: 1 }),
            makeEntry({ timestamp: '2024-03-09T12:00:00.000Z', recipient_key: 'ADA@example.com', category: 'filler' }),
        ]);

        const history = histories.get('ada@example.com');
        expect(history?.highestFollowUp).toBe(1);
        expect(history?.lastOutreachAt?.toISOString()).toBe('2024-03-08T12:00:00.000Z');
        expect(history?.lastSentAt.toISOString()).toBe('2024-03-09T12:00:00.000Z');
        expect(history?.sentByCategory).toEqual({ first_touch: 1, filler: 1, follow_up: 1 });
    });
});

describe('assessEligibility', () => {
    it('treats an unknown recipient as fresh', () => {
        expect(assessEligibility(undefined, NOW, DEFAULT_FOLLOW_UP_POLICY)).toEqual({ status: 'fresh' });
    });

    it('keeps a recipient with only failed attempts fresh', async () => {
        const histories = await foldHistories([makeEntry({ outcome: 'failed' })]);
        expect(assessEligibility(histories.get('ada@example.com'), NOW, DEFAULT_FOLLOW_UP_POLICY)).toEqual({ status: 'fresh' });
    });

    it('makes follow-up 1 due ten days after first touch', async () => {
        const histories = await foldHistories([makeEntry({ timestamp: '2024-03-10T12:00:00.000Z' })]);
        const tenDaysLater = new Date('2024-03-20T12:00:00.000Z');

        expect(assessEligibility(histories.get('ada@example.com'), tenDaysLater, DEFAULT_FOLLOW_UP_POLICY)).toEqual({
            status: 'follow_up_due',
            sequence: 1,
            daysSinceLast: 10,
        });
    });

    it('reports follow-up 1 as not yet due inside the first interval', async () => {
        const histories = await foldHistories([makeEntry({ timestamp: '2024-03-15T12:00:00.000Z' })]);

        expect(assessEligibility(histories.get('ada@example.com'), NOW, DEFAULT_FOLLOW_UP_POLICY)).toEqual({
            status: 'follow_up_not_yet_due',
            sequence: 1,
            daysSinceLast: 5,
            dueInDays: 2,
        });
    });

    it('makes follow-up 1 due once the first interval has passed', async () => {
        const histories = await foldHistories([makeEntry({ timestamp: '2024-03-13T12:00:00.000Z' })]);

        expect(assessEligibility(histories.get('ada@example.com'), NOW, DEFAULT_FOLLOW_UP_POLICY)).toEqual({
            status: 'follow_up_due',
            sequence: 1,
            daysSinceLast: 7,
        });
    });

    it('measures the next interval from the most recent outreach send', async () => {
        const histories = await foldHistories([
            makeEntry({ timestamp: '2024-02-01T12:00:00.000Z' }),
            makeEntry({ timestamp: '2024-03-10T12:00:00.000Z', category: 'follow_up', sequence: 1 }),
        ]);

        expect(assessEligibility(histories.get('ada@example.com'), NOW, DEFAULT_FOLLOW_UP_POLICY)).toEqual({
            status: 'follow_up_not_yet_due',
            sequence: 2,
            daysSinceLast: 10,
            dueInDays: 4,
        });
    });

    it('continues from the highest sequence when the history has a gap', async () => {
        const histories = await foldHistories([
            makeEntry({ timestamp: '2024-01-01T12:00:00.000Z' }),
            makeEntry({ timestamp: '2024-02-01T12:00:00.000Z', category: 'follow_up', sequence: 2 }),
        ]);

        expect(assessEligibility(histories.get('ada@example.com'), NOW, DEFAULT_FOLLOW_UP_POLICY)).toMatchObject({
            status: 'follow_up_due',
            sequence: 3,
        });
    });

    it('marks the sequence exhausted after the last follow-up', async () => {
        const histories = await foldHistories([
            makeEntry({ timestamp: '2024-01-01T12:00:00.000Z' }),
            makeEntry({ timestamp: '2024-01-10T12:00:00.000Z', category: 'follow_up', sequence: 3 }),
        ]);

        expect(assessEligibility(histories.get('ada@example.com'), NOW, DEFAULT_FOLLOW_UP_POLICY)).toEqual({
            status: 'exhausted',
            followUpsSent: 3,
        });
    });

    it('does not treat filler-only history as outreach', async () => {
        const histories = await foldHistories([makeEntry({ recipient_key: 'seed-one@example.com', category: 'filler' })]);

        expect(assessEligibility(histories.get('seed-one@example.com'), NOW, DEFAULT_FOLLOW_UP_POLICY)).toMatchObject({
            status: 'ineligible',
        });
    });

    it('clamps a future last send to zero days', async () => {
        const histories = await foldHistories([makeEntry({ timestamp: '2024-03-25T12:00:00.000Z' })]);

        expect(assessEligibility(histories.get('ada@example.com'), NOW, DEFAULT_FOLLOW_UP_POLICY)).toMatchObject({
            status: 'follow_up_not_yet_due',
            daysSinceLast: 0,
        });
    });
});

describe('EligibilityCalculator', () => {
    it('evaluates a batch of keys against one ledger scan', async () => {
        const ledger = new MemoryLedger([
            makeEntry({ timestamp: '2024-03-01T12:00:00.000Z' }),
            makeEntry({ timestamp: '2024-03-19T12:00:00.000Z', recipient_key: 'grace@example.com' }),
        ]);
        const calculator = new EligibilityCalculator(ledger, DEFAULT_FOLLOW_UP_POLICY, new MutableClock('2024-03-20T12:00:00.000Z'));

        const results = await calculator.evaluateAll(['Ada@Example.com', 'grace@example.com', 'new@example.com']);

        expect(results.get('ada@example.com')).toEqual({ status: 'follow_up_due', sequence: 1, daysSinceLast: 19 });
        expect(results.get('grace@example.com')).toMatchObject({ status: 'follow_up_not_yet_due', dueInDays: 6 });
        expect(results.get('new@example.com')).toEqual({ status: 'fresh' });
        expect(await calculator.evaluate('new@example.com')).toEqual({ status: 'fresh' });
    });
});
