import { parseISO } from 'date-fns';
import type { Ledger } from '../../db/ledger.js';
import { quotaGroupOf, type LedgerEntry, type QuotaGroup } from '../../types/index.js';
import { calendarDay, systemClock, type Clock } from '../../utils/time.js';

export type DailyCaps = Record<QuotaGroup, number>;

/**
 * Today's ceilings and consumption. Consumption counts `sent` entries whose
 * calendar day, in the campaign time zone, matches `day`.
 */
export class QuotaState {
    constructor(
        readonly day: Date,
        readonly ceilings: DailyCaps,
        private readonly consumed: Record<QuotaGroup, number>,
    ) {}

    consumedToday(group: QuotaGroup): number {
        return this.consumed[group];
    }

    remaining(group: QuotaGroup): number {
        return Math.max(0, this.ceilings[group] - this.consumed[group]);
    }

    atCeiling(): boolean {
        return this.remaining('outreach') === 0 && this.remaining('filler') === 0;
    }
}

export async function tallyDay(
    entries: AsyncIterable<LedgerEntry> | Iterable<LedgerEntry>,
    day: Date,
    timeZone?: string,
): Promise<Record<QuotaGroup, number>> {
    const consumed: Record<QuotaGroup, number> = { outreach: 0, filler: 0 };
    const today = calendarDay(day, timeZone);
    for await (const entry of entries) {
        if (entry.outcome === 'sent' && calendarDay(parseISO(entry.timestamp), timeZone) === today) {
            consumed[quotaGroupOf(entry.category)] += 1;
        }
    }
    return consumed;
}

export class QuotaTracker {
    constructor(
        private readonly ledger: Ledger,
        readonly caps: DailyCaps,
        private readonly clock: Clock = systemClock,
        readonly timeZone?: string,
    ) {}

    async load(): Promise<QuotaState> {
        const today = this.clock.now();
        const consumed = await tallyDay(this.ledger.scan(), today, this.timeZone);
        return new QuotaState(today, this.caps, consumed);
    }
}
