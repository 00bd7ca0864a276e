import { differenceInDays, parseISO } from 'date-fns';
import type { Ledger } from '../../db/ledger.js';
import {
    normalizeRecipientKey,
    type Eligibility,
    type LedgerEntry,
    type SendCategory,
} from '../../types/index.js';
import { systemClock, type Clock } from '../../utils/time.js';

export interface FollowUpPolicy {
    /** Days since the last contact before follow-up n may go out; index 0 is follow-up 1 */
    intervals: number[];
    maxFollowups: number;
}

export const DEFAULT_FOLLOW_UP_POLICY: FollowUpPolicy = {
    intervals: [7, 14, 21],
    maxFollowups: 3,
};

/**
 * Per-recipient view of the ledger, counting `sent` entries only. A failed
 * attempt never counts as contact.
 */
export interface EligibilityHistory {
    recipientKey: string;
    firstSentAt: Date;
    lastSentAt: Date;
    /** Most recent first_touch or follow_up send */
    lastOutreachAt: Date | null;
    sentByCategory: Record<SendCategory, number>;
    highestFollowUp: number;
}

export type HistoryIndex = Map<string, EligibilityHistory>;

export function applyEntry(histories: HistoryIndex, entry: LedgerEntry): HistoryIndex {
    if (entry.outcome !== 'sent') {
        return histories;
    }

    const key = normalizeRecipientKey(entry.recipient_key);
    const at = parseISO(entry.timestamp);
    const isOutreach = entry.category !== 'filler';
    const existing = histories.get(key);

    if (!existing) {
        histories.set(key, {
            recipientKey: key,
            firstSentAt: at,
            lastSentAt: at,
            lastOutreachAt: isOutreach ? at : null,
            sentByCategory: {
                first_touch: entry.category === 'first_touch' ? 1 : 0,
                filler: entry.category === 'filler' ? 1 : 0,
                follow_up: entry.category === 'follow_up' ? 1 : 0,
            },
            highestFollowUp: entry.sequence ?? 0,
        });
        return histories;
    }

    existing.sentByCategory[entry.category] += 1;
    if (at < existing.firstSentAt) existing.firstSentAt = at;
    if (at > existing.lastSentAt) existing.lastSentAt = at;
    if (isOutreach && (existing.lastOutreachAt === null || at > existing.lastOutreachAt)) {
        existing.lastOutreachAt = at;
    }
    if (entry.sequence !== null) {
        existing.highestFollowUp = Math.max(existing.highestFollowUp, entry.sequence);
    }
    return histories;
}

/**
 * Materialize every recipient's history with one pass over the ledger.
 * Nothing is cached between cycles.
 */
export async function foldHistories(
    entries: AsyncIterable<LedgerEntry> | Iterable<LedgerEntry>,
): Promise<HistoryIndex> {
    const histories: HistoryIndex = new Map();
    for await (const entry of entries) {
        applyEntry(histories, entry);
    }
    return histories;
}

/**
 * Classify one recipient. Sequence numbers are max(sent) + 1, so a gap in
 * the history never makes a sequence repeat or go backwards.
 */
export function assessEligibility(
    history: EligibilityHistory | undefined,
    now: Date,
    policy: FollowUpPolicy,
): Eligibility {
    if (!history) {
        return { status: 'fresh' };
    }

    if (history.lastOutreachAt === null) {
        return { status: 'ineligible', reason: 'only filler traffic on record' };
    }

    if (history.highestFollowUp >= policy.maxFollowups) {
        return { status: 'exhausted', followUpsSent: history.highestFollowUp };
    }

    const sequence = history.highestFollowUp + 1;
    const interval = policy.intervals[sequence - 1];
    if (interval === undefined) {
        return { status: 'ineligible', reason: `no interval configured for follow-up ${sequence}` };
    }

    const daysSinceLast = Math.max(0, differenceInDays(now, history.lastOutreachAt));
    if (daysSinceLast < interval) {
        return { status: 'follow_up_not_yet_due', sequence, daysSinceLast, dueInDays: interval - daysSinceLast };
    }
    return { status: 'follow_up_due', sequence, daysSinceLast };
}

export class EligibilityCalculator {
    constructor(
        private readonly ledger: Ledger,
        readonly policy: FollowUpPolicy = DEFAULT_FOLLOW_UP_POLICY,
        private readonly clock: Clock = systemClock,
    ) {}

    async evaluate(recipientKey: string): Promise<Eligibility> {
        const results = await this.evaluateAll([recipientKey]);
        return results.get(normalizeRecipientKey(recipientKey)) ?? { status: 'fresh' };
    }

    /**
     * Rebuilds histories from a full scan, then classifies each key.
     */
    async evaluateAll(recipientKeys: Iterable<string>): Promise<Map<string, Eligibility>> {
        const histories = await foldHistories(this.ledger.scan());
        const now = this.clock.now();
        const results = new Map<string, Eligibility>();
        for (const raw of recipientKeys) {
            const key = normalizeRecipientKey(raw);
            results.set(key, assessEligibility(histories.get(key), now, this.policy));
        }
        return results;
    }
}
