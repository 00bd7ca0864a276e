import { format, parseISO, startOfDay, subDays } from 'date-fns';
import type { QuotaState } from '../agents/quota/index.js';
import { emptyTotals, normalizeRecipientKey, SEND_CATEGORIES, type CategoryTally, type LedgerEntry, type SendCategory } from '../types/index.js';

export interface LedgerStatistics {
    totalAttempts: number;
    sent: number;
    failed: number;
    byCategory: Record<SendCategory, CategoryTally>;
    /** Percentage of attempts that went out, one decimal ("0%" when empty) */
    successRate: string;
    uniqueRecipients: number;
    firstAttemptAt: string | null;
    lastAttemptAt: string | null;
    /** Sent per local day (yyyy-MM-dd) over the trailing window, oldest first */
    recentDays: Array<{ day: string; sent: number }>;
}

/**
 * Lifetime view of the ledger, plus a per-day sent count for the last
 * `windowDays` days ending at `now`.
 */
export async function computeLedgerStatistics(
    entries: AsyncIterable<LedgerEntry> | Iterable<LedgerEntry>,
    now: Date = new Date(),
    windowDays = 7,
): Promise<LedgerStatistics> {
    const byCategory = emptyTotals();
    const recipients = new Set<string>();
    const windowStart = startOfDay(subDays(now, windowDays - 1));
    const daily = new Map<string, number>();
    for (let offset = windowDays - 1; offset >= 0; offset--) {
        daily.set(format(subDays(now, offset), 'yyyy-MM-dd'), 0);
    }

    let firstAttemptAt: string | null = null;
    let lastAttemptAt: string | null = null;

    for await (const entry of entries) {
        byCategory[entry.category][entry.outcome]++;
        if (firstAttemptAt === null) firstAttemptAt = entry.timestamp;
        lastAttemptAt = entry.timestamp;

        if (entry.category !== 'filler') {
            recipients.add(normalizeRecipientKey(entry.recipient_key));
        }

        const at = parseISO(entry.timestamp);
        if (entry.outcome === 'sent' && at >= windowStart) {
            const day = format(at, 'yyyy-MM-dd');
            const current = daily.get(day);
            if (current !== undefined) {
                daily.set(day, current + 1);
            }
        }
    }

    const sent = SEND_CATEGORIES.reduce((total, category) => total + byCategory[category].sent, 0);
    const failed = SEND_CATEGORIES.reduce((total, category) => total + byCategory[category].failed, 0);
    const totalAttempts = sent + failed;

    return {
        totalAttempts,
        sent,
        failed,
        byCategory,
        successRate: totalAttempts === 0 ? '0%' : `${((sent / totalAttempts) * 100).toFixed(1)}%`,
        uniqueRecipients: recipients.size,
        firstAttemptAt,
        lastAttemptAt,
        recentDays: [...daily.entries()].map(([day, count]) => ({ day, sent: count })),
    };
}

export function formatStatistics(stats: LedgerStatistics, quota?: QuotaState): string {
    const lines = [
        '📊 SEND STATISTICS',
        `  Attempts:          ${stats.totalAttempts}`,
        `  Sent:              ${stats.sent}`,
        `  Failed:            ${stats.failed}`,
        `  Success rate:      ${stats.successRate}`,
        `  Unique recipients: ${stats.uniqueRecipients}`,
        '',
        '  By category:',
        ...SEND_CATEGORIES.map(
            (category) => `    ${category.padEnd(12)} ${stats.byCategory[category].sent} sent, ${stats.byCategory[category].failed} failed`,
        ),
        '',
        '  Last days (sent):',
        ...stats.recentDays.map(({ day, sent }) => `    ${day}  ${sent}`),
    ];

    if (quota) {
        lines.push(
            '',
            `  Today: outreach ${quota.consumedToday('outreach')}/${quota.ceilings.outreach}, ` +
            `filler ${quota.consumedToday('filler')}/${quota.ceilings.filler}`,
        );
    }

    return lines.join('\n');
}
