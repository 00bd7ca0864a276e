import { z } from 'zod';

// Traffic roles
export const SendCategory = z.enum(['first_touch', 'filler', 'follow_up']);
export type SendCategory = z.infer<typeof SendCategory>;

export const SEND_CATEGORIES: readonly SendCategory[] = SendCategory.options;

export const SendOutcome = z.enum(['sent', 'failed']);
export type SendOutcome = z.infer<typeof SendOutcome>;

// first_touch and follow_up share one daily ceiling
export type QuotaGroup = 'outreach' | 'filler';

export function quotaGroupOf(category: SendCategory): QuotaGroup {
    return category === 'filler' ? 'filler' : 'outreach';
}

export function normalizeRecipientKey(email: string): string {
    return email.trim().toLowerCase();
}

// Recipient as loaded for one cycle
export const RecipientSchema = z.object({
    // Identity
    email: z.string().trim().toLowerCase().email(),
    first_name: z.string().trim().min(1),
    last_name: z.string().trim().min(1),

    // Professional
    organization: z.string().trim().min(1),
    title: z.string().trim(),
    industry: z.string().trim(),
    website: z.string().trim(),

    // Location
    city: z.string().trim(),
    state: z.string().trim(),
    country: z.string().trim(),
});
export type Recipient = z.infer<typeof RecipientSchema>;

/**
 * Filler traffic goes to seed mailboxes that carry no profile.
 */
export function fillerRecipient(address: string): Recipient {
    return {
        email: normalizeRecipientKey(address),
        first_name: '',
        last_name: '',
        organization: '',
        title: '',
        industry: '',
        website: '',
        city: '',
        state: '',
        country: '',
    };
}

// Denormalized into every ledger entry for audit
export const RecipientSnapshotSchema = z.object({
    first_name: z.string(),
    last_name: z.string(),
    organization: z.string(),
    title: z.string(),
});
export type RecipientSnapshot = z.infer<typeof RecipientSnapshotSchema>;

export function snapshotOf(recipient: Recipient): RecipientSnapshot {
    return {
        first_name: recipient.first_name,
        last_name: recipient.last_name,
        organization: recipient.organization,
        title: recipient.title,
    };
}

// One row per send attempt
export const LedgerEntryFields = z.object({
    timestamp: z.string().datetime({ offset: true }),
    recipient_key: z.string().min(1),
    outcome: SendOutcome,
    category: SendCategory,
    sequence: z.number().int().min(1).nullable(),
    snapshot: RecipientSnapshotSchema,
});

export const LedgerEntrySchema = LedgerEntryFields.superRefine((entry, ctx) => {
    if (entry.category === 'follow_up' && entry.sequence === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sequence'], message: 'follow_up entries need a sequence' });
    }
    if (entry.category !== 'follow_up' && entry.sequence !== null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sequence'], message: 'only follow_up entries carry a sequence' });
    }
});
export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

// Scheduling unit, consumed once by the executor
export type Candidate =
    | { category: 'first_touch'; recipient: Recipient }
    | { category: 'filler'; recipient: Recipient }
    | { category: 'follow_up'; recipient: Recipient; sequence: number; daysSinceLast: number };

export function sequenceOf(candidate: Candidate): number | null {
    return candidate.category === 'follow_up' ? candidate.sequence : null;
}

export type Eligibility =
    | { status: 'fresh' }
    | { status: 'follow_up_due'; sequence: number; daysSinceLast: number }
    | { status: 'follow_up_not_yet_due'; sequence: number; daysSinceLast: number; dueInDays: number }
    | { status: 'exhausted'; followUpsSent: number }
    | { status: 'ineligible'; reason: string };

export interface CategoryTally {
    sent: number;
    failed: number;
}

export type StopReason =
    | 'at_ceiling'
    | 'outreach_quota_exhausted'
    | 'candidates_exhausted'
    | 'interrupted';

export interface CycleSummary {
    startedAt: string;
    finishedAt: string;
    startedSending: boolean;
    stopReason: StopReason;
    totals: Record<SendCategory, CategoryTally>;
    rejected: number;
    unsent: {
        fresh: number;
        followUp: number;
    };
}

export function emptyTotals(): Record<SendCategory, CategoryTally> {
    return {
        first_touch: { sent: 0, failed: 0 },
        filler: { sent: 0, failed: 0 },
        follow_up: { sent: 0, failed: 0 },
    };
}
