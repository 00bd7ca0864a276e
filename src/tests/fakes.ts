import { clampTimestamp, validateEntry, type Ledger } from '../db/ledger.js';
import type { CycleLock } from '../db/ledger-lock.js';
import type { Pacer } from '../agents/sending/pacer.js';
import type { DeliveryResult, MailTransport, OutboundMessage } from '../services/transport/types.js';
import type { LedgerEntry, Recipient, SendCategory } from '../types/index.js';
import { LedgerIOError } from '../utils/errors.js';
import type { Clock } from '../utils/time.js';

/**
 * In-process ledger with the same validation and clamping as the real ones.
 */
export class MemoryLedger implements Ledger {
    readonly description = 'memory';
    readonly entries: LedgerEntry[];
    failAppends = false;

    constructor(initial: LedgerEntry[] = []) {
        this.entries = [...initial];
    }

    async append(entry: LedgerEntry): Promise<LedgerEntry> {
        if (this.failAppends) {
            throw new LedgerIOError('disk full');
        }
        const last = this.entries[this.entries.length - 1];
        const stored = clampTimestamp(validateEntry(entry), last ? last.timestamp : null);
        this.entries.push(stored);
        return stored;
    }

    async *scan(): AsyncGenerator<LedgerEntry> {
        for (const entry of [...this.entries]) {
            yield entry;
        }
    }
}

type Behaviour = 'ok' | 'fail' | 'throw';

/**
 * Records every delivery. Per-address scripts are consumed attempt by
 * attempt; once a script runs out the address succeeds.
 */
export class FakeTransport implements MailTransport {
    readonly name = 'fake';
    readonly delivered: OutboundMessage[] = [];
    readonly attempts: OutboundMessage[] = [];
    private readonly scripts = new Map<string, Behaviour[]>();
    private failEverything = false;

    script(address: string, behaviours: Behaviour[]): this {
        this.scripts.set(address, [...behaviours]);
        return this;
    }

    failAll(): this {
        this.failEverything = true;
        return this;
    }

    async deliver(message: OutboundMessage): Promise<DeliveryResult> {
        this.attempts.push(message);
        const behaviour = this.failEverything ? 'fail' : this.scripts.get(message.to)?.shift() ?? 'ok';
        if (behaviour === 'throw') {
            throw new Error('connection reset');
        }
        if (behaviour === 'fail') {
            return { success: false, error: 'mailbox unavailable' };
        }
        this.delivered.push(message);
        return { success: true, messageId: `msg-${this.delivered.length}` };
    }
}

export class RecordingPacer implements Pacer {
    readonly pauses: SendCategory[] = [];

    async pause(category: SendCategory): Promise<number> {
        this.pauses.push(category);
        return 0;
    }
}

export class RecordingLock implements CycleLock {
    readonly events: string[] = [];

    async acquire(): Promise<void> {
        this.events.push('acquire');
    }

    async release(): Promise<void> {
        this.events.push('release');
    }
}

export class MutableClock implements Clock {
    private current: Date;

    constructor(iso: string) {
        this.current = new Date(iso);
    }

    now(): Date {
        return new Date(this.current.getTime());
    }

    set(iso: string): void {
        this.current = new Date(iso);
    }

    advanceSeconds(seconds: number): void {
        this.current = new Date(this.current.getTime() + seconds * 1000);
    }
}

export const noSleep = async (): Promise<void> => {};

export function makeRecipient(overrides: Partial<Recipient> = {}): Recipient {
    return {
        email: 'ada@example.com',
        first_name: 'Ada',
        last_name: 'Lovelace',
        organization: 'Analytical Engines',
        title: 'Founder',
        industry: 'Manufacturing',
        website: 'analytical.example',
        city: 'London',
        state: 'England',
        country: 'UK',
        ...overrides,
    };
}

export function makeRecipients(count: number, prefix = 'contact'): Recipient[] {
    return Array.from({ length: count }, (_, index) =>
        makeRecipient({
            email: `${prefix}${index + 1}@example.com`,
            first_name: `Name${index + 1}`,
            organization: `Company ${index + 1}`,
        }),
    );
}

export function makeEntry(overrides: Partial<LedgerEntry> = {}): LedgerEntry {
    return {
        timestamp: '2024-03-01T10:00:00.000Z',
        recipient_key: 'ada@example.com',
        outcome: 'sent',
        category: 'first_touch',
        sequence: null,
        snapshot: { first_name: 'Ada', last_name: 'Lovelace', organization: 'Analytical Engines', title: 'Founder' },
        ...overrides,
    };
}
