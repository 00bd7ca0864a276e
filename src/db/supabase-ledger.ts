import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { LedgerEntryFields, LedgerEntrySchema, type LedgerEntry } from '../types/index.js';
import { LedgerIOError } from '../utils/errors.js';
import { LEDGER_TABLE } from './client.js';
import { clampTimestamp, validateEntry, type Ledger } from './ledger.js';

// Rows carry a bigserial id that fixes insertion order (see sql/send_ledger.sql)
const LedgerRowSchema = LedgerEntryFields.extend({
    id: z.number().int(),
});

const TimestampRowSchema = z.array(z.object({ timestamp: z.string() }));

function describeError(error: { message: string; code?: string }): string {
    return error.code ? `${error.message} (${error.code})` : error.message;
}

/**
 * Ledger stored in a Supabase table. Same contract as the file ledger: insert
 * only, scanned in id order page by page.
 */
export class SupabaseLedger implements Ledger {
    private lastTimestamp: string | null | undefined;

    constructor(
        private readonly client: SupabaseClient,
        private readonly pageSize = 1000,
    ) {}

    get description(): string {
        return `supabase:${LEDGER_TABLE}`;
    }

    async append(entry: LedgerEntry): Promise<LedgerEntry> {
        const valid = validateEntry(entry);

        if (this.lastTimestamp === undefined) {
            this.lastTimestamp = await this.fetchLastTimestamp();
        }
        const stored = clampTimestamp(valid, this.lastTimestamp);

        const { error } = await this.client.from(LEDGER_TABLE).insert(stored);
        if (error) {
            throw new LedgerIOError(`Supabase insert into ${LEDGER_TABLE} failed: ${describeError(error)}`);
        }

        this.lastTimestamp = stored.timestamp;
        return stored;
    }

    async *scan(): AsyncGenerator<LedgerEntry> {
        for (let from = 0; ; from += this.pageSize) {
            const { data, error } = await this.client
                .from(LEDGER_TABLE)
                .select('*')
                .order('id', { ascending: true })
                .range(from, from + this.pageSize - 1);

            if (error) {
                throw new LedgerIOError(`Supabase scan of ${LEDGER_TABLE} failed: ${describeError(error)}`);
            }

            const rows = z.array(z.unknown()).safeParse(data);
            if (!rows.success) {
                throw new LedgerIOError(`Supabase scan of ${LEDGER_TABLE} returned no rows array`);
            }

            for (const raw of rows.data) {
                yield this.toEntry(raw);
            }

            if (rows.data.length < this.pageSize) {
                return;
            }
        }
    }

    private toEntry(raw: unknown): LedgerEntry {
        const row = LedgerRowSchema.safeParse(raw);
        if (!row.success) {
            throw new LedgerIOError(`Malformed ${LEDGER_TABLE} row: ${row.error.message}`);
        }
        const { id, ...fields } = row.data;
        const entry = LedgerEntrySchema.safeParse(fields);
        if (!entry.success) {
            throw new LedgerIOError(`Malformed ${LEDGER_TABLE} row ${id}: ${entry.error.message}`);
        }
        return entry.data;
    }

    private async fetchLastTimestamp(): Promise<string | null> {
        const { data, error } = await this.client
            .from(LEDGER_TABLE)
            .select('timestamp')
            .order('id', { ascending: false })
            .limit(1);

        if (error) {
            throw new LedgerIOError(`Supabase read of latest ${LEDGER_TABLE} row failed: ${describeError(error)}`);
        }

        const rows = TimestampRowSchema.safeParse(data);
        if (!rows.success) {
            throw new LedgerIOError(`Malformed latest ${LEDGER_TABLE} row: ${rows.error.message}`);
        }
        return rows.data[0]?.timestamp ?? null;
    }
}
