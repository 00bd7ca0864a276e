import { createReadStream } from 'fs';
import { mkdir, open, type FileHandle } from 'fs/promises';
import path from 'path';
import * as readline from 'readline';
import { LedgerEntrySchema, type LedgerEntry } from '../types/index.js';
import { LedgerIOError, errorMessage, isErrnoException } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Append-only record of every send attempt. The only store the dispatcher
 * trusts for dedup, follow-up timing and daily quotas.
 */
export interface Ledger {
    readonly description: string;
    /**
     * Durably record one attempt. Returns the entry as stored (its timestamp
     * may be moved forward to keep the ledger non-decreasing).
     */
    append(entry: LedgerEntry): Promise<LedgerEntry>;
    /** Lazy, restartable scan in append order. */
    scan(): AsyncIterable<LedgerEntry>;
}

/**
 * Keep timestamps non-decreasing across appends.
 */
export function clampTimestamp(entry: LedgerEntry, lastTimestamp: string | null): LedgerEntry {
    if (lastTimestamp !== null && Date.parse(entry.timestamp) < Date.parse(lastTimestamp)) {
        return { ...entry, timestamp: lastTimestamp };
    }
    return entry;
}

export function validateEntry(entry: unknown): LedgerEntry {
    const parsed = LedgerEntrySchema.safeParse(entry);
    if (!parsed.success) {
        throw new LedgerIOError(`Refusing to write malformed ledger entry: ${parsed.error.message}`);
    }
    return parsed.data;
}

export async function collectEntries(ledger: Ledger): Promise<LedgerEntry[]> {
    const entries: LedgerEntry[] = [];
    for await (const entry of ledger.scan()) {
        entries.push(entry);
    }
    return entries;
}

const NEWLINE = 0x0a;
const TAIL_CHUNK = 4096;

type TailState = 'missing' | 'terminated' | 'torn';

async function tailState(handle: FileHandle): Promise<Exclude<TailState, 'missing'>> {
    const { size } = await handle.stat();
    if (size === 0) return 'terminated';
    const last = Buffer.alloc(1);
    await handle.read(last, 0, 1, size - 1);
    return last[0] === NEWLINE ? 'terminated' : 'torn';
}

// Offset just past the last newline, 0 when the file holds none.
async function endOfLastLine(handle: FileHandle): Promise<number> {
    const chunk = Buffer.alloc(TAIL_CHUNK);
    let end = (await handle.stat()).size;
    while (end > 0) {
        const start = Math.max(0, end - TAIL_CHUNK);
        const { bytesRead } = await handle.read(chunk, 0, end - start, start);
        const index = chunk.subarray(0, bytesRead).lastIndexOf(NEWLINE);
        if (index !== -1) return start + index + 1;
        end = start;
    }
    return 0;
}

/**
 * JSON-lines file ledger. Each append is one line, flushed to disk before the
 * call returns.
 *
 * A crash mid-append can leave a final line without its newline. The scan
 * skips such a line when it does not parse, and the next append cuts it off
 * before writing. A malformed line that ends in a newline fails the scan
 * wherever it sits.
 */
export class FileLedger implements Ledger {
    private lastTimestamp: string | null | undefined;

    constructor(readonly filePath: string) {}

    get description(): string {
        return `file:${this.filePath}`;
    }

    async append(entry: LedgerEntry): Promise<LedgerEntry> {
        const valid = validateEntry(entry);

        if (this.lastTimestamp === undefined) {
            this.lastTimestamp = await this.readLastTimestamp();
        }
        const stored = clampTimestamp(valid, this.lastTimestamp);

        try {
            await mkdir(path.dirname(this.filePath), { recursive: true });
            const handle = await open(this.filePath, 'a+');
            try {
                await this.dropTornTail(handle);
                await handle.write(`${JSON.stringify(stored)}\n`);
                await handle.datasync();
            } finally {
                await handle.close();
            }
        } catch (error) {
            throw new LedgerIOError(`Failed to append to ledger ${this.filePath}: ${errorMessage(error)}`, { cause: error });
        }

        this.lastTimestamp = stored.timestamp;
        return stored;
    }

    async *scan(): AsyncGenerator<LedgerEntry> {
        const tail = await this.readTailState();
        if (tail === 'missing') {
            return;
        }

        const lines = readline.createInterface({
            input: createReadStream(this.filePath, { encoding: 'utf-8' }),
            crlfDelay: Infinity,
        });

        let lineNumber = 0;
        let torn: { lineNumber: number; reason: string } | null = null;

        try {
            for await (const line of lines) {
                lineNumber++;
                if (line.trim() === '') continue;

                if (torn) {
                    throw new LedgerIOError(`Ledger ${this.filePath} is corrupt at line ${torn.lineNumber}: ${torn.reason}`);
                }

                const entry = this.parseLine(line);
                if (typeof entry === 'string') {
                    torn = { lineNumber, reason: entry };
                    continue;
                }
                yield entry;
            }
        } catch (error) {
            if (error instanceof LedgerIOError) throw error;
            throw new LedgerIOError(`Failed to read ledger ${this.filePath}: ${errorMessage(error)}`, { cause: error });
        } finally {
            lines.close();
        }

        if (torn) {
            if (tail === 'terminated' || torn.lineNumber !== lineNumber) {
                throw new LedgerIOError(`Ledger ${this.filePath} is corrupt at line ${torn.lineNumber}: ${torn.reason}`);
            }
            logger.warn(`Skipping torn final ledger line ${torn.lineNumber} in ${this.filePath}`, { metadata: torn });
        }
    }

    // An unterminated final line that still parses was counted by scans, so it
    // only gets its newline. Anything else is cut back to the last full line.
    private async dropTornTail(handle: FileHandle): Promise<void> {
        if ((await tailState(handle)) === 'terminated') return;

        const { size } = await handle.stat();
        const keep = await endOfLastLine(handle);
        const fragment = Buffer.alloc(size - keep);
        await handle.read(fragment, 0, fragment.length, keep);

        if (typeof this.parseLine(fragment.toString('utf-8')) !== 'string') {
            await handle.write('\n');
            return;
        }
        logger.warn(`Cutting torn final line from ledger ${this.filePath} before appending`, {
            metadata: { offset: keep, bytes: fragment.length },
        });
        await handle.truncate(keep);
    }

    // Returns the parse failure reason instead of throwing, so the caller can
    // tell a torn tail from corruption in the middle.
    private parseLine(line: string): LedgerEntry | string {
        let raw: unknown;
        try {
            raw = JSON.parse(line);
        } catch (error) {
            return errorMessage(error);
        }
        const parsed = LedgerEntrySchema.safeParse(raw);
        return parsed.success ? parsed.data : parsed.error.message;
    }

    private async readTailState(): Promise<TailState> {
        let handle: FileHandle;
        try {
            handle = await open(this.filePath, 'r');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') return 'missing';
            throw new LedgerIOError(`Cannot access ledger ${this.filePath}: ${errorMessage(error)}`, { cause: error });
        }
        try {
            return await tailState(handle);
        } catch (error) {
            throw new LedgerIOError(`Failed to read ledger ${this.filePath}: ${errorMessage(error)}`, { cause: error });
        } finally {
            await handle.close();
        }
    }

    private async readLastTimestamp(): Promise<string | null> {
        let last: string | null = null;
        for await (const entry of this.scan()) {
            last = entry.timestamp;
        }
        return last;
    }
}
