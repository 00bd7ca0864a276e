import { mkdir, open, readFile, rm } from 'fs/promises';
import path from 'path';
import { ConfigError, LedgerIOError, errorMessage, isErrnoException } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface CycleLock {
    acquire(): Promise<void>;
    release(): Promise<void>;
}

/**
 * Advisory single-scheduler lock: an exclusively created file beside the
 * ledger. It only guards against a second dispatcher on the same host and
 * path; it is not a cross-process coordination protocol.
 */
export class LedgerLock implements CycleLock {
    private held = false;

    constructor(readonly lockPath: string) {}

    async acquire(): Promise<void> {
        if (this.held) return;

        try {
            await mkdir(path.dirname(this.lockPath), { recursive: true });
            const handle = await open(this.lockPath, 'wx');
            try {
                await handle.writeFile(JSON.stringify({ pid: process.pid, acquired_at: new Date().toISOString() }));
            } finally {
                await handle.close();
            }
        } catch (error) {
            if (isErrnoException(error) && error.code === 'EEXIST') {
                const holder = await this.describeHolder();
                throw new ConfigError(
                    `Ledger lock ${this.lockPath} is already held${holder}. ` +
                    'Another dispatcher may be running against this ledger; remove the lock file only if none is.',
                );
            }
            throw new LedgerIOError(`Could not create ledger lock ${this.lockPath}: ${errorMessage(error)}`, { cause: error });
        }

        this.held = true;
        logger.debug(`Acquired ledger lock ${this.lockPath}`);
    }

    async release(): Promise<void> {
        if (!this.held) return;
        await rm(this.lockPath, { force: true });
        this.held = false;
        logger.debug(`Released ledger lock ${this.lockPath}`);
    }

    private async describeHolder(): Promise<string> {
        try {
            const content = await readFile(this.lockPath, 'utf-8');
            const holder: unknown = JSON.parse(content);
            if (typeof holder === 'object' && holder !== null && 'pid' in holder) {
                return ` by pid ${String(holder.pid)}`;
            }
        } catch (error) {
            logger.debug(`Could not read lock holder from ${this.lockPath}: ${errorMessage(error)}`);
        }
        return '';
    }
}
