/**
 * Campaign error taxonomy.
 *
 * Per-candidate errors (TRANSPORT, VALIDATION) are logged and the cycle moves
 * on. Cycle-level errors (LEDGER_IO, CONFIG) abort the cycle.
 */

export type CampaignErrorCode = 'TRANSPORT' | 'LEDGER_IO' | 'VALIDATION' | 'CONFIG';

export class CampaignError extends Error {
    constructor(
        readonly code: CampaignErrorCode,
        message: string,
        readonly fatal: boolean,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'CampaignError';
    }
}

/** Delivery attempt failed. Retried by the executor, then terminal for that candidate only. */
export class TransportError extends CampaignError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('TRANSPORT', message, false, options);
        this.name = 'TransportError';
    }
}

export class LedgerIOError extends CampaignError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('LEDGER_IO', message, true, options);
        this.name = 'LedgerIOError';
    }
}

/** A single recipient record is malformed and gets skipped. */
export class ValidationError extends CampaignError {
    constructor(
        message: string,
        readonly recordRef?: string,
        readonly issues: string[] = [],
    ) {
        super('VALIDATION', message, false);
        this.name = 'ValidationError';
    }
}

export class ConfigError extends CampaignError {
    constructor(
        message: string,
        readonly issues: string[] = [],
        options?: { cause?: unknown },
    ) {
        super('CONFIG', message, true, options);
        this.name = 'ConfigError';
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
