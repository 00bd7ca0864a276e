import type { Ledger } from '../../db/ledger.js';
import type { MessageComposer } from '../../services/composer.js';
import type { DeliveryResult, MailTransport, OutboundMessage, SenderIdentity } from '../../services/transport/types.js';
import {
    quotaGroupOf,
    sequenceOf,
    snapshotOf,
    type Candidate,
    type LedgerEntry,
    type SendOutcome,
} from '../../types/index.js';
import { TransportError, errorMessage } from '../../utils/errors.js';
import { logger, logSuccess } from '../../utils/logger.js';
import { metrics } from '../../utils/metrics.js';
import { withRetry } from '../../utils/retry.js';
import { sleep as defaultSleep, systemClock, type Clock, type Sleeper } from '../../utils/time.js';
import type { Pacer } from './pacer.js';

export interface SendingConfig {
    sender: SenderIdentity;
    replyTo?: string;
    /** Transport invocations per candidate, the first attempt included */
    maxRetries: number;
    /** Fixed wait between attempts, milliseconds */
    retryWaitMs: number;
}

export const DEFAULT_SENDING: Pick<SendingConfig, 'maxRetries' | 'retryWaitMs'> = {
    maxRetries: 3,
    retryWaitMs: 5000,
};

export interface ExecutorDeps {
    ledger: Ledger;
    transport: MailTransport;
    composer: MessageComposer;
    pacer: Pacer;
    clock?: Clock;
    /** Wait used between retries */
    sleep?: Sleeper;
}

export interface SendOptions {
    /** Skip the pacing delay after the final send of a batch */
    lastInBatch: boolean;
    signal?: AbortSignal;
}

/**
 * Sends one candidate: compose once, deliver with bounded retries, record the
 * outcome in the ledger, then pace. The only writer of ledger entries.
 */
export class PacingExecutor {
    private readonly clock: Clock;
    private readonly sleep: Sleeper;

    constructor(
        private readonly config: SendingConfig,
        private readonly deps: ExecutorDeps,
    ) {
        this.clock = deps.clock ?? systemClock;
        this.sleep = deps.sleep ?? defaultSleep;
    }

    async send(candidate: Candidate, options: SendOptions): Promise<SendOutcome> {
        const { recipient, category } = candidate;
        const sequence = sequenceOf(candidate);
        const composed = this.deps.composer.compose(recipient, category, sequence ?? undefined);

        const message: OutboundMessage = {
            from: this.config.sender,
            to: recipient.email,
            subject: composed.subject,
            body: composed.body,
            replyTo: this.config.replyTo,
        };

        const label = sequence === null ? category : `${category} #${sequence}`;
        logger.info(`📤 Sending ${label} to ${recipient.email}`);

        let outcome: SendOutcome;
        try {
            const messageId = await withRetry(() => this.deliverOnce(message), {
                maxAttempts: this.config.maxRetries,
                initialDelay: this.config.retryWaitMs,
                maxDelay: this.config.retryWaitMs,
                backoffMultiplier: 1,
                jitter: false,
                isRetryable: (error) => error instanceof TransportError,
                onRetry: () => metrics.increment('transportRetries'),
                operationName: `${label} send to ${recipient.email}`,
                sleep: this.sleep,
            });
            outcome = 'sent';
            logSuccess(`Sent ${label} to ${recipient.email}`, { messageId });
        } catch (error) {
            if (!(error instanceof TransportError)) {
                throw error;
            }
            outcome = 'failed';
            logger.error(`Giving up on ${label} to ${recipient.email} after ${this.config.maxRetries} attempt(s)`, {
                metadata: { error: error.message },
            });
        }

        await this.record(candidate, outcome);

        if (outcome === 'sent') {
            metrics.increment(quotaGroupOf(category) === 'filler' ? 'fillerSent' : 'outreachSent');
        } else {
            metrics.increment('sendFailures');
        }

        if (!options.lastInBatch && !options.signal?.aborted) {
            await this.deps.pacer.pause(category, options.signal);
        }

        return outcome;
    }

    private async deliverOnce(message: OutboundMessage): Promise<string | undefined> {
        let result: DeliveryResult;
        try {
            result = await this.deps.transport.deliver(message);
        } catch (error) {
            throw new TransportError(`${this.deps.transport.name} transport threw: ${errorMessage(error)}`, { cause: error });
        }
        if (!result.success) {
            throw new TransportError(result.error || `${this.deps.transport.name} transport reported failure`);
        }
        return result.messageId;
    }

    // LedgerIOError propagates: the cycle cannot continue without a durable record
    private async record(candidate: Candidate, outcome: SendOutcome): Promise<LedgerEntry> {
        return this.deps.ledger.append({
            timestamp: this.clock.now().toISOString(),
            recipient_key: candidate.recipient.email,
            outcome,
            category: candidate.category,
            sequence: sequenceOf(candidate),
            snapshot: snapshotOf(candidate.recipient),
        });
    }
}
