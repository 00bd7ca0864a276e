import type { CycleLock } from '../../db/ledger-lock.js';
import type { FillerPool } from '../../services/filler-pool.js';
import {
    emptyTotals,
    fillerRecipient,
    normalizeRecipientKey,
    quotaGroupOf,
    type Candidate,
    type CycleSummary,
    type Eligibility,
    type QuotaGroup,
    type Recipient,
    type SendOutcome,
    type StopReason,
} from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { logger, logSuccess } from '../../utils/logger.js';
import { metrics } from '../../utils/metrics.js';
import { systemClock, type Clock } from '../../utils/time.js';
import type { EligibilityCalculator } from '../eligibility/index.js';
import type { QuotaTracker } from '../quota/index.js';
import type { PacingExecutor } from '../sending/index.js';

export interface SchedulerConfig {
    /** Outreach sends between two filler sends */
    subbatchSize: number;
    /** Filler sends before the first outreach send */
    initialBurstSize: number;
}

export const DEFAULT_SCHEDULER: SchedulerConfig = {
    subbatchSize: 3,
    initialBurstSize: 5,
};

export interface SchedulerDeps {
    executor: PacingExecutor;
    quotaTracker: QuotaTracker;
    eligibility: EligibilityCalculator;
    fillerPool: FillerPool;
    lock?: CycleLock;
    clock?: Clock;
}

export type CyclePhase = 'idle' | 'init' | 'filler_burst' | 'interleave' | 'done';

export interface CandidateQueues {
    fresh: Candidate[];
    followUps: Candidate[];
    rejected: number;
}

interface CycleState {
    budget: Record<QuotaGroup, number>;
    summary: CycleSummary;
    signal?: AbortSignal;
}

/**
 * One campaign cycle: Init → FillerBurst → Interleave → Done.
 *
 * Sends are strictly sequential. Quota budget only shrinks on `sent`, so a
 * failed candidate frees its slot for the next one in the queue.
 */
export class AlternatingScheduler {
    private currentPhase: CyclePhase = 'idle';
    private readonly clock: Clock;

    constructor(
        private readonly config: SchedulerConfig,
        private readonly deps: SchedulerDeps,
    ) {
        this.clock = deps.clock ?? systemClock;
    }

    get phase(): CyclePhase {
        return this.currentPhase;
    }

    async runCycle(recipients: readonly Recipient[], options: { signal?: AbortSignal } = {}): Promise<CycleSummary> {
        const { lock } = this.deps;
        await lock?.acquire();
        try {
            return await this.cycle(recipients, options.signal);
        } finally {
            this.currentPhase = 'done';
            await lock?.release();
        }
    }

    /**
     * Split the pool into fresh and due follow-up candidates, in pool order.
     * Always consults the calculator for follow-ups, even with no fresh
     * recipients.
     */
    async buildQueues(recipients: readonly Recipient[]): Promise<CandidateQueues> {
        const unique: Recipient[] = [];
        const seen = new Set<string>();
        let rejected = 0;

        for (const recipient of recipients) {
            const key = normalizeRecipientKey(recipient.email);
            const problem = !key ? 'empty email' : seen.has(key) ? `duplicate email ${key}` : null;
            if (problem) {
                const error = new ValidationError(`Skipping recipient: ${problem}`, key);
                logger.warn(error.message);
                rejected++;
                continue;
            }
            seen.add(key);
            unique.push({ ...recipient, email: key });
        }

        const eligibility = await this.deps.eligibility.evaluateAll(unique.map((recipient) => recipient.email));
        const fresh: Candidate[] = [];
        const followUps: Candidate[] = [];

        for (const recipient of unique) {
            const status: Eligibility = eligibility.get(recipient.email) ?? { status: 'fresh' };
            switch (status.status) {
                case 'fresh':
                    fresh.push({ category: 'first_touch', recipient });
                    break;
                case 'follow_up_due':
                    followUps.push({
                        category: 'follow_up',
                        recipient,
                        sequence: status.sequence,
                        daysSinceLast: status.daysSinceLast,
                    });
                    break;
                case 'follow_up_not_yet_due':
                    logger.debug(`${recipient.email}: follow-up ${status.sequence} due in ${status.dueInDays} day(s)`);
                    break;
                case 'exhausted':
                    logger.debug(`${recipient.email}: sequence complete (${status.followUpsSent} follow-ups sent)`);
                    break;
                case 'ineligible':
                    logger.debug(`${recipient.email}: ineligible (${status.reason})`);
                    break;
            }
        }

        return { fresh, followUps, rejected };
    }

    private async cycle(recipients: readonly Recipient[], signal?: AbortSignal): Promise<CycleSummary> {
        this.currentPhase = 'init';
        const startedAt = this.clock.now().toISOString();
        metrics.increment('cyclesRun');

        const quota = await this.deps.quotaTracker.load();
        const state: CycleState = {
            budget: { outreach: quota.remaining('outreach'), filler: quota.remaining('filler') },
            summary: {
                startedAt,
                finishedAt: startedAt,
                startedSending: false,
                stopReason: 'at_ceiling',
                totals: emptyTotals(),
                rejected: 0,
                unsent: { fresh: 0, followUp: 0 },
            },
            signal,
        };

        logger.info(
            `📊 Today's quota: outreach ${quota.consumedToday('outreach')}/${quota.ceilings.outreach}, ` +
            `filler ${quota.consumedToday('filler')}/${quota.ceilings.filler}`,
        );

        if (quota.atCeiling()) {
            logSuccess('All daily limits reached, nothing to send');
            return this.finish(state, 'at_ceiling', { fresh: [], followUps: [], rejected: 0 });
        }

        const queues = await this.buildQueues(recipients);
        state.summary.rejected = queues.rejected;
        metrics.increment('recipientsRejected', queues.rejected);
        logger.info(`📋 Queued ${queues.fresh.length} fresh and ${queues.followUps.length} follow-up candidates`);

        // Filler burst, one batch
        this.currentPhase = 'filler_burst';
        const burst = Math.min(this.config.initialBurstSize, state.budget.filler);
        if (burst > 0) {
            logger.info(`🔥 Initial filler burst (${burst})`);
        }
        for (let i = 0; i < burst; i++) {
            if (signal?.aborted) {
                return this.finish(state, 'interrupted', queues);
            }
            await this.dispatch(state, this.fillerCandidate(), i === burst - 1);
        }

        // Interleave: one filler, then up to subbatchSize outreach
        this.currentPhase = 'interleave';
        for (;;) {
            if (signal?.aborted) {
                return this.finish(state, 'interrupted', queues);
            }
            if (state.budget.outreach <= 0) {
                return this.finish(state, 'outreach_quota_exhausted', queues);
            }
            if (queues.fresh.length === 0 && queues.followUps.length === 0) {
                return this.finish(state, 'candidates_exhausted', queues);
            }

            if (state.budget.filler > 0) {
                await this.dispatch(state, this.fillerCandidate(), true);
                if (signal?.aborted) continue;
            }

            const batchSize = Math.min(
                this.config.subbatchSize,
                state.budget.outreach,
                queues.fresh.length + queues.followUps.length,
            );
            for (let i = 0; i < batchSize; i++) {
                if (signal?.aborted) break;
                const candidate = queues.fresh.shift() ?? queues.followUps.shift();
                if (!candidate) break;
                await this.dispatch(state, candidate, i === batchSize - 1);
            }
        }
    }

    private fillerCandidate(): Candidate {
        return { category: 'filler', recipient: fillerRecipient(this.deps.fillerPool.next()) };
    }

    private async dispatch(state: CycleState, candidate: Candidate, lastInBatch: boolean): Promise<void> {
        state.summary.startedSending = true;

        let outcome: SendOutcome;
        try {
            outcome = await this.deps.executor.send(candidate, { lastInBatch, signal: state.signal });
        } catch (error) {
            if (error instanceof ValidationError) {
                logger.warn(`Skipping ${candidate.recipient.email}: ${error.message}`);
                state.summary.rejected++;
                return;
            }
            throw error;
        }

        const tally = state.summary.totals[candidate.category];
        if (outcome === 'sent') {
            tally.sent++;
            state.budget[quotaGroupOf(candidate.category)]--;
        } else {
            tally.failed++;
        }
    }

    private finish(state: CycleState, reason: StopReason, queues: CandidateQueues): CycleSummary {
        this.currentPhase = 'done';
        const summary: CycleSummary = {
            ...state.summary,
            finishedAt: this.clock.now().toISOString(),
            stopReason: reason,
            unsent: { fresh: queues.fresh.length, followUp: queues.followUps.length },
        };
        logger.info(`🏁 Cycle finished (${reason})`, { metadata: summary });
        return summary;
    }
}
