#!/usr/bin/env node
/**
 * Campaign Dispatcher - Campaign Runner
 *
 * Runs one dispatch cycle against the configured ledger, recipients and mail
 * transport, or keeps running cycles on a cron schedule.
 *
 * Default Schedule:
 *   - Weekdays at 09:00 in CAMPAIGN_TIMEZONE (CAMPAIGN_SCHEDULE overrides)
 */

import 'dotenv/config';
import { pathToFileURL } from 'url';
import cron, { type ScheduledTask } from 'node-cron';
import type { SupabaseClient } from '@supabase/supabase-js';
import { EligibilityCalculator } from './agents/eligibility/index.js';
import { QuotaTracker } from './agents/quota/index.js';
import { AlternatingScheduler } from './agents/scheduler/index.js';
import { PacingExecutor } from './agents/sending/index.js';
import { RandomPacer, type Pacer } from './agents/sending/pacer.js';
import { loadConfig, type CampaignConfig, type LedgerSettings } from './config/index.js';
import { checkConnection, createLedgerClient, FileLedger, LedgerLock, SupabaseLedger, type CycleLock, type Ledger } from './db/index.js';
import { loadTemplateLibrary, TemplateComposer } from './services/composer.js';
import { FillerPool } from './services/filler-pool.js';
import { SlackNotifier } from './services/notifications.js';
import { CsvRecipientSource, type RecipientSource } from './services/recipients.js';
import { computeLedgerStatistics, formatStatistics } from './services/reporting.js';
import { createTransport, type MailTransport } from './services/transport/index.js';
import type { CycleSummary } from './types/index.js';
import { ConfigError, LedgerIOError, TransportError, errorMessage } from './utils/errors.js';
import { logger, logSuccess } from './utils/logger.js';
import { metrics } from './utils/metrics.js';
import { systemClock, type Clock } from './utils/time.js';

// ============================================================================
// Wiring
// ============================================================================

export interface Campaign {
    config: CampaignConfig;
    ledger: Ledger;
    /** Set for the Supabase backend, checked before each cycle */
    ledgerClient?: SupabaseClient;
    transport: MailTransport;
    recipients: RecipientSource;
    quotaTracker: QuotaTracker;
    scheduler: AlternatingScheduler;
    notifier: SlackNotifier;
}

/** Replacements for the parts that touch the outside world */
export interface CampaignOverrides {
    ledger?: Ledger;
    transport?: MailTransport;
    recipients?: RecipientSource;
    pacer?: Pacer;
    lock?: CycleLock;
    clock?: Clock;
    random?: () => number;
    fetch?: typeof fetch;
}

function openLedger(settings: LedgerSettings, fetchImpl?: typeof fetch): { ledger: Ledger; client?: SupabaseClient } {
    if (settings.backend === 'file') {
        return { ledger: new FileLedger(settings.path) };
    }
    const client = createLedgerClient({ url: settings.url, serviceRoleKey: settings.serviceRoleKey, fetch: fetchImpl });
    return { ledger: new SupabaseLedger(client), client };
}

export function buildCampaign(config: CampaignConfig, overrides: CampaignOverrides = {}): Campaign {
    const clock = overrides.clock ?? systemClock;
    const random = overrides.random ?? Math.random;

    const opened = overrides.ledger ? { ledger: overrides.ledger } : openLedger(config.ledger, overrides.fetch);
    const { ledger } = opened;
    const transport = overrides.transport ?? createTransport(config.transport);

    const library = loadTemplateLibrary(config.templatesPath);
    const fillerPool = new FillerPool(config.fillerAddresses ?? library.filler.addresses, random);

    const quotaTracker = new QuotaTracker(ledger, config.caps, clock, config.schedule.timezone);
    const executor = new PacingExecutor(config.sending, {
        ledger,
        transport,
        composer: new TemplateComposer(library, random),
        pacer: overrides.pacer ?? new RandomPacer(config.pacing, random),
        clock,
    });

    const scheduler = new AlternatingScheduler(config.scheduler, {
        executor,
        quotaTracker,
        eligibility: new EligibilityCalculator(ledger, config.followUps, clock),
        fillerPool,
        lock: overrides.lock ?? new LedgerLock(config.lockPath),
        clock,
    });

    return {
        config,
        ledger,
        ledgerClient: 'client' in opened ? opened.client : undefined,
        transport,
        recipients: overrides.recipients ?? new CsvRecipientSource(config.recipientsPath),
        quotaTracker,
        scheduler,
        notifier: new SlackNotifier(config.slackWebhookUrl, overrides.fetch),
    };
}

// ============================================================================
// Cycle
// ============================================================================

async function preflight(campaign: Campaign): Promise<void> {
    if (campaign.ledgerClient && !(await checkConnection(campaign.ledgerClient))) {
        throw new LedgerIOError(`Cannot reach ledger ${campaign.ledger.description}`);
    }

    if (campaign.transport.verify) {
        logger.info(`Checking ${campaign.transport.name} connection...`);
        try {
            await campaign.transport.verify();
        } catch (error) {
            throw new TransportError(`${campaign.transport.name} connection check failed: ${errorMessage(error)}`, { cause: error });
        }
        logSuccess(`${campaign.transport.name} connection OK`);
    }
}

function printSummary(summary: CycleSummary): void {
    const row = (label: string, value: number) => `│  ${label.padEnd(22)}${String(value).padStart(5)}                              │`;
    console.log(`
┌─────────────────────────────────────────────────────────────┐
│                 📊 CYCLE SUMMARY                            │
├─────────────────────────────────────────────────────────────┤
${row('📧 First touch sent:', summary.totals.first_touch.sent)}
${row('🔁 Follow-ups sent:', summary.totals.follow_up.sent)}
${row('🌱 Filler sent:', summary.totals.filler.sent)}
${row('❌ Failed:', summary.totals.first_touch.failed + summary.totals.follow_up.failed + summary.totals.filler.failed)}
${row('⚠️  Rejected records:', summary.rejected)}
└─────────────────────────────────────────────────────────────┘
`);
}

/**
 * One full cycle: pre-flight checks, recipient load, dispatch. Per-candidate
 * problems end up in the summary; cycle-level problems are thrown.
 */
export async function runCampaignCycle(campaign: Campaign, signal?: AbortSignal): Promise<CycleSummary> {
    await preflight(campaign);

    const batch = await campaign.recipients.load();
    for (const rejection of batch.rejected) {
        logger.warn(`Skipping record: ${rejection.message}`);
    }
    metrics.increment('recipientsRejected', batch.rejected.length);
    logger.info(`Loaded ${batch.recipients.length} recipients from ${campaign.recipients.description}`);

    const summary = await campaign.scheduler.runCycle(batch.recipients, { signal });
    const result: CycleSummary = { ...summary, rejected: summary.rejected + batch.rejected.length };

    printSummary(result);
    metrics.logMetricsSummary();
    return result;
}

// ============================================================================
// Modes
// ============================================================================

async function showStatistics(campaign: Campaign): Promise<void> {
    const [stats, quota] = await Promise.all([
        computeLedgerStatistics(campaign.ledger.scan()),
        campaign.quotaTracker.load(),
    ]);
    console.log(formatStatistics(stats, quota));
}

/**
 * Runs a cycle now, then on every cron tick. A tick that fires while a cycle
 * is still running is skipped.
 */
export function startCampaignScheduler(campaign: Campaign, controller: AbortController): ScheduledTask {
    const { schedule } = campaign.config;
    let running = false;

    const tick = async (stage: string) => {
        if (running) {
            logger.warn(`Previous cycle still running, skipping ${stage}`);
            return;
        }
        running = true;
        try {
            const summary = await runCampaignCycle(campaign, controller.signal);
            await campaign.notifier.cycleCompleted(summary);
        } catch (error) {
            await campaign.notifier.cycleFailed(error, stage);
        } finally {
            running = false;
        }
    };

    logger.info(`👀 Starting campaign watcher (${schedule.cron}, ${schedule.timezone})`);
    const task = cron.schedule(schedule.cron, () => tick('Scheduled run'), { timezone: schedule.timezone });
    void tick('Initial run');
    return task;
}

function printHelp(): void {
    console.log(`
Usage: campaign-dispatcher [options]

Options:
  (none)         Run one dispatch cycle now
  --watch, -w    Run now, then on CAMPAIGN_SCHEDULE
  --stats        Show ledger statistics and today's quota
  --help, -h     Show this help message

Environment Variables:
  SENDER_EMAIL            Sender address (required)
  MAIL_TRANSPORT          resend | smtp | dry-run (default: dry-run)
  FIRST_TOUCH_DAILY_CAP   Outreach sends per day (default: 15)
  FILLER_DAILY_CAP        Filler sends per day (default: 5)
  LEDGER_BACKEND          file | supabase (default: file)
  RECIPIENTS_CSV          Contacts export (default: data/recipients.csv)
  SLACK_WEBHOOK_URL       Slack webhook for cycle reports
`);
}

async function main(): Promise<number> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        printHelp();
        return 0;
    }

    let config: CampaignConfig;
    try {
        config = loadConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            logger.error(error.message);
            return 1;
        }
        throw error;
    }

    const campaign = buildCampaign(config);
    const controller = new AbortController();
    const stop = (signal: NodeJS.Signals) => {
        logger.warn(`${signal} received, stopping after the current send`);
        controller.abort();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    if (args.includes('--stats')) {
        await showStatistics(campaign);
        return 0;
    }

    console.log(`
╔═══════════════════════════════════════════════════════════════╗
║          📬 CAMPAIGN DISPATCHER                                ║
╚═══════════════════════════════════════════════════════════════╝
`);

    if (!campaign.notifier.enabled) {
        logger.warn('SLACK_WEBHOOK_URL not set - you will NOT receive failure notifications!');
    } else {
        logSuccess('Slack notifications enabled');
    }

    if (args.includes('--watch') || args.includes('-w')) {
        const task = startCampaignScheduler(campaign, controller);
        await new Promise<void>((resolve) => controller.signal.addEventListener('abort', () => resolve(), { once: true }));
        task.stop();
        return 0;
    }

    try {
        const summary = await runCampaignCycle(campaign, controller.signal);
        await campaign.notifier.cycleCompleted(summary);
        return 0;
    } catch (error) {
        await campaign.notifier.cycleFailed(error, 'Single run');
        return 1;
    }
}

const isMainModule = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isMainModule) {
    main()
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            logger.error('Campaign runner crashed', { metadata: errorMessage(error) });
            process.exitCode = 1;
        });
}
