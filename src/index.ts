// Campaign Dispatcher - public API
export * from './types/index.js';
export * from './db/index.js';

export {
    EligibilityCalculator,
    assessEligibility,
    foldHistories,
    DEFAULT_FOLLOW_UP_POLICY,
    type FollowUpPolicy,
    type EligibilityHistory,
} from './agents/eligibility/index.js';
export { QuotaTracker, QuotaState, tallyDay, type DailyCaps } from './agents/quota/index.js';
export { PacingExecutor, DEFAULT_SENDING, type SendingConfig, type ExecutorDeps } from './agents/sending/index.js';
export { RandomPacer, DEFAULT_PACING, type Pacer, type PacingRanges, type DelayRange } from './agents/sending/pacer.js';
export {
    AlternatingScheduler,
    DEFAULT_SCHEDULER,
    type SchedulerConfig,
    type SchedulerDeps,
    type CyclePhase,
} from './agents/scheduler/index.js';

export { loadConfig, type CampaignConfig, type LedgerSettings } from './config/index.js';
export { TemplateComposer, loadTemplateLibrary, personalize, type MessageComposer, type TemplateLibrary } from './services/composer.js';
export { FillerPool } from './services/filler-pool.js';
export { CsvRecipientSource, parseRecipientsCsv, type RecipientSource, type RecipientBatch } from './services/recipients.js';
export { SlackNotifier } from './services/notifications.js';
export { computeLedgerStatistics, formatStatistics, type LedgerStatistics } from './services/reporting.js';
export * from './services/transport/index.js';

export { buildCampaign, runCampaignCycle, startCampaignScheduler, type Campaign, type CampaignOverrides } from './campaign-runner.js';
export * from './utils/errors.js';
export type { Clock, Sleeper } from './utils/time.js';
