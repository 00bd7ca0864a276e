import { z } from 'zod';
import cron from 'node-cron';
import type { FollowUpPolicy } from '../agents/eligibility/index.js';
import type { DailyCaps } from '../agents/quota/index.js';
import type { SchedulerConfig } from '../agents/scheduler/index.js';
import type { SendingConfig } from '../agents/sending/index.js';
import type { DelayRange, PacingRanges } from '../agents/sending/pacer.js';
import { DEFAULT_TEMPLATES_PATH } from '../services/composer.js';
import type { TransportSettings } from '../services/transport/index.js';
import { ConfigError } from '../utils/errors.js';

export type LedgerSettings =
    | { backend: 'file'; path: string }
    | { backend: 'supabase'; url: string; serviceRoleKey: string };

export interface CampaignConfig {
    caps: DailyCaps;
    sending: SendingConfig;
    pacing: PacingRanges;
    followUps: FollowUpPolicy;
    scheduler: SchedulerConfig;
    transport: TransportSettings;
    ledger: LedgerSettings;
    /** Advisory lock held for the duration of a cycle */
    lockPath: string;
    recipientsPath: string;
    templatesPath: string;
    /** Overrides the addresses bundled with the templates */
    fillerAddresses?: string[];
    schedule: {
        cron: string;
        timezone: string;
    };
    slackWebhookUrl?: string;
    app: {
        nodeEnv: 'development' | 'production' | 'test';
        logLevel: 'error' | 'warn' | 'info' | 'success' | 'debug';
    };
}

// ============================================================================
// Field parsers
// ============================================================================

const count = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const positive = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

// "60-180" → { minSeconds: 60, maxSeconds: 180 }
const delayRange = z.string().transform((value, ctx): DelayRange => {
    const match = /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(value);
    const min = Number(match?.[1]);
    const max = Number(match?.[2]);
    if (!match || min > max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected "min-max" seconds with min <= max, got "${value}"` });
        return z.NEVER;
    }
    return { minSeconds: min, maxSeconds: max };
});

// "7,14,21" → [7, 14, 21]
const dayList = z.string().transform((value, ctx): number[] => {
    const days = value.split(',').map((part) => part.trim()).filter((part) => part !== '').map(Number);
    if (days.length === 0 || days.some((day) => !Number.isInteger(day) || day < 0)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected comma-separated whole days, got "${value}"` });
        return z.NEVER;
    }
    return days;
});

const emailList = z.string().transform((value, ctx): string[] => {
    const addresses = value.split(',').map((part) => part.trim().toLowerCase()).filter((part) => part !== '');
    for (const address of addresses) {
        if (!z.string().email().safeParse(address).success) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid filler address "${address}"` });
        }
    }
    return addresses;
});

const flag = z.string().optional().transform((value) => value !== undefined && /^(true|1|yes)$/i.test(value));

function isTimezone(zone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: zone });
        return true;
    } catch {
        return false;
    }
}

// ============================================================================
// Sections
// ============================================================================

const CoreEnvSchema = z
    .object({
        FIRST_TOUCH_DAILY_CAP: count(15),
        FILLER_DAILY_CAP: count(5),
        MAX_RETRIES: positive(3),
        RETRY_WAIT_SECONDS: count(5),
        FILLER_DELAY_RANGE: delayRange.default('60-180'),
        OUTREACH_DELAY_RANGE: delayRange.default('30-120'),
        FOLLOWUP_INTERVALS: dayList.default('7,14,21'),
        MAX_FOLLOWUPS: count(3),
        SUBBATCH_SIZE: positive(3),
        INITIAL_BURST_SIZE: count(5),

        SENDER_EMAIL: z.string().email(),
        SENDER_NAME: z.string().optional(),
        REPLY_TO_EMAIL: z.string().email().optional(),

        RECIPIENTS_CSV: z.string().default('data/recipients.csv'),
        TEMPLATES_PATH: z.string().default(DEFAULT_TEMPLATES_PATH),
        FILLER_ADDRESSES: emailList.optional(),

        CAMPAIGN_SCHEDULE: z
            .string()
            .default('0 9 * * 1-5')
            .refine((expression) => cron.validate(expression), { message: 'invalid cron expression' }),
        CAMPAIGN_TIMEZONE: z.string().default('America/New_York').refine(isTimezone, { message: 'unknown time zone' }),
        SLACK_WEBHOOK_URL: z.string().url().optional(),

        LOG_LEVEL: z.enum(['error', 'warn', 'info', 'success', 'debug']).default('info'),
        NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    })
    .superRefine((env, ctx) => {
        if (env.MAX_FOLLOWUPS > env.FOLLOWUP_INTERVALS.length) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['MAX_FOLLOWUPS'],
                message: `${env.MAX_FOLLOWUPS} follow-ups need as many FOLLOWUP_INTERVALS, got ${env.FOLLOWUP_INTERVALS.length}`,
            });
        }
    });

const TransportEnvSchema = z
    .discriminatedUnion('MAIL_TRANSPORT', [
        z.object({ MAIL_TRANSPORT: z.literal('dry-run') }),
        z.object({ MAIL_TRANSPORT: z.literal('resend'), RESEND_API_KEY: z.string().min(1) }),
        z.object({
            MAIL_TRANSPORT: z.literal('smtp'),
            SMTP_HOST: z.string().min(1),
            SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
            SMTP_SECURE: flag,
            SMTP_USER: z.string().min(1),
            SMTP_PASSWORD: z.string().min(1),
        }),
    ])
    .transform((env): TransportSettings => {
        switch (env.MAIL_TRANSPORT) {
            case 'dry-run':
                return { kind: 'dry-run' };
            case 'resend':
                return { kind: 'resend', apiKey: env.RESEND_API_KEY };
            case 'smtp':
                return {
                    kind: 'smtp',
                    smtp: {
                        host: env.SMTP_HOST,
                        port: env.SMTP_PORT,
                        secure: env.SMTP_SECURE,
                        auth: { user: env.SMTP_USER, pass: env.SMTP_PASSWORD },
                    },
                };
        }
    });

const LedgerEnvSchema = z.discriminatedUnion('LEDGER_BACKEND', [
    z.object({
        LEDGER_BACKEND: z.literal('file'),
        LEDGER_PATH: z.string().default('data/sent-ledger.jsonl'),
        LEDGER_LOCK_PATH: z.string().optional(),
    }),
    z.object({
        LEDGER_BACKEND: z.literal('supabase'),
        SUPABASE_URL: z.string().url(),
        SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
        LEDGER_LOCK_PATH: z.string().default('data/campaign.lock'),
    }),
]);

function describeIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`);
}

// Blank values count as unset
function cleanEnv(env: NodeJS.ProcessEnv): Record<string, string> {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            cleaned[key] = value.trim();
        }
    }
    return cleaned;
}

/**
 * Build the campaign configuration from environment variables. Every problem
 * is collected before a single ConfigError is thrown.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CampaignConfig {
    const cleaned = cleanEnv(env);
    const withDefaults = { MAIL_TRANSPORT: 'dry-run', LEDGER_BACKEND: 'file', ...cleaned };

    const core = CoreEnvSchema.safeParse(withDefaults);
    const transport = TransportEnvSchema.safeParse(withDefaults);
    const ledger = LedgerEnvSchema.safeParse(withDefaults);

    if (!core.success || !transport.success || !ledger.success) {
        const issues = [
            ...(core.success ? [] : describeIssues(core.error)),
            ...(transport.success ? [] : describeIssues(transport.error)),
            ...(ledger.success ? [] : describeIssues(ledger.error)),
        ];
        throw new ConfigError(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, issues);
    }

    const c = core.data;
    const l = ledger.data;

    const ledgerSettings: LedgerSettings = l.LEDGER_BACKEND === 'file'
        ? { backend: 'file', path: l.LEDGER_PATH }
        : { backend: 'supabase', url: l.SUPABASE_URL, serviceRoleKey: l.SUPABASE_SERVICE_ROLE_KEY };
    const lockPath = l.LEDGER_LOCK_PATH ?? (l.LEDGER_BACKEND === 'file' ? `${l.LEDGER_PATH}.lock` : 'data/campaign.lock');

    return {
        caps: { outreach: c.FIRST_TOUCH_DAILY_CAP, filler: c.FILLER_DAILY_CAP },
        sending: {
            sender: { email: c.SENDER_EMAIL, name: c.SENDER_NAME },
            replyTo: c.REPLY_TO_EMAIL,
            maxRetries: c.MAX_RETRIES,
            retryWaitMs: c.RETRY_WAIT_SECONDS * 1000,
        },
        pacing: { filler: c.FILLER_DELAY_RANGE, outreach: c.OUTREACH_DELAY_RANGE },
        followUps: { intervals: c.FOLLOWUP_INTERVALS, maxFollowups: c.MAX_FOLLOWUPS },
        scheduler: { subbatchSize: c.SUBBATCH_SIZE, initialBurstSize: c.INITIAL_BURST_SIZE },
        transport: transport.data,
        ledger: ledgerSettings,
        lockPath,
        recipientsPath: c.RECIPIENTS_CSV,
        templatesPath: c.TEMPLATES_PATH,
        fillerAddresses: c.FILLER_ADDRESSES,
        schedule: { cron: c.CAMPAIGN_SCHEDULE, timezone: c.CAMPAIGN_TIMEZONE },
        slackWebhookUrl: c.SLACK_WEBHOOK_URL,
        app: { nodeEnv: c.NODE_ENV, logLevel: c.LOG_LEVEL },
    };
}
