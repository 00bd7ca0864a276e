import { SEND_CATEGORIES, type CycleSummary, type SendCategory } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// ============================================================================
// Slack Block Kit
// ============================================================================

interface TextObject {
    type: 'plain_text' | 'mrkdwn';
    text: string;
    emoji?: boolean;
}

export type SlackBlock =
    | { type: 'header'; text: TextObject }
    | { type: 'section'; text?: TextObject; fields?: TextObject[] }
    | { type: 'context'; elements: TextObject[] };

const CATEGORY_LABELS: Record<SendCategory, string> = {
    first_touch: '📧 First touch',
    follow_up: '🔁 Follow-up',
    filler: '🌱 Filler',
};

const STOP_REASON_LABELS: Record<CycleSummary['stopReason'], string> = {
    at_ceiling: 'daily limits already reached',
    outreach_quota_exhausted: 'outreach quota used up',
    candidates_exhausted: 'no candidates left',
    interrupted: 'interrupted',
};

export function summaryBlocks(summary: CycleSummary): SlackBlock[] {
    const failed = Object.values(summary.totals).reduce((total, tally) => total + tally.failed, 0);
    const emoji = failed > 0 ? '⚠️' : '✅';
    const status = failed > 0 ? 'completed with failures' : 'completed';

    const blocks: SlackBlock[] = [
        {
            type: 'header',
            text: { type: 'plain_text', text: `${emoji} Campaign cycle ${status}`, emoji: true },
        },
        {
            type: 'section',
            fields: SEND_CATEGORIES.map((category): TextObject => ({
                type: 'mrkdwn',
                text: `*${CATEGORY_LABELS[category]}:*\n${summary.totals[category].sent} sent, ${summary.totals[category].failed} failed`,
            })),
        },
        {
            type: 'section',
            fields: [
                { type: 'mrkdwn', text: `*Stopped:*\n${STOP_REASON_LABELS[summary.stopReason]}` },
                { type: 'mrkdwn', text: `*Rejected records:*\n${summary.rejected}` },
                { type: 'mrkdwn', text: `*Left for later:*\n${summary.unsent.fresh} fresh, ${summary.unsent.followUp} follow-up` },
            ],
        },
        {
            type: 'context',
            elements: [{ type: 'mrkdwn', text: `⏰ ${summary.startedAt} → ${summary.finishedAt}` }],
        },
    ];

    return blocks;
}

export function failureBlocks(error: unknown, stage: string, at: Date = new Date()): SlackBlock[] {
    const blocks: SlackBlock[] = [
        {
            type: 'header',
            text: { type: 'plain_text', text: '🚨 CRITICAL: Campaign cycle failed', emoji: true },
        },
        {
            type: 'section',
            text: { type: 'mrkdwn', text: `*Stage:* ${stage}\n*Error:* ${errorMessage(error)}` },
        },
        {
            type: 'context',
            elements: [{ type: 'mrkdwn', text: `⏰ ${at.toISOString()}` }],
        },
    ];

    const stack = error instanceof Error ? error.stack : undefined;
    if (stack) {
        blocks.push({
            type: 'section',
            text: { type: 'mrkdwn', text: `\`\`\`${stack.slice(0, 500)}${stack.length > 500 ? '...' : ''}\`\`\`` },
        });
    }

    return blocks;
}

/**
 * Posts cycle outcomes to a Slack incoming webhook. Delivery problems are
 * logged and never fail the cycle.
 */
export class SlackNotifier {
    constructor(
        private readonly webhookUrl: string | undefined,
        private readonly fetchImpl: typeof fetch = fetch,
    ) {}

    get enabled(): boolean {
        return Boolean(this.webhookUrl);
    }

    async cycleCompleted(summary: CycleSummary): Promise<boolean> {
        return this.post(summaryBlocks(summary));
    }

    async cycleFailed(error: unknown, stage: string): Promise<boolean> {
        logger.error(`CRITICAL FAILURE [${stage}]: ${errorMessage(error)}`);
        return this.post(failureBlocks(error, stage));
    }

    private async post(blocks: SlackBlock[]): Promise<boolean> {
        if (!this.webhookUrl) {
            logger.debug('Slack notifications disabled - SLACK_WEBHOOK_URL not set');
            return false;
        }

        try {
            const response = await this.fetchImpl(this.webhookUrl, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ blocks }),
            });
            if (!response.ok) {
                logger.error(`Slack notification failed: HTTP ${response.status}`);
                return false;
            }
            return true;
        } catch (error) {
            logger.error('Failed to send Slack notification', { metadata: errorMessage(error) });
            return false;
        }
    }
}
