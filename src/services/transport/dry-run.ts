import { randomUUID } from 'crypto';
import { logger } from '../../utils/logger.js';
import type { DeliveryResult, MailTransport, OutboundMessage } from './types.js';

/**
 * Accepts every message without sending it. Cycles still pace and record
 * outcomes exactly as they would against a real transport.
 */
export class DryRunTransport implements MailTransport {
    readonly name = 'dry-run';

    async deliver(message: OutboundMessage): Promise<DeliveryResult> {
        logger.info(`[dry-run] ${message.to}: ${message.subject}`);
        return { success: true, messageId: `dry-run-${randomUUID()}` };
    }
}
