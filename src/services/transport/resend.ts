import { Resend } from 'resend';
import { formatAddress, type DeliveryResult, type MailTransport, type OutboundMessage } from './types.js';

/**
 * Single-attempt delivery through the Resend API, plain-text body.
 */
export class ResendTransport implements MailTransport {
    readonly name = 'resend';
    private resend: Resend;

    constructor(apiKey: string) {
        this.resend = new Resend(apiKey);
    }

    async deliver(message: OutboundMessage): Promise<DeliveryResult> {
        const { data, error } = await this.resend.emails.send({
            from: formatAddress(message.from),
            to: [message.to],
            subject: message.subject,
            text: message.body,
            replyTo: message.replyTo,
        });

        if (error) {
            return { success: false, error: `${error.name}: ${error.message}` };
        }

        return {
            success: true,
            messageId: data?.id,
        };
    }
}
