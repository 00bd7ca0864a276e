import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { errorMessage } from '../../utils/errors.js';
import { formatAddress, type DeliveryResult, type MailTransport, type OutboundMessage } from './types.js';

export interface SmtpConfig {
    host: string;
    port: number;
    /** Implicit TLS (port 465); otherwise STARTTLS is negotiated */
    secure: boolean;
    auth: {
        user: string;
        pass: string;
    };
}

export class SmtpTransport implements MailTransport {
    readonly name = 'smtp';

    private transporter: Transporter;

    constructor(config: SmtpConfig) {
        this.transporter = nodemailer.createTransport({
            host: config.host,
            port: config.port,
            secure: config.secure,
            requireTLS: !config.secure,
            auth: {
                user: config.auth.user,
                pass: config.auth.pass,
            },
        });
    }

    async deliver(message: OutboundMessage): Promise<DeliveryResult> {
        try {
            const info = await this.transporter.sendMail({
                from: formatAddress(message.from),
                to: message.to,
                subject: message.subject,
                text: message.body,
                replyTo: message.replyTo,
            });

            return {
                success: true,
                messageId: info.messageId,
            };
        } catch (error) {
            return {
                success: false,
                error: `SMTP send failed: ${errorMessage(error)}`,
            };
        }
    }

    async verify(): Promise<void> {
        await this.transporter.verify();
    }
}
