import { DryRunTransport } from './dry-run.js';
import { ResendTransport } from './resend.js';
import { SmtpTransport, type SmtpConfig } from './smtp.js';
import type { MailTransport } from './types.js';

export * from './types.js';
export { DryRunTransport } from './dry-run.js';
export { ResendTransport } from './resend.js';
export { SmtpTransport, type SmtpConfig } from './smtp.js';

export type TransportSettings =
    | { kind: 'dry-run' }
    | { kind: 'resend'; apiKey: string }
    | { kind: 'smtp'; smtp: SmtpConfig };

export function createTransport(settings: TransportSettings): MailTransport {
    switch (settings.kind) {
        case 'dry-run':
            return new DryRunTransport();
        case 'resend':
            return new ResendTransport(settings.apiKey);
        case 'smtp':
            return new SmtpTransport(settings.smtp);
    }
}
