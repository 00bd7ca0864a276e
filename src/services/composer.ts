import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { Recipient, SendCategory } from '../types/index.js';
import { ConfigError, ValidationError, errorMessage } from '../utils/errors.js';

export const DEFAULT_TEMPLATES_PATH = fileURLToPath(new URL('../../templates/messages.json', import.meta.url));

const MessageTemplateSchema = z.object({
    subject: z.string().min(1),
    body: z.string().min(1),
});
export type MessageTemplate = z.infer<typeof MessageTemplateSchema>;

export const TemplateLibrarySchema = z.object({
    firstTouch: z.array(MessageTemplateSchema).min(1),
    followUps: z.array(MessageTemplateSchema).min(1),
    filler: z.object({
        addresses: z.array(z.string().email()),
        subjects: z.array(z.string().min(1)).min(1),
        body: z.string().min(1),
    }),
});
export type TemplateLibrary = z.infer<typeof TemplateLibrarySchema>;

export interface ComposedMessage {
    subject: string;
    body: string;
}

/**
 * (recipient, category, sequence?) → (subject, body). Called once per
 * candidate; retries reuse the result.
 */
export interface MessageComposer {
    compose(recipient: Recipient, category: SendCategory, sequence?: number): ComposedMessage;
}

export function loadTemplateLibrary(filePath: string = DEFAULT_TEMPLATES_PATH): TemplateLibrary {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new ConfigError(`Cannot read templates from ${filePath}: ${errorMessage(error)}`, [], { cause: error });
    }

    const parsed = TemplateLibrarySchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(
            `Invalid templates file ${filePath}`,
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        );
    }
    return parsed.data;
}

export function pick<T>(items: readonly T[], random: () => number): T {
    const item = items[Math.floor(random() * items.length)];
    if (item === undefined) {
        throw new Error('Cannot pick from an empty list');
    }
    return item;
}

/**
 * Industry first, else "City, State[, Country]" (country omitted for US).
 */
export function industryOrLocation(recipient: Recipient): string {
    const industry = recipient.industry.trim();
    if (industry) {
        return industry.toLowerCase();
    }

    const parts = [recipient.city, recipient.state].filter((part) => part.trim() !== '');
    if (recipient.country && recipient.country.toUpperCase() !== 'US') {
        parts.push(recipient.country);
    }
    return parts.length > 0 ? parts.join(', ') : 'your area';
}

export function placeholdersFor(recipient: Recipient): Record<string, string> {
    return {
        '{{Company Name}}': recipient.organization || 'your company',
        '{{First Name}}': recipient.first_name || 'there',
        '{{Last Name}}': recipient.last_name,
        '{{Title}}': recipient.title,
        '{{City}}': recipient.city,
        '{{State}}': recipient.state,
        '{{Country}}': recipient.country,
        '{{industry or location}}': industryOrLocation(recipient),
    };
}

export function personalize(template: MessageTemplate, recipient: Recipient): ComposedMessage {
    let { subject, body } = template;
    for (const [placeholder, value] of Object.entries(placeholdersFor(recipient))) {
        subject = subject.split(placeholder).join(value);
        body = body.split(placeholder).join(value);
    }
    return { subject, body };
}

export class TemplateComposer implements MessageComposer {
    constructor(
        private readonly library: TemplateLibrary,
        private readonly random: () => number = Math.random,
    ) {}

    compose(recipient: Recipient, category: SendCategory, sequence?: number): ComposedMessage {
        switch (category) {
            case 'first_touch':
                return personalize(pick(this.library.firstTouch, this.random), recipient);

            case 'follow_up': {
                if (sequence === undefined) {
                    throw new ValidationError(`Follow-up for ${recipient.email} has no sequence number`, recipient.email);
                }
                const template = this.library.followUps[sequence - 1] ?? pick(this.library.followUps, this.random);
                return personalize(template, recipient);
            }

            case 'filler':
                return {
                    subject: pick(this.library.filler.subjects, this.random),
                    body: this.library.filler.body,
                };
        }
    }
}
