import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { makeRecipient } from '../tests/fakes.js';
import { fillerRecipient } from '../types/index.js';
import { ConfigError, ValidationError } from '../utils/errors.js';
import { industryOrLocation, loadTemplateLibrary, personalize, TemplateComposer } from './composer.js';

const library = loadTemplateLibrary();

describe('industryOrLocation', () => {
    it('prefers the industry, lower-cased', () => {
        expect(industryOrLocation(makeRecipient({ industry: 'Health Care' }))).toBe('health care');
    });

    it('falls back to city and state, leaving out the US', () => {
        expect(industryOrLocation(makeRecipient({ industry: '', city: 'Austin', state: 'TX', country: 'US' }))).toBe('Austin, TX');
        expect(industryOrLocation(makeRecipient({ industry: '', city: 'Toronto', state: 'ON', country: 'Canada' }))).toBe(
            'Toronto, ON, Canada',
        );
    });

    it('uses a generic phrase when nothing is known', () => {
        expect(industryOrLocation(makeRecipient({ industry: '', city: '', state: '', country: '' }))).toBe('your area');
    });
});

describe('personalize', () => {
    it('replaces every occurrence of each placeholder', () => {
        const message = personalize(
            { subject: '{{First Name}} at {{Company Name}}', body: '{{Company Name}} / {{Company Name}} / {{Title}}' },
            makeRecipient(),
        );

        expect(message).toEqual({
            subject: 'Ada at Analytical Engines',
            body: 'Analytical Engines / Analytical Engines / Founder',
        });
    });

    it('falls back for missing name and company', () => {
        const message = personalize({ subject: 'Hi {{First Name}}', body: 'About {{Company Name}}' }, fillerRecipient('x@example.com'));
        expect(message).toEqual({ subject: 'Hi there', body: 'About your company' });
    });
});

describe('TemplateComposer', () => {
    it('picks a first-touch template at random', () => {
        const composer = new TemplateComposer(library, () => 0.5);
        expect(composer.compose(makeRecipient(), 'first_touch').subject).toBe('Ada, an idea for Analytical Engines');
    });

    it('selects the follow-up template by sequence number', () => {
        const composer = new TemplateComposer(library, () => 0.99);
        expect(composer.compose(makeRecipient(), 'follow_up', 2).subject).toBe('Analytical Engines: three places to start');
    });

    it('picks at random past the last follow-up template', () => {
        const composer = new TemplateComposer(library, () => 0);
        expect(composer.compose(makeRecipient(), 'follow_up', 7).subject).toBe('Re: Quick question about Analytical Engines');
    });

    it('rejects a follow-up without a sequence number', () => {
        const composer = new TemplateComposer(library, () => 0);
        expect(() => composer.compose(makeRecipient(), 'follow_up')).toThrow(ValidationError);
    });

    it('composes filler traffic from the filler subjects and body', () => {
        const composer = new TemplateComposer(library, () => 0.3);
        const message = composer.compose(fillerRecipient('seed-one@example.com'), 'filler');

        expect(message.subject).toBe('Connection Check');
        expect(message.body).toBe(library.filler.body);
    });
});

describe('loadTemplateLibrary', () => {
    it('rejects a file without first-touch templates', async () => {
        const dir = await mkdtemp(path.join(tmpdir(), 'templates-'));
        const file = path.join(dir, 'messages.json');
        await writeFile(file, JSON.stringify({ ...library, firstTouch: [] }));

        try {
            expect(() => loadTemplateLibrary(file)).toThrow(ConfigError);
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });

    it('reports an unreadable file as a configuration problem', () => {
        expect(() => loadTemplateLibrary('/nonexistent/messages.json')).toThrow('Cannot read templates from /nonexistent/messages.json');
    });
});
