import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { RecipientSchema, type Recipient } from '../types/index.js';
import { ConfigError, ValidationError, errorMessage } from '../utils/errors.js';

export interface RecipientBatch {
    recipients: Recipient[];
    rejected: ValidationError[];
}

/**
 * Yields validated recipients: unique, non-empty email keys plus name and
 * organization. Anything else comes back in `rejected`.
 */
export interface RecipientSource {
    readonly description: string;
    load(): Promise<RecipientBatch>;
}

// Export column → recipient field
export const COLUMN_MAP = {
    'First Name': 'first_name',
    'Last Name': 'last_name',
    'Email': 'email',
    'Company': 'organization',
    'Title': 'title',
    'City': 'city',
    'State': 'state',
    'Country': 'country',
    'Website': 'website',
    'Industry': 'industry',
} as const satisfies Record<string, keyof Recipient>;

export const REQUIRED_COLUMNS = ['First Name', 'Last Name', 'Email', 'Company', 'Title', 'City', 'State', 'Country'] as const;

const CsvRowsSchema = z.array(z.array(z.string()));

function describeIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`);
}

/**
 * Parse a contacts export. Missing required columns fail the whole file;
 * bad rows are rejected one by one.
 */
export function parseRecipientsCsv(content: string, sourceName = 'csv'): RecipientBatch {
    let parsed: unknown;
    try {
        parsed = parse(content, {
            bom: true,
            skip_empty_lines: true,
            trim: true,
            relax_column_count: true,
        });
    } catch (error) {
        throw new ConfigError(`Cannot parse recipients from ${sourceName}: ${errorMessage(error)}`, [], { cause: error });
    }

    const rows = CsvRowsSchema.parse(parsed);
    const [header, ...records] = rows;
    if (!header) {
        throw new ConfigError(`Recipients file ${sourceName} is empty`);
    }

    const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
    if (missing.length > 0) {
        throw new ConfigError(
            `Missing required columns in ${sourceName}: ${missing.join(', ')}. Available columns: ${header.join(', ') || 'none'}`,
            missing.map((column) => `missing column: ${column}`),
        );
    }

    const recipients: Recipient[] = [];
    const rejected: ValidationError[] = [];
    const seen = new Set<string>();

    records.forEach((cells, index) => {
        const recordRef = `${sourceName} record ${index + 1}`;
        const record: Record<string, string> = {};
        for (const [column, field] of Object.entries(COLUMN_MAP)) {
            const position = header.indexOf(column);
            record[field] = position >= 0 ? cells[position] ?? '' : '';
        }

        const result = RecipientSchema.safeParse(record);
        if (!result.success) {
            const issues = describeIssues(result.error);
            rejected.push(new ValidationError(`${recordRef}: ${issues.join('; ')}`, recordRef, issues));
            return;
        }

        if (seen.has(result.data.email)) {
            rejected.push(new ValidationError(`${recordRef}: duplicate email ${result.data.email}`, recordRef));
            return;
        }

        seen.add(result.data.email);
        recipients.push(result.data);
    });

    return { recipients, rejected };
}

export class CsvRecipientSource implements RecipientSource {
    constructor(readonly filePath: string) {}

    get description(): string {
        return `csv:${this.filePath}`;
    }

    async load(): Promise<RecipientBatch> {
        let content: string;
        try {
            content = await readFile(this.filePath, 'utf-8');
        } catch (error) {
            throw new ConfigError(`Cannot read recipients file ${this.filePath}: ${errorMessage(error)}`, [], { cause: error });
        }
        return parseRecipientsCsv(content, this.filePath);
    }
}
