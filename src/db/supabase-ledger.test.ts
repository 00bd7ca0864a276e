import { describe, expect, it } from 'vitest';
import { makeEntry } from '../tests/fakes.js';
import { LedgerIOError } from '../utils/errors.js';
import { checkConnection, createLedgerClient } from './client.js';
import { collectEntries } from './ledger.js';
import { SupabaseLedger } from './supabase-ledger.js';

type Row = Record<string, unknown>;

interface RecordedRequest {
    method: string;
    url: URL;
}

/**
 * Minimal in-process PostgREST for the send_ledger table: insert, order,
 * offset and limit.
 */
function fakePostgrest(initial: Row[] = [], failWith?: { status: number; message: string }) {
    const rows: Row[] = initial.map((row, index) => ({ id: index + 1, ...row }));
    const requests: RecordedRequest[] = [];

    const fetchImpl: typeof fetch = async (input, init) => {
        const url = new URL(input instanceof Request ? input.url : input.toString());
        const method = init?.method ?? 'GET';
        requests.push({ method, url });

        if (failWith) {
            return new Response(JSON.stringify({ message: failWith.message, code: 'XX000' }), {
                status: failWith.status,
                headers: { 'Content-Type': 'application/json' },
            });
        }

        if (method === 'POST') {
            const body: unknown = JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
            rows.push({ ...(typeof body === 'object' && body !== null ? body : {}), id: rows.length + 1 });
            return new Response(null, { status: 201 });
        }

        const ordered = url.searchParams.get('order') === 'id.desc' ? [...rows].reverse() : rows;
        const offset = Number(url.searchParams.get('offset') ?? 0);
        const limit = Number(url.searchParams.get('limit') ?? ordered.length);
        return new Response(JSON.stringify(ordered.slice(offset, offset + limit)), {
            status: 200,
            headers: { 'Content-Type': 'application/json' },
        });
    };

    const client = createLedgerClient({ url: 'http://ledger.test', serviceRoleKey: 'test-secret', fetch: fetchImpl });
    return { client, rows, requests };
}

describe('SupabaseLedger', () => {
    it('scans page by page in insertion order', async () => {
        const stored = [
            makeEntry({ timestamp: '2024-03-11T09:00:00.000Z', recipient_key: 'one@example.com' }),
            makeEntry({ timestamp: '2024-03-11T09:01:00.000Z', recipient_key: 'two@example.com' }),
            makeEntry({ timestamp: '2024-03-11T09:02:00.000Z', recipient_key: 'three@example.com' }),
        ];
        const { client, requests } = fakePostgrest(stored);

        const entries = await collectEntries(new SupabaseLedger(client, 2));

        expect(entries).toEqual(stored);
        expect(requests.map((request) => request.url.searchParams.get('offset'))).toEqual(['0', '2']);
        expect(requests.every((request) => request.url.pathname === '/rest/v1/send_ledger')).toBe(true);
    });

    it('inserts entries, clamping against the latest stored timestamp', async () => {
        const { client, rows } = fakePostgrest([makeEntry({ timestamp: '2024-03-11T10:00:00.000Z' })]);
        const ledger = new SupabaseLedger(client);

        const result = await ledger.append(makeEntry({ timestamp: '2024-03-11T09:30:00.000Z', recipient_key: 'grace@example.com' }));

        expect(result.timestamp).toBe('2024-03-11T10:00:00.000Z');
        expect(rows[1]).toMatchObject({ id: 2, recipient_key: 'grace@example.com', timestamp: '2024-03-11T10:00:00.000Z' });
    });

    it('rejects rows that do not match the entry schema', async () => {
        const { client } = fakePostgrest([{ timestamp: 'yesterday', recipient_key: 'x@example.com' }]);

        await expect(collectEntries(new SupabaseLedger(client))).rejects.toBeInstanceOf(LedgerIOError);
    });

    it('turns API errors into ledger errors', async () => {
        const { client } = fakePostgrest([], { status: 500, message: 'database unavailable' });

        await expect(collectEntries(new SupabaseLedger(client))).rejects.toThrow(
            'Supabase scan of send_ledger failed: database unavailable (XX000)',
        );
        await expect(new SupabaseLedger(client).append(makeEntry())).rejects.toBeInstanceOf(LedgerIOError);
        expect(await checkConnection(client)).toBe(false);
    });

    it('reports a reachable table', async () => {
        const { client } = fakePostgrest();
        expect(await checkConnection(client)).toBe(true);
    });
});
