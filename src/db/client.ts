import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export const LEDGER_TABLE = 'send_ledger';

export interface SupabaseSettings {
    url: string;
    serviceRoleKey: string;
    /** In-process stand-in for tests */
    fetch?: typeof fetch;
}

// Service role client for backend operations; no user session involved
export function createLedgerClient(settings: SupabaseSettings): SupabaseClient {
    return createClient(settings.url, settings.serviceRoleKey, {
        auth: {
            autoRefreshToken: false,
            persistSession: false,
        },
        global: settings.fetch ? { fetch: settings.fetch } : undefined,
    });
}

// Helper to check connection
export async function checkConnection(client: SupabaseClient): Promise<boolean> {
    try {
        const { error } = await client.from(LEDGER_TABLE).select('id').limit(1);
        return !error;
    } catch {
        return false;
    }
}
