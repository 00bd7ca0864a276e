export { type Ledger, FileLedger, clampTimestamp, collectEntries } from './ledger.js';
export { type CycleLock, LedgerLock } from './ledger-lock.js';
export { SupabaseLedger } from './supabase-ledger.js';
export { createLedgerClient, checkConnection, LEDGER_TABLE } from './client.js';
