/**
 * Ledger Core - NFT listing/offer ledger and proceeds settlement
 *
 * Shared by the core API, the operator scripts and the test suite.
 */

// Types & errors
export * from './types/index';
export * from './errors';
export * from './ports';

// Ledgers & settlement
export * from './marketplace';
export * from './ledger/listingLedger';
export * from './ledger/offerLedger';
export * from './settlement/engine';
export * from './settlement/shares';
export * from './settlement/authorization';

// Concurrency & events
export * from './guard/reentrancyGuard';
export * from './events/eventBus';

// Hosts
export * from './memory/inMemoryHost';
export * from './db/pgHost';
export * from './db/migrate';
export { query, transaction, closePool, getPool, type SqlClient } from './db/client';

// Config & bootstrap
export * from './config/env';
export * from './bootstrap';

// Utils
export * from './utils/logger';
