/**
 * Shared module exports.
 *
 * Cross-cutting concerns used by multiple core modules.
 * Table types and constants live here to avoid circular dependencies.
 */

// Tables
export {
    TABLEDRIFT_TABLES,
    LEDGER_TABLE_SUFFIX,
} from './tables.js'

export type {
    LedgerRow,
    TableDriftDatabase,
    TableDriftLockTable,
} from './tables.js'

// Transactions
export { inTransaction } from './transaction.js'

// Errors
export { toError } from './errors.js'
