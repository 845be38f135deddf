/**
 * tabledrift SDK
 *
 * Programmatic access to a tabledrift-managed table.
 *
 * @example
 * ```typescript
 * import { createContext } from 'tabledrift/sdk'
 *
 * const ctx = await createContext({ settings: { database: './catalog.db' } })
 * await ctx.connect()
 *
 * const id = await ctx.createRecord({ name: 'Mug', price: '12.50' })
 * await ctx.updateRecord(id, { stock: 3 })
 *
 * const [latest] = await ctx.listVersions({ recordId: id, limit: 1 })
 * await ctx.rollback(latest.id)
 *
 * await ctx.disconnect()
 * ```
 */
import { resolveSettings } from '../core/config/index.js';

import { Context } from './context.js';
import type { CreateContextOptions } from './types.js';

// ─────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────

/**
 * Create an SDK context.
 *
 * Settings are resolved using the full priority chain:
 * defaults <- settings file <- env <- options.settings
 *
 * @returns Unconnected context (call connect() to use)
 * @throws ConfigValidationError if the resolved settings are invalid
 */
export async function createContext(options: CreateContextOptions = {}): Promise<Context> {

    const projectRoot = options.projectRoot ?? process.cwd();

    const settings = await resolveSettings({
        projectRoot,
        file: options.file,
        overrides: options.settings,
        env: options.env,
    });

    return new Context(settings, options, projectRoot);

}

// ─────────────────────────────────────────────────────────────
// Re-exports
// ─────────────────────────────────────────────────────────────

export { Context } from './context.js';

// Types
export type { CreateContextOptions, ExportedRecord } from './types.js';

// Guards (errors for catching)
export { RawStatementDeniedError, ProtectedTableError } from './guards.js';

// Re-export observer types for event subscriptions
export type { TableDriftEvents, TableDriftEventNames } from '../core/observer.js';

// Core errors
export { IdentifierInvalidError } from '../core/identifier/index.js';
export {
    ColumnNotFoundError,
    ColumnExistsError,
    PrimaryKeyImmutableError,
    TypeInvalidError,
    TypeCoercionError,
    MigrationFailureError,
} from '../core/schema/index.js';
export { RecordNotFoundError, TableNotReadyError } from '../core/record/index.js';
export { VersionNotFoundError, LedgerQueryError } from '../core/ledger/index.js';
export { FieldNoLongerExistsError } from '../core/rollback/index.js';
export { LockAcquireError, LockNotFoundError, LockOwnershipError } from '../core/lock/index.js';
export { ConfigValidationError } from '../core/config/index.js';

// Commonly needed types
export type { Settings, SettingsInput } from '../core/config/index.js';
export type {
    ColumnDescriptor,
    ColumnType,
    TableSchema,
    RebuildResult,
    RawStatementResult,
} from '../core/schema/index.js';
export type {
    DynamicRecord,
    FieldValue,
    FieldChange,
    WriteValues,
    ListRecordsOptions,
} from '../core/record/index.js';
export type { VersionEntry, ListVersionsOptions } from '../core/ledger/index.js';
export type { RollbackOutcome, RollbackState } from '../core/rollback/index.js';
export type { Lock, LockStatus } from '../core/lock/index.js';
