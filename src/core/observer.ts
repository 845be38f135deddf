/**
 * Central event system for tabledrift.
 *
 * Core modules emit events, the logger and CLI subscribe. Business logic
 * never writes output directly.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('schema:column:added', { table, column, type })
 *
 * // In CLI - subscribe to events
 * const cleanup = observer.on('record:updated', (data) => render(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^rollback:/, ({ event, data }) => audit(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'


/**
 * All events emitted by tabledrift core modules.
 *
 * Events are namespaced by module:
 * - `schema:*` - Column mutations, rebuilds, raw statements
 * - `record:*` - Record writes
 * - `ledger:*` - Version entries appended
 * - `rollback:*` - Rollback state transitions
 * - `lock:*` - Writer lock acquisition/release
 * - `config:*` - Settings resolution
 * - `connection:*` - Database connections
 * - `error` - Catch-all errors
 */
export interface TableDriftEvents {

    // Schema
    'schema:bootstrap': { table: string; created: boolean; columns: string[] }
    'schema:column:added': { table: string; column: string; type: string }
    'schema:column:dropped': { table: string; column: string }
    'schema:column:modified': { table: string; from: string; to: string; type: string }
    'schema:rebuild:start': { table: string; shadow: string; columns: string[] }
    'schema:rebuild:complete': { table: string; copied: string[]; durationMs: number }
    'schema:rebuild:failed': { table: string; step: string; error: string }
    'schema:raw:before': { table: string; statement: string }
    'schema:raw:after': { table: string; statement: string; success: boolean; durationMs: number; error?: string }

    // Records
    'record:created': { table: string; id: number; fields: string[] }
    'record:updated': { table: string; id: number; changed: string[] }
    'record:deleted': { table: string; id: number }

    // Ledger
    'ledger:appended': { table: string; recordId: number; count: number; actor: string }

    // Rollback
    'rollback:validated': { versionId: number; recordId: number; field: string }
    'rollback:applied': { versionId: number; recordId: number; field: string }
    'rollback:logged': { versionId: number; inversionId: number }
    'rollback:rejected': { versionId: number; reason: string }
    'rollback:failed': { versionId: number; reason: string }

    // Lock
    'lock:acquiring': { table: string; actor: string }
    'lock:acquired': { table: string; actor: string; expiresAt: Date }
    'lock:released': { table: string; actor: string; forced: boolean }
    'lock:blocked': { table: string; holder: string; heldSince: Date }
    'lock:expired': { table: string; previousHolder: string }

    // Config
    'config:loaded': { path: string; fromFile: boolean }

    // Connection
    'connection:open': { database: string }
    'connection:close': { database: string }
    'connection:error': { database: string; error: string }

    // Logger lifecycle
    'logger:started': { file: string | null; level: string }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type TableDriftEventNames = Events<TableDriftEvents>;
export type TableDriftEventCallback<E extends TableDriftEventNames> = ObserverEngine.EventCallback<TableDriftEvents[E]>

/**
 * Global observer instance for tabledrift.
 *
 * Enable debug mode with `TABLEDRIFT_DEBUG=1` to see all events as they occur.
 */
export const observer = new ObserverEngine<TableDriftEvents>({
    name: 'tabledrift',
    spy: process.env['TABLEDRIFT_DEBUG']
        ? (action) => console.error(`[tabledrift:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
