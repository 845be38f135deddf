/**
 * SQLite dialect adapter.
 *
 * Uses better-sqlite3 for synchronous, fast SQLite access.
 */
import { Kysely, SqliteDialect } from 'kysely'
import Database from 'better-sqlite3'
import type { ConnectionConfig, ConnectionResult } from '../types.js'


export const DEFAULT_BUSY_TIMEOUT = 5000


/**
 * Create a SQLite connection.
 *
 * @example
 * ```typescript
 * // In-memory database
 * const conn = createSqliteConnection({ database: ':memory:' })
 *
 * // File-based database
 * const conn = createSqliteConnection({ database: './inventory.db' })
 * ```
 */
export function createSqliteConnection(config: ConnectionConfig): ConnectionResult {

    const database = new Database(config.database, {
        readonly: config.readonly ?? false,
        timeout: config.busyTimeout ?? DEFAULT_BUSY_TIMEOUT,
    })

    const db = new Kysely<unknown>({
        dialect: new SqliteDialect({ database }),
    })

    return {
        db,
        database: config.database,
        destroy: () => db.destroy(),
    }
}
