/**
 * Connection factory with retry logic.
 *
 * Opens the SQLite database and retries while another writer holds it.
 */
import { sql } from 'kysely'
import { retry, attempt } from '@logosdx/utils'
import type { ConnectionConfig, ConnectionResult } from './types.js'
import { createSqliteConnection } from './dialects/sqlite.js'
import { observer } from '../observer.js'
import { toError } from '../shared/index.js'


/**
 * Whether an error is a transient busy/locked failure.
 */
export function isBusyError(err: Error): boolean {

    const msg = err.message.toLowerCase()

    return msg.includes('database is locked') ||
           msg.includes('sqlite_busy') ||
           msg.includes('database table is locked')
}


/**
 * Create a database connection with retry logic.
 *
 * Retries while the database is locked by another process. Does not
 * retry missing directories or corrupt files.
 *
 * @example
 * ```typescript
 * const conn = await createConnection({ database: './inventory.db' })
 *
 * await sql`SELECT 1`.execute(conn.db)
 * await conn.destroy()
 * ```
 */
export async function createConnection(config: ConnectionConfig): Promise<ConnectionResult> {

    try {

        const conn = await retry(
            async () => {

                const conn = createSqliteConnection(config)

                // Test connection with simple query
                const [, err] = await attempt(() => sql`SELECT 1`.execute(conn.db))

                if (err) {

                    await conn.destroy()
                    throw err
                }

                return conn
            },
            {
                retries: 3,
                delay: 250,
                backoff: 2,  // 250ms, 500ms, 1s
                jitterFactor: 0.1,
                shouldRetry: isBusyError,
            }
        )

        observer.emit('connection:open', { database: config.database })
        return conn
    }
    catch (err) {

        const error = toError(err)

        observer.emit('connection:error', { database: config.database, error: error.message })
        throw error
    }
}


/**
 * Test a connection config without keeping the connection open.
 *
 * @example
 * ```typescript
 * const result = await testConnection({ database: './inventory.db' })
 *
 * if (!result.ok) {
 *     console.error('Connection failed:', result.error)
 * }
 * ```
 */
export async function testConnection(config: ConnectionConfig): Promise<{ ok: boolean; error?: string }> {

    try {

        const conn = await createConnection(config)
        await conn.destroy()

        return { ok: true }
    }
    catch (err) {

        return { ok: false, error: toError(err).message }
    }
}
