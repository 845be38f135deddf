/**
 * Connection configuration types.
 */
import type { Kysely } from 'kysely';

/**
 * Database connection configuration.
 *
 * @example
 * ```typescript
 * const fileConfig: ConnectionConfig = { database: './inventory.db' }
 * const memoryConfig: ConnectionConfig = { database: ':memory:' }
 * ```
 */
export interface ConnectionConfig {

    /** Database file path, or ':memory:' */
    database: string;

    /** Milliseconds SQLite waits on a locked database before failing (default: 5000) */
    busyTimeout?: number;

    /** Open the database read-only */
    readonly?: boolean;
}

/**
 * Result of creating a connection.
 */
export interface ConnectionResult {
    db: Kysely<unknown>;
    database: string;
    destroy: () => Promise<void>;
}
