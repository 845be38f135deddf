/**
 * Table lock manager.
 *
 * Schema mutations take a lock row in `__tabledrift_lock__`, keyed by the
 * managed table's name, for their whole duration. Taking the lock is a
 * single upsert: it inserts a fresh row, or extends the caller's own,
 * and returns nothing while another writer holds it.
 *
 * @example
 * ```typescript
 * const locks = new LockManager()
 *
 * await locks.withLock(db, 'product', 'alice', () => dropColumn(db, 'product', 'stock'))
 * ```
 */
import { attempt, wait } from '@logosdx/utils'
import type { Kysely } from 'kysely'

import { observer } from '../observer.js'
import { TABLEDRIFT_TABLES, type TableDriftDatabase, type TableDriftLockTable } from '../shared/index.js'
import { DEFAULT_LOCK_OPTIONS, type Lock, type LockOptions, type LockStatus } from './types.js'
import { LockAcquireError, LockNotFoundError, LockOwnershipError } from './errors.js'


type LockDb = Kysely<TableDriftDatabase>


/**
 * Create the lock table if missing.
 */
export async function ensureLockTable(db: Kysely<unknown>): Promise<void> {

    await db.schema
        .createTable(TABLEDRIFT_TABLES.lock)
        .ifNotExists()
        .addColumn('table_name', 'text', (col) => col.primaryKey())
        .addColumn('locked_by', 'text', (col) => col.notNull())
        .addColumn('locked_at', 'text', (col) => col.notNull())
        .addColumn('expires_at', 'text', (col) => col.notNull())
        .addColumn('reason', 'text')
        .execute()
}


function toLock(row: TableDriftLockTable): Lock {

    return {
        table: row.table_name,
        lockedBy: row.locked_by,
        lockedAt: new Date(row.locked_at),
        expiresAt: new Date(row.expires_at),
        ...(row.reason === null ? {} : { reason: row.reason }),
    }
}


export class LockManager {

    /**
     * Take the lock on a table.
     *
     * Taking a lock the actor already holds extends it.
     *
     * @throws LockAcquireError while another actor holds it
     */
    async acquire(
        db: Kysely<unknown>,
        table: string,
        actor: string,
        options: LockOptions = {},
    ): Promise<Lock> {

        const opts = { ...DEFAULT_LOCK_OPTIONS, ...options }
        const locks = db.withTables<TableDriftDatabase>()
        const deadline = Date.now() + opts.waitTimeout

        observer.emit('lock:acquiring', { table, actor })

        for (;;) {

            await this.#clearExpired(locks, table)

            const claimed = await this.#claim(locks, table, actor, opts.timeout, opts.reason)

            if (claimed) {

                observer.emit('lock:acquired', { table, actor, expiresAt: claimed.expiresAt })

                return claimed
            }

            const held = await this.#read(locks, table)

            // Released between the claim and the read
            if (!held) continue

            observer.emit('lock:blocked', {
                table,
                holder: held.lockedBy,
                heldSince: held.lockedAt,
            })

            if (!opts.wait || Date.now() >= deadline) {

                throw new LockAcquireError(held)
            }

            await wait(opts.pollInterval)
        }
    }

    /**
     * Give up a lock.
     *
     * @throws LockNotFoundError if the table isn't locked
     * @throws LockOwnershipError if another actor holds the lock
     */
    async release(db: Kysely<unknown>, table: string, actor: string): Promise<void> {

        const locks = db.withTables<TableDriftDatabase>()
        const held = await this.#read(locks, table)

        if (!held) {

            throw new LockNotFoundError(table, actor)
        }

        if (held.lockedBy !== actor) {

            throw new LockOwnershipError(table, actor, held.lockedBy)
        }

        await locks
            .deleteFrom(TABLEDRIFT_TABLES.lock)
            .where('table_name', '=', table)
            .where('locked_by', '=', actor)
            .execute()

        observer.emit('lock:released', { table, actor, forced: false })
    }

    /**
     * Drop the lock whoever holds it, e.g. one left by a crashed writer.
     *
     * @returns false if the table wasn't locked
     */
    async forceRelease(db: Kysely<unknown>, table: string): Promise<boolean> {

        const removed = await db
            .withTables<TableDriftDatabase>()
            .deleteFrom(TABLEDRIFT_TABLES.lock)
            .where('table_name', '=', table)
            .returning('locked_by')
            .executeTakeFirst()

        if (!removed) {

            return false
        }

        observer.emit('lock:released', { table, actor: removed.locked_by, forced: true })

        return true
    }

    /**
     * Run an operation under the table's lock.
     *
     * The lock is released whether or not the operation succeeds. A failed
     * release is reported as an `error` event; the operation's own result
     * or error is what the caller gets.
     */
    async withLock<T>(
        db: Kysely<unknown>,
        table: string,
        actor: string,
        operation: () => Promise<T>,
        options: LockOptions = {},
    ): Promise<T> {

        await this.acquire(db, table, actor, options)

        try {

            return await operation()
        }
        finally {

            const [, err] = await attempt(() => this.release(db, table, actor))

            if (err) {

                observer.emit('error', {
                    source: 'lock',
                    error: err,
                    context: { table, actor },
                })
            }
        }
    }

    async status(db: Kysely<unknown>, table: string): Promise<LockStatus> {

        const locks = db.withTables<TableDriftDatabase>()

        await this.#clearExpired(locks, table)

        const lock = await this.#read(locks, table)

        return { isLocked: lock !== null, lock }
    }

    // ─────────────────────────────────────────────────────────────
    // Rows
    // ─────────────────────────────────────────────────────────────

    async #read(locks: LockDb, table: string): Promise<Lock | null> {

        const row = await locks
            .selectFrom(TABLEDRIFT_TABLES.lock)
            .selectAll()
            .where('table_name', '=', table)
            .executeTakeFirst()

        return row ? toLock(row) : null
    }

    /**
     * Insert the lock, or extend it when the actor already holds it.
     *
     * Returns null when the row belongs to someone else: the conflict
     * update's WHERE fails and RETURNING yields nothing.
     */
    async #claim(
        locks: LockDb,
        table: string,
        actor: string,
        timeout: number,
        reason: string | undefined,
    ): Promise<Lock | null> {

        const now = new Date()
        const expiresAt = new Date(now.getTime() + timeout).toISOString()

        const row = await locks
            .insertInto(TABLEDRIFT_TABLES.lock)
            .values({
                table_name: table,
                locked_by: actor,
                locked_at: now.toISOString(),
                expires_at: expiresAt,
                reason: reason ?? null,
            })
            .onConflict((oc) => oc
                .column('table_name')
                .doUpdateSet(reason === undefined
                    ? { expires_at: expiresAt }
                    : { expires_at: expiresAt, reason })
                .where('locked_by', '=', actor))
            .returningAll()
            .executeTakeFirst()

        return row ? toLock(row) : null
    }

    async #clearExpired(locks: LockDb, table: string): Promise<void> {

        const expired = await locks
            .deleteFrom(TABLEDRIFT_TABLES.lock)
            .where('table_name', '=', table)
            .where('expires_at', '<', new Date().toISOString())
            .returning('locked_by')
            .executeTakeFirst()

        if (expired) {

            observer.emit('lock:expired', { table, previousHolder: expired.locked_by })
        }
    }
}
