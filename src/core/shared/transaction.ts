/**
 * Transaction helper.
 *
 * Every externally visible operation runs as one transaction. Components
 * call `inTransaction()` so that they open one when called on a plain
 * connection and join the caller's when already inside one.
 */
import type { Kysely } from 'kysely';


/**
 * Run a function inside a transaction.
 *
 * Reuses `db` when it already is a transaction; Kysely does not nest them.
 * Inside `fn`, only the handle it receives may be used: the SQLite driver
 * has a single connection, so querying the outer handle would wait forever.
 *
 * @example
 * ```typescript
 * await inTransaction(db, async (trx) => {
 *     await accessor.update(trx, id, values, actor)
 *     await ledger.record(trx, id, diffs, actor)
 * })
 * ```
 */
export async function inTransaction<DB, T>(
    db: Kysely<DB>,
    fn: (trx: Kysely<DB>) => Promise<T>,
): Promise<T> {

    if (db.isTransaction) {

        return fn(db);

    }

    return db.transaction().execute(fn);

}
