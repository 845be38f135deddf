/**
 * Lock errors.
 */
import type { Lock } from './types.js'


/**
 * Another writer holds the table's lock.
 *
 * Raised at once when waiting is off, or when the wait ran out.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => locks.acquire(db, 'product', 'alice'))
 * if (err instanceof LockAcquireError) {
 *     console.log(`${err.holder} holds it until ${err.lock.expiresAt}`)
 * }
 * ```
 */
export class LockAcquireError extends Error {

    override readonly name = 'LockAcquireError' as const

    readonly table: string
    readonly holder: string

    constructor(public readonly lock: Lock) {

        const why = lock.reason ? ` for "${lock.reason}"` : ''

        super(`${lock.table} is locked by ${lock.lockedBy}${why} until ${lock.expiresAt.toISOString()}`)

        this.table = lock.table
        this.holder = lock.lockedBy
    }
}


/**
 * Release of a lock that isn't held.
 */
export class LockNotFoundError extends Error {

    override readonly name = 'LockNotFoundError' as const

    constructor(
        public readonly table: string,
        public readonly actor: string,
    ) {

        super(`${actor} holds no lock on ${table}`)
    }
}


/**
 * Release of a lock someone else holds.
 */
export class LockOwnershipError extends Error {

    override readonly name = 'LockOwnershipError' as const

    constructor(
        public readonly table: string,
        public readonly actor: string,
        public readonly holder: string,
    ) {

        super(`${actor} cannot release the lock on ${table}: it belongs to ${holder}`)
    }
}
