/**
 * Lock manager tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Kysely } from 'kysely'

import {
    ensureLockTable,
    LockManager,
    LockAcquireError,
    LockNotFoundError,
    LockOwnershipError,
} from '../../../src/core/lock/index.js'
import { TABLEDRIFT_TABLES, type TableDriftDatabase } from '../../../src/core/shared/index.js'
import { observer } from '../../../src/core/observer.js'
import { createTestDb } from '../../utils/db.js'


function sleep(ms: number): Promise<void> {

    return new Promise(resolve => setTimeout(resolve, ms))
}


describe('lock: manager', () => {

    let db: Kysely<unknown>
    let locks: LockManager

    async function lockRow(table: string) {

        return db
            .withTables<TableDriftDatabase>()
            .selectFrom(TABLEDRIFT_TABLES.lock)
            .selectAll()
            .where('table_name', '=', table)
            .executeTakeFirst()
    }

    beforeEach(async () => {

        db = createTestDb()
        locks = new LockManager()
        await ensureLockTable(db)
    })

    afterEach(async () => {

        await db.destroy()
    })

    describe('acquire', () => {

        it('should take a free lock', async () => {

            const lock = await locks.acquire(db, 'product', 'alice')

            expect(lock.table).toBe('product')
            expect(lock.lockedBy).toBe('alice')
            expect(lock.reason).toBeUndefined()
            expect(lock.expiresAt.getTime() - lock.lockedAt.getTime()).toBe(300_000)
        })

        it('should store the reason', async () => {

            await locks.acquire(db, 'product', 'alice', { reason: 'drop column stock' })

            const row = await lockRow('product')

            expect(row?.locked_by).toBe('alice')
            expect(row?.reason).toBe('drop column stock')
        })

        it('should use a custom timeout', async () => {

            const lock = await locks.acquire(db, 'product', 'alice', { timeout: 60_000 })

            expect(lock.expiresAt.getTime() - lock.lockedAt.getTime()).toBe(60_000)
        })

        it('should refuse a second actor', async () => {

            await locks.acquire(db, 'product', 'alice')

            await expect(locks.acquire(db, 'product', 'bob')).rejects.toThrow(LockAcquireError)
            expect((await lockRow('product'))?.locked_by).toBe('alice')
        })

        it('should emit lock:blocked for a refused actor', async () => {

            const blocked: unknown[] = []
            const cleanup = observer.on('lock:blocked', (data) => blocked.push(data.holder))

            await locks.acquire(db, 'product', 'alice')
            await expect(locks.acquire(db, 'product', 'bob')).rejects.toThrow(LockAcquireError)
            cleanup()

            expect(blocked).toEqual(['alice'])
        })

        it('should extend the lock when the holder takes it again', async () => {

            const first = await locks.acquire(db, 'product', 'alice', { reason: 'add column' })
            await sleep(20)
            const second = await locks.acquire(db, 'product', 'alice')

            expect(second.expiresAt.getTime()).toBeGreaterThan(first.expiresAt.getTime())
            expect(second.lockedAt).toEqual(first.lockedAt)
            expect(second.reason).toBe('add column')
        })

        it('should take over an expired lock', async () => {

            const expired: unknown[] = []
            const cleanup = observer.on('lock:expired', (data) => expired.push(data))

            await locks.acquire(db, 'product', 'alice', { timeout: 1 })
            await sleep(20)

            const lock = await locks.acquire(db, 'product', 'bob')
            cleanup()

            expect(lock.lockedBy).toBe('bob')
            expect(expired).toEqual([{ table: 'product', previousHolder: 'alice' }])
        })

        it('should keep tables apart', async () => {

            const a = await locks.acquire(db, 'product', 'alice')
            const b = await locks.acquire(db, 'supplier', 'bob')

            expect(a.lockedBy).toBe('alice')
            expect(b.lockedBy).toBe('bob')
        })
    })

    describe('acquire with wait', () => {

        it('should wait until the lock expires', async () => {

            await locks.acquire(db, 'product', 'alice', { timeout: 100 })

            const lock = await locks.acquire(db, 'product', 'bob', {
                wait: true,
                waitTimeout: 5000,
                pollInterval: 25,
            })

            expect(lock.lockedBy).toBe('bob')
        })

        it('should give up after waitTimeout', async () => {

            await locks.acquire(db, 'product', 'alice', { timeout: 60_000 })

            await expect(locks.acquire(db, 'product', 'bob', {
                wait: true,
                waitTimeout: 60,
                pollInterval: 20,
            })).rejects.toThrow(LockAcquireError)
        })
    })

    describe('release', () => {

        it('should release a held lock', async () => {

            await locks.acquire(db, 'product', 'alice')
            await locks.release(db, 'product', 'alice')

            expect(await lockRow('product')).toBeUndefined()
        })

        it('should throw LockNotFoundError when nothing is held', async () => {

            await expect(locks.release(db, 'product', 'alice')).rejects.toThrow(LockNotFoundError)
        })

        it('should throw LockOwnershipError for another holder', async () => {

            await locks.acquire(db, 'product', 'alice')

            await expect(locks.release(db, 'product', 'bob')).rejects.toThrow(LockOwnershipError)
            expect((await lockRow('product'))?.locked_by).toBe('alice')
        })
    })

    describe('forceRelease', () => {

        it('should release regardless of holder', async () => {

            const released: unknown[] = []
            const cleanup = observer.on('lock:released', (data) => released.push(data))

            await locks.acquire(db, 'product', 'alice')

            expect(await locks.forceRelease(db, 'product')).toBe(true)
            cleanup()

            expect(await lockRow('product')).toBeUndefined()
            expect(released).toEqual([{ table: 'product', actor: 'alice', forced: true }])
        })

        it('should return false when nothing is held', async () => {

            expect(await locks.forceRelease(db, 'product')).toBe(false)
        })
    })

    describe('withLock', () => {

        it('should hold the lock during the operation and release it after', async () => {

            const holder = await locks.withLock(db, 'product', 'alice', async () => {

                const row = await lockRow('product')
                return row?.locked_by
            })

            expect(holder).toBe('alice')
            expect(await lockRow('product')).toBeUndefined()
        })

        it('should release the lock when the operation throws', async () => {

            await expect(locks.withLock(db, 'product', 'alice', async () => {

                throw new Error('rebuild failed')
            })).rejects.toThrow('rebuild failed')

            expect(await lockRow('product')).toBeUndefined()
        })

        it('should report a failed release without masking the result', async () => {

            const errors: string[] = []
            const cleanup = observer.on('error', (data) => errors.push(data.error.name))

            const result = await locks.withLock(db, 'product', 'alice', async () => {

                await locks.forceRelease(db, 'product')
                return 'done'
            })
            cleanup()

            expect(result).toBe('done')
            expect(errors).toEqual(['LockNotFoundError'])
        })
    })

    describe('status', () => {

        it('should report an unlocked table', async () => {

            expect(await locks.status(db, 'product')).toEqual({ isLocked: false, lock: null })
        })

        it('should report the holder', async () => {

            await locks.acquire(db, 'product', 'alice', { reason: 'modify column' })

            const status = await locks.status(db, 'product')

            expect(status.isLocked).toBe(true)
            expect(status.lock?.lockedBy).toBe('alice')
            expect(status.lock?.reason).toBe('modify column')
        })
    })
})
