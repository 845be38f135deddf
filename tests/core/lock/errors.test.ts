/**
 * Lock error tests.
 */
import { describe, it, expect } from 'vitest'
import {
    LockAcquireError,
    LockNotFoundError,
    LockOwnershipError,
    type Lock,
} from '../../../src/core/lock/index.js'


describe('lock: errors', () => {

    describe('LockAcquireError', () => {

        const lock: Lock = {
            table: 'product',
            lockedBy: 'alice',
            lockedAt: new Date('2024-01-01T00:00:00Z'),
            expiresAt: new Date('2024-01-01T00:05:00Z'),
        }

        it('should expose the held lock', () => {

            const error = new LockAcquireError(lock)

            expect(error.name).toBe('LockAcquireError')
            expect(error.table).toBe('product')
            expect(error.holder).toBe('alice')
            expect(error.lock).toBe(lock)
        })

        it('should name the holder and expiry', () => {

            expect(new LockAcquireError(lock).message)
                .toBe('product is locked by alice until 2024-01-01T00:05:00.000Z')
        })

        it('should include the reason when there is one', () => {

            expect(new LockAcquireError({ ...lock, reason: 'drop column stock' }).message)
                .toBe('product is locked by alice for "drop column stock" until 2024-01-01T00:05:00.000Z')
        })
    })

    describe('LockNotFoundError', () => {

        it('should name the table and actor', () => {

            const error = new LockNotFoundError('product', 'alice')

            expect(error.name).toBe('LockNotFoundError')
            expect(error.message).toBe('alice holds no lock on product')
        })
    })

    describe('LockOwnershipError', () => {

        it('should name both actors', () => {

            const error = new LockOwnershipError('product', 'bob', 'alice')

            expect(error.name).toBe('LockOwnershipError')
            expect(error.actor).toBe('bob')
            expect(error.holder).toBe('alice')
            expect(error.message).toBe('bob cannot release the lock on product: it belongs to alice')
        })
    })
})
