/**
 * Lock module exports.
 *
 * Single-writer protection for schema changes.
 */

export type { Lock, LockOptions, LockStatus } from './types.js';

export {
    LockAcquireError,
    LockNotFoundError,
    LockOwnershipError,
} from './errors.js';

export { LockManager, ensureLockTable } from './manager.js';
