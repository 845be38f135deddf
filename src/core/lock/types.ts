/**
 * Lock types.
 */


/**
 * A held lock on one managed table.
 */
export interface Lock {
    table: string;
    lockedBy: string;
    lockedAt: Date;

    /** The lock lapses after this; the next writer clears it */
    expiresAt: Date;

    reason?: string;
}

/**
 * How to take a lock.
 *
 * Durations are in milliseconds.
 */
export interface LockOptions {
    /** How long the lock lasts (default 5 minutes) */
    timeout?: number;

    /** Poll while another writer holds it, instead of failing at once */
    wait?: boolean;

    /** Give up waiting after this long (default 30 seconds) */
    waitTimeout?: number;

    /** Delay between polls (default 250ms) */
    pollInterval?: number;

    /** Stored with the lock and shown to blocked writers */
    reason?: string;
}

export interface LockStatus {
    isLocked: boolean;
    lock: Lock | null;
}

export const DEFAULT_LOCK_OPTIONS = {
    timeout: 300_000,
    wait: false,
    waitTimeout: 30_000,
    pollInterval: 250,
} as const satisfies Required<Omit<LockOptions, 'reason'>>;
