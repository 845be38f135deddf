/**
 * Rollback types.
 */
import type { VersionEntry } from '../ledger/index.js';


/**
 * Rollback states.
 *
 * `requested → validated → applied → logged`. A validation failure moves
 * `requested → rejected`; a later one moves `validated` or `applied` to
 * `failed`. `logged`, `rejected` and `failed` are terminal.
 */
export type RollbackState = 'requested' | 'validated' | 'applied' | 'logged' | 'rejected' | 'failed';

/**
 * A completed rollback.
 */
export interface RollbackOutcome {

    /** Entry that was rolled back */
    versionId: number;

    recordId: number;
    field: string;

    /** Canonical value the field holds afterwards */
    restored: string | null;

    /** New forward entry recording the rollback */
    inversion: VersionEntry;

    /** States passed through, in order */
    trace: RollbackState[];

}
