/**
 * Table types for tabledrift's own bookkeeping tables.
 *
 * The managed table itself has no static type: its columns are read at
 * call time. The lock table has a fixed name and is queried through the
 * Kysely builder; the ledger's name is configurable, so its rows are
 * typed here and queried with `sql` templates.
 */
// ─────────────────────────────────────────────────────────────
// Table Names
// ─────────────────────────────────────────────────────────────

/**
 * Fixed bookkeeping table names.
 *
 * @example
 * ```typescript
 * await db.selectFrom(TABLEDRIFT_TABLES.lock).selectAll().execute()
 * ```
 */
export const TABLEDRIFT_TABLES = Object.freeze({
    /** Single-writer lock table */
    lock: '__tabledrift_lock__' as const,
});

/**
 * Suffix appended to the managed table's name for its default ledger.
 */
export const LEDGER_TABLE_SUFFIX = '_field_versions';

// ─────────────────────────────────────────────────────────────
// Ledger
// ─────────────────────────────────────────────────────────────

/**
 * Physical ledger row.
 *
 * Column names and order are a compatibility contract for external
 * reporting tools and must not change.
 */
export interface LedgerRow {
    /** Monotonic surrogate key */
    id: number;

    /** Primary key of the changed record */
    record_id: number;

    /** Column name at the time of the change */
    field_name: string;

    /** Canonical string form before the change (null = no value) */
    old_value: string | null;

    /** Canonical string form after the change (null = no value) */
    new_value: string | null;

    /** ISO 8601 timestamp */
    changed_at: string;

    /** Actor that made the change */
    changed_by: string;
}

// ─────────────────────────────────────────────────────────────
// __tabledrift_lock__
// ─────────────────────────────────────────────────────────────

/**
 * Writer lock table.
 *
 * At most one row per managed table; the primary key makes a second
 * writer's insert conflict. Timestamps are ISO strings.
 */
export interface TableDriftLockTable {
    table_name: string;
    locked_by: string;
    locked_at: string;
    expires_at: string;
    reason: string | null;
}


// ─────────────────────────────────────────────────────────────
// Database Interface
// ─────────────────────────────────────────────────────────────

/**
 * Fixed bookkeeping tables, for `Kysely<TableDriftDatabase>`.
 */
export type TableDriftDatabase = {
    __tabledrift_lock__: TableDriftLockTable;
};
