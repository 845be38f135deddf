/**
 * Versioning ledger.
 *
 * Append-only store of field-level changes, one row per changed field.
 * The table name is configurable but its layout is fixed:
 *
 *     id, record_id, field_name, old_value, new_value, changed_at, changed_by
 *
 * External reporting reads it directly, so the layout must not change.
 *
 * @example
 * ```typescript
 * const ledger = new VersionLedger('product_field_versions')
 * await ledger.ensure(db)
 *
 * await ledger.record(db, 1, [{ field: 'name', oldValue: 'Mug', newValue: 'Cup' }], 'alice')
 *
 * const recent = await ledger.list(db, { recordId: 1, limit: 10 })
 * ```
 */
import { sql, type Kysely, type RawBuilder } from 'kysely';

import { observer } from '../observer.js';
import { ident, sanitizeIdentifier, type Identifier } from '../identifier/index.js';
import type { LedgerRow } from '../shared/index.js';
import { LedgerQueryError } from './errors.js';
import {
    ListVersionsOptionsSchema,
    type ListVersionsOptions,
    type VersionDiff,
    type VersionEntry,
    type VersionSortField,
} from './types.js';


/**
 * Physical column behind each sortable attribute.
 */
const SORT_COLUMNS: Record<VersionSortField, keyof LedgerRow> = {
    id: 'id',
    recordId: 'record_id',
    fieldName: 'field_name',
    oldValue: 'old_value',
    newValue: 'new_value',
    timestamp: 'changed_at',
    actor: 'changed_by',
};


/**
 * Map a physical row to a VersionEntry.
 */
function toEntry(row: LedgerRow): VersionEntry {

    return {
        id: row.id,
        recordId: row.record_id,
        fieldName: row.field_name,
        oldValue: row.old_value,
        newValue: row.new_value,
        timestamp: new Date(row.changed_at),
        actor: row.changed_by,
    };

}


export class VersionLedger {

    readonly table: Identifier;

    constructor(table: string) {

        this.table = sanitizeIdentifier(table);

    }

    /**
     * Create the ledger table and its record index if missing.
     */
    async ensure(db: Kysely<unknown>): Promise<void> {

        await db.schema
            .createTable(this.table)
            .ifNotExists()
            .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
            .addColumn('record_id', 'integer', (col) => col.notNull())
            .addColumn('field_name', 'text', (col) => col.notNull())
            .addColumn('old_value', 'text')
            .addColumn('new_value', 'text')
            .addColumn('changed_at', 'text', (col) => col.notNull())
            .addColumn('changed_by', 'text', (col) => col.notNull())
            .execute();

        await db.schema
            .createIndex(`${this.table}_record_idx`)
            .ifNotExists()
            .on(this.table)
            .columns(['record_id', 'id'])
            .execute();

    }

    /**
     * Append one entry per diff.
     *
     * All entries share one timestamp and get increasing ids in diff order.
     * An empty list appends nothing.
     */
    async record(
        db: Kysely<unknown>,
        recordId: number,
        diffs: readonly VersionDiff[],
        actor: string,
    ): Promise<VersionEntry[]> {

        if (diffs.length === 0) {

            return [];

        }

        const changedAt = new Date().toISOString();

        const values = diffs.map((diff) => sql`(
            ${recordId}, ${diff.field}, ${diff.oldValue}, ${diff.newValue}, ${changedAt}, ${actor}
        )`);

        const result = await sql<LedgerRow>`
            INSERT INTO ${ident(this.table)}
                (record_id, field_name, old_value, new_value, changed_at, changed_by)
            VALUES ${sql.join(values)}
            RETURNING id, record_id, field_name, old_value, new_value, changed_at, changed_by
        `.execute(db);

        const entries = result.rows
            .map(toEntry)
            .sort((a, b) => a.id - b.id);

        observer.emit('ledger:appended', {
            table: this.table,
            recordId,
            count: entries.length,
            actor,
        });

        return entries;

    }

    /**
     * List entries, newest first by default.
     *
     * Sorted by the requested attribute with id as tie-break, then cut to
     * `limit`.
     *
     * @throws LedgerQueryError if the options are invalid
     */
    async list(db: Kysely<unknown>, options: ListVersionsOptions): Promise<VersionEntry[]> {

        const parsed = ListVersionsOptionsSchema.safeParse(options);

        if (!parsed.success) {

            throw new LedgerQueryError(parsed.error.issues);

        }

        const { recordId, fieldName, limit, sortField, order } = parsed.data;

        const conditions: RawBuilder<unknown>[] = [];

        if (recordId !== undefined) {

            conditions.push(sql`record_id = ${recordId}`);

        }

        if (fieldName !== undefined) {

            conditions.push(sql`field_name = ${fieldName}`);

        }

        const where = conditions.length > 0
            ? sql`WHERE ${sql.join(conditions, sql` AND `)}`
            : sql``;

        const direction = sql.raw(order === 'asc' ? 'ASC' : 'DESC');

        const result = await sql<LedgerRow>`
            SELECT id, record_id, field_name, old_value, new_value, changed_at, changed_by
            FROM ${ident(this.table)}
            ${where}
            ORDER BY ${ident(SORT_COLUMNS[sortField])} ${direction}, id ${direction}
            LIMIT ${limit}
        `.execute(db);

        return result.rows.map(toEntry);

    }

    /**
     * Get one entry by id.
     */
    async getById(db: Kysely<unknown>, id: number): Promise<VersionEntry | null> {

        const result = await sql<LedgerRow>`
            SELECT id, record_id, field_name, old_value, new_value, changed_at, changed_by
            FROM ${ident(this.table)}
            WHERE id = ${id}
        `.execute(db);

        const row = result.rows[0];

        return row ? toEntry(row) : null;

    }

}
