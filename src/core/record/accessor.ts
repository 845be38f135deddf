/**
 * Record accessor.
 *
 * Schema-driven CRUD over the managed table. The column set is read on
 * every call, values are coerced to each column's kind, and every
 * committed field change is appended to the ledger in the same
 * transaction as the write.
 *
 * @example
 * ```typescript
 * const accessor = new RecordAccessor({ table: 'product', ledger })
 *
 * const id = await accessor.create(db, { name: 'Mug', price: '12.50' }, 'alice')
 * const changes = await accessor.update(db, id, { stock: 4 }, 'alice')
 * // [{ field: 'stock', oldValue: '0', newValue: '4' }]
 *
 * const record = await accessor.get(db, id)
 * record.values['price_cents'] // '12.50'
 * ```
 */
import { sql, type Kysely, type RawBuilder } from 'kysely';

import { observer } from '../observer.js';
import { inTransaction } from '../shared/index.js';
import { ident, sanitizeIdentifier, type Identifier } from '../identifier/index.js';
import {
    ColumnNotFoundError,
    findColumn,
    findPrimaryKey,
    listColumns,
    PrimaryKeyImmutableError,
    zeroValue,
    type ColumnDescriptor,
    type TableSchema,
} from '../schema/index.js';
import type { VersionLedger } from '../ledger/index.js';
import { canonical, toFieldValue } from './canonical.js';
import { coerceValue } from './coercion.js';
import { centsTransform, type ValueTransform } from './money.js';
import { RecordNotFoundError, TableNotReadyError } from './errors.js';
import type {
    AppliedValue,
    DynamicRecord,
    FieldChange,
    FieldValue,
    ListRecordsOptions,
    ReadOptions,
    WriteValues,
} from './types.js';


/**
 * Accessor options.
 */
export interface RecordAccessorOptions {

    /** Managed table name */
    table: string;

    /** Ledger that receives every field change */
    ledger: VersionLedger;

    /** Value transforms (default: cents) */
    transforms?: readonly ValueTransform[];

}

/**
 * Live layout plus the resolved primary key.
 */
interface Layout {

    schema: TableSchema;
    primaryKey: ColumnDescriptor;

}

/**
 * A caller-supplied value matched to its column and converted for storage.
 */
interface ResolvedWrite {

    column: ColumnDescriptor;
    stored: FieldValue;

}


export class RecordAccessor {

    readonly table: Identifier;
    readonly #ledger: VersionLedger;
    readonly #transforms: readonly ValueTransform[];

    constructor(options: RecordAccessorOptions) {

        this.table = sanitizeIdentifier(options.table);
        this.#ledger = options.ledger;
        this.#transforms = options.transforms ?? [centsTransform];

    }

    // ─────────────────────────────────────────────────────────
    // Writes
    // ─────────────────────────────────────────────────────────

    /**
     * Insert a record.
     *
     * Columns not supplied get, in order of precedence: their database
     * default; a zero value when NOT NULL; otherwise null. One ledger
     * entry is appended per supplied field.
     *
     * @returns The new record's id
     * @throws ColumnNotFoundError, PrimaryKeyImmutableError, TypeCoercionError
     */
    async create(db: Kysely<unknown>, values: WriteValues, actor: string): Promise<number> {

        return inTransaction(db, async (trx) => {

            const layout = await this.#layout(trx);
            const writes = this.#resolve(layout, values);

            const columns: Identifier[] = [];
            const params: FieldValue[] = [];

            for (const column of layout.schema.columns) {

                if (column.isPrimaryKey) continue;

                const write = writes.find((w) => w.column === column);

                if (write) {

                    columns.push(column.name);
                    params.push(write.stored);
                    continue;

                }

                if (column.default !== null) continue;

                // BLOB has no zero value, so a required one must be supplied
                columns.push(column.name);
                params.push(coerceValue(column, column.nullable ? null : zeroValue(column.type)));

            }

            const pk = ident(layout.primaryKey.name);

            const insert = columns.length === 0
                ? sql<{ id: number }>`
                    INSERT INTO ${ident(this.table)} DEFAULT VALUES RETURNING ${pk} AS id
                `
                : sql<{ id: number }>`
                    INSERT INTO ${ident(this.table)} (${sql.join(columns.map((c) => ident(c)))})
                    VALUES (${sql.join(params)})
                    RETURNING ${pk} AS id
                `;

            const result = await insert.execute(trx);
            const row = result.rows[0];

            if (!row) {

                throw new TableNotReadyError(this.table, 'insert returned no id');

            }

            const id = Number(row.id);

            await this.#ledger.record(
                trx,
                id,
                writes.map((write) => ({
                    field: write.column.name,
                    oldValue: null,
                    newValue: canonical(write.stored),
                })),
                actor,
            );

            observer.emit('record:created', {
                table: this.table,
                id,
                fields: writes.map((write) => write.column.name),
            });

            return id;

        });

    }

    /**
     * Update fields of a record.
     *
     * Each supplied value is compared with the stored one by canonical
     * form. Only differing fields are written (in one UPDATE) and logged.
     *
     * @returns The fields that changed, in schema order
     * @throws RecordNotFoundError, ColumnNotFoundError, PrimaryKeyImmutableError, TypeCoercionError
     */
    async update(
        db: Kysely<unknown>,
        id: number,
        values: WriteValues,
        actor: string,
    ): Promise<FieldChange[]> {

        return inTransaction(db, async (trx) => {

            const layout = await this.#layout(trx);
            const writes = this.#resolve(layout, values);
            const current = await this.#readRow(trx, layout, id);

            const changes: FieldChange[] = [];
            const changed: ResolvedWrite[] = [];

            for (const write of writes) {

                const oldValue = canonical(toFieldValue(current[write.column.name]));
                const newValue = canonical(write.stored);

                if (oldValue !== newValue) {

                    changes.push({ field: write.column.name, oldValue, newValue });
                    changed.push(write);

                }

            }

            if (changed.length === 0) {

                return [];

            }

            const assignments = changed.map((write) => sql`${ident(write.column.name)} = ${write.stored}`);

            await sql`
                UPDATE ${ident(this.table)}
                SET ${sql.join(assignments)}
                WHERE ${ident(layout.primaryKey.name)} = ${id}
            `.execute(trx);

            await this.#ledger.record(trx, id, changes, actor);

            observer.emit('record:updated', {
                table: this.table,
                id,
                changed: changes.map((change) => change.field),
            });

            return changes;

        });

    }

    /**
     * Delete a record. Deletion is not versioned.
     *
     * @throws RecordNotFoundError
     */
    async delete(db: Kysely<unknown>, id: number): Promise<void> {

        await inTransaction(db, async (trx) => {

            const layout = await this.#layout(trx);

            const result = await sql`
                DELETE FROM ${ident(this.table)} WHERE ${ident(layout.primaryKey.name)} = ${id}
            `.execute(trx);

            if (!result.numAffectedRows) {

                throw new RecordNotFoundError(this.table, id);

            }

            observer.emit('record:deleted', { table: this.table, id });

        });

    }

    /**
     * Write a stored-form value to one field, skipping transforms.
     *
     * Used by rollback. The value is still coerced to the column's kind.
     * Does not touch the ledger; the caller logs the inversion.
     *
     * @throws RecordNotFoundError, ColumnNotFoundError, PrimaryKeyImmutableError, TypeCoercionError
     */
    async applyStoredValue(
        db: Kysely<unknown>,
        id: number,
        field: string,
        value: FieldValue,
    ): Promise<AppliedValue> {

        return inTransaction(db, async (trx) => {

            const layout = await this.#layout(trx);
            const column = findColumn(layout.schema.columns, field);

            if (!column) {

                throw new ColumnNotFoundError(this.table, field);

            }

            if (column.isPrimaryKey) {

                throw new PrimaryKeyImmutableError(this.table, column.name);

            }

            const current = await this.#readRow(trx, layout, id);
            const stored = coerceValue(column, value);

            await sql`
                UPDATE ${ident(this.table)}
                SET ${ident(column.name)} = ${stored}
                WHERE ${ident(layout.primaryKey.name)} = ${id}
            `.execute(trx);

            return {
                field: column.name,
                previous: canonical(toFieldValue(current[column.name])),
                current: canonical(stored),
            };

        });

    }

    // ─────────────────────────────────────────────────────────
    // Reads
    // ─────────────────────────────────────────────────────────

    /**
     * Get a record by id.
     *
     * @throws RecordNotFoundError
     */
    async get(db: Kysely<unknown>, id: number, options: ReadOptions = {}): Promise<DynamicRecord> {

        const layout = await this.#layout(db);
        const row = await this.#readRow(db, layout, id);

        return this.#toRecord(layout, row, options.raw ?? false);

    }

    /**
     * Get several records, in the order the ids were given.
     *
     * @throws RecordNotFoundError for the first id that doesn't exist
     */
    async getMany(
        db: Kysely<unknown>,
        ids: readonly number[],
        options: ReadOptions = {},
    ): Promise<DynamicRecord[]> {

        if (ids.length === 0) {

            return [];

        }

        const layout = await this.#layout(db);
        const pk = layout.primaryKey.name;

        const result = await sql<Record<string, unknown>>`
            SELECT * FROM ${ident(this.table)} WHERE ${ident(pk)} IN (${sql.join([...ids])})
        `.execute(db);

        const byId = new Map(result.rows.map((row) => [Number(row[pk]), row]));

        return ids.map((id) => {

            const row = byId.get(id);

            if (!row) {

                throw new RecordNotFoundError(this.table, id);

            }

            return this.#toRecord(layout, row, options.raw ?? false);

        });

    }

    /**
     * List records with optional search, sort and paging.
     *
     * `search` matches a case-insensitive substring of any TEXT column.
     *
     * @throws ColumnNotFoundError if `sortBy` names no column
     */
    async list(db: Kysely<unknown>, options: ListRecordsOptions = {}): Promise<DynamicRecord[]> {

        const layout = await this.#layout(db);
        const columns = layout.schema.columns;

        let sortColumn = layout.primaryKey;

        if (options.sortBy !== undefined) {

            const found = findColumn(columns, sanitizeIdentifier(options.sortBy));

            if (!found) {

                throw new ColumnNotFoundError(this.table, options.sortBy);

            }

            sortColumn = found;

        }

        const search = options.search?.trim() ?? '';
        const textColumns = columns.filter((column) => column.type === 'TEXT');

        let where: RawBuilder<unknown> = sql``;

        if (search !== '') {

            const pattern = `%${search.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
            const matches = textColumns.map((column) => sql`${ident(column.name)} LIKE ${pattern} ESCAPE '\\'`);

            where = matches.length > 0
                ? sql`WHERE ${sql.join(matches, sql` OR `)}`
                : sql`WHERE 0`;

        }

        const direction = sql.raw(options.order === 'asc' ? 'ASC' : 'DESC');
        const tieBreak = sortColumn === layout.primaryKey
            ? sql``
            : sql`, ${ident(layout.primaryKey.name)} ${direction}`;

        const paging = options.limit === undefined && options.offset === undefined
            ? sql``
            : sql`LIMIT ${options.limit ?? -1} OFFSET ${options.offset ?? 0}`;

        const result = await sql<Record<string, unknown>>`
            SELECT * FROM ${ident(this.table)}
            ${where}
            ORDER BY ${ident(sortColumn.name)} ${direction}${tieBreak}
            ${paging}
        `.execute(db);

        return result.rows.map((row) => this.#toRecord(layout, row, options.raw ?? false));

    }

    // ─────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────

    async #layout(db: Kysely<unknown>): Promise<Layout> {

        const columns = await listColumns(db, this.table);

        if (columns.length === 0) {

            throw new TableNotReadyError(this.table, 'table does not exist');

        }

        const primaryKey = findPrimaryKey(columns);

        if (!primaryKey) {

            throw new TableNotReadyError(this.table, 'table has no primary key');

        }

        return { schema: { table: this.table, columns }, primaryKey };

    }

    async #readRow(
        db: Kysely<unknown>,
        layout: Layout,
        id: number,
    ): Promise<Record<string, unknown>> {

        const result = await sql<Record<string, unknown>>`
            SELECT * FROM ${ident(this.table)} WHERE ${ident(layout.primaryKey.name)} = ${id}
        `.execute(db);

        const row = result.rows[0];

        if (!row) {

            throw new RecordNotFoundError(this.table, id);

        }

        return row;

    }

    /**
     * Match each write key to a column and convert its value for storage.
     *
     * A key that names a column is used as-is. Otherwise it may be a
     * transform alias (e.g. `price` for `price_cents`).
     */
    #resolve(layout: Layout, values: WriteValues): ResolvedWrite[] {

        const columns = layout.schema.columns;
        const writes = new Map<ColumnDescriptor, ResolvedWrite>();

        for (const [key, value] of Object.entries(values)) {

            const direct = findColumn(columns, key);
            const column = direct ?? this.#findByAlias(columns, key);

            if (!column) {

                throw new ColumnNotFoundError(this.table, key);

            }

            if (column.isPrimaryKey) {

                throw new PrimaryKeyImmutableError(this.table, column.name);

            }

            const transform = this.#transformFor(column);
            const input = transform ? transform.toStored(column, value) : value;

            writes.set(column, { column, stored: coerceValue(column, input) });

        }

        return columns.flatMap((column) => {

            const write = writes.get(column);

            return write ? [write] : [];

        });

    }

    #findByAlias(
        columns: readonly ColumnDescriptor[],
        key: string,
    ): ColumnDescriptor | undefined {

        const wanted = key.toLowerCase();

        return columns.find((column) => {

            const transform = this.#transformFor(column);

            return transform?.alias(column)?.toLowerCase() === wanted;

        });

    }

    #transformFor(column: ColumnDescriptor): ValueTransform | undefined {

        return this.#transforms.find((transform) => transform.applies(column));

    }

    #toRecord(layout: Layout, row: Record<string, unknown>, raw: boolean): DynamicRecord {

        const values: Record<string, FieldValue> = {};

        for (const column of layout.schema.columns) {

            const value = toFieldValue(row[column.name]);
            const transform = raw ? undefined : this.#transformFor(column);

            values[column.name] = transform ? transform.toDisplay(column, value) : value;

        }

        return {
            id: Number(row[layout.primaryKey.name]),
            schema: layout.schema,
            values,
        };

    }

}
