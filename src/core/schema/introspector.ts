/**
 * Schema introspection.
 *
 * Reads the live layout of a table from SQLite's PRAGMAs and
 * sqlite_master. Nothing is cached: a call made after a mutation always
 * sees the new layout.
 */
import { sql, type Kysely } from 'kysely';

import { ident, sanitizeIdentifier } from '../identifier/index.js';
import { affinityOf } from './column-type.js';
import type { ColumnDescriptor, TableSchema } from './types.js';


/**
 * Row shape returned by `PRAGMA table_info`.
 */
interface TableInfoRow {
    cid: number;
    name: string;
    type: string;
    notnull: number;
    dflt_value: string | null;
    pk: number;
}


/**
 * Check if a table exists.
 */
export async function tableExists(db: Kysely<unknown>, table: string): Promise<boolean> {

    const name = sanitizeIdentifier(table);

    const result = await sql<{ name: string }>`
        SELECT name FROM sqlite_master WHERE type = 'table' AND name = ${name}
    `.execute(db);

    return result.rows.length > 0;

}

/**
 * List the current columns of a table, in ordinal order.
 *
 * Returns an empty list when the table does not exist.
 *
 * @example
 * ```typescript
 * const columns = await listColumns(db, 'product')
 * // [{ ordinal: 0, name: 'id', type: 'INTEGER', isPrimaryKey: true, ... }, ...]
 * ```
 */
export async function listColumns(db: Kysely<unknown>, table: string): Promise<ColumnDescriptor[]> {

    const name = sanitizeIdentifier(table);

    const result = await sql<TableInfoRow>`
        PRAGMA table_info(${ident(name)})
    `.execute(db);

    return result.rows.map((row) => ({
        ordinal: row.cid,
        name: row.name,
        type: affinityOf(row.type),
        declaredType: row.type,
        nullable: row.notnull === 0 && row.pk === 0,
        default: row.dflt_value,
        isPrimaryKey: row.pk > 0,
    }));

}

/**
 * Read a table's schema as a TableSchema.
 */
export async function getTableSchema(db: Kysely<unknown>, table: string): Promise<TableSchema> {

    const name = sanitizeIdentifier(table);
    const columns = await listColumns(db, name);

    return { table: name, columns };

}

/**
 * Get the raw `CREATE TABLE` text for a table.
 *
 * For display and audit only; never parsed back.
 *
 * @returns Definition text, or null if the table does not exist
 */
export async function getDefinitionStatement(db: Kysely<unknown>, table: string): Promise<string | null> {

    const name = sanitizeIdentifier(table);

    const result = await sql<{ sql: string | null }>`
        SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ${name}
    `.execute(db);

    return result.rows[0]?.sql ?? null;

}

/**
 * Find the primary key column of a schema.
 */
export function findPrimaryKey(columns: readonly ColumnDescriptor[]): ColumnDescriptor | undefined {

    return columns.find((column) => column.isPrimaryKey);

}

/**
 * Find a column by name.
 *
 * SQLite identifiers are case-insensitive, so matching is too.
 */
export function findColumn(
    columns: readonly ColumnDescriptor[],
    name: string,
): ColumnDescriptor | undefined {

    const wanted = name.toLowerCase();

    return columns.find((column) => column.name.toLowerCase() === wanted);

}
