/**
 * DDL statement builders.
 *
 * Each function runs one statement against the handle it's given, which
 * during a rebuild is the rebuild's transaction. Identifiers pass through
 * `ident()`; column types come from the closed ColumnType union.
 */
import { sql, type Kysely, type RawBuilder } from 'kysely';

import { ident } from '../identifier/index.js';
import type { ColumnDescriptor } from './types.js';


const LITERAL_DEFAULT = /^([+-]?\d+(\.\d+)?|'([^']|'')*'|NULL|TRUE|FALSE|CURRENT_TIME|CURRENT_DATE|CURRENT_TIMESTAMP)$/i;


/**
 * Render a stored default expression for a column definition.
 *
 * Literals are written as-is; anything else is parenthesized, which SQLite
 * requires for expression defaults.
 */
function renderStoredDefault(expression: string): RawBuilder<unknown> {

    const trimmed = expression.trim();

    if (LITERAL_DEFAULT.test(trimmed) || (trimmed.startsWith('(') && trimmed.endsWith(')'))) {

        return sql.raw(trimmed);

    }

    return sql.raw(`(${trimmed})`);

}

/**
 * Build the definition clause for one column.
 *
 * An INTEGER primary key becomes `INTEGER PRIMARY KEY AUTOINCREMENT` so
 * record ids are never reused.
 *
 * @example
 * ```typescript
 * columnDefinition({ name: 'stock', type: 'INTEGER', nullable: false, default: '0', ... })
 * // "stock" INTEGER NOT NULL DEFAULT 0
 * ```
 */
export function columnDefinition(column: ColumnDescriptor): RawBuilder<unknown> {

    if (column.isPrimaryKey) {

        return column.type === 'INTEGER'
            ? sql`${ident(column.name)} INTEGER PRIMARY KEY AUTOINCREMENT`
            : sql`${ident(column.name)} ${sql.raw(column.type)} PRIMARY KEY NOT NULL`;

    }

    const notNull = column.nullable ? sql`` : sql` NOT NULL`;
    const defaultClause = column.default === null
        ? sql``
        : sql` DEFAULT ${renderStoredDefault(column.default)}`;

    return sql`${ident(column.name)} ${sql.raw(column.type)}${notNull}${defaultClause}`;

}

/**
 * Create a table with the given columns.
 */
export async function createTable(
    db: Kysely<unknown>,
    table: string,
    columns: readonly ColumnDescriptor[],
): Promise<void> {

    await sql`CREATE TABLE ${ident(table)} (${sql.join(columns.map(columnDefinition))})`.execute(db);

}

/**
 * Append a column with `ALTER TABLE … ADD COLUMN`.
 */
export async function addColumn(
    db: Kysely<unknown>,
    table: string,
    column: ColumnDescriptor,
): Promise<void> {

    await sql`ALTER TABLE ${ident(table)} ADD COLUMN ${columnDefinition(column)}`.execute(db);

}

/**
 * Copy the named columns from one table into another in a single statement.
 *
 * @returns Number of rows copied
 */
export async function copyRows(
    db: Kysely<unknown>,
    from: string,
    to: string,
    columns: readonly string[],
): Promise<number> {

    if (columns.length === 0) {

        return 0;

    }

    const list = sql.join(columns.map((column) => ident(column)));

    const result = await sql`
        INSERT INTO ${ident(to)} (${list}) SELECT ${list} FROM ${ident(from)}
    `.execute(db);

    return Number(result.numAffectedRows ?? 0n);

}

/**
 * Carry the AUTOINCREMENT high-water mark from one table to another.
 *
 * Without this, ids of deleted trailing rows could be handed out again
 * after a rebuild and collide with their old ledger history.
 */
export async function carrySequence(
    db: Kysely<unknown>,
    from: string,
    to: string,
): Promise<void> {

    const hasSequence = await sequenceTableExists(db);

    if (!hasSequence) {

        return;

    }

    const previous = await sql<{ seq: number }>`
        SELECT seq FROM sqlite_sequence WHERE name = ${from}
    `.execute(db);

    const seq = previous.rows[0]?.seq;

    if (seq === undefined) {

        return;

    }

    const updated = await sql`
        UPDATE sqlite_sequence SET seq = MAX(seq, ${seq}) WHERE name = ${to}
    `.execute(db);

    if (!updated.numAffectedRows) {

        await sql`INSERT INTO sqlite_sequence (name, seq) VALUES (${to}, ${seq})`.execute(db);

    }

}

/**
 * Check if SQLite has created its sequence table yet.
 */
async function sequenceTableExists(db: Kysely<unknown>): Promise<boolean> {

    const result = await sql<{ name: string }>`
        SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'sqlite_sequence'
    `.execute(db);

    return result.rows.length > 0;

}

/**
 * Drop a table.
 */
export async function dropTable(db: Kysely<unknown>, table: string): Promise<void> {

    await sql`DROP TABLE ${ident(table)}`.execute(db);

}

/**
 * Rename a table.
 */
export async function renameTable(db: Kysely<unknown>, from: string, to: string): Promise<void> {

    await sql`ALTER TABLE ${ident(from)} RENAME TO ${ident(to)}`.execute(db);

}
