/**
 * Schema types.
 *
 * Describes the live physical layout of the managed table. Descriptors are
 * read fresh from the database on every operation; nothing here is compiled
 * against a fixed column set.
 */
import type { Identifier } from '../identifier/index.js';


/**
 * The four canonical column kinds.
 *
 * Declared types that aren't canonical (e.g. `VARCHAR(120)`) are mapped
 * to one of these by SQLite affinity rules.
 */
export type ColumnType = 'INTEGER' | 'REAL' | 'TEXT' | 'BLOB';

/**
 * All canonical column types, in display order.
 */
export const COLUMN_TYPES: readonly ColumnType[] = ['INTEGER', 'REAL', 'TEXT', 'BLOB'];

/**
 * A literal supplied for a column default.
 */
export type DefaultLiteral = string | number | null;

/**
 * Schema metadata for one column.
 */
export interface ColumnDescriptor {

    /** Zero-based position in the table */
    ordinal: number;

    name: Identifier;

    /** Canonical kind */
    type: ColumnType;

    /** Declared type text as stored in the schema (e.g. 'VARCHAR(120)') */
    declaredType: string;

    nullable: boolean;

    /** SQL default expression text as stored in the schema, e.g. `'abc'` or `0` */
    default: string | null;

    isPrimaryKey: boolean;

}

/**
 * Ordered column set for one logical table.
 */
export interface TableSchema {

    table: Identifier;
    columns: readonly ColumnDescriptor[];

}

/**
 * Column definition used when seeding or planning new columns.
 */
export interface ColumnSpec {

    name: string;
    type: string;

    /** Defaults to true */
    nullable?: boolean;

    default?: DefaultLiteral;

}

/**
 * Result of a completed rebuild.
 */
export interface RebuildResult {

    table: Identifier;

    /** Columns whose values were carried into the new table */
    copied: Identifier[];

    /** Columns present before the rebuild and absent after */
    lost: Identifier[];

    durationMs: number;

}

/**
 * Result of a raw operator statement.
 */
export interface RawStatementResult {

    columns: string[];
    rows: Record<string, unknown>[];

    /** Rows affected (for INSERT/UPDATE/DELETE) */
    rowsAffected?: number;

    durationMs: number;

}
