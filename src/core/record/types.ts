/**
 * Record types.
 *
 * Records have no compiled shape. Each one carries the schema it was read
 * with, and values are keyed by the live column names.
 */
import type { TableSchema } from '../schema/index.js';


/**
 * A single field value as read from or written to the managed table.
 *
 * BLOB contents are carried as base64 text.
 */
export type FieldValue = number | string | null;

/**
 * Field values keyed by column name (or a transform's write alias).
 */
export type WriteValues = Record<string, FieldValue>;

/**
 * One row of the managed table, paired with the schema it was read under.
 */
export interface DynamicRecord {

    id: number;
    schema: TableSchema;
    values: Record<string, FieldValue>;

}

/**
 * A field whose canonical value changed.
 *
 * `oldValue` and `newValue` are canonical strings; null means no value.
 */
export interface FieldChange {

    field: string;
    oldValue: string | null;
    newValue: string | null;

}

/**
 * Read options.
 */
export interface ReadOptions {

    /** Skip display transforms and return stored forms */
    raw?: boolean;

}

/**
 * Options for listing records.
 */
export interface ListRecordsOptions extends ReadOptions {

    /** Case-insensitive substring matched against every TEXT column */
    search?: string;

    /** Column to sort by (default: primary key) */
    sortBy?: string;

    /** Sort direction (default: desc) */
    order?: 'asc' | 'desc';

    limit?: number;
    offset?: number;

}

/**
 * Result of writing one stored value directly.
 */
export interface AppliedValue {

    field: string;

    /** Canonical value before the write */
    previous: string | null;

    /** Canonical value after the write */
    current: string | null;

}
