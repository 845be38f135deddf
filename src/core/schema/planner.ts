/**
 * Column mutation planner.
 *
 * Validates a requested schema change against the live layout, then picks
 * the path that applies it: `ALTER TABLE … ADD COLUMN` for additions, a
 * full rebuild for drops and modifications. Every name passes through the
 * sanitizer first.
 *
 * @example
 * ```typescript
 * await addColumn(db, 'product', 'weight kg', 'real', '0')
 * // adds "weight_kg" REAL DEFAULT 0
 *
 * await modifyColumn(db, 'product', 'weight_kg', 'weight', 'INTEGER')
 * await dropColumn(db, 'product', 'weight')
 * ```
 */
import { sql, type Kysely } from 'kysely';
import { attempt } from '@logosdx/utils';

import { observer } from '../observer.js';
import { inTransaction, toError } from '../shared/index.js';
import { sanitizeIdentifier } from '../identifier/index.js';
import { findColumn, listColumns } from './introspector.js';
import { addColumn as alterAddColumn } from './ddl.js';
import { rebuildTable } from './rebuilder.js';
import { parseColumnType, renderDefault } from './column-type.js';
import {
    ColumnExistsError,
    ColumnNotFoundError,
    MigrationFailureError,
    PrimaryKeyImmutableError,
} from './errors.js';
import type {
    ColumnDescriptor,
    DefaultLiteral,
    RawStatementResult,
    RebuildResult,
} from './types.js';


// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

/**
 * Look up a column that a drop or modify is about to touch.
 *
 * @throws ColumnNotFoundError, PrimaryKeyImmutableError
 */
function requireMutableColumn(
    table: string,
    columns: readonly ColumnDescriptor[],
    name: string,
): ColumnDescriptor {

    const column = findColumn(columns, name);

    if (!column) {

        throw new ColumnNotFoundError(table, name);

    }

    if (column.isPrimaryKey) {

        throw new PrimaryKeyImmutableError(table, column.name);

    }

    return column;

}

/**
 * Renumber ordinals after the layout changed.
 */
function renumber(columns: readonly ColumnDescriptor[]): ColumnDescriptor[] {

    return columns.map((column, ordinal) => ({ ...column, ordinal }));

}

// ─────────────────────────────────────────────────────────────
// Operations
// ─────────────────────────────────────────────────────────────

/**
 * Append a nullable column.
 *
 * Existing rows read the default (or null) for the new column; no row is
 * rewritten.
 *
 * @throws TypeInvalidError if `type` is not INTEGER, REAL, TEXT or BLOB
 * @throws TypeCoercionError if the default doesn't suit the type
 * @throws ColumnExistsError if the name is taken
 * @throws MigrationFailureError if the ALTER fails
 */
export async function addColumn(
    db: Kysely<unknown>,
    table: string,
    name: string,
    type: string,
    defaultValue?: DefaultLiteral,
): Promise<ColumnDescriptor> {

    const tableName = sanitizeIdentifier(table);
    const columnName = sanitizeIdentifier(name);
    const columnType = parseColumnType(type);
    const expression = renderDefault(columnName, columnType, defaultValue);

    return inTransaction(db, async (trx) => {

        const columns = await listColumns(trx, tableName);

        if (findColumn(columns, columnName)) {

            throw new ColumnExistsError(tableName, columnName);

        }

        const column: ColumnDescriptor = {
            ordinal: columns.length,
            name: columnName,
            type: columnType,
            declaredType: columnType,
            nullable: true,
            default: expression,
            isPrimaryKey: false,
        };

        const [, err] = await attempt(() => alterAddColumn(trx, tableName, column));

        if (err) {

            throw new MigrationFailureError(tableName, 'alter', err);

        }

        observer.emit('schema:column:added', {
            table: tableName,
            column: columnName,
            type: columnType,
        });

        return column;

    });

}

/**
 * Remove a column by rebuilding the table without it.
 *
 * The column's live data is gone afterwards; ledger entries for it remain
 * but can no longer be rolled back.
 *
 * @throws ColumnNotFoundError, PrimaryKeyImmutableError, MigrationFailureError
 */
export async function dropColumn(
    db: Kysely<unknown>,
    table: string,
    name: string,
): Promise<RebuildResult> {

    const tableName = sanitizeIdentifier(table);
    const columnName = sanitizeIdentifier(name);

    return inTransaction(db, async (trx) => {

        const columns = await listColumns(trx, tableName);
        const column = requireMutableColumn(tableName, columns, columnName);

        const target = renumber(columns.filter((c) => c !== column));
        const result = await rebuildTable(trx, tableName, target);

        observer.emit('schema:column:dropped', {
            table: tableName,
            column: column.name,
        });

        return result;

    });

}

/**
 * Rename and/or retype a column by rebuilding the table.
 *
 * The column keeps its position and becomes nullable. When the name is
 * unchanged its values are copied across (SQLite converts them by the new
 * type's affinity); a renamed column starts out empty.
 *
 * @throws ColumnNotFoundError, PrimaryKeyImmutableError, ColumnExistsError
 * @throws TypeInvalidError, TypeCoercionError, MigrationFailureError
 */
export async function modifyColumn(
    db: Kysely<unknown>,
    table: string,
    oldName: string,
    newName: string,
    newType: string,
    newDefault?: DefaultLiteral,
): Promise<RebuildResult> {

    const tableName = sanitizeIdentifier(table);
    const from = sanitizeIdentifier(oldName);
    const to = sanitizeIdentifier(newName);
    const columnType = parseColumnType(newType);
    const expression = renderDefault(to, columnType, newDefault);

    return inTransaction(db, async (trx) => {

        const columns = await listColumns(trx, tableName);
        const column = requireMutableColumn(tableName, columns, from);
        const clash = findColumn(columns, to);

        if (clash && clash !== column) {

            throw new ColumnExistsError(tableName, to);

        }

        const target = columns.map((c): ColumnDescriptor => {

            if (c !== column) {

                return c;

            }

            return {
                ordinal: c.ordinal,
                name: to,
                type: columnType,
                declaredType: columnType,
                nullable: true,
                default: expression,
                isPrimaryKey: false,
            };

        });

        const result = await rebuildTable(trx, tableName, target);

        observer.emit('schema:column:modified', {
            table: tableName,
            from: column.name,
            to,
            type: columnType,
        });

        return result;

    });

}

/**
 * Execute an operator-issued statement verbatim.
 *
 * Bypasses planning. This is the one operation that can break schema and
 * ledger consistency, so each call is announced on `schema:raw:before`
 * and `schema:raw:after` for the audit trail. The SDK refuses it unless
 * raw statements are enabled.
 *
 * @throws MigrationFailureError with step 'raw' if the statement fails
 */
export async function runRawStatement(
    db: Kysely<unknown>,
    table: string,
    statement: string,
): Promise<RawStatementResult> {

    const tableName = sanitizeIdentifier(table);
    const start = performance.now();

    observer.emit('schema:raw:before', { table: tableName, statement });

    try {

        const result = await inTransaction(db, (trx) =>
            sql.raw<Record<string, unknown>>(statement).execute(trx),
        );

        const durationMs = performance.now() - start;
        const firstRow = result.rows[0];

        observer.emit('schema:raw:after', {
            table: tableName,
            statement,
            success: true,
            durationMs,
        });

        return {
            columns: firstRow ? Object.keys(firstRow) : [],
            rows: result.rows,
            rowsAffected: result.numAffectedRows === undefined
                ? undefined
                : Number(result.numAffectedRows),
            durationMs,
        };

    }
    catch (err) {

        const error = toError(err);

        observer.emit('schema:raw:after', {
            table: tableName,
            statement,
            success: false,
            durationMs: performance.now() - start,
            error: error.message,
        });

        throw new MigrationFailureError(tableName, 'raw', error);

    }

}
