/**
 * Bootstrap.
 *
 * Creates the managed table, its ledger and the lock table on first use.
 * A table that already exists is left exactly as it is: seed columns only
 * apply when the table is created.
 *
 * @example
 * ```typescript
 * const result = await bootstrap(db, {
 *     table: 'product',
 *     primaryKey: 'id',
 *     columns: [{ name: 'name', type: 'TEXT', nullable: false, default: '' }],
 *     ledger,
 * })
 * // result.created = true on the first run, false afterwards
 * ```
 */
import type { Kysely } from 'kysely';

import { observer } from '../observer.js';
import { inTransaction } from '../shared/index.js';
import { sanitizeIdentifier } from '../identifier/index.js';
import {
    createTable,
    listColumns,
    parseColumnType,
    renderDefault,
    tableExists,
    type ColumnDescriptor,
    type ColumnSpec,
} from '../schema/index.js';
import { ensureLockTable } from '../lock/index.js';
import type { VersionLedger } from '../ledger/index.js';


export interface BootstrapOptions {

    /** Managed table name */
    table: string;

    /** Primary key column name */
    primaryKey: string;

    /** Columns added after the primary key when the table is created */
    columns: readonly ColumnSpec[];

    ledger: VersionLedger;

}

export interface BootstrapResult {

    /** Whether the managed table was created by this call */
    created: boolean;

    /** Current column names */
    columns: string[];

}


/**
 * Build the initial layout: an INTEGER AUTOINCREMENT key plus seed columns.
 *
 * @throws TypeInvalidError, TypeCoercionError for a bad seed column
 */
export function initialLayout(primaryKey: string, seed: readonly ColumnSpec[]): ColumnDescriptor[] {

    const key: ColumnDescriptor = {
        ordinal: 0,
        name: sanitizeIdentifier(primaryKey),
        type: 'INTEGER',
        declaredType: 'INTEGER',
        nullable: false,
        default: null,
        isPrimaryKey: true,
    };

    const columns = seed.map((entry, index): ColumnDescriptor => {

        const name = sanitizeIdentifier(entry.name);
        const type = parseColumnType(entry.type);

        return {
            ordinal: index + 1,
            name,
            type,
            declaredType: type,
            nullable: entry.nullable ?? true,
            default: renderDefault(name, type, entry.default),
            isPrimaryKey: false,
        };

    });

    return [key, ...columns];

}

/**
 * Create whatever is missing, in one transaction.
 */
export async function bootstrap(db: Kysely<unknown>, options: BootstrapOptions): Promise<BootstrapResult> {

    const table = sanitizeIdentifier(options.table);
    const layout = initialLayout(options.primaryKey, options.columns);

    const result = await inTransaction(db, async (trx) => {

        const exists = await tableExists(trx, table);

        if (!exists) {

            await createTable(trx, table, layout);

        }

        await options.ledger.ensure(trx);
        await ensureLockTable(trx);

        const columns = await listColumns(trx, table);

        return {
            created: !exists,
            columns: columns.map((column) => column.name),
        };

    });

    observer.emit('schema:bootstrap', {
        table,
        created: result.created,
        columns: result.columns,
    });

    return result;

}
