/**
 * Table rebuilder.
 *
 * Replaces a table's physical layout when SQLite can't alter it in place:
 * create a shadow table with the target layout, copy the columns both
 * layouts share, then drop the old table and rename the shadow into its
 * place. All of it runs in one transaction, so readers see either the old
 * table or the new one.
 *
 * @example
 * ```typescript
 * const columns = await listColumns(db, 'product')
 * const target = columns.filter((c) => c.name !== 'stock')
 *
 * const result = await rebuildTable(db, 'product', target)
 * // result.copied = ['id', 'name', 'price_cents', ...]
 * // result.lost   = ['stock']
 * ```
 */
import type { Kysely } from 'kysely';
import { attempt } from '@logosdx/utils';

import { observer } from '../observer.js';
import { inTransaction, toError } from '../shared/index.js';
import { sanitizeIdentifier, type Identifier } from '../identifier/index.js';
import { listColumns, tableExists } from './introspector.js';
import { carrySequence, copyRows, createTable, dropTable, renameTable } from './ddl.js';
import { MigrationFailureError, type MigrationStep } from './errors.js';
import type { ColumnDescriptor, RebuildResult } from './types.js';


/**
 * Suffix for the shadow table built during a rebuild.
 */
export const SHADOW_SUFFIX = '__rebuild';


/**
 * Name of the shadow table for a given table.
 */
export function shadowName(table: string): Identifier {

    return sanitizeIdentifier(`${table}${SHADOW_SUFFIX}`);

}

/**
 * Names present in both layouts, in target order.
 *
 * Matching is by name, not position: a renamed column is not in the
 * intersection and its data does not carry over.
 */
export function sharedColumns(
    current: readonly ColumnDescriptor[],
    target: readonly ColumnDescriptor[],
): Identifier[] {

    const existing = new Set(current.map((column) => column.name.toLowerCase()));

    return target
        .filter((column) => existing.has(column.name.toLowerCase()))
        .map((column) => column.name);

}

/**
 * Run one rebuild step, tagging any failure with the step name.
 */
async function step(
    table: string,
    name: MigrationStep,
    fn: () => Promise<void>,
): Promise<void> {

    const [, err] = await attempt(fn);

    if (err) {

        throw new MigrationFailureError(table, name, err);

    }

}

/**
 * Rebuild a table with a new column layout.
 *
 * Steps, all inside one transaction:
 * 1. Create `<table>__rebuild` with the target layout
 * 2. Copy the shared columns with a single INSERT … SELECT
 * 3. Carry the AUTOINCREMENT high-water mark over
 * 4. Drop the old table and rename the shadow into its place
 *
 * @param db - Connection or transaction
 * @param table - Table to rebuild
 * @param target - Full target layout (the planner computes it)
 * @throws MigrationFailureError if any step fails; the table is unchanged
 */
export async function rebuildTable(
    db: Kysely<unknown>,
    table: string,
    target: readonly ColumnDescriptor[],
): Promise<RebuildResult> {

    const name = sanitizeIdentifier(table);
    const shadow = shadowName(name);
    const start = performance.now();

    observer.emit('schema:rebuild:start', {
        table: name,
        shadow,
        columns: target.map((column) => column.name),
    });

    let result: { copied: Identifier[]; lost: Identifier[] };

    try {

        result = await inTransaction(db, async (trx) => {

            const current = await listColumns(trx, name);
            const copied = sharedColumns(current, target);
            const kept = new Set(copied.map((column) => column.toLowerCase()));
            const lost = current
                .filter((column) => !kept.has(column.name.toLowerCase()))
                .map((column) => column.name);

            await step(name, 'create-shadow', async () => {

                if (await tableExists(trx, shadow)) {

                    throw new Error(`shadow table '${shadow}' already exists`);

                }

                await createTable(trx, shadow, target);

            });

            await step(name, 'copy', async () => {

                await copyRows(trx, name, shadow, copied);
                await carrySequence(trx, name, shadow);

            });

            await step(name, 'swap', async () => {

                await dropTable(trx, name);
                await renameTable(trx, shadow, name);

            });

            return { copied, lost };

        });

    }
    catch (err) {

        const failure = err instanceof MigrationFailureError
            ? err
            : new MigrationFailureError(name, 'swap', toError(err));

        observer.emit('schema:rebuild:failed', {
            table: name,
            step: failure.step,
            error: failure.cause.message,
        });

        throw failure;

    }

    const durationMs = performance.now() - start;

    observer.emit('schema:rebuild:complete', {
        table: name,
        copied: result.copied,
        durationMs,
    });

    return {
        table: name,
        copied: result.copied,
        lost: result.lost,
        durationMs,
    };

}
