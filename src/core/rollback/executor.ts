/**
 * Rollback executor.
 *
 * Restores a field to the value a ledger entry replaced. The rollback is
 * itself a forward change: a new entry is appended, nothing in the ledger
 * is modified, and the new entry can be rolled back in turn.
 *
 * Each run moves through `requested → validated → applied → logged` and
 * emits a `rollback:*` event per transition. A run that fails validation
 * ends at `rejected`; one that fails after it ends at `failed`. Either way
 * the table and ledger are left untouched.
 *
 * @example
 * ```typescript
 * const executor = new RollbackExecutor({ accessor, ledger })
 *
 * const outcome = await executor.rollback(db, 17, 'alice')
 * // outcome.trace = ['requested', 'validated', 'applied', 'logged']
 * ```
 */
import type { Kysely } from 'kysely';

import { observer } from '../observer.js';
import { inTransaction, toError } from '../shared/index.js';
import { findColumn, listColumns, PrimaryKeyImmutableError } from '../schema/index.js';
import { VersionNotFoundError, type VersionLedger } from '../ledger/index.js';
import { coerceValue, type RecordAccessor } from '../record/index.js';
import { FieldNoLongerExistsError } from './errors.js';
import type { RollbackOutcome, RollbackState } from './types.js';


export interface RollbackExecutorOptions {

    accessor: RecordAccessor;
    ledger: VersionLedger;

}


export class RollbackExecutor {

    readonly #accessor: RecordAccessor;
    readonly #ledger: VersionLedger;

    constructor(options: RollbackExecutorOptions) {

        this.#accessor = options.accessor;
        this.#ledger = options.ledger;

    }

    /**
     * Roll back one ledger entry.
     *
     * @throws VersionNotFoundError if no entry has the id
     * @throws FieldNoLongerExistsError if the entry's column was dropped
     * @throws PrimaryKeyImmutableError if the entry targets the primary key
     * @throws RecordNotFoundError if the record was deleted
     * @throws TypeCoercionError if the old value no longer suits the column
     */
    async rollback(db: Kysely<unknown>, versionId: number, actor: string): Promise<RollbackOutcome> {

        const trace: RollbackState[] = ['requested'];

        try {

            return await inTransaction(db, async (trx) => {

                const entry = await this.#ledger.getById(trx, versionId);

                if (!entry) {

                    throw new VersionNotFoundError(versionId);

                }

                const columns = await listColumns(trx, this.#accessor.table);
                const column = findColumn(columns, entry.fieldName);

                if (!column) {

                    throw new FieldNoLongerExistsError(versionId, entry.fieldName);

                }

                if (column.isPrimaryKey) {

                    throw new PrimaryKeyImmutableError(this.#accessor.table, column.name);

                }

                await this.#accessor.get(trx, entry.recordId, { raw: true });
                coerceValue(column, entry.oldValue);

                trace.push('validated');
                observer.emit('rollback:validated', {
                    versionId,
                    recordId: entry.recordId,
                    field: column.name,
                });

                const applied = await this.#accessor.applyStoredValue(
                    trx,
                    entry.recordId,
                    column.name,
                    entry.oldValue,
                );

                trace.push('applied');
                observer.emit('rollback:applied', {
                    versionId,
                    recordId: entry.recordId,
                    field: column.name,
                });

                const [inversion] = await this.#ledger.record(
                    trx,
                    entry.recordId,
                    [{ field: column.name, oldValue: applied.previous, newValue: applied.current }],
                    actor,
                );

                if (!inversion) {

                    throw new Error(`Ledger did not record the rollback of version ${versionId}`);

                }

                trace.push('logged');
                observer.emit('rollback:logged', { versionId, inversionId: inversion.id });

                return {
                    versionId,
                    recordId: entry.recordId,
                    field: column.name,
                    restored: applied.current,
                    inversion,
                    trace,
                };

            });

        }
        catch (err) {

            const error = toError(err);

            if (trace.includes('validated')) {

                trace.push('failed');
                observer.emit('rollback:failed', { versionId, reason: error.message });

            }
            else {

                trace.push('rejected');
                observer.emit('rollback:rejected', { versionId, reason: error.message });

            }

            throw error;

        }

    }

}
