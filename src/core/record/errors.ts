/**
 * Record errors.
 */


/**
 * Error when no record has the given id.
 *
 * @example
 * ```typescript
 * const [record, err] = await attempt(() => accessor.get(db, 42))
 * if (err instanceof RecordNotFoundError) {
 *     console.log(`No record ${err.id}`)
 * }
 * ```
 */
export class RecordNotFoundError extends Error {

    override readonly name = 'RecordNotFoundError' as const

    constructor(
        public readonly table: string,
        public readonly id: number,
    ) {

        super(`Record ${id} not found in '${table}'`)
    }
}


/**
 * Error when the managed table is missing or has no primary key.
 *
 * Happens when a raw statement replaced the table with one the accessor
 * can't address.
 */
export class TableNotReadyError extends Error {

    override readonly name = 'TableNotReadyError' as const

    constructor(
        public readonly table: string,
        public readonly reason: string,
    ) {

        super(`Table '${table}' is not usable: ${reason}`)
    }
}
