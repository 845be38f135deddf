/**
 * Rollback errors.
 */


/**
 * Error when a version's field has since been dropped from the table.
 *
 * The ledger keeps history for dropped columns, but there is nowhere to
 * restore the value to.
 */
export class FieldNoLongerExistsError extends Error {

    override readonly name = 'FieldNoLongerExistsError' as const

    constructor(
        public readonly versionId: number,
        public readonly field: string,
    ) {

        super(`Version ${versionId} targets '${field}', which no longer exists`)
    }
}
