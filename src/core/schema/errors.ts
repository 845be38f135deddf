/**
 * Schema errors.
 *
 * Specific classes let callers tell a bad request (missing column,
 * immutable key) apart from a failed migration.
 */


/**
 * Error when a named column does not exist in the current schema.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => planner.dropColumn(db, 'stock'))
 * if (err instanceof ColumnNotFoundError) {
 *     console.log(`No column ${err.column} on ${err.table}`)
 * }
 * ```
 */
export class ColumnNotFoundError extends Error {

    override readonly name = 'ColumnNotFoundError' as const

    constructor(
        public readonly table: string,
        public readonly column: string,
    ) {

        super(`Column '${column}' not found on '${table}'`)
    }
}


/**
 * Error when a column name is already taken.
 */
export class ColumnExistsError extends Error {

    override readonly name = 'ColumnExistsError' as const

    constructor(
        public readonly table: string,
        public readonly column: string,
    ) {

        super(`Column '${column}' already exists on '${table}'`)
    }
}


/**
 * Error when an operation targets the primary key column.
 *
 * The key is fixed once the table exists.
 */
export class PrimaryKeyImmutableError extends Error {

    override readonly name = 'PrimaryKeyImmutableError' as const

    constructor(
        public readonly table: string,
        public readonly column: string,
    ) {

        super(`Primary key '${column}' on '${table}' cannot be changed`)
    }
}


/**
 * Error when a requested column type is not INTEGER, REAL, TEXT or BLOB.
 */
export class TypeInvalidError extends Error {

    override readonly name = 'TypeInvalidError' as const

    constructor(public readonly requested: string) {

        super(`Invalid column type '${requested}': expected INTEGER, REAL, TEXT or BLOB`)
    }
}


/**
 * Error when a value can't be coerced to its column's type.
 *
 * Raised for non-numeric input to a numeric column, a malformed monetary
 * literal, or a default that doesn't suit the column.
 */
export class TypeCoercionError extends Error {

    override readonly name = 'TypeCoercionError' as const

    constructor(
        public readonly column: string,
        public readonly expected: string,
        public readonly value: unknown,
    ) {

        super(`Cannot store ${JSON.stringify(value)} in '${column}': expected ${expected}`)
    }
}


/**
 * Rebuild step names, in execution order.
 */
export type MigrationStep = 'alter' | 'create-shadow' | 'copy' | 'swap' | 'raw'


/**
 * Error when a schema change fails.
 *
 * The change ran inside a transaction that was rolled back, so the live
 * table is exactly as it was before the call.
 */
export class MigrationFailureError extends Error {

    override readonly name = 'MigrationFailureError' as const

    constructor(
        public readonly table: string,
        public readonly step: MigrationStep,
        public override readonly cause: Error,
    ) {

        super(`Migration of '${table}' failed during ${step}: ${cause.message}`)
    }
}
