/**
 * Identifier errors.
 */


/**
 * Error when a name reaches SQL construction without being sanitized.
 *
 * Should never occur in normal flow; it means a caller skipped
 * `sanitizeIdentifier()`.
 */
export class IdentifierInvalidError extends Error {

    override readonly name = 'IdentifierInvalidError' as const

    constructor(public readonly value: string) {

        super(`Invalid identifier: ${JSON.stringify(value)}`)
    }
}
