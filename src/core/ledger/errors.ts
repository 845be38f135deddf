/**
 * Ledger errors.
 */
import type { ZodIssue } from 'zod'


/**
 * Error when no ledger entry has the given id.
 */
export class VersionNotFoundError extends Error {

    override readonly name = 'VersionNotFoundError' as const

    constructor(public readonly versionId: number) {

        super(`Version ${versionId} not found`)
    }
}


/**
 * Error when listing options fail validation.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => ledger.list(db, { limit: 0 }))
 * if (err instanceof LedgerQueryError) {
 *     console.log(err.issues[0].path) // ['limit']
 * }
 * ```
 */
export class LedgerQueryError extends Error {

    override readonly name = 'LedgerQueryError' as const

    constructor(public readonly issues: ZodIssue[]) {

        const details = issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ')

        super(`Invalid version query: ${details}`)
    }
}
