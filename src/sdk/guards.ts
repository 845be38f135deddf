/**
 * SDK Safety Guards.
 *
 * Guards protect a table from accidental destructive operations and
 * keep the raw-statement escape hatch closed unless it is enabled.
 */
import type { Settings } from '../core/config/index.js';
import type { CreateContextOptions } from './types.js';

// ─────────────────────────────────────────────────────────────
// Error Classes
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when a raw statement is issued without
 * `guards.allowRawStatements`.
 *
 * @example
 * ```typescript
 * await ctx.runRawStatement('CREATE INDEX ...')  // Throws RawStatementDeniedError
 * ```
 */
export class RawStatementDeniedError extends Error {

    override readonly name = 'RawStatementDeniedError' as const;

    constructor(public readonly table: string) {

        super(`Raw statements are disabled for table "${table}" (set guards.allowRawStatements)`);

    }

}

/**
 * Error thrown when attempting destructive operations on a protected table.
 *
 * @example
 * ```typescript
 * // If guards.protected is true and allowProtected is false
 * await ctx.dropColumn('stock')  // Throws ProtectedTableError
 * ```
 */
export class ProtectedTableError extends Error {

    override readonly name = 'ProtectedTableError' as const;

    constructor(
        public readonly table: string,
        public readonly operation: string,
    ) {

        super(`Cannot ${operation} on protected table "${table}"`);

    }

}

// ─────────────────────────────────────────────────────────────
// Guard Functions
// ─────────────────────────────────────────────────────────────

/**
 * Check if raw statements are enabled.
 *
 * @throws RawStatementDeniedError if guards.allowRawStatements is false
 */
export function checkRawStatementsAllowed(settings: Settings): void {

    if (!settings.guards.allowRawStatements) {

        throw new RawStatementDeniedError(settings.table.name);

    }

}

/**
 * Check if operation is allowed on the protected table.
 *
 * @throws ProtectedTableError if the table is protected and allowProtected is false
 */
export function checkProtectedTable(
    settings: Settings,
    operation: string,
    options: CreateContextOptions,
): void {

    if (settings.guards.protected && !options.allowProtected) {

        throw new ProtectedTableError(settings.table.name, operation);

    }

}
