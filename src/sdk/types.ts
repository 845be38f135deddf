/**
 * SDK Types.
 */
import type { SettingsInput } from '../core/config/index.js';
import type { FieldValue } from '../core/record/index.js';

// ─────────────────────────────────────────────────────────────
// Factory Options
// ─────────────────────────────────────────────────────────────

/**
 * Options for creating an SDK context.
 *
 * @example
 * ```typescript
 * // Settings from .tabledrift/settings.yml and TABLEDRIFT_* env vars
 * const ctx = await createContext()
 *
 * // Explicit overrides win over file and env
 * const ctx = await createContext({
 *     settings: { database: ':memory:', actor: 'alice' },
 * })
 *
 * // Allow destructive ops on a protected table
 * const ctx = await createContext({ allowProtected: true })
 * ```
 */
export interface CreateContextOptions {

    /** Project root directory. Defaults to process.cwd() */
    projectRoot?: string;

    /** Settings file to read instead of `.tabledrift/settings.yml` */
    file?: string;

    /** Highest-priority settings overrides */
    settings?: SettingsInput;

    /** Environment to read TABLEDRIFT_* vars from. Defaults to process.env */
    env?: NodeJS.ProcessEnv;

    /** Allow destructive operations when guards.protected is set. Default: false */
    allowProtected?: boolean;

}

// ─────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────

/**
 * A record flattened for export, keyed by column name.
 *
 * Monetary columns are rendered as two-decimal strings.
 */
export type ExportedRecord = Record<string, FieldValue>;
