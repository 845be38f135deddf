/**
 * Settings resolver - merges settings from every source.
 *
 * Priority order (highest to lowest):
 * 1. Explicit overrides (CLI flags, SDK options)
 * 2. Environment variables (TABLEDRIFT_*)
 * 3. Settings file
 * 4. Defaults
 */
import { merge, clone } from '@logosdx/utils'

import { LEDGER_TABLE_SUFFIX } from '../shared/index.js'
import { getEnvSettings } from './env.js'
import { loadSettingsFile } from './loader.js'
import { parseSettings, type Settings, type SettingsInput } from './schema.js'


/**
 * Options for resolving settings.
 */
export interface ResolveOptions {

    /** Directory containing `.tabledrift/` (default: cwd) */
    projectRoot?: string

    /** Explicit settings file path */
    file?: string

    /** Highest-priority overrides */
    overrides?: SettingsInput

    /** Environment to read (default: process.env) */
    env?: NodeJS.ProcessEnv
}


/**
 * Resolve settings from all sources.
 *
 * @throws ConfigValidationError if the merged settings are invalid
 *
 * @example
 * ```typescript
 * const settings = await resolveSettings({
 *     overrides: { database: './catalog.db', actor: 'alice' },
 * })
 * ```
 */
export async function resolveSettings(options: ResolveOptions = {}): Promise<Settings> {

    const projectRoot = options.projectRoot ?? process.cwd()
    const { settings: fromFile } = await loadSettingsFile(projectRoot, options.file)
    const fromEnv = getEnvSettings(options.env)

    // clone() keeps the file settings untouched by merge; seed column
    // lists replace each other rather than concatenate
    const merged = merge(
        merge(clone(fromFile), fromEnv, { mergeArrays: false }),
        options.overrides ?? {},
        { mergeArrays: false }
    )

    return parseSettings(merged)
}


/**
 * Ledger table name for resolved settings.
 *
 * @example
 * ```typescript
 * ledgerTableName(parseSettings({}))  // 'product_field_versions'
 * ```
 */
export function ledgerTableName(settings: Settings): string {

    return settings.ledger.table ?? `${settings.table.name}${LEDGER_TABLE_SUFFIX}`
}
