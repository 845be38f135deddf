/**
 * Environment variable settings.
 *
 * Any setting can be overridden via a TABLEDRIFT_* environment variable.
 * Underscores map to nesting; camelCase keys keep their case.
 *
 * @example
 * ```bash
 * TABLEDRIFT_DATABASE=./catalog.db
 * TABLEDRIFT_TABLE_NAME=book
 * TABLEDRIFT_ACTOR=deploy-bot
 * TABLEDRIFT_LOCK_TIMEOUT=60000
 * TABLEDRIFT_LOCK_waitTimeout=10000
 * TABLEDRIFT_GUARDS_allowRawStatements=true
 * TABLEDRIFT_LOGGING_LEVEL=verbose
 * ```
 */
import { makeNestedConfig } from '@logosdx/utils'

import type { SettingsInput } from './schema.js'


/**
 * Meta env vars that control tool behavior, not settings.
 */
const META_ENV_VARS = new Set([
    'TABLEDRIFT_DEBUG',     // Observer spy
    'TABLEDRIFT_HEADLESS',  // Force headless output
    'TABLEDRIFT_DEV',       // Development mode
    'TABLEDRIFT_JSON',      // JSON output mode
])

/**
 * Keys whose values stay strings even when they look numeric.
 */
const STRING_KEYS = ['database', 'actor', 'name', 'file', 'table']


/**
 * Read settings from environment variables.
 *
 * @example
 * ```typescript
 * // TABLEDRIFT_TABLE_NAME=book
 * // TABLEDRIFT_LOCK_TIMEOUT=60000
 *
 * getEnvSettings()
 * // { table: { name: 'book' }, lock: { timeout: 60000 } }
 * ```
 */
export function getEnvSettings(env: NodeJS.ProcessEnv = process.env): SettingsInput {

    const flat: Record<string, string> = {}

    for (const [key, value] of Object.entries(env)) {

        if (value !== undefined) {

            flat[key] = value
        }
    }

    const { allConfigs } = makeNestedConfig<SettingsInput>(
        flat,
        {
            filter: (key) => key.startsWith('TABLEDRIFT_') && !META_ENV_VARS.has(key),
            stripPrefix: 'TABLEDRIFT_',
            forceAllCapToLower: true,
            skipConversion: (key) => STRING_KEYS.some((name) => key.toLowerCase().endsWith(name)),
        }
    )

    return allConfigs()
}


/**
 * Check if output should be JSON.
 */
export function shouldOutputJson(): boolean {

    const json = process.env['TABLEDRIFT_JSON']
    return json === '1' || json === 'true'
}
