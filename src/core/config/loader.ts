/**
 * Settings file loader.
 *
 * Reads `.tabledrift/settings.yml` from the project root. The file is
 * optional; a missing or empty file means "all defaults".
 */
import { readFile, access } from 'node:fs/promises'
import { join } from 'node:path'
import { parse as parseYaml } from 'yaml'
import { attempt, attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'
import { parseSettings, type Settings } from './schema.js'


export const SETTINGS_DIR_PATH = '.tabledrift'
export const SETTINGS_FILE_NAME = 'settings.yml'


export interface LoadedSettings {

    /** Absolute path the file was looked up at */
    path: string

    /** Whether the file existed */
    fromFile: boolean

    settings: Settings
}


/**
 * Path of the settings file under a project root.
 */
export function settingsFilePath(projectRoot: string): string {

    return join(projectRoot, SETTINGS_DIR_PATH, SETTINGS_FILE_NAME)
}


/**
 * Load and validate the settings file.
 *
 * @param projectRoot - Directory containing `.tabledrift/`
 * @param file - Explicit settings file, overriding the default location
 * @throws ConfigValidationError if the file's contents are invalid
 *
 * @example
 * ```typescript
 * const { settings, fromFile } = await loadSettingsFile(process.cwd())
 * ```
 */
export async function loadSettingsFile(projectRoot: string, file?: string): Promise<LoadedSettings> {

    const path = file ?? settingsFilePath(projectRoot)

    const [, missing] = await attempt(() => access(path))

    if (missing) {

        if (file) {

            throw new Error(`Settings file not found: ${file}`)
        }

        observer.emit('config:loaded', { path, fromFile: false })

        return { path, fromFile: false, settings: parseSettings({}) }
    }

    const [content, readErr] = await attempt(() => readFile(path, 'utf-8'))

    if (readErr) {

        throw new Error(`Failed to read settings file: ${readErr.message}`)
    }

    const [parsed, yamlErr] = attemptSync(() => parseYaml(content ?? ''))

    if (yamlErr) {

        throw new Error(`Invalid YAML in settings file: ${yamlErr.message}`)
    }

    const settings = parseSettings(parsed ?? {})

    observer.emit('config:loaded', { path, fromFile: true })

    return { path, fromFile: true, settings }
}
