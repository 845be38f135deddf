/**
 * Config module - settings for tabledrift.
 *
 * Handles loading, validation and merging settings from the settings
 * file, environment variables and explicit overrides.
 */

// Schema & Validation
export {
    SettingsSchema,
    ColumnSpecSchema,
    LogLevelSchema,
    DEFAULT_SEED_COLUMNS,
    ConfigValidationError,
    parseSettings,
    type Settings,
    type SettingsInput,
    type LogLevel,
} from './schema.js';

// Loading
export {
    loadSettingsFile,
    settingsFilePath,
    SETTINGS_DIR_PATH,
    SETTINGS_FILE_NAME,
    type LoadedSettings,
} from './loader.js';

// Resolver
export {
    resolveSettings,
    ledgerTableName,
    type ResolveOptions,
} from './resolver.js';

// Environment variables
export { getEnvSettings, shouldOutputJson } from './env.js';
