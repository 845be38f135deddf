/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error' or '*:error', '*:failed', '*:rejected' -> error
 * - '*:blocked', '*:expired' -> warn
 * - '*:added', '*:complete', '*:created', etc. -> info
 * - Everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Patterns that classify an event as error level.
 */
const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/, /:rejected$/];

/**
 * Patterns that classify an event as warn level.
 */
const WARN_PATTERNS = [/:blocked$/, /:expired$/];

/**
 * Patterns that classify an event as info level.
 * These are significant changes worth logging at default verbosity.
 */
const INFO_PATTERNS = [
    /:bootstrap$/,
    /:added$/,
    /:dropped$/,
    /:modified$/,
    /:complete$/,
    /:created$/,
    /:updated$/,
    /:deleted$/,
    /:logged$/,
    /:acquired$/,
    /:released$/,
    // Raw statements are always audited
    /^schema:raw:/,
];

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('error')                 // 'error'
 * classifyEvent('schema:rebuild:failed') // 'error'
 * classifyEvent('record:updated')        // 'info'
 * classifyEvent('ledger:appended')       // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    if (ERROR_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'error';

    }

    if (WARN_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'warn';

    }

    if (INFO_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'info';

    }

    return 'debug';

}

/**
 * Map entry level to priority for comparison.
 * Lower priority = more severe.
 */
export function entryLevelPriority(level: EntryLevel): number {

    switch (level) {

    case 'error':
        return 1;
    case 'warn':
        return 2;
    case 'info':
        return 3;
    case 'debug':
        return 4;

    }

}

/**
 * Check if an entry level passes the configured verbosity.
 */
export function passesLevel(level: EntryLevel, configLevel: LogLevel): boolean {

    return entryLevelPriority(level) <= LOG_LEVEL_PRIORITY[configLevel];

}

/**
 * Check if an event should be logged at the given verbosity level.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')                // true
 * shouldLog('record:created', 'info')       // true
 * shouldLog('ledger:appended', 'info')      // false
 * shouldLog('ledger:appended', 'verbose')   // true
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    if (configLevel === 'silent') {

        return false;

    }

    return passesLevel(classifyEvent(event), configLevel);

}
