/**
 * Logger types.
 */
import type { LogLevel } from '../config/index.js';

export type { LogLevel };

/**
 * Verbosity rank per configured level; an entry is written when its own
 * rank is at or below the configured one.
 */
export const LOG_LEVEL_PRIORITY = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
} as const satisfies Record<LogLevel, number>;

export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * One line of the JSON log file.
 *
 * @example
 * ```json
 * {"timestamp":"2024-01-15T10:30:00.000Z","level":"info","event":"schema:column:added","message":"Added column product.weight (REAL)"}
 * ```
 */
export interface LogEntry {
    timestamp: string;
    level: EntryLevel;
    event: string;
    message: string;

    /** Event payload, kept at verbose level */
    data?: Record<string, unknown>;

    context?: Record<string, unknown>;
}

export type LoggerState = 'idle' | 'running' | 'stopped';
