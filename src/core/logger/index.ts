/**
 * Logger Module
 *
 * Captures observer events and writes them to console and file streams.
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerState,
} from './types.js';

export { LOG_LEVEL_PRIORITY } from './types.js';

// Classifier
export { classifyEvent, shouldLog, passesLevel } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, serializeEntry } from './formatter.js';
export { formatColorLine } from './color.js';

// Logger
export { Logger, getLogger, resetLogger, type LoggerOptions } from './logger.js';
