/**
 * Logger
 *
 * Stream-based logger subscribed to every observer event. Writes compact
 * (optionally colored) lines to a console stream and JSON entries to a
 * file stream.
 *
 * @example
 * ```typescript
 * import { createWriteStream } from 'node:fs'
 *
 * const logger = new Logger({
 *     level: 'info',
 *     console: process.stderr,
 *     file: createWriteStream('.tabledrift/tabledrift.log', { flags: 'a' }),
 * })
 *
 * logger.start()
 * // every core event is now logged
 * await logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';

import { observer } from '../observer.js';
import { classifyEvent, passesLevel, shouldLog } from './classifier.js';
import { formatEntry, generateMessage, sanitizeData, serializeEntry } from './formatter.js';
import { formatColorLine } from './color.js';
import type { EntryLevel, LogLevel, LoggerState } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Minimum level to write (default: info) */
    level?: LogLevel;

    /** Master switch (default: true) */
    enabled?: boolean;

    /** Console stream for compact lines (null for none) */
    console?: Writable | null;

    /** File stream for JSON entries (null for none) */
    file?: Writable | null;

    /** Path of the file stream, for display */
    filepath?: string | null;

    /** Write JSON entries to the console too (default: false) */
    json?: boolean;

    /** Color console lines (default: false) */
    color?: boolean;

    /** Context to include with every entry */
    context?: Record<string, unknown>;
}

/**
 * Coerce an event payload to a plain record.
 */
function toRecord(data: unknown): Record<string, unknown> {

    if (typeof data !== 'object' || data === null) {

        return data === undefined ? {} : { value: data };

    }

    return Object.fromEntries(Object.entries(data));

}

/**
 * Logger that captures observer events and writes to streams.
 */
export class Logger {

    #level: LogLevel;
    #enabled: boolean;
    #console: Writable | null;
    #file: Writable | null;
    #filepath: string | null;
    #json: boolean;
    #color: boolean;
    #context: Record<string, unknown>;
    #state: LoggerState = 'idle';
    #unsubscribe: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#level = options.level ?? 'info';
        this.#enabled = options.enabled ?? true;
        this.#console = options.console ?? null;
        this.#file = options.file ?? null;
        this.#filepath = options.filepath ?? null;
        this.#json = options.json ?? false;
        this.#color = options.color ?? false;
        this.#context = options.context ?? {};

    }

    get state(): LoggerState {

        return this.#state;

    }

    get level(): LogLevel {

        return this.#level;

    }

    /**
     * Check if logging is enabled.
     */
    get isEnabled(): boolean {

        return this.#enabled && this.#level !== 'silent';

    }

    /**
     * Merge into the context written with every entry.
     */
    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    /**
     * Start capturing observer events.
     */
    start(): void {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        this.#unsubscribe = observer.on(/.*/, ({ event, data }) => {

            this.#handleEvent(String(event), toRecord(data));

        });

        this.#state = 'running';

        observer.emit('logger:started', {
            file: this.#filepath,
            level: this.#level,
        });

    }

    /**
     * Stop capturing events and close the file stream.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        if (this.#unsubscribe) {

            this.#unsubscribe();
            this.#unsubscribe = null;

        }

        const file = this.#file;

        if (file && file !== process.stdout && file !== process.stderr) {

            await new Promise<void>((resolve) => {

                file.end(() => resolve());

            });

        }

        this.#state = 'stopped';

    }

    /**
     * Handle an observer event.
     */
    #handleEvent(event: string, data: Record<string, unknown>): void {

        // Skip logger's own events to avoid loops
        if (event.startsWith('logger:')) {

            return;

        }

        if (!shouldLog(event, this.#level)) {

            return;

        }

        const includeData = this.#level === 'verbose';
        const entry = formatEntry(event, data, this.#context, includeData);

        this.#file?.write(serializeEntry(entry));

        if (!this.#console) {

            return;

        }

        if (this.#json) {

            this.#console.write(serializeEntry(entry));
            return;

        }

        this.#console.write(this.#line(classifyEvent(event), event, generateMessage(event, data), entry.data));

    }

    /**
     * Build a compact console line.
     */
    #line(level: EntryLevel, event: string, message: string, data?: Record<string, unknown>): string {

        if (this.#color) {

            return formatColorLine(level, event, message, data) + '\n';

        }

        const levelLabel = level.toUpperCase().padEnd(5);
        const suffix = data ? ` ${JSON.stringify(data)}` : '';

        return `[${levelLabel}] [${event}] ${message}${suffix}\n`;

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    /**
     * Log an info message directly.
     */
    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    /**
     * Log a warning message directly.
     */
    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    /**
     * Log an error message directly.
     */
    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    /**
     * Log a debug message directly.
     */
    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (!this.isEnabled || !passesLevel(level, this.#level)) {

            return;

        }

        const payload = data && this.#level === 'verbose' ? sanitizeData(data) : undefined;

        if (this.#file) {

            const entry = {
                timestamp: new Date().toISOString(),
                level,
                event: 'log',
                message,
                ...(payload ? { data: payload } : {}),
            };

            this.#file.write(JSON.stringify(entry) + '\n');

        }

        this.#console?.write(this.#line(level, 'log', message, payload));

    }

}

// ─────────────────────────────────────────────────────────────
// Singleton
// ─────────────────────────────────────────────────────────────

let loggerInstance: Logger | null = null;

/**
 * Get or create the shared Logger.
 *
 * Options apply only when the instance is first created.
 */
export function getLogger(options?: LoggerOptions): Logger {

    if (!loggerInstance) {

        loggerInstance = new Logger(options);

    }

    return loggerInstance;

}

/**
 * Stop and drop the shared Logger.
 *
 * Useful for testing to ensure clean state between tests.
 */
export async function resetLogger(): Promise<void> {

    if (loggerInstance) {

        await loggerInstance.stop();
        loggerInstance = null;

    }

}
