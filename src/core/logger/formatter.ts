/**
 * Log Formatter
 *
 * Converts observer events into LogEntry objects and serializes them
 * for file output. Each entry is a single JSON line.
 */
import type { LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


/**
 * Render a list payload field.
 */
function list(value: unknown): string {

    return Array.isArray(value) ? value.join(', ') : String(value)
}


/**
 * Human-readable message templates.
 * Keys are event names, values build a message from the event payload.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Schema
    'schema:bootstrap': (d) => d['created']
        ? `Created ${d['table']} with columns ${list(d['columns'])}`
        : `Using existing ${d['table']}`,
    'schema:column:added': (d) => `Added column ${d['table']}.${d['column']} (${d['type']})`,
    'schema:column:dropped': (d) => `Dropped column ${d['table']}.${d['column']}`,
    'schema:column:modified': (d) => `Modified column ${d['table']}.${d['from']} -> ${d['to']} (${d['type']})`,
    'schema:rebuild:start': (d) => `Rebuilding ${d['table']} via ${d['shadow']}`,
    'schema:rebuild:complete': (d) => `Rebuilt ${d['table']}, kept ${list(d['copied'])}`,
    'schema:rebuild:failed': (d) => `Rebuild of ${d['table']} failed during ${d['step']}: ${d['error']}`,
    'schema:raw:before': (d) => `Raw statement on ${d['table']}: ${d['statement']}`,
    'schema:raw:after': (d) => d['success']
        ? `Raw statement on ${d['table']} succeeded`
        : `Raw statement on ${d['table']} failed: ${d['error']}`,

    // Records
    'record:created': (d) => `Created ${d['table']} #${d['id']}`,
    'record:updated': (d) => `Updated ${d['table']} #${d['id']}: ${list(d['changed'])}`,
    'record:deleted': (d) => `Deleted ${d['table']} #${d['id']}`,

    // Ledger
    'ledger:appended': (d) => `Recorded ${d['count']} change(s) to #${d['recordId']} by ${d['actor']}`,

    // Rollback
    'rollback:validated': (d) => `Rollback of version ${d['versionId']} validated (${d['field']} on #${d['recordId']})`,
    'rollback:applied': (d) => `Rollback of version ${d['versionId']} applied`,
    'rollback:logged': (d) => `Rolled back version ${d['versionId']} as version ${d['inversionId']}`,
    'rollback:rejected': (d) => `Rollback of version ${d['versionId']} rejected: ${d['reason']}`,
    'rollback:failed': (d) => `Rollback of version ${d['versionId']} failed: ${d['reason']}`,

    // Lock
    'lock:acquiring': (d) => `Locking ${d['table']} for ${d['actor']}`,
    'lock:acquired': (d) => `Locked ${d['table']} for ${d['actor']}`,
    'lock:released': (d) => d['forced'] ? `Force-released lock on ${d['table']}` : `Unlocked ${d['table']}`,
    'lock:blocked': (d) => `Lock blocked: ${d['table']} held by ${d['holder']}`,
    'lock:expired': (d) => `Lock on ${d['table']} expired (was held by ${d['previousHolder']})`,

    // Config
    'config:loaded': (d) => d['fromFile']
        ? `Settings loaded from ${d['path']}`
        : 'No settings file, using defaults',

    // Connection
    'connection:open': (d) => `Connected to ${d['database']}`,
    'connection:close': (d) => `Disconnected from ${d['database']}`,
    'connection:error': (d) => `Connection error for ${d['database']}: ${d['error']}`,

    // Logger lifecycle
    'logger:started': (d) => `Logger started at ${d['level']} level${d['file'] ? `, writing ${d['file']}` : ''}`,

    // Generic error
    'error': (d) => {

        const error = d['error']
        return `Error in ${d['source']}: ${error instanceof Error ? error.message : String(error)}`
    },
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to a generic format.
 *
 * @example
 * ```typescript
 * generateMessage('record:deleted', { table: 'product', id: 3 })
 * // 'Deleted product #3'
 *
 * generateMessage('custom:thing', { a: 1 })
 * // 'custom thing: a=1'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return String(value)
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format an event into a LogEntry.
 *
 * @param includeData - Whether to include the full payload (verbose mode)
 *
 * @example
 * ```typescript
 * const entry = formatEntry('record:deleted', { table: 'product', id: 3 }, { actor: 'alice' })
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'info',
 * //     event: 'record:deleted',
 * //     message: 'Deleted product #3',
 * //     context: { actor: 'alice' }
 * // }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Make payload values JSON-safe.
 */
export function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 3).join('\n'),
            }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        if (typeof value === 'bigint') {

            result[key] = value.toString()
            continue
        }

        result[key] = value
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line for file output.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
