/**
 * Colored console lines.
 *
 * `INF record:updated  Updated product #3 (2 fields)  id=3 fields=name,stock`
 */
import ansis from 'ansis';
import { attemptSync } from '@logosdx/utils';

import type { EntryLevel } from './types.js';


const TAGS: Record<EntryLevel, string> = {
    error: ansis.red.bold('ERR'),
    warn: ansis.yellow.bold('WRN'),
    info: ansis.cyan('INF'),
    debug: ansis.gray('DBG'),
};

const MAX_VALUE = 60;


function clip(text: string): string {

    return text.length > MAX_VALUE ? `${text.slice(0, MAX_VALUE - 1)}…` : text;

}

/**
 * Render one payload value; stored field values print as they would in
 * the ledger, with null as NULL.
 */
function renderValue(value: unknown): string {

    if (value === null || value === undefined) return ansis.dim('NULL');
    if (value instanceof Date) return value.toISOString();
    if (value instanceof Error) return ansis.red(clip(value.message));

    if (typeof value === 'string') {

        return /\s/.test(value) ? clip(JSON.stringify(value)) : clip(value);

    }

    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {

        return ansis.yellow(String(value));

    }

    if (Array.isArray(value)) return clip(value.map(String).join(','));

    const [json] = attemptSync(() => JSON.stringify(value));

    return typeof json === 'string' ? clip(json) : ansis.dim('{…}');

}

/**
 * Format one log line for a terminal.
 */
export function formatColorLine(
    level: EntryLevel,
    event: string,
    message: string,
    data?: Record<string, unknown>,
): string {

    const head = `${TAGS[level]} ${ansis.bold(event)}  ${message}`;
    const pairs = Object.entries(data ?? {})
        .map(([key, value]) => `${ansis.dim(key)}=${renderValue(value)}`);

    return pairs.length === 0 ? head : `${head}  ${pairs.join(' ')}`;

}
