import dayjs from 'dayjs';
import relativeTime from 'dayjs/plugin/relativeTime.js';

import type { RouteParams, CliFlags } from '../types.js';
import type { Logger } from '../../core/logger/index.js';
import type { FieldValue } from '../../core/record/index.js';
import type { SettingsInput } from '../../core/config/index.js';
import { toError } from '../../core/shared/index.js';
import { observer } from '../../core/observer.js';
import type { Context } from '../../sdk/context.js';
import { createContext } from '../../sdk/index.js';

dayjs.extend(relativeTime);

export interface HeadlessCommand {
    (
        params: RouteParams,
        flags: CliFlags,
        logger: Logger
    ): Promise<number>;
}

export type RouteHandler = {
    run: HeadlessCommand;
    help: string;
}

/**
 * Settings overrides from CLI flags. Unset flags are left out so they
 * don't mask file or env values.
 */
export function flagOverrides(flags: CliFlags): SettingsInput {

    const overrides: SettingsInput = {};

    if (flags.database !== undefined) overrides.database = flags.database;
    if (flags.actor !== undefined) overrides.actor = flags.actor;
    if (flags.table !== undefined) overrides.table = { name: flags.table };

    return overrides;

}

/**
 * Open a context, run the operation, and always disconnect.
 *
 * Context failures are emitted as `error` events, which the logger
 * already writes; anything else is logged here.
 *
 * @returns Exit code
 */
export const withContext = async (opts: {
    flags: CliFlags;
    logger: Logger;
    fn: (ctx: Context) => Promise<void>;
}): Promise<number> => {

    const { flags, logger, fn } = opts;

    let ctx: Context;

    try {

        ctx = await createContext({
            file: flags.settings,
            settings: flagOverrides(flags),
            allowProtected: flags.allowProtected,
        });

    }
    catch (err) {

        logger.error(`Failed to load settings: ${toError(err).message}`);

        return 1;

    }

    const reported = new Set<Error>();
    const cleanup = observer.on('error', ({ error }) => {

        reported.add(error);

    });

    try {

        await ctx.connect();
        await fn(ctx);

        return 0;

    }
    catch (err) {

        const error = toError(err);

        if (!reported.has(error)) {

            logger.error(error.message);

        }

        return 1;

    }
    finally {

        cleanup();
        await ctx.disconnect();

    }

};

// ─────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────

export function writeJson(value: unknown): void {

    process.stdout.write(JSON.stringify(value) + '\n');

}

export function writeLine(text = ''): void {

    process.stdout.write(text + '\n');

}

/**
 * Render a field value for text output.
 */
export function formatField(value: FieldValue): string {

    return value === null ? 'NULL' : String(value);

}

/**
 * Relative time, e.g. "3 minutes ago".
 */
export function fromNow(date: Date): string {

    return dayjs(date).fromNow();

}

/**
 * Render rows as left-aligned columns under a header.
 *
 * @example
 * ```typescript
 * formatTable(['id', 'name'], [['1', 'Mug']])
 * // 'id  name\n--  ----\n1   Mug'
 * ```
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {

    const widths = headers.map((header, index) =>
        Math.max(header.length, ...rows.map((row) => (row[index] ?? '').length)),
    );

    const line = (cells: readonly string[]) => cells
        .map((cell, index) => cell.padEnd(widths[index] ?? 0))
        .join('  ')
        .trimEnd();

    return [
        line(headers),
        line(widths.map((width) => '-'.repeat(width))),
        ...rows.map(line),
    ].join('\n');

}
