import { VERSION_SORT_FIELDS, type VersionEntry, type VersionSortField } from '../../core/ledger/index.js';
import { UsageError } from '../parse.js';
import { withContext, formatTable, fromNow, writeJson, writeLine, type HeadlessCommand } from './_helpers.js';

export const DEFAULT_VERSION_LIMIT = 50;

export const help = `
# VERSION LIST

List ledger entries, newest first

## Usage

    tabledrift version list [--record ID] [--field NAME] [--limit N] [--sort FIELD] [--order asc|desc]

## Description

Sort fields: id, recordId, fieldName, oldValue, newValue, timestamp, actor.
Entries with equal sort values are ordered by id. \`--limit\` defaults to 50.

## Examples

    tabledrift version list --record 3
    tabledrift version list --field price_cents --sort timestamp --order asc
`;

/**
 * @throws UsageError for an unknown sort field
 */
export function parseSortField(value: string | undefined): VersionSortField | undefined {

    if (value === undefined) {

        return undefined;

    }

    const field = VERSION_SORT_FIELDS.find((candidate) => candidate === value);

    if (!field) {

        throw new UsageError(`Unknown sort field '${value}'. Use one of: ${VERSION_SORT_FIELDS.join(', ')}`);

    }

    return field;

}

export function toJsonEntry(entry: VersionEntry) {

    return { ...entry, timestamp: entry.timestamp.toISOString() };

}

export const run: HeadlessCommand = async (_params, flags, logger) => {

    const sortField = parseSortField(flags.sort);

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const entries = await ctx.listVersions({
                recordId: flags.record,
                fieldName: flags.field,
                limit: flags.limit ?? DEFAULT_VERSION_LIMIT,
                sortField,
                order: flags.order,
            });

            if (flags.json) {

                writeJson(entries.map(toJsonEntry));
                return;

            }

            writeLine(formatTable(
                ['id', 'record', 'field', 'old', 'new', 'when', 'actor'],
                entries.map((entry) => [
                    String(entry.id),
                    String(entry.recordId),
                    entry.fieldName,
                    entry.oldValue ?? 'NULL',
                    entry.newValue ?? 'NULL',
                    fromNow(entry.timestamp),
                    entry.actor,
                ]),
            ));

        },
    });

};
