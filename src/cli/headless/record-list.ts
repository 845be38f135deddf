import { withContext, formatField, formatTable, writeJson, writeLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# RECORD LIST

List records

## Usage

    tabledrift record list [--search TEXT] [--sort FIELD] [--order asc|desc] [--limit N] [--offset N]

## Description

\`--search\` matches a case-insensitive substring of any TEXT column.
Records are sorted by id, newest first, unless \`--sort\` names a column.

## Examples

    tabledrift record list --search mug
    tabledrift record list --sort price_cents --order asc --limit 10
`;

export const run: HeadlessCommand = async (_params, flags, logger) => {

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const records = await ctx.listRecords({
                search: flags.search,
                sortBy: flags.sort,
                order: flags.order,
                limit: flags.limit,
                offset: flags.offset,
                raw: flags.raw,
            });

            if (flags.json) {

                writeJson(records.map((record) => record.values));
                return;

            }

            const columns = await ctx.listColumns();

            writeLine(formatTable(
                columns.map((column) => column.name),
                records.map((record) => columns.map((column) => formatField(record.values[column.name] ?? null))),
            ));

        },
    });

};
