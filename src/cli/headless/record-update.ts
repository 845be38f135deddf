import { parseAssignments, parseId, UsageError } from '../parse.js';
import { withContext, formatTable, writeJson, writeLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# RECORD UPDATE

Change fields of a record

## Usage

    tabledrift record update <id> field=value... [--null FIELD]

## Description

Only fields whose value actually changes are written and versioned.

## Examples

    tabledrift record update 3 stock=2 price=9.99
    tabledrift record update 3 --null category

## JSON Output

\`\`\`json
[{ "field": "stock", "oldValue": "4", "newValue": "2" }]
\`\`\`
`;

export const run: HeadlessCommand = async (params, flags, logger) => {

    const [idArg, ...assignments] = params.args;
    const id = parseId(idArg);
    const values = parseAssignments(assignments, flags.null);

    if (Object.keys(values).length === 0) {

        throw new UsageError('Usage: tabledrift record update <id> field=value...');

    }

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const changes = await ctx.updateRecord(id, values);

            if (flags.json) {

                writeJson(changes);
                return;

            }

            if (changes.length === 0) {

                writeLine('No changes');
                return;

            }

            writeLine(formatTable(
                ['field', 'old', 'new'],
                changes.map((change) => [change.field, change.oldValue ?? 'NULL', change.newValue ?? 'NULL']),
            ));

        },
    });

};
