import { parseAssignments } from '../parse.js';
import { withContext, writeJson, writeLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# RECORD CREATE

Insert a record

## Usage

    tabledrift record create [field=value...] [--null FIELD]

## Description

Fields not given take the column default; NOT NULL columns without a
default get a zero value. \`--null\` (repeatable) sets a field to NULL.

## Examples

    tabledrift record create name=Mug price=12.50 stock=4
    tabledrift record create name=Lamp --null description

## JSON Output

\`\`\`json
{ "id": 4 }
\`\`\`
`;

export const run: HeadlessCommand = async (params, flags, logger) => {

    const values = parseAssignments(params.args, flags.null);

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const id = await ctx.createRecord(values);

            if (flags.json) {

                writeJson({ id });
                return;

            }

            writeLine(String(id));

        },
    });

};
