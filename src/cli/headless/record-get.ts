import type { DynamicRecord } from '../../core/record/index.js';
import { parseId, UsageError } from '../parse.js';
import { withContext, formatField, formatTable, writeJson, writeLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# RECORD GET

Show one record, or compare several side by side

## Usage

    tabledrift record get <id> [<id>...] [--raw] [--json]

## Description

With one id, prints each field on its own line. With several, prints one
column per record so fields can be compared. \`--raw\` shows stored
values (e.g. cents) instead of display values.

## Examples

    tabledrift record get 3
    tabledrift record get 3 7 --raw
`;

function toJson(record: DynamicRecord) {

    return { id: record.id, values: record.values };

}

export const run: HeadlessCommand = async (params, flags, logger) => {

    if (params.args.length === 0) {

        throw new UsageError('Usage: tabledrift record get <id> [<id>...]');

    }

    const ids = params.args.map((arg) => parseId(arg));

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const records = await ctx.getRecords(ids, { raw: flags.raw });

            if (flags.json) {

                const [only] = records;

                writeJson(records.length === 1 && only ? toJson(only) : records.map(toJson));
                return;

            }

            const fields = records[0] ? Object.keys(records[0].values) : [];

            writeLine(formatTable(
                ['field', ...records.map((record) => `#${record.id}`)],
                fields.map((field) => [
                    field,
                    ...records.map((record) => formatField(record.values[field] ?? null)),
                ]),
            ));

        },
    });

};
