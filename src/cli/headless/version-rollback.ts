import { parseId } from '../parse.js';
import { withContext, writeJson, writeLine, type HeadlessCommand } from './_helpers.js';
import { toJsonEntry } from './version-list.js';

export const help = `
# VERSION ROLLBACK

Restore a field to the value it held before an entry

## Usage

    tabledrift version rollback <version-id>

## Description

Writes the entry's old value back to the record and appends a new
entry for the change. Fails if the field has since been dropped, or
the record deleted.

## Examples

    tabledrift version rollback 12

## JSON Output

\`\`\`json
{
    "versionId": 12,
    "recordId": 3,
    "field": "price_cents",
    "restored": "1250",
    "inversion": { "id": 15, "oldValue": "999", "newValue": "1250" },
    "trace": ["requested", "validated", "applied", "logged"]
}
\`\`\`
`;

export const run: HeadlessCommand = async (params, flags, logger) => {

    const versionId = parseId(params.args[0], 'version id');

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const outcome = await ctx.rollback(versionId);

            if (flags.json) {

                writeJson({ ...outcome, inversion: toJsonEntry(outcome.inversion) });
                return;

            }

            writeLine(`Restored ${outcome.field} of record #${outcome.recordId} to ${outcome.restored ?? 'NULL'} (version #${outcome.inversion.id})`);

        },
    });

};
