import { parseId } from '../parse.js';
import { withContext, fromNow, writeJson, writeLine, type HeadlessCommand } from './_helpers.js';
import { toJsonEntry } from './version-list.js';

export const help = `
# VERSION SHOW

Show one ledger entry

## Usage

    tabledrift version show <version-id>

## Examples

    tabledrift version show 12
`;

export const run: HeadlessCommand = async (params, flags, logger) => {

    const versionId = parseId(params.args[0], 'version id');

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const entry = await ctx.getVersion(versionId);

            if (flags.json) {

                writeJson(toJsonEntry(entry));
                return;

            }

            writeLine(`Version #${entry.id}`);
            writeLine(`  record   ${entry.recordId}`);
            writeLine(`  field    ${entry.fieldName}`);
            writeLine(`  old      ${entry.oldValue ?? 'NULL'}`);
            writeLine(`  new      ${entry.newValue ?? 'NULL'}`);
            writeLine(`  when     ${entry.timestamp.toISOString()} (${fromNow(entry.timestamp)})`);
            writeLine(`  actor    ${entry.actor}`);

        },
    });

};
