import { withContext, fromNow, writeJson, writeLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# LOCK STATUS

Check current lock status

## Usage

    tabledrift lock status

## Description

Shows whether the managed table is locked for schema changes, and by whom.

## JSON Output

When locked:

\`\`\`json
{
    "isLocked": true,
    "lock": {
        "lockedBy": "deploy",
        "lockedAt": "2024-01-15T10:30:00Z",
        "expiresAt": "2024-01-15T10:35:00Z"
    }
}
\`\`\`

When not locked:

\`\`\`json
{
    "isLocked": false,
    "lock": null
}
\`\`\`
`;

export const run: HeadlessCommand = async (_params, flags, logger) => {

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const status = await ctx.lockStatus();

            if (flags.json) {

                const output = status.lock
                    ? {
                        isLocked: true,
                        lock: {
                            lockedBy: status.lock.lockedBy,
                            lockedAt: status.lock.lockedAt.toISOString(),
                            expiresAt: status.lock.expiresAt.toISOString(),
                            reason: status.lock.reason ?? null,
                        },
                    }
                    : { isLocked: false, lock: null };

                writeJson(output);

            }
            else if (status.lock) {

                writeLine(`Locked by ${status.lock.lockedBy} ${fromNow(status.lock.lockedAt)} (expires ${fromNow(status.lock.expiresAt)})`);

            }
            else {

                writeLine('No active lock');

            }

        },
    });

};
