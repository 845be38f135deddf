/**
 * Headless command runner.
 *
 * Resolves the route to its command module, sets up the event logger,
 * and maps any failure to exit code 1.
 *
 * @example
 * ```bash
 * tabledrift schema add weight REAL
 *
 * # JSON output for scripting
 * tabledrift --json record export | jq '.[0]'
 * ```
 */
import { createWriteStream, mkdirSync } from 'node:fs';
import path from 'node:path';

import { attempt, attemptSync } from '@logosdx/utils';

import { Logger, type LogLevel } from '../../core/logger/index.js';
import { resolveSettings } from '../../core/config/index.js';
import { isCi, isDev } from '../../core/environment.js';
import { toError } from '../../core/shared/index.js';

import { isRoute, type Route, type RouteParams, type CliFlags } from '../types.js';
import { flagOverrides, type RouteHandler } from './_helpers.js';

import * as CmdSchema from './schema.js';
import * as CmdSchemaShow from './schema-show.js';
import * as CmdSchemaAdd from './schema-add.js';
import * as CmdSchemaDrop from './schema-drop.js';
import * as CmdSchemaModify from './schema-modify.js';
import * as CmdSchemaSql from './schema-sql.js';
import * as CmdRecord from './record.js';
import * as CmdRecordGet from './record-get.js';
import * as CmdRecordCreate from './record-create.js';
import * as CmdRecordUpdate from './record-update.js';
import * as CmdRecordDelete from './record-delete.js';
import * as CmdRecordList from './record-list.js';
import * as CmdRecordExport from './record-export.js';
import * as CmdVersion from './version.js';
import * as CmdVersionList from './version-list.js';
import * as CmdVersionShow from './version-show.js';
import * as CmdVersionRollback from './version-rollback.js';
import * as CmdLock from './lock.js';
import * as CmdLockStatus from './lock-status.js';
import * as CmdLockForce from './lock-force.js';
import { createHelpHandler } from './help.js';

/**
 * Registry of command handlers.
 */
const HANDLERS: Partial<Record<Route, RouteHandler>> = {

    'schema': CmdSchema,
    'schema/show': CmdSchemaShow,
    'schema/add': CmdSchemaAdd,
    'schema/drop': CmdSchemaDrop,
    'schema/modify': CmdSchemaModify,
    'schema/sql': CmdSchemaSql,

    'record': CmdRecord,
    'record/get': CmdRecordGet,
    'record/create': CmdRecordCreate,
    'record/update': CmdRecordUpdate,
    'record/delete': CmdRecordDelete,
    'record/list': CmdRecordList,
    'record/export': CmdRecordExport,

    'version': CmdVersion,
    'version/list': CmdVersionList,
    'version/show': CmdVersionShow,
    'version/rollback': CmdVersionRollback,

    'lock': CmdLock,
    'lock/status': CmdLockStatus,
    'lock/force': CmdLockForce,
};

HANDLERS['help'] = createHelpHandler(HANDLERS);

/**
 * Create a logger for the command run.
 *
 * Events go to stderr in JSON mode so stdout carries only results.
 * File logging is attempted but not required.
 */
export async function createHeadlessLogger(projectRoot: string, flags: CliFlags): Promise<Logger> {

    const [settings] = await attempt(() => resolveSettings({
        projectRoot,
        file: flags.settings,
        overrides: flagOverrides(flags),
    }));

    const logging = settings?.logging;
    const defaultLevel: LogLevel = isDev() ? 'verbose' : 'info';

    let file: ReturnType<typeof createWriteStream> | null = null;
    let filepath: string | null = null;

    if (logging?.file) {

        const resolved = path.resolve(projectRoot, logging.file);

        const [stream] = attemptSync(() => {

            mkdirSync(path.dirname(resolved), { recursive: true });

            return createWriteStream(resolved, { flags: 'a' });

        });

        if (stream) {

            stream.on('error', (err) => {

                process.stderr.write(`Log file unavailable: ${err.message}\n`);

            });

            file = stream;
            filepath = resolved;

        }

    }

    return new Logger({
        level: logging?.level ?? defaultLevel,
        enabled: logging?.enabled ?? true,
        console: flags.json ? process.stderr : process.stdout,
        file,
        filepath,
        json: flags.json,
        color: !flags.json && !isCi(),
    });

}

/**
 * Run a command.
 *
 * @returns Exit code (0 for success, 1 for any error)
 */
export async function runHeadless(
    route: string,
    params: RouteParams,
    flags: CliFlags,
): Promise<number> {

    const projectRoot = process.cwd();
    const logger = await createHeadlessLogger(projectRoot, flags);
    logger.start();

    const handler = isRoute(route) ? HANDLERS[route] : undefined;

    if (!handler) {

        logger.error(`Unknown command: ${route.replace('/', ' ')}`);
        await logger.stop();

        return 1;

    }

    let exitCode: number;

    try {

        exitCode = await handler.run(params, flags, logger);

    }
    catch (err) {

        logger.error(toError(err).message);
        exitCode = 1;

    }

    await logger.stop();

    return exitCode;

}
