import type { Logger } from '../../core/logger/index.js';
import type { CliFlags, RouteParams } from '../types.js';
import { type RouteHandler } from './_helpers.js';
import { formatHelp } from '../help-formatter.js';

export const help = `
# HELP

Show help for commands

## Usage

    tabledrift help [command] [subcommand]

## Description

Displays help information for tabledrift commands.
Without arguments, lists all available commands.

## Global Options

    --json                Output JSON
    --settings, -s FILE   Settings file (default: .tabledrift/settings.yml)
    --database, -d FILE   Database file
    --table, -t NAME      Managed table
    --actor, -a NAME      Actor recorded in the ledger
    --allow-protected     Allow destructive operations on a protected table

## Examples

    tabledrift help
    tabledrift help schema
    tabledrift help record update
`;

/**
 * List available topics from registered handlers, grouped by
 * top-level command.
 */
export function generateTopicsList(handlers: Partial<Record<string, RouteHandler>>): string {

    const routes = Object.keys(handlers)
        .filter((route) => route !== 'help')
        .sort();

    const groups = new Map<string, string[]>();

    for (const route of routes) {

        const [topLevel = route, ...rest] = route.split('/');
        const subcommands = groups.get(topLevel) ?? [];

        if (rest.length > 0) {

            subcommands.push(rest.join(' '));

        }

        groups.set(topLevel, subcommands);

    }

    const lines: string[] = ['## Available Commands', ''];

    for (const [cmd, subcommands] of groups) {

        lines.push(subcommands.length === 0
            ? `    ${cmd}`
            : `    ${cmd.padEnd(12)} ${subcommands.join(', ')}`);

    }

    lines.push('');
    lines.push('Run `tabledrift help <command>` for detailed help on any command.');

    return lines.join('\n');

}

/**
 * Build the help handler over the registered command handlers.
 */
export function createHelpHandler(handlers: Partial<Record<string, RouteHandler>>): RouteHandler {

    const run = async (params: RouteParams, flags: CliFlags, logger: Logger): Promise<number> => {

        // No topic specified - show help overview with available commands
        if (params.args.length === 0) {

            const fullHelp = `${help}\n${generateTopicsList(handlers)}`;

            process.stdout.write(`${flags.json ? fullHelp : formatHelp(fullHelp)}\n`);

            return 0;

        }

        const route = params.args.join('/');
        const handler = handlers[route];

        if (!handler) {

            logger.error(`Unknown command: ${params.args.join(' ')}`);

            return 1;

        }

        process.stdout.write(`${flags.json ? handler.help : formatHelp(handler.help)}\n`);

        return 0;

    };

    return { run, help };

}
