/**
 * Help Text Formatter
 *
 * Applies terminal colors to the markdown-ish help text of each command.
 *
 * Supported syntax:
 * - `# Heading` → bold blue (title)
 * - `## Heading` → bold (section)
 * - ```lang ... ``` code blocks → dim delimiters, magenta code
 * - `inline code` → magenta
 * - `    indented` lines → command highlighting
 * - `[optional]` → gray
 * - `<required>` → yellow
 */
import ansis from 'ansis';

// ─────────────────────────────────────────────────────────────
// Color Functions
// ─────────────────────────────────────────────────────────────

const colors = {
    h1: (s: string) => ansis.bold.blue(s),
    h2: (s: string) => ansis.bold(s),
    code: (s: string) => ansis.magenta(s),
    codeDelimiter: (s: string) => ansis.dim(s),
    command: (s: string) => ansis.blue(s),
    subcommand: (s: string) => ansis.cyan(s),
    flag: (s: string) => ansis.yellow(s),
    optional: (s: string) => ansis.gray(s),
    required: (s: string) => ansis.yellow(s),
    example: (s: string) => ansis.dim(s),
};

// ─────────────────────────────────────────────────────────────
// Inline Formatting
// ─────────────────────────────────────────────────────────────

/**
 * Handles: `code`, [optional], <required>
 */
function formatInline(line: string): string {

    return line
        .replace(/`([^`]+)`/g, (_, code: string) => colors.code(code))
        .replace(/\[([^\]]+)\]/g, (_, content: string) => colors.optional(`[${content}]`))
        .replace(/<([^>]+)>/g, (_, content: string) => colors.required(`<${content}>`));

}

/**
 * Format an indented command example.
 *
 * Highlights: tabledrift (command), subcommand, flags, placeholders
 */
function formatCommand(line: string): string {

    const leadingSpace = line.match(/^(\s*)/)?.[1] ?? '';
    const tokens = line.trim().split(/\s+/);

    let foundSubcommand = false;

    const formatted = tokens.map((token, index) => {

        if (index === 0) {

            return colors.command(token);

        }

        if (token.startsWith('-')) {

            return colors.flag(token);

        }

        if (token.startsWith('[') || token.startsWith('<')) {

            return formatInline(token);

        }

        if (!foundSubcommand) {

            foundSubcommand = true;
            return colors.subcommand(token);

        }

        return token;

    });

    return leadingSpace + formatted.join(' ');

}

// ─────────────────────────────────────────────────────────────
// Block Formatting
// ─────────────────────────────────────────────────────────────

/**
 * Format a complete help text with colors.
 */
export function formatHelp(text: string): string {

    const output: string[] = [];
    let inCodeBlock = false;

    for (const line of text.split('\n')) {

        if (line.trim().startsWith('```')) {

            inCodeBlock = !inCodeBlock;
            output.push(colors.codeDelimiter(line));
            continue;

        }

        if (inCodeBlock) {

            output.push(colors.code(line));
            continue;

        }

        const heading = line.match(/^(#{1,2})\s+(.+)$/);

        if (heading?.[1] && heading[2]) {

            output.push(heading[1].length === 1 ? colors.h1(heading[2]) : colors.h2(heading[2]));
            continue;

        }

        if (/^\s{4,}/.test(line)) {

            output.push(line.trim().startsWith('tabledrift')
                ? formatCommand(line)
                : colors.example(formatInline(line)));
            continue;

        }

        output.push(formatInline(line));

    }

    return output.join('\n');

}

/**
 * Strip ANSI codes from text (for testing or plain output).
 */
export function stripColors(text: string): string {

    // eslint-disable-next-line no-control-regex
    return text.replace(/\x1b\[[0-9;]*m/g, '');

}
