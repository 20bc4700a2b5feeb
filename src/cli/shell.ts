import * as readline from 'readline';

import type { ShsplitConfig } from '../core/config';
import { defaults } from '../core/config';
import { ShsplitError } from '../core/errors';
import type { OutputFormat } from '../core/model';
import { isOutputFormat, OUTPUT_FORMATS } from '../core/model';
import { DEFAULT_ESCAPE_CHAR, DISABLED_CHAR } from '../core/options';
import type { SplitOptions } from '../core/options';
import { safeSplit } from '../core/splitter';
import type { CliDeps } from './runCli';
import { renderWords } from './shellOutput';

export interface ShellOptions {
    prompt?: string;
    banner?: boolean;
    /** Split options the session starts with; the output format always starts as `pretty`. */
    config?: ShsplitConfig;
}

export const CONTINUATION_PROMPT = '> ';

interface ShellState {
    split: SplitOptions;
    format: OutputFormat;
}

type CommandOutcome = { handled: false } | { handled: true; exit?: boolean };

const HELP = [
    'Commands:',
    '  <text>                     Split text and print the words',
    '  options                    Show the active split options',
    '  set limit <n>              Limit the number of words (-1 for none)',
    '  set escape on|off          Enable or disable backslash escapes',
    `  set format <format>        ${OUTPUT_FORMATS.join('|')}`,
    '  help',
    '  exit',
    ''
].join('\n');

function runCommand(line: string, state: ShellState, io: CliDeps['io']): CommandOutcome {
    if (line === 'exit' || line === 'quit' || line === '.exit') {
        return { handled: true, exit: true };
    }

    if (line === 'help' || line === '.help') {
        io.stdout.write(`${HELP}\n`);
        return { handled: true };
    }

    if (line === 'options') {
        io.stdout.write(JSON.stringify({ ...state.split, format: state.format }, null, 2) + '\n');
        return { handled: true };
    }

    if (!line.startsWith('set ')) {
        return { handled: false };
    }

    const [name, value, ...extra] = line.slice(4).trim().split(/\s+/);
    if (value === undefined || extra.length > 0) {
        io.stderr.write('Usage: set <limit|escape|format> <value>\n');
        return { handled: true };
    }

    if (name === 'limit') {
        const limit = Number(value);
        if (!Number.isInteger(limit)) {
            io.stderr.write(`Not an integer: ${value}\n`);
            return { handled: true };
        }
        state.split = { ...state.split, limit };
    } else if (name === 'escape') {
        if (value !== 'on' && value !== 'off') {
            io.stderr.write('Usage: set escape on|off\n');
            return { handled: true };
        }
        state.split = { ...state.split, escapeChar: value === 'on' ? DEFAULT_ESCAPE_CHAR : DISABLED_CHAR };
    } else if (name === 'format') {
        if (!isOutputFormat(value)) {
            io.stderr.write(`Unknown format: ${value}\n`);
            return { handled: true };
        }
        state.format = value;
    } else {
        io.stderr.write(`Unknown setting: ${name}\n`);
        return { handled: true };
    }

    io.stdout.write(`${name} = ${value}\n`);
    return { handled: true };
}

/**
 * Read lines from stdin and split each one. A line that leaves a quote or a
 * trailing backslash open is joined with the next one by a newline, the way an
 * interactive /bin/sh continues a command.
 */
export async function runShell(deps: CliDeps, options: ShellOptions = {}): Promise<number> {
    const prompt = options.prompt ?? 'shsplit> ';
    const banner = options.banner ?? true;

    const io = deps.io;
    if (!io.stdin) {
        throw new ShsplitError('The interactive shell needs stdin', 'CONFIG');
    }

    const state: ShellState = {
        split: { ...(options.config ?? defaults()).split },
        format: 'pretty'
    };

    if (banner) {
        io.stdout.write(`${deps.tool.name}@${deps.tool.version}\n`);
        io.stdout.write(`Type "help" for commands, "exit" to quit.\n\n`);
    }

    const rl = readline.createInterface({ input: io.stdin, terminal: false, crlfDelay: Infinity });

    let lastExitCode = 0;
    let pending: string | undefined;

    io.stdout.write(prompt);
    try {
        for await (const line of rl) {
            if (pending === undefined) {
                const trimmed = line.trim();
                if (!trimmed) {
                    io.stdout.write(prompt);
                    continue;
                }
                const outcome = runCommand(trimmed, state, io);
                if (outcome.handled) {
                    if (outcome.exit) break;
                    io.stdout.write(prompt);
                    continue;
                }
            }

            const text = pending === undefined ? line : `${pending}\n${line}`;
            const result = safeSplit(text, state.split);
            if (result.ok) {
                pending = undefined;
                lastExitCode = 0;
                io.stdout.write(renderWords(state.format, result.words));
            } else {
                pending = text;
            }

            io.stdout.write(pending === undefined ? prompt : CONTINUATION_PROMPT);
        }
    } finally {
        rl.close();
    }

    if (pending !== undefined) {
        const result = safeSplit(pending, state.split);
        if (!result.ok) {
            io.stderr.write(`\n${result.error.message}\n`);
            lastExitCode = 1;
        }
    }

    return lastExitCode;
}
