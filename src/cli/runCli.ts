import * as fs from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';

import { Command, CommanderError, InvalidArgumentError } from 'commander';

import { loadConfig, writeDefaultConfig } from '../core/config';
import type { ConfigOverrides } from '../core/config';
import { errorMessage, ShsplitError } from '../core/errors';
import type { Logger } from '../core/logger';
import { createStderrLogger, NullLogger } from '../core/logger';
import { exitCodeFor, isOutputFormat } from '../core/model';
import { DISABLED_CHAR } from '../core/options';
import type { SplitOptions } from '../core/options';
import { splitWithOptions } from '../core/splitter';
import { runShell } from './shell';
import { renderWords } from './shellOutput';

export interface CliIO {
    stdin?: Readable;
    stdout: { write(chunk: string): void; isTTY?: boolean };
    stderr: { write(chunk: string): void; isTTY?: boolean };
}

export interface CliDeps {
    tool: { name: string; version: string };
    io: CliIO;
    env: NodeJS.ProcessEnv;
    /** Directory the config file search starts from (default: process.cwd()). */
    cwd?: string;
    logger?: Logger;
}

interface SplitCommandOptions {
    limit?: number;
    splitChars?: string;
    singleChar?: string;
    doubleChar?: string;
    escapeChar?: string;
    escape: boolean;
    doubleEscapeChars?: string;
    format?: string;
    output?: string;
    config: boolean;
}

function parseInteger(value: string): number {
    const n = Number(value);
    if (value.trim() === '' || !Number.isInteger(n)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return n;
}

export async function readStream(stream: Readable): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
    }
    return Buffer.concat(chunks).toString('utf8');
}

export function splitOverridesFromFlags(opts: SplitCommandOptions): Partial<SplitOptions> {
    if (opts.escape === false && opts.escapeChar !== undefined) {
        throw new ShsplitError('Use only one of --escape-char or --no-escape', 'CONFIG');
    }
    return {
        splitChars: opts.splitChars,
        singleChar: opts.singleChar,
        doubleChar: opts.doubleChar,
        escapeChar: opts.escape === false ? DISABLED_CHAR : opts.escapeChar,
        doubleEscapeChars: opts.doubleEscapeChars,
        limit: opts.limit
    };
}

export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
    const io = deps.io;
    const env = deps.env;
    const cwd = deps.cwd ?? process.cwd();
    const baseLogger = deps.logger || new NullLogger();
    let exitCode = 0;

    const program = new Command();
    program
        .name('shsplit')
        .description('Split text into words the way /bin/sh does, without expansion')
        .version(deps.tool.version)
        .option('-v, --verbose', 'Enable verbose logging')
        .configureOutput({
            writeOut: (s) => io.stdout.write(s),
            writeErr: (s) => io.stderr.write(s)
        });
    program.exitOverride();

    const loggerFor = (): Logger => (program.opts().verbose ? createStderrLogger(io.stderr) : baseLogger);

    program
        .command('split')
        .description('Split INPUT (or stdin when omitted) and print the words')
        .argument('[input]', 'Text to split')
        .option('-n, --limit <n>', 'Maximum number of words; the last one is the unsplit remainder', parseInteger)
        .option('--split-chars <chars>', 'Characters that separate words (default: space, newline, tab)')
        .option('--single-char <char>', 'Single-quote character ("" disables)')
        .option('--double-char <char>', 'Double-quote character ("" disables)')
        .option('--escape-char <char>', 'Escape character ("" disables)')
        .option('--no-escape', 'Treat backslashes as ordinary characters')
        .option('--double-escape-chars <chars>', 'Characters a backslash escapes inside double quotes')
        .option('-f, --format <format>', 'lines|json|nul|pretty')
        .option('-o, --output <file>', 'Write output to a file (default: stdout)')
        .option('--no-config', 'Ignore .shsplitrc.json')
        .action(async (input: string | undefined, opts: SplitCommandOptions) => {
            const logger = loggerFor();

            const format = opts.format;
            if (format !== undefined && !isOutputFormat(format)) {
                throw new ShsplitError(`Unknown format: ${format}`, 'CONFIG');
            }

            const overrides: ConfigOverrides = {
                split: splitOverridesFromFlags(opts),
                format
            };
            const { config, configFile } = loadConfig(cwd, overrides, env, { noConfigFile: opts.config === false });
            if (configFile) {
                logger.debug('Loaded config', { configFile });
            }
            logger.debug('Split options', { ...config.split });

            let text = input;
            if (text === undefined) {
                if (!io.stdin) {
                    throw new ShsplitError('No input given and stdin is not available', 'CONFIG');
                }
                try {
                    text = await readStream(io.stdin);
                } catch (error) {
                    throw new ShsplitError(`Failed to read stdin: ${errorMessage(error)}`, 'RUNTIME', error);
                }
            }

            const words = splitWithOptions(text, config.split);
            logger.debug('Split input', { length: text.length, words: words.length });

            const output = renderWords(config.format, words);
            if (opts.output) {
                const outPath = path.resolve(cwd, opts.output);
                try {
                    fs.mkdirSync(path.dirname(outPath), { recursive: true });
                    fs.writeFileSync(outPath, output, 'utf8');
                } catch (error) {
                    throw new ShsplitError(`Failed to write ${outPath}: ${errorMessage(error)}`, 'RUNTIME', error);
                }
                logger.info('Wrote output', { path: outPath });
            } else {
                io.stdout.write(output);
            }
        });

    program
        .command('config')
        .description('Configuration helpers')
        .command('init')
        .description('Create a default .shsplitrc.json in the current directory')
        .option('-f, --force', 'Overwrite if it already exists')
        .action((opts: { force?: boolean }) => {
            const written = writeDefaultConfig(cwd, Boolean(opts.force));
            io.stdout.write(`Wrote config: ${written}\n`);
        });

    program
        .command('shell')
        .description('Interactive shell (split each line you type)')
        .option('--no-banner', 'Hide the startup banner')
        .option('--prompt <prompt>', 'Prompt text', 'shsplit> ')
        .option('--no-config', 'Ignore .shsplitrc.json')
        .action(async (opts: { banner: boolean; prompt: string; config: boolean }) => {
            const { config } = loadConfig(cwd, {}, env, { noConfigFile: opts.config === false });
            exitCode = await runShell(deps, { banner: opts.banner, prompt: opts.prompt, config });
        });

    try {
        await program.parseAsync(argv, { from: 'node' });
        return exitCode;
    } catch (error) {
        if (error instanceof CommanderError) {
            // Commander has already written its own message through configureOutput.
            if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
                return 0;
            }
            return 2;
        }
        io.stderr.write(`${errorMessage(error)}\n`);
        return exitCodeFor(error);
    }
}
