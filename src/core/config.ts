import * as fs from 'fs';
import * as path from 'path';

import { parse as parseJsonc, printParseErrorCode } from 'jsonc-parser';
import type { ParseError } from 'jsonc-parser';

import { errorMessage, ShsplitError } from './errors';
import type { OutputFormat } from './model';
import { isOutputFormat } from './model';
import type { SplitOptions } from './options';
import { defaultSplitOptions, resolveSplitOptions } from './options';

export const DEFAULT_CONFIG_FILE = '.shsplitrc.json';

export interface ShsplitConfig {
    split: SplitOptions;
    format: OutputFormat;
}

export interface LoadedConfig {
    config: ShsplitConfig;
    configFile?: string;
}

export interface ConfigOverrides {
    split?: Partial<SplitOptions>;
    format?: OutputFormat;
}

export interface LoadConfigOptions {
    /** Skip the search for a config file; defaults, env and overrides still apply. */
    noConfigFile?: boolean;
}

export function defaults(): ShsplitConfig {
    return { split: defaultSplitOptions(), format: 'lines' };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeConfig(base: ShsplitConfig, next: ConfigOverrides): ShsplitConfig {
    const split: SplitOptions = { ...base.split };
    const entries: [string, unknown][] = Object.entries(next.split ?? {});
    for (const [key, value] of entries) {
        if (value !== undefined) Object.assign(split, { [key]: value });
    }
    return { split, format: next.format ?? base.format };
}

function configFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
    const split: Partial<SplitOptions> = {};

    if (env.SHSPLIT_SPLIT_CHARS !== undefined) split.splitChars = env.SHSPLIT_SPLIT_CHARS;
    if (env.SHSPLIT_ESCAPE_CHAR !== undefined) split.escapeChar = env.SHSPLIT_ESCAPE_CHAR;
    if (env.SHSPLIT_LIMIT) {
        const limit = Number(env.SHSPLIT_LIMIT);
        if (env.SHSPLIT_LIMIT.trim() === '' || !Number.isInteger(limit)) {
            throw new ShsplitError(`SHSPLIT_LIMIT must be an integer, got ${JSON.stringify(env.SHSPLIT_LIMIT)}`, 'CONFIG');
        }
        split.limit = limit;
    }

    const format = env.SHSPLIT_FORMAT;
    if (format !== undefined && !isOutputFormat(format)) {
        throw new ShsplitError(`SHSPLIT_FORMAT must be one of lines|json|nul|pretty, got ${JSON.stringify(format)}`, 'CONFIG');
    }

    return { split, format };
}

function configFromJson(raw: unknown): ConfigOverrides {
    if (!isPlainObject(raw)) {
        throw new Error('Config root must be a JSON object');
    }

    const out: ConfigOverrides = {};
    const rawSplit = raw.split;
    if (rawSplit !== undefined) {
        if (!isPlainObject(rawSplit)) {
            throw new Error('"split" must be an object');
        }
        const split: Partial<SplitOptions> = {};
        for (const key of ['splitChars', 'singleChar', 'doubleChar', 'escapeChar', 'doubleEscapeChars'] as const) {
            const value = rawSplit[key];
            if (value === undefined) continue;
            if (typeof value !== 'string') throw new Error(`"split.${key}" must be a string`);
            split[key] = value;
        }
        const limit = rawSplit.limit;
        if (limit !== undefined) {
            if (typeof limit !== 'number' || !Number.isInteger(limit)) throw new Error('"split.limit" must be an integer');
            split.limit = limit;
        }
        out.split = split;
    }
    const format = raw.format;
    if (format !== undefined) {
        if (!isOutputFormat(format)) throw new Error('"format" must be one of lines|json|nul|pretty');
        out.format = format;
    }
    return out;
}

export function findConfigFile(rootPath: string): string | undefined {
    let cur = path.resolve(rootPath);
    while (true) {
        const candidate = path.join(cur, DEFAULT_CONFIG_FILE);
        if (fs.existsSync(candidate)) return candidate;

        const parent = path.dirname(cur);
        if (parent === cur) break;
        cur = parent;
    }

    return undefined;
}

export function parseConfigText(text: string): ConfigOverrides {
    const errors: ParseError[] = [];
    const parsed: unknown = parseJsonc(text, errors, { allowTrailingComma: true });
    if (errors.length > 0) {
        const first = errors[0];
        throw new Error(`${printParseErrorCode(first.error)} at offset ${first.offset}`);
    }
    return configFromJson(parsed);
}

/**
 * Merge defaults < SHSPLIT_* env < nearest .shsplitrc.json < overrides.
 */
export function loadConfig(
    rootPath: string,
    overrides: ConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env,
    options: LoadConfigOptions = {}
): LoadedConfig {
    let config = mergeConfig(defaults(), configFromEnv(env));

    const configFile = options.noConfigFile ? undefined : findConfigFile(rootPath);
    if (configFile) {
        try {
            const raw = fs.readFileSync(configFile, 'utf8');
            config = mergeConfig(config, parseConfigText(raw));
        } catch (error) {
            throw new ShsplitError(`Failed to load config at ${configFile}: ${errorMessage(error)}`, 'CONFIG', error);
        }
    }

    config = mergeConfig(config, overrides);

    // Surface invalid characters or limits now rather than on the first split.
    resolveSplitOptions(config.split);

    return { config, configFile };
}

export function defaultConfigJson(): string {
    return JSON.stringify(defaults(), null, 2) + '\n';
}

export function writeDefaultConfig(rootPath: string, force = false): string {
    const filePath = path.join(rootPath, DEFAULT_CONFIG_FILE);
    if (!force && fs.existsSync(filePath)) {
        throw new ShsplitError(`Config file already exists at ${filePath}`, 'CONFIG');
    }
    try {
        fs.writeFileSync(filePath, defaultConfigJson(), 'utf8');
    } catch (error) {
        throw new ShsplitError(`Failed to write config at ${filePath}: ${errorMessage(error)}`, 'RUNTIME', error);
    }
    return filePath;
}
