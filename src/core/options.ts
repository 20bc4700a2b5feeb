import { CodePointSet } from './codePoints';
import { ShsplitError } from './errors';

export const DEFAULT_SPLIT_CHARS = ' \n\t';
export const DEFAULT_SINGLE_CHAR = "'";
export const DEFAULT_DOUBLE_CHAR = '"';
export const DEFAULT_ESCAPE_CHAR = '\\';
export const DEFAULT_DOUBLE_ESCAPE_CHARS = '$`"\n\\';

/** Value of `escapeChar`, `singleChar` or `doubleChar` that turns the feature off. */
export const DISABLED_CHAR = '';

export interface SplitOptions {
    /** Every code point in this string separates words outside of quotes. */
    splitChars: string;
    singleChar: string;
    doubleChar: string;
    escapeChar: string;
    /** Code points a backslash may escape inside a double-quoted span. */
    doubleEscapeChars: string;
    /** `-1` for no limit; with `n > 0` the last word is the unsplit remainder. */
    limit: number;
}

export interface ResolvedSplitOptions {
    splitChars: CodePointSet;
    singleChar?: number;
    doubleChar?: number;
    escapeChar?: number;
    doubleEscapeChars: CodePointSet;
    limit: number;
}

export function defaultSplitOptions(): SplitOptions {
    return {
        splitChars: DEFAULT_SPLIT_CHARS,
        singleChar: DEFAULT_SINGLE_CHAR,
        doubleChar: DEFAULT_DOUBLE_CHAR,
        escapeChar: DEFAULT_ESCAPE_CHAR,
        doubleEscapeChars: DEFAULT_DOUBLE_ESCAPE_CHARS,
        limit: -1
    };
}

export function noEscapeSplitOptions(): SplitOptions {
    return { ...defaultSplitOptions(), escapeChar: DISABLED_CHAR };
}

function resolveChar(field: string, value: string): number | undefined {
    // NUL is accepted as a sentinel too.
    if (value === DISABLED_CHAR || value === '\0') return undefined;
    const chars = Array.from(value);
    const first = chars[0].codePointAt(0);
    if (chars.length !== 1 || first === undefined) {
        throw new ShsplitError(`${field} must be a single character, got ${JSON.stringify(value)}`, 'CONFIG');
    }
    return first;
}

export function resolveSplitOptions(options?: Partial<SplitOptions> | null): ResolvedSplitOptions {
    const merged: SplitOptions = { ...defaultSplitOptions() };
    const entries: [string, unknown][] = Object.entries(options ?? {});
    for (const [key, value] of entries) {
        if (value === undefined) continue;
        if (key === 'limit') {
            if (typeof value !== 'number' || !Number.isInteger(value)) {
                throw new ShsplitError(`limit must be an integer, got ${String(value)}`, 'CONFIG');
            }
            merged.limit = value;
        } else if (isStringField(key)) {
            if (typeof value !== 'string') {
                throw new ShsplitError(`${key} must be a string`, 'CONFIG');
            }
            merged[key] = value;
        }
    }

    const splitChars = merged.splitChars.length > 0 ? merged.splitChars : DEFAULT_SPLIT_CHARS;

    return {
        splitChars: new CodePointSet(splitChars),
        singleChar: resolveChar('singleChar', merged.singleChar),
        doubleChar: resolveChar('doubleChar', merged.doubleChar),
        escapeChar: resolveChar('escapeChar', merged.escapeChar),
        doubleEscapeChars: new CodePointSet(merged.doubleEscapeChars),
        limit: merged.limit
    };
}

type StringField = Exclude<keyof SplitOptions, 'limit'>;

const STRING_FIELDS: readonly string[] = ['splitChars', 'singleChar', 'doubleChar', 'escapeChar', 'doubleEscapeChars'] satisfies StringField[];

function isStringField(key: string): key is StringField {
    return STRING_FIELDS.includes(key);
}
