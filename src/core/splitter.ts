import { NEWLINE, readCodePoint, trimAsciiWhitespace, trimCodePoints } from './codePoints';
import { SplitError } from './errors';
import type { SplitOptions } from './options';
import { resolveSplitOptions } from './options';
import { parseWord } from './wordParser';

export type SplitResult =
    | { ok: true; words: string[]; error?: undefined }
    | { ok: false; words: undefined; error: SplitError };

/**
 * Split a string the way /bin/sh splits words, after quote removal.
 *
 * Single quotes, double quotes and backslash-escapes are honoured. No
 * expansion of any kind is performed, and `$'...'` quoting is not supported.
 *
 * @throws SplitError when the input ends inside a quoted span or right after
 * a backslash.
 */
export function splitWithOptions(input: string, options?: Partial<SplitOptions> | null): string[] {
    const resolved = resolveSplitOptions(options);
    const { limit, splitChars, escapeChar } = resolved;

    if (limit === 0) return [];
    if (limit === 1) {
        // Returned verbatim: quotes and backslashes are not interpreted.
        const trimmed = trimCodePoints(input, splitChars);
        return trimmed.length > 0 ? [trimmed] : [];
    }

    const words: string[] = [];
    let i = 0;

    for (;;) {
        const cp = readCodePoint(input, i);
        if (!cp) break;

        if (splitChars.has(cp.value)) {
            i += cp.width;
            continue;
        }

        if (cp.value === escapeChar) {
            const next = readCodePoint(input, i + cp.width);
            if (!next) throw new SplitError('UNTERMINATED_ESCAPE');
            if (next.value === NEWLINE) {
                i += cp.width + next.width;
                continue;
            }
        }

        const parsed = parseWord(input, resolved, i);
        words.push(parsed.word);
        i = parsed.end;

        if (limit === words.length + 1) {
            const tail = trimAsciiWhitespace(input.slice(i));
            if (tail.length > 0) words.push(tail);
            return words;
        }
    }

    return words;
}

export function split(input: string): string[] {
    return splitWithOptions(input);
}

export function splitN(input: string, n: number): string[] {
    return splitWithOptions(input, { limit: n });
}

/** Like {@link splitWithOptions}, but reports an unterminated construct instead of throwing it. */
export function safeSplit(input: string, options?: Partial<SplitOptions> | null): SplitResult {
    try {
        return { ok: true, words: splitWithOptions(input, options) };
    } catch (error) {
        if (error instanceof SplitError) {
            return { ok: false, words: undefined, error };
        }
        throw error;
    }
}
