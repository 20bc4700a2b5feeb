import { NEWLINE, readCodePoint } from './codePoints';
import { SplitError } from './errors';
import type { ResolvedSplitOptions } from './options';

type WordState = 'raw' | 'single' | 'double' | 'escape';

export interface ParsedWord {
    word: string;
    /** Index just past the word and the separator that ended it; `input.slice(end)` is the remainder. */
    end: number;
}

/**
 * Parse one word starting at `start`.
 *
 * Literal text is copied in slices: `pending` marks the first code unit not
 * yet appended to `word`, and each state flushes `input.slice(pending, i)`
 * before dropping a quote or a consumed backslash.
 */
export function parseWord(input: string, options: ResolvedSplitOptions, start = 0): ParsedWord {
    let word = '';
    let pending = start;
    let state: WordState = 'raw';

    for (;;) {
        switch (state) {
            case 'raw': {
                let i = pending;
                let next: WordState | undefined;
                for (;;) {
                    const cp = readCodePoint(input, i);
                    if (!cp) {
                        return { word: word + input.slice(pending), end: input.length };
                    }
                    if (cp.value === options.singleChar) {
                        next = 'single';
                    } else if (cp.value === options.doubleChar) {
                        next = 'double';
                    } else if (cp.value === options.escapeChar) {
                        next = 'escape';
                    } else if (options.splitChars.has(cp.value)) {
                        return { word: word + input.slice(pending, i), end: i + cp.width };
                    }
                    if (next) {
                        word += input.slice(pending, i);
                        pending = i + cp.width;
                        state = next;
                        break;
                    }
                    i += cp.width;
                }
                break;
            }

            case 'escape': {
                const cp = readCodePoint(input, pending);
                if (!cp) throw new SplitError('UNTERMINATED_ESCAPE');
                // Backslash-newline is a line continuation.
                if (cp.value !== NEWLINE) {
                    word += input.slice(pending, pending + cp.width);
                }
                pending += cp.width;
                state = 'raw';
                break;
            }

            case 'single': {
                let i = pending;
                for (;;) {
                    const cp = readCodePoint(input, i);
                    if (!cp) throw new SplitError('UNTERMINATED_SINGLE_QUOTE');
                    if (cp.value === options.singleChar) {
                        word += input.slice(pending, i);
                        pending = i + cp.width;
                        break;
                    }
                    i += cp.width;
                }
                state = 'raw';
                break;
            }

            case 'double': {
                let i = pending;
                for (;;) {
                    const cp = readCodePoint(input, i);
                    if (!cp) throw new SplitError('UNTERMINATED_DOUBLE_QUOTE');
                    if (cp.value === options.doubleChar) {
                        word += input.slice(pending, i);
                        pending = i + cp.width;
                        break;
                    }
                    if (cp.value === options.escapeChar) {
                        const escaped = readCodePoint(input, i + cp.width);
                        const after = i + cp.width + (escaped?.width ?? 0);
                        if (escaped && options.doubleEscapeChars.has(escaped.value)) {
                            word += input.slice(pending, i);
                            if (escaped.value !== NEWLINE) {
                                word += input.slice(i + cp.width, after);
                            }
                            pending = after;
                        }
                        // Otherwise both characters stay in the pending literal.
                        i = after;
                        continue;
                    }
                    i += cp.width;
                }
                state = 'raw';
                break;
            }
        }
    }
}
