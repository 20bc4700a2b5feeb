export { safeSplit, split, splitN, splitWithOptions } from './core/splitter';
export type { SplitResult } from './core/splitter';
export { parseWord } from './core/wordParser';
export type { ParsedWord } from './core/wordParser';
export {
    DEFAULT_DOUBLE_CHAR,
    DEFAULT_DOUBLE_ESCAPE_CHARS,
    DEFAULT_ESCAPE_CHAR,
    DEFAULT_SINGLE_CHAR,
    DEFAULT_SPLIT_CHARS,
    DISABLED_CHAR,
    defaultSplitOptions,
    noEscapeSplitOptions,
    resolveSplitOptions
} from './core/options';
export type { ResolvedSplitOptions, SplitOptions } from './core/options';
export { isSplitError, ShsplitError, SplitError } from './core/errors';
export type { SplitErrorCode } from './core/errors';
