export type SplitErrorCode =
    | 'UNTERMINATED_SINGLE_QUOTE'
    | 'UNTERMINATED_DOUBLE_QUOTE'
    | 'UNTERMINATED_ESCAPE';

const SPLIT_ERROR_MESSAGES: Record<SplitErrorCode, string> = {
    UNTERMINATED_SINGLE_QUOTE: 'Unterminated single-quoted string',
    UNTERMINATED_DOUBLE_QUOTE: 'Unterminated double-quoted string',
    UNTERMINATED_ESCAPE: 'Unterminated backslash-escape'
};

/**
 * Raised when the input ends while a quoted span or a backslash-escape is
 * still open. The whole split fails; no partial word list is returned.
 */
export class SplitError extends Error {
    constructor(public readonly code: SplitErrorCode) {
        super(SPLIT_ERROR_MESSAGES[code]);
        this.name = 'SplitError';
    }
}

export function isSplitError(error: unknown): error is SplitError {
    return error instanceof SplitError;
}

export class ShsplitError extends Error {
    constructor(message: string, public readonly code: 'CONFIG' | 'RUNTIME', cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'ShsplitError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
