export const NEWLINE = 0x0a;

export interface CodePoint {
    value: number;
    /** Length in UTF-16 code units (2 for astral code points). */
    width: number;
}

export function readCodePoint(input: string, index: number): CodePoint | undefined {
    if (index >= input.length) return undefined;
    const value = input.codePointAt(index);
    if (value === undefined) return undefined;
    return { value, width: value > 0xffff ? 2 : 1 };
}

export class CodePointSet {
    private readonly members: ReadonlySet<number>;

    constructor(chars: string) {
        const members = new Set<number>();
        for (const ch of chars) {
            const value = ch.codePointAt(0);
            if (value !== undefined) members.add(value);
        }
        this.members = members;
    }

    has(value: number): boolean {
        return this.members.has(value);
    }

    get size(): number {
        return this.members.size;
    }
}

/** Strip leading and trailing code points that belong to `set`. */
export function trimCodePoints(input: string, set: CodePointSet): string {
    let start = 0;
    while (start < input.length) {
        const cp = readCodePoint(input, start);
        if (!cp || !set.has(cp.value)) break;
        start += cp.width;
    }

    let end = input.length;
    while (end > start) {
        // Step back over a surrogate pair when the last unit is a low surrogate.
        const low = input.charCodeAt(end - 1);
        const pair = end - 2 >= start && low >= 0xdc00 && low <= 0xdfff && isHighSurrogate(input.charCodeAt(end - 2));
        const cp = readCodePoint(input, pair ? end - 2 : end - 1);
        if (!cp || !set.has(cp.value)) break;
        end -= cp.width;
    }

    return input.slice(start, end);
}

function isHighSurrogate(unit: number): boolean {
    return unit >= 0xd800 && unit <= 0xdbff;
}

function isAsciiWhitespace(unit: number): boolean {
    // space, \t, \n, \v, \f, \r
    return unit === 0x20 || (unit >= 0x09 && unit <= 0x0d);
}

/**
 * Trim ASCII whitespace only. `String.prototype.trim` also strips Unicode
 * spaces such as U+00A0, which must survive here.
 */
export function trimAsciiWhitespace(input: string): string {
    let start = 0;
    while (start < input.length && isAsciiWhitespace(input.charCodeAt(start))) start++;

    let end = input.length;
    while (end > start && isAsciiWhitespace(input.charCodeAt(end - 1))) end--;

    return input.slice(start, end);
}
