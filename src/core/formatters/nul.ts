// NUL-terminated words, for `xargs -0`.
export function formatNul(words: string[]): string {
    return words.map(w => `${w}\0`).join('');
}
