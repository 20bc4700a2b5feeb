/** One word per line. Words that contain a newline are ambiguous in this format; use `nul` or `json` for those. */
export function formatLines(words: string[]): string {
    return words.map(w => `${w}\n`).join('');
}
