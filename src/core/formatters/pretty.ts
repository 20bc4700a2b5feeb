export function formatPretty(words: string[]): string {
    if (words.length === 0) {
        return '(no words)\n';
    }

    const width = String(words.length).length;
    const lines = words.map((w, i) => `[${String(i + 1).padStart(width)}] ${JSON.stringify(w)}`);
    return lines.join('\n') + '\n';
}
