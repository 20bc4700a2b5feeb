export function formatJson(words: string[]): string {
    return JSON.stringify(words, null, 2) + '\n';
}
