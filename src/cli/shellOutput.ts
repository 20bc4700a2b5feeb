import { formatJson } from '../core/formatters/json';
import { formatLines } from '../core/formatters/lines';
import { formatNul } from '../core/formatters/nul';
import { formatPretty } from '../core/formatters/pretty';
import type { OutputFormat } from '../core/model';

export function renderWords(format: OutputFormat, words: string[]): string {
    switch (format) {
        case 'lines':
            return formatLines(words);
        case 'json':
            return formatJson(words);
        case 'nul':
            return formatNul(words);
        case 'pretty':
            return formatPretty(words);
    }
}
