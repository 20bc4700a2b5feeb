import { SplitError } from './errors';

export const OUTPUT_FORMATS = ['lines', 'json', 'nul', 'pretty'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: unknown): value is OutputFormat {
    return OUTPUT_FORMATS.some(f => f === value);
}

/** 1 for input the splitter rejected, 2 for everything else (usage, config, I/O). */
export function exitCodeFor(error: unknown): 1 | 2 {
    return error instanceof SplitError ? 1 : 2;
}
