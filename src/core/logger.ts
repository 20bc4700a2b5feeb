export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

export class NullLogger implements Logger {
    debug(): void {}
    info(): void {}
    warn(): void {}
    error(): void {}
}

export function createStderrLogger(stderr: { write(chunk: string): void }): Logger {
    const write = (level: string) => (message: string, meta?: Record<string, unknown>) =>
        stderr.write(`[${level}] ${message}${meta ? ` ${JSON.stringify(meta)}` : ''}\n`);
    return {
        debug: write('debug'),
        info: write('info'),
        warn: write('warn'),
        error: write('error')
    };
}
