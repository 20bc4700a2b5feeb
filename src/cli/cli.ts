#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';

import { runCli } from './runCli';

function readPackageMeta(): { name: string; version: string } {
    // Same relative path from src/cli and dist/cli.
    const pkgPath = path.join(__dirname, '..', '..', 'package.json');
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'name' in parsed && 'version' in parsed) {
        return { name: String(parsed.name), version: String(parsed.version) };
    }
    return { name: 'shsplit', version: '0.0.0' };
}

async function main(): Promise<void> {
    const argv =
        process.argv.length <= 2
            ? (process.stdin.isTTY ? [...process.argv, 'shell'] : [...process.argv, '--help'])
            : process.argv;

    const exitCode = await runCli(argv, {
        tool: readPackageMeta(),
        io: process,
        env: process.env
    });
    process.exitCode = exitCode;
}

void main();
