import { describe, expect, it } from 'vitest';

import { renderWords } from '../../src/cli/shellOutput';
import { SplitError, ShsplitError } from '../../src/core/errors';
import { formatJson } from '../../src/core/formatters/json';
import { formatLines } from '../../src/core/formatters/lines';
import { formatNul } from '../../src/core/formatters/nul';
import { formatPretty } from '../../src/core/formatters/pretty';
import { exitCodeFor, isOutputFormat } from '../../src/core/model';

describe('formatters', () => {
  it('writes one word per line', () => {
    expect(formatLines(['a', 'b c'])).toBe('a\nb c\n');
    expect(formatLines([])).toBe('');
  });

  it('writes a JSON array', () => {
    expect(formatJson(['a', 'b"c'])).toBe('[\n  "a",\n  "b\\"c"\n]\n');
    expect(formatJson([])).toBe('[]\n');
  });

  it('terminates each word with NUL', () => {
    expect(formatNul(['a', 'b\nc'])).toBe('a\0b\nc\0');
  });

  it('numbers words and quotes them', () => {
    expect(formatPretty(['a', 'b\tc'])).toBe('[1] "a"\n[2] "b\\tc"\n');
    expect(formatPretty([])).toBe('(no words)\n');
  });

  it('pads indexes to the same width', () => {
    const lines = formatPretty(Array.from({ length: 10 }, () => 'w')).split('\n');
    expect(lines[0]).toBe('[ 1] "w"');
    expect(lines[9]).toBe('[10] "w"');
  });

  it('dispatches on the output format', () => {
    expect(renderWords('lines', ['x'])).toBe('x\n');
    expect(renderWords('json', ['x'])).toBe('[\n  "x"\n]\n');
    expect(renderWords('nul', ['x'])).toBe('x\0');
    expect(renderWords('pretty', ['x'])).toBe('[1] "x"\n');
  });
});

describe('model helpers', () => {
  it('recognises output formats', () => {
    expect(isOutputFormat('nul')).toBe(true);
    expect(isOutputFormat('md')).toBe(false);
    expect(isOutputFormat(undefined)).toBe(false);
  });

  it('maps errors to exit codes', () => {
    expect(exitCodeFor(new SplitError('UNTERMINATED_ESCAPE'))).toBe(1);
    expect(exitCodeFor(new ShsplitError('bad', 'CONFIG'))).toBe(2);
    expect(exitCodeFor(new Error('boom'))).toBe(2);
  });
});
