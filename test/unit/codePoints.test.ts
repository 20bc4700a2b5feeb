import { describe, expect, it } from 'vitest';

import { CodePointSet, readCodePoint, trimAsciiWhitespace, trimCodePoints } from '../../src/core/codePoints';

describe('code points', () => {
  it('reads astral characters as one code point', () => {
    expect(readCodePoint('😀a', 0)).toEqual({ value: 0x1f600, width: 2 });
    expect(readCodePoint('😀a', 2)).toEqual({ value: 0x61, width: 1 });
    expect(readCodePoint('a', 1)).toBeUndefined();
  });

  it('builds sets from strings', () => {
    const set = new CodePointSet('ab😀a');
    expect(set.size).toBe(3);
    expect(set.has(0x1f600)).toBe(true);
    expect(set.has(0x63)).toBe(false);
  });

  it('trims members of a set from both ends', () => {
    expect(trimCodePoints('  a b \n', new CodePointSet(' \n'))).toBe('a b');
    expect(trimCodePoints('😀a😀😀', new CodePointSet('😀'))).toBe('a');
    expect(trimCodePoints('   ', new CodePointSet(' '))).toBe('');
    expect(trimCodePoints('\ra\r', new CodePointSet(' '))).toBe('\ra\r');
  });

  it('trims ASCII whitespace only', () => {
    expect(trimAsciiWhitespace('\v\f a \r\n')).toBe('a');
    expect(trimAsciiWhitespace('\u00a0a\u00a0')).toBe('\u00a0a\u00a0');
  });

  it('keeps internal whitespace runs and trims in linear time', () => {
    const run = ' '.repeat(100_000);
    const input = `\t b${run}c \n`;
    const started = performance.now();
    const trimmed = trimAsciiWhitespace(input);
    expect(performance.now() - started).toBeLessThan(50);
    expect(trimmed).toBe(`b${run}c`);
    expect(trimAsciiWhitespace(run)).toBe('');
  });
});
