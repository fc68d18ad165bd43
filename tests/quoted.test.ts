import { describe, it } from 'node:test';
import assert from 'node:assert';
import { decodeQuoted, encodeQuoted } from '../src/bkm/quoted.js';

describe('decodeQuoted', () => {
  it('decodes a title and returns the rest of the line', () => {
    assert.deepStrictEqual(decodeQuoted('"Hello" font:bold'), {
      ok: true,
      value: 'Hello',
      rest: ' font:bold',
    });
  });

  it('unescapes quotes and backslashes', () => {
    const decoded = decodeQuoted('"say \\"hi\\" a\\\\b"');
    assert.deepStrictEqual(decoded, { ok: true, value: 'say "hi" a\\b', rest: '' });
  });

  it('keeps a backslash that does not start an escape', () => {
    const decoded = decodeQuoted('"C:\\path\\n"');
    assert.deepStrictEqual(decoded, { ok: true, value: 'C:\\path\\n', rest: '' });
  });

  it('decodes an empty literal', () => {
    assert.deepStrictEqual(decodeQuoted('"" x'), { ok: true, value: '', rest: ' x' });
  });

  it('fails without touching the input', () => {
    assert.deepStrictEqual(decodeQuoted('"'), { ok: false, rest: '"' });
    assert.deepStrictEqual(decodeQuoted('abc'), { ok: false, rest: 'abc' });
    assert.deepStrictEqual(decodeQuoted('"unterminated'), { ok: false, rest: '"unterminated' });
    assert.deepStrictEqual(decodeQuoted('"x\\'), { ok: false, rest: '"x\\' });
  });
});

describe('encodeQuoted', () => {
  it('escapes quotes and backslashes', () => {
    assert.strictEqual(encodeQuoted('a"b\\c'), '"a\\"b\\\\c"');
  });

  it('decodes back to the original text', () => {
    const samples = ['', 'plain', '"', '\\', '\\"', 'end\\', 'C:\\dir\\"x"', '  spaced  ', 'ünïcode ✓'];
    for (const sample of samples) {
      const decoded = decodeQuoted(encodeQuoted(sample));
      assert.deepStrictEqual(decoded, { ok: true, value: sample, rest: '' });
    }
  });
});
