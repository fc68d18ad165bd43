import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseBookmarkLine } from '../src/bkm/line.js';
import { FONT_BOLD, FONT_ITALIC } from '../src/bkm/model.js';

describe('parseBookmarkLine', () => {
  it('computes the level from pairs of leading spaces', () => {
    const parsed = parseBookmarkLine('    "Child" page:3');
    assert.ok(parsed.ok);
    assert.strictEqual(parsed.level, 2);
    assert.strictEqual(parsed.node.title, 'Child');
    assert.strictEqual(parsed.node.pageNo, 3);
    assert.deepStrictEqual(parsed.node.children, []);
  });

  it('rejects an odd number of leading spaces', () => {
    assert.deepStrictEqual(parseBookmarkLine('   "Odd"'), {
      ok: false,
      reason: 'odd-indent',
      indent: 3,
    });
  });

  it('keeps other fields when a token is unknown', () => {
    const parsed = parseBookmarkLine('"Title" glow:shiny font:italic');
    assert.ok(parsed.ok);
    assert.strictEqual(parsed.titleOk, true);
    assert.strictEqual(parsed.node.fontFlags, FONT_ITALIC);
    assert.deepStrictEqual(parsed.ignoredTokens, [{ text: 'glow:shiny' }]);
  });

  it('tolerates a missing title', () => {
    const parsed = parseBookmarkLine('  no quotes font:bold');
    assert.ok(parsed.ok);
    assert.strictEqual(parsed.level, 1);
    assert.strictEqual(parsed.titleOk, false);
    assert.strictEqual(parsed.node.title, '');
    assert.strictEqual(parsed.node.fontFlags, FONT_BOLD);
  });
});
