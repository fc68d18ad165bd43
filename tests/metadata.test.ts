import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { ColorParser } from '../src/bkm/color.js';
import { formatColor, parseColor } from '../src/bkm/color.js';
import { applyMetadata, parseRect, scanMetadataTokens } from '../src/bkm/metadata.js';
import { createOutlineNode, FONT_BOLD, FONT_ITALIC } from '../src/bkm/model.js';

describe('scanMetadataTokens', () => {
  it('splits on spaces and keeps quoted values whole', () => {
    assert.deepStrictEqual(scanMetadataTokens(' font:bold  destname:"Chapter 1" x'), [
      { text: 'font:bold' },
      { text: 'destname:', quotedValue: 'Chapter 1' },
      { text: 'x' },
    ]);
  });

  it('treats an unterminated quoted value as a plain token', () => {
    assert.deepStrictEqual(scanMetadataTokens('destname:"open end'), [
      { text: 'destname:"open' },
      { text: 'end' },
    ]);
  });
});

describe('parseColor', () => {
  it('parses long and short hex forms', () => {
    assert.deepStrictEqual(parseColor('#ff8000'), { ok: true, value: 0xff8000 });
    assert.deepStrictEqual(parseColor('#f80'), { ok: true, value: 0xff8800 });
    assert.deepStrictEqual(parseColor('#000000'), { ok: true, value: 0 });
  });

  it('rejects anything else', () => {
    assert.deepStrictEqual(parseColor('red'), { ok: false });
    assert.deepStrictEqual(parseColor('#12345'), { ok: false });
  });

  it('formats with six lowercase digits', () => {
    assert.strictEqual(formatColor(0x0a0b0c), '#0a0b0c');
    assert.strictEqual(formatColor(0xffffff), '#ffffff');
  });
});

describe('applyMetadata', () => {
  it('sets every known field and ignores unknown tokens', () => {
    const node = createOutlineNode('A');
    const ignored = applyMetadata(
      node,
      ' font:bold font:italic color:#ff0000 glow:shiny page:12 open-default OPEN-TOGGLED unchecked',
      parseColor
    );

    assert.strictEqual(node.fontFlags, FONT_BOLD | FONT_ITALIC);
    assert.strictEqual(node.color, 0xff0000);
    assert.strictEqual(node.pageNo, 12);
    assert.strictEqual(node.isOpenDefault, true);
    assert.strictEqual(node.isOpenToggled, true);
    assert.strictEqual(node.isUnchecked, true);
    assert.deepStrictEqual(ignored, [{ text: 'glow:shiny' }]);
  });

  it('matches unchecked case-sensitively', () => {
    const node = createOutlineNode();
    applyMetadata(node, 'Unchecked', parseColor);
    assert.strictEqual(node.isUnchecked, false);
  });

  it('keeps black as a set color and skips bad values', () => {
    const black = createOutlineNode();
    applyMetadata(black, 'color:#000000', parseColor);
    assert.strictEqual(black.color, 0);

    const bad = createOutlineNode();
    const ignored = applyMetadata(bad, 'color:#zzz page:0 page:-3 page:2.5', parseColor);
    assert.strictEqual(bad.color, undefined);
    assert.strictEqual(bad.pageNo, 0);
    assert.strictEqual(ignored.length, 4);
  });

  it('builds a destination from dest tokens', () => {
    const node = createOutlineNode();
    applyMetadata(
      node,
      'destkind:ScrollTo destname:"Intro part" destvalue:"v\\"1" destpage:4 destrect:1.5,2,100,-20',
      parseColor
    );
    assert.deepStrictEqual(node.destination, {
      kind: 'ScrollTo',
      name: 'Intro part',
      value: 'v"1',
      pageNo: 4,
      rect: { x: 1.5, y: 2, dx: 100, dy: -20 },
    });
  });

  it('ignores dest tokens without a destkind', () => {
    const node = createOutlineNode();
    applyMetadata(node, 'destpage:4 destname:"x"', parseColor);
    assert.strictEqual(node.destination, undefined);
  });

  it('uses the supplied color parser', () => {
    const named: ColorParser = (token) =>
      token === 'red' ? { ok: true, value: 0xff0000 } : { ok: false };
    const node = createOutlineNode();
    applyMetadata(node, 'color:red', named);
    assert.strictEqual(node.color, 0xff0000);
  });
});

describe('parseRect', () => {
  it('needs four numbers', () => {
    assert.deepStrictEqual(parseRect('0,0,612,792'), { x: 0, y: 0, dx: 612, dy: 792 });
    assert.strictEqual(parseRect('1,2,3'), undefined);
    assert.strictEqual(parseRect('1,2,x,4'), undefined);
    assert.strictEqual(parseRect('1,2,,4'), undefined);
  });
});
