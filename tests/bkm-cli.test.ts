import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Writable } from 'node:stream';
import { runBookmarkViewCli } from '../src/bkm-cli.js';
import type { BookmarkViewIo } from '../src/bkm-cli.js';
import { MemoryFileIo } from './memory-io.js';

function captureIo(files: MemoryFileIo): BookmarkViewIo & { out: () => string; err: () => string } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const sink = (chunks: string[]) =>
    new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(String(chunk));
        callback();
      },
    });
  return {
    stdout: sink(stdout),
    stderr: sink(stderr),
    files,
    out: () => stdout.join(''),
    err: () => stderr.join(''),
  };
}

const SIDECAR = 'file: manual.pdf\ntitle: Mine\n"Intro"\n  "Setup" font:bold\n';

describe('runBookmarkViewCli', () => {
  it('prints help without arguments', async () => {
    const io = captureIo(new MemoryFileIo());
    assert.strictEqual(await runBookmarkViewCli([], io, '/work'), 0);
    assert.strictEqual(io.out().split('\n')[0], 'bookmark-view — CLI for .bkm bookmark-view sidecars');
  });

  it('prints the flat view as JSON', async () => {
    const io = captureIo(new MemoryFileIo({ '/work/manual.pdf.bkm': SIDECAR }));
    const code = await runBookmarkViewCli(['get', 'manual.pdf', '--view=flat'], io, '/work');
    assert.strictEqual(code, 0);

    const output: { bookmarks: { items: { title: string; level: number; bold: boolean }[] } } =
      JSON.parse(io.out());
    assert.deepStrictEqual(
      output.bookmarks.items.map((row) => [row.title, row.level, row.bold]),
      [
        ['Intro', 0, false],
        ['Setup', 1, true],
      ]
    );
  });

  it('resolves documents under --root', async () => {
    const io = captureIo(new MemoryFileIo({ '/work/sub/manual.pdf.bkm': SIDECAR }));
    const code = await runBookmarkViewCli(['--root', 'sub', 'validate', 'manual.pdf'], io, '/work');
    assert.strictEqual(code, 0);
    assert.deepStrictEqual(JSON.parse(io.out()), { errors: [], warnings: [] });
  });

  it('exits with 1 when validation finds errors', async () => {
    const io = captureIo(new MemoryFileIo({ '/work/bad.pdf.bkm': 'nope\n' }));
    const code = await runBookmarkViewCli(['validate', 'bad.pdf'], io, '/work');
    assert.strictEqual(code, 1);
    const output: { errors: { code: string }[] } = JSON.parse(io.out());
    assert.deepStrictEqual(
      output.errors.map((d) => d.code),
      ['MISSING_FILE_HEADER']
    );
  });

  it('formats a sidecar', async () => {
    const files = new MemoryFileIo({ '/work/manual.pdf.bkm': SIDECAR });
    const io = captureIo(files);
    const code = await runBookmarkViewCli(['format', 'manual.pdf'], io, '/work');
    assert.strictEqual(code, 0);
    assert.strictEqual(
      files.files.get('/work/manual.pdf.bkm'),
      'file: manual.pdf\ntitle: default view\n"Intro"\n  "Setup" font:bold\n'
    );
  });

  it('needs --force to format a file with warnings', async () => {
    const original = `${SIDECAR}\n"left over"\n`;
    const files = new MemoryFileIo({ '/work/manual.pdf.bkm': original });

    const refused = captureIo(files);
    assert.strictEqual(await runBookmarkViewCli(['format', 'manual.pdf'], refused, '/work'), 1);
    assert.strictEqual(
      refused.err().split('\n')[0],
      'LOSSY: rewriting would drop content; pass force to rewrite anyway'
    );
    assert.strictEqual(files.files.get('/work/manual.pdf.bkm'), original);

    const forced = captureIo(files);
    assert.strictEqual(await runBookmarkViewCli(['format', 'manual.pdf', '--force'], forced, '/work'), 0);
    const output: { changed: boolean; warnings: { code: string }[] } = JSON.parse(forced.out());
    assert.strictEqual(output.changed, true);
    assert.deepStrictEqual(
      output.warnings.map((d) => d.code),
      ['TRAILING_CONTENT']
    );
  });

  it('reports errors on stderr', async () => {
    const io = captureIo(new MemoryFileIo());
    assert.strictEqual(await runBookmarkViewCli(['nope'], io, '/work'), 1);
    assert.strictEqual(io.err().split('\n')[0], 'Unknown command: nope');

    const missing = captureIo(new MemoryFileIo());
    assert.strictEqual(await runBookmarkViewCli(['get'], missing, '/work'), 1);
    assert.strictEqual(missing.err().split('\n')[0], 'Missing <document>');
  });
});
