#!/usr/bin/env node

/**
 * `bookmark-view` - local CLI for `.bkm` bookmark-view sidecars.
 *
 * Shares the core API with the stdio server so both behave the same.
 *
 * Important: this module is imported by tests, so it must NOT auto-run when
 * imported. The bottom-of-file "isMain" guard ensures that.
 */

import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { BookmarkViewConfig } from './config.js';
import { formatBookmarksDoc, getBookmarks, validateBookmarksDoc } from './bkm/api.js';
import type { BookmarkFileIo } from './bkm/storage.js';
import { nodeFileIo } from './bkm/storage.js';

type OutlineView = 'tree' | 'flat';

export interface BookmarkViewIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** File access for sidecars; defaults to the local filesystem. */
  files?: BookmarkFileIo;
}

function helpText(defaultRoot: string): string {
  return [
    'bookmark-view — CLI for .bkm bookmark-view sidecars',
    '',
    'Usage:',
    '  bookmark-view [--root <dir>] [--mirror-open-toggled] <cmd>',
    '',
    'Commands:',
    '  bookmark-view get <document> [--view tree|flat]',
    '  bookmark-view validate <document>',
    '  bookmark-view format <document> [--dry-run] [--force] [--if-match <etag>]',
    '',
    'Notes:',
    `  Defaults: --root=${defaultRoot}`,
    '  <document> is the path of the document; its sidecar is <document>.bkm.',
    '  Output: JSON to stdout; errors to stderr.',
    '',
  ].join('\n');
}

function writeHelp(io: BookmarkViewIo, defaultRoot: string): void {
  io.stdout.write(helpText(defaultRoot));
}

function writeJson(io: BookmarkViewIo, value: unknown): void {
  io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Consume a boolean flag from argv.
 */
function takeFlag(argv: string[], flag: string): boolean {
  const index = argv.indexOf(flag);
  if (index === -1) return false;
  argv.splice(index, 1);
  return true;
}

/**
 * Consume a `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 */
function takeOption(argv: string[], flag: string): string | undefined {
  const indexEq = argv.findIndex((arg) => arg.startsWith(`${flag}=`));
  if (indexEq !== -1) {
    const value = argv[indexEq]?.slice(flag.length + 1);
    argv.splice(indexEq, 1);
    if (!value) throw new Error(`Missing value for ${flag}`);
    return value;
  }

  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  argv.splice(index, 2);
  if (!value || value.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return value;
}

function assertNoUnknownFlags(argv: string[]): void {
  const unknown = argv.find((arg) => arg.startsWith('--'));
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
}

function parseView(value: string | undefined): OutlineView | undefined {
  if (!value) return undefined;
  if (value === 'tree' || value === 'flat') return value;
  throw new Error(`Invalid --view: ${JSON.stringify(value)}`);
}

/**
 * Parse global CLI options into an API config object.
 */
function takeCliConfig(argv: string[], defaultRoot: string): BookmarkViewConfig {
  let rootDir = defaultRoot;
  const rootArg = takeOption(argv, '--root');
  if (rootArg) rootDir = resolvePath(defaultRoot, rootArg);

  const openToggled = takeFlag(argv, '--mirror-open-toggled') ? 'mirror-default' : 'independent';
  return { rootDir, openToggled };
}

async function runCommand(
  cmd: string,
  config: BookmarkViewConfig,
  argv: string[],
  io: BookmarkViewIo
): Promise<number> {
  const files = io.files ?? nodeFileIo;

  if (cmd === 'get') {
    const documentPath = argv.shift();
    const view = parseView(takeOption(argv, '--view'));
    assertNoUnknownFlags(argv);
    if (!documentPath) throw new Error('Missing <document>');
    const { bookmarks, etag } = await getBookmarks(config, { documentPath, view }, files);
    writeJson(io, { bookmarks, etag });
    return 0;
  }

  if (cmd === 'validate') {
    const documentPath = argv.shift();
    assertNoUnknownFlags(argv);
    if (!documentPath) throw new Error('Missing <document>');
    const { errors, warnings } = await validateBookmarksDoc(config, { documentPath }, files);
    writeJson(io, { errors, warnings });
    return errors.length > 0 ? 1 : 0;
  }

  if (cmd === 'format') {
    const documentPath = argv.shift();
    const dryRun = takeFlag(argv, '--dry-run');
    const force = takeFlag(argv, '--force');
    const ifMatch = takeOption(argv, '--if-match');
    assertNoUnknownFlags(argv);
    if (!documentPath) throw new Error('Missing <document>');
    const { etag, changed, warnings } = await formatBookmarksDoc(
      config,
      { documentPath, dryRun, ifMatch, force },
      files
    );
    writeJson(io, { etag, changed, warnings });
    return 0;
  }

  throw new Error(`Unknown command: ${cmd}`);
}

/**
 * Run the CLI with a provided argv array (excluding `node` and script path).
 *
 * Returns an exit code, but does not call `process.exit()`.
 */
export async function runBookmarkViewCli(
  args: string[],
  io: BookmarkViewIo = { stdout: process.stdout, stderr: process.stderr },
  defaultRoot: string = process.cwd()
): Promise<number> {
  const argv = [...args];

  try {
    if (takeFlag(argv, '--help') || takeFlag(argv, '-h') || argv.length === 0) {
      writeHelp(io, defaultRoot);
      return 0;
    }

    const config = takeCliConfig(argv, defaultRoot);
    const cmd = argv.shift();
    if (!cmd || cmd === 'help') {
      writeHelp(io, defaultRoot);
      return 0;
    }

    return await runCommand(cmd, config, argv, io);
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    io.stderr.write('\n');
    writeHelp(io, defaultRoot);
    return 1;
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runBookmarkViewCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
