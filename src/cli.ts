#!/usr/bin/env node

/**
 * CLI entrypoint for the stdio MCP server.
 *
 * - Parse CLI flags into a `BookmarkViewConfig`.
 * - Start the server over stdio (the MCP transport).
 * - Provide stable `--help` and `--version` output.
 */
import { runStdioServer } from './server.js';
import { loadConfigFromArgs } from './config.js';

const VERSION = '0.1.0';

function printHelp(): void {
  process.stdout.write(
    [
      'bookmark-view-mcp (stdio MCP server)',
      '',
      'Usage:',
      '  bookmark-view-mcp [--root <dir>] [--mirror-open-toggled]',
      '',
      'Options:',
      '  --root   Root directory (default: cwd)',
      '  --mirror-open-toggled  Write open-toggled whenever open-default is set',
      '  --help   Show help',
      '',
    ].join('\n')
  );
}

function argsContainHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

function argsContainVersion(argv: string[]): boolean {
  return argv.includes('--version') || argv.includes('-v');
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argsContainHelp(argv)) {
    printHelp();
    return;
  }

  if (argsContainVersion(argv)) {
    process.stdout.write(`bookmark-view-mcp ${VERSION}\n`);
    return;
  }

  const config = loadConfigFromArgs(argv, process.cwd());
  await runStdioServer(config);
}

await main();
