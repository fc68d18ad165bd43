import { resolve } from 'node:path';

/**
 * Runtime configuration for locating and rewriting bookmark-view sidecars.
 *
 * `rootDir` is treated as a trust boundary: sidecar paths must resolve within it.
 */
export interface BookmarkViewConfig {
  rootDir: string;
  /**
   * How `open-toggled` is written on save.
   *
   * Default is `independent`; `mirror-default` writes it whenever
   * `open-default` is set, matching files produced by older writers.
   */
  openToggled?: 'independent' | 'mirror-default';
}

/**
 * Parse CLI args into a `BookmarkViewConfig`.
 *
 * Supported flags:
 * - `--root <dir>`: filesystem root (defaults to `cwd`).
 * - `--mirror-open-toggled`: write `open-toggled` whenever `open-default` is set.
 */
export function loadConfigFromArgs(argv: string[], cwd: string): BookmarkViewConfig {
  const args = [...argv];

  let rootDir = cwd;
  let openToggled: BookmarkViewConfig['openToggled'] = 'independent';

  while (args.length > 0) {
    const flag = args.shift();
    if (!flag) break;

    if (flag === '--root') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --root');
      rootDir = resolve(cwd, value);
      continue;
    }

    if (flag === '--mirror-open-toggled') {
      openToggled = 'mirror-default';
      continue;
    }

    throw new Error(`Unknown argument: ${flag}`);
  }

  return { rootDir, openToggled };
}
