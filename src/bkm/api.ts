import type { BookmarkViewConfig } from '../config.js';
import type { ColorParser } from './color.js';
import { errorDiagnostic, formatDiagnostics } from './diagnostics.js';
import type { Diagnostic } from './diagnostics.js';
import type { BookmarkCollection, OutlineDocument } from './model.js';
import { parseBookmarksText } from './parse.js';
import type { ParseBookmarksResult } from './parse.js';
import { serializeBookmarks } from './serialize.js';
import type { SerializeOptions } from './serialize.js';
import {
  nodeFileIo,
  readSidecarFile,
  sha256Hex,
  sidecarPathFor,
} from './storage.js';
import type { BookmarkFileIo } from './storage.js';
import { checkBeforeWrite, validateBookmarksText } from './validate.js';
import type { ValidateBookmarksResult } from './validate.js';
import { buildOutlineFlatRows, buildOutlineTreeView, countOutlineNodes } from './view.js';

/**
 * Public API for bookmark-view files.
 *
 * Two layers:
 * - Path-based load/save (`parseBookmarksFile`, `loadAlternativeBookmarks`,
 *   `exportBookmarksToFile`) that report failure as result values.
 * - Config-based operations used by the CLI and the MCP server, which resolve
 *   documents under `config.rootDir` and throw with formatted diagnostics.
 */
export interface BookmarkIoOptions {
  io?: BookmarkFileIo;
  parseColor?: ColorParser;
}

export interface ExportBookmarksResult {
  ok: boolean;
  errors: Diagnostic[];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read and parse a `.bkm` file. A read failure is reported as `READ_FAILED`.
 */
export async function parseBookmarksFile(
  path: string,
  options: BookmarkIoOptions = {}
): Promise<ParseBookmarksResult> {
  const io = options.io ?? nodeFileIo;
  let text: string;
  try {
    text = await io.readFile(path);
  } catch (error) {
    return {
      ok: false,
      errors: [errorDiagnostic('READ_FAILED', `Cannot read ${path}: ${describeError(error)}`)],
      warnings: [],
    };
  }
  return parseBookmarksText(text, { parseColor: options.parseColor });
}

/**
 * Load the alternative bookmark views stored beside `baseFileName`
 * (`<baseFileName>.bkm`). Returns `undefined` if the sidecar is missing or
 * malformed.
 */
export async function loadAlternativeBookmarks(
  baseFileName: string,
  options: BookmarkIoOptions = {}
): Promise<BookmarkCollection | undefined> {
  const parsed = await parseBookmarksFile(sidecarPathFor(baseFileName), options);
  return parsed.ok ? parsed.collection : undefined;
}

/**
 * Serialize `collection` and write it to `bkmPath`.
 *
 * Nothing is written if a node's page disagrees with its destination page or
 * a value does not fit the line format.
 */
export async function exportBookmarksToFile(
  collection: BookmarkCollection,
  bkmPath: string,
  options: SerializeOptions & { io?: BookmarkFileIo } = {}
): Promise<ExportBookmarksResult> {
  const problems = checkBeforeWrite(collection);
  if (problems.length > 0) return { ok: false, errors: problems };

  const io = options.io ?? nodeFileIo;
  try {
    await io.writeFile(bkmPath, serializeBookmarks(collection, options));
  } catch (error) {
    return {
      ok: false,
      errors: [errorDiagnostic('WRITE_FAILED', `Cannot write ${bkmPath}: ${describeError(error)}`)],
    };
  }
  return { ok: true, errors: [] };
}

function requireCollection(parsed: ParseBookmarksResult): BookmarkCollection {
  if (!parsed.ok || !parsed.collection) {
    const message =
      parsed.errors.length > 0 ? formatDiagnostics(parsed.errors) : 'Failed to parse bookmarks';
    throw new Error(message);
  }
  return parsed.collection;
}

function firstDocument(collection: BookmarkCollection): OutlineDocument {
  const document = collection.documents[0];
  if (!document) throw new Error('Bookmark file holds no views');
  return document;
}

export interface GetBookmarksOptions {
  documentPath: string;
  view?: 'tree' | 'flat';
}

/**
 * Read and parse the sidecar of a document.
 *
 * The `view` option controls the shape of the returned entries:
 * - `tree`: nested entries with children
 * - `flat`: pre-order rows with level and title path
 */
export async function getBookmarks(
  config: BookmarkViewConfig,
  options: GetBookmarksOptions,
  io: BookmarkFileIo = nodeFileIo
): Promise<{ bookmarks: Record<string, unknown>; etag: string }> {
  const { text, etag } = await readSidecarFile(config, options.documentPath, io);
  const document = firstDocument(requireCollection(parseBookmarksText(text)));

  const view = options.view ?? 'tree';
  const items =
    view === 'tree' ? buildOutlineTreeView(document.items) : buildOutlineFlatRows(document.items);

  const bookmarks: Record<string, unknown> = {
    documentPath: options.documentPath,
    sourcePath: document.sourcePath,
    title: document.title,
    count: countOutlineNodes(document),
    view,
    items,
  };
  return { bookmarks, etag };
}

/**
 * Validate the sidecar of a document without modifying it.
 */
export async function validateBookmarksDoc(
  config: BookmarkViewConfig,
  options: { documentPath: string },
  io: BookmarkFileIo = nodeFileIo
): Promise<ValidateBookmarksResult> {
  const { text } = await readSidecarFile(config, options.documentPath, io);
  return validateBookmarksText(text);
}

export interface FormatBookmarksOptions {
  documentPath: string;
  dryRun?: boolean;
  ifMatch?: string;
  /** Rewrite even if parsing reported warnings (content after the first view, broken titles). */
  force?: boolean;
}

export interface FormatBookmarksResult {
  etag: string;
  changed: boolean;
  text: string;
  /** Parse warnings; each marks input the canonical text does not keep. */
  warnings: Diagnostic[];
}

/**
 * Rewrite a sidecar in canonical form (parse, then serialize).
 *
 * Unknown tokens are dropped and the view title is reset, as on any save.
 * `ifMatch` guards against overwriting a file changed since it was read.
 * A file that parsed with warnings is only rewritten with `force`.
 */
export async function formatBookmarksDoc(
  config: BookmarkViewConfig,
  options: FormatBookmarksOptions,
  io: BookmarkFileIo = nodeFileIo
): Promise<FormatBookmarksResult> {
  const { absolutePath, text, etag } = await readSidecarFile(config, options.documentPath, io);
  if (options.ifMatch && options.ifMatch !== etag) {
    throw new Error(`CONFLICT: etag mismatch (expected ${options.ifMatch}, got ${etag})`);
  }

  const parsed = parseBookmarksText(text);
  const collection = requireCollection(parsed);
  const newText = serializeBookmarks(collection, { openToggled: config.openToggled });
  const changed = newText !== text;

  if (changed && !options.dryRun) {
    if (parsed.warnings.length > 0 && !options.force) {
      throw new Error(
        `LOSSY: rewriting would drop content; pass force to rewrite anyway\n${formatDiagnostics(
          parsed.warnings
        )}`
      );
    }
    await io.writeFile(absolutePath, newText);
  }
  return {
    etag: changed && !options.dryRun ? sha256Hex(newText) : etag,
    changed,
    text: newText,
    warnings: parsed.warnings,
  };
}
