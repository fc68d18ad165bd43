import type { ColorParser } from './color.js';
import { FILE_HEADER_KEY, TITLE_HEADER_KEY } from './constants.js';
import { errorDiagnostic, warningDiagnostic } from './diagnostics.js';
import type { Diagnostic } from './diagnostics.js';
import { parseBookmarkLine } from './line.js';
import type { BookmarkCollection, OutlineDocument } from './model.js';
import { splitLines, parseKeyValue } from './tokens.js';
import { reconstructOutline } from './tree.js';
import type { LeveledNode } from './tree.js';

/**
 * Parser for `.bkm` bookmark-view files.
 *
 * A file holds one document:
 * - `file: <path>` header
 * - `title: <view title>` header
 * - one entry line per outline node, up to the first empty line
 *
 * Any structural problem fails the whole parse; no partial collection is
 * returned.
 */
export interface ParseBookmarksOptions {
  parseColor?: ColorParser;
}

export interface ParseBookmarksResult {
  ok: boolean;
  collection?: BookmarkCollection;
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

type DocumentParse =
  | { ok: true; document: OutlineDocument; endLine: number }
  | { ok: false; error: Diagnostic };

/**
 * Parse one document starting at `startLine`.
 *
 * Entries are collected into a local list that only becomes reachable from
 * the returned document on success; every failure path returns before that.
 */
function parseDocumentAt(
  lines: string[],
  startLine: number,
  options: ParseBookmarksOptions,
  warnings: Diagnostic[]
): DocumentParse {
  const sourcePath = parseKeyValue(lines[startLine] ?? '', FILE_HEADER_KEY);
  if (sourcePath === undefined) {
    return {
      ok: false,
      error: errorDiagnostic('MISSING_FILE_HEADER', 'Expected "file: <path>" header', startLine),
    };
  }

  const titleLine = startLine + 1;
  const title = parseKeyValue(lines[titleLine] ?? '', TITLE_HEADER_KEY);
  if (title === undefined) {
    return {
      ok: false,
      error: errorDiagnostic('MISSING_TITLE_HEADER', 'Expected "title: <title>" header', titleLine),
    };
  }

  const entries: LeveledNode[] = [];
  let lineIndex = titleLine + 1;
  for (; lineIndex < lines.length; lineIndex += 1) {
    const line = lines[lineIndex] ?? '';
    if (line === '') break;

    const parsed = parseBookmarkLine(line, { parseColor: options.parseColor });
    if (!parsed.ok) {
      return {
        ok: false,
        error: errorDiagnostic(
          'ODD_INDENT',
          `Indentation must be a multiple of 2 spaces (found ${parsed.indent})`,
          lineIndex
        ),
      };
    }
    if (!parsed.titleOk) {
      warnings.push(
        warningDiagnostic('UNTERMINATED_TITLE', 'Missing or unterminated quoted title', lineIndex)
      );
    }
    entries.push({ node: parsed.node, level: parsed.level });
  }

  const items = reconstructOutline(entries);
  if (!items) {
    return {
      ok: false,
      error: errorDiagnostic('NO_ENTRIES', 'Bookmark view has no entries', titleLine + 1),
    };
  }

  return { ok: true, document: { sourcePath, title, items }, endLine: lineIndex };
}

/**
 * Parse the text of a `.bkm` file.
 *
 * Only the first document is read. Anything after its terminating empty line
 * is left alone, with a warning if it is not blank.
 */
export function parseBookmarksText(
  text: string,
  options: ParseBookmarksOptions = {}
): ParseBookmarksResult {
  const warnings: Diagnostic[] = [];
  const lines = splitLines(text);

  const parsed = parseDocumentAt(lines, 0, options, warnings);
  if (!parsed.ok) {
    return { ok: false, errors: [parsed.error], warnings };
  }

  const trailing = lines
    .slice(parsed.endLine + 1)
    .findIndex((line) => line.trim().length > 0);
  if (trailing !== -1) {
    warnings.push(
      warningDiagnostic(
        'TRAILING_CONTENT',
        'Content after the first bookmark view is not read',
        parsed.endLine + 1 + trailing
      )
    );
  }

  return { ok: true, collection: { documents: [parsed.document] }, errors: [], warnings };
}
