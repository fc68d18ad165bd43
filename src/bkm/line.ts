import type { ColorParser } from './color.js';
import { parseColor as defaultParseColor } from './color.js';
import { INDENT_WIDTH } from './constants.js';
import { applyMetadata } from './metadata.js';
import type { MetadataToken } from './metadata.js';
import type { OutlineNode } from './model.js';
import { createOutlineNode } from './model.js';
import { decodeQuoted } from './quoted.js';
import { countLeading } from './tokens.js';

/**
 * Parser for a single outline entry:
 *
 * `<indent>"quoted title" metadata*`
 */
export type ParsedBookmarkLine =
  | {
      ok: true;
      node: OutlineNode;
      /** Nesting level (leading spaces / 2). */
      level: number;
      /** False if the title literal was missing or unterminated. */
      titleOk: boolean;
      ignoredTokens: MetadataToken[];
    }
  | { ok: false; reason: 'odd-indent'; indent: number };

export interface ParseLineOptions {
  parseColor?: ColorParser;
}

/**
 * Parse one entry line.
 *
 * The only structural check is the indentation width. A missing or broken
 * title literal yields an empty title, and the metadata scan then starts at
 * the first non-space character.
 */
export function parseBookmarkLine(
  line: string,
  options: ParseLineOptions = {}
): ParsedBookmarkLine {
  const indent = countLeading(line, ' ');
  if (indent % INDENT_WIDTH !== 0) return { ok: false, reason: 'odd-indent', indent };

  const title = decodeQuoted(line.slice(indent));
  const node = createOutlineNode(title.ok ? title.value : '');
  const ignoredTokens = applyMetadata(node, title.rest, options.parseColor ?? defaultParseColor);

  return { ok: true, node, level: indent / INDENT_WIDTH, titleOk: title.ok, ignoredTokens };
}
