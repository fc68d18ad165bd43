import { errorDiagnostic } from './diagnostics.js';
import type { Diagnostic } from './diagnostics.js';
import type { BookmarkCollection, OutlineNode } from './model.js';
import { parseBookmarksText } from './parse.js';
import type { ParseBookmarksOptions } from './parse.js';

/**
 * Checks for in-memory trees and for raw `.bkm` text.
 */
export interface ValidateBookmarksResult {
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

/**
 * A node's own page and its destination's page must agree when both are set.
 */
export function pageNumbersMatch(node: OutlineNode): boolean {
  const dest = node.destination;
  if (!dest || dest.pageNo <= 0 || node.pageNo <= 0) return true;
  return dest.pageNo === node.pageNo;
}

/**
 * Visit every node of every document in pre-order, with its title path.
 */
function walkOutline(
  collection: BookmarkCollection,
  visit: (node: OutlineNode, path: string[]) => void
): void {
  const stack: { node: OutlineNode; path: string[] }[] = [];

  for (const document of collection.documents) {
    for (let index = document.items.length - 1; index >= 0; index -= 1) {
      const node = document.items[index];
      if (node) stack.push({ node, path: [node.title] });
    }

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) continue;

      visit(frame.node, frame.path);

      const children = frame.node.children;
      for (let index = children.length - 1; index >= 0; index -= 1) {
        const child = children[index];
        if (child) stack.push({ node: child, path: [...frame.path, child.title] });
      }
    }
  }
}

/**
 * Report every node that breaks `pageNumbersMatch`, in pre-order.
 *
 * Diagnostics carry no line number; the message names the node by its title
 * path instead.
 */
export function checkPageNumbers(collection: BookmarkCollection): Diagnostic[] {
  const errors: Diagnostic[] = [];
  walkOutline(collection, (node, path) => {
    if (pageNumbersMatch(node)) return;
    errors.push(
      errorDiagnostic(
        'PAGE_MISMATCH',
        `Page ${node.pageNo} of "${path.join(' / ')}" differs from its destination page ${
          node.destination?.pageNo ?? 0
        }`
      )
    );
  });
  return errors;
}

const LINE_BREAK_RE = /[\r\n]/;
const WHITESPACE_RE = /\s/;

/**
 * Header values and entry fields must fit on one line; a destination kind is
 * a single token.
 */
export function checkWritableValues(collection: BookmarkCollection): Diagnostic[] {
  const errors: Diagnostic[] = [];
  const unwritable = (message: string): void => {
    errors.push(errorDiagnostic('UNWRITABLE_VALUE', message));
  };

  for (const document of collection.documents) {
    const sourcePath = document.sourcePath;
    if (!sourcePath || sourcePath.trim() !== sourcePath || LINE_BREAK_RE.test(sourcePath)) {
      unwritable(`Source path ${JSON.stringify(sourcePath)} must be non-empty, unpadded and on one line`);
    }
  }

  walkOutline(collection, (node, path) => {
    const where = `"${path.join(' / ')}"`;
    if (LINE_BREAK_RE.test(node.title)) unwritable(`Title of ${where} contains a line break`);

    const dest = node.destination;
    if (!dest) return;
    if (!dest.kind || WHITESPACE_RE.test(dest.kind)) {
      unwritable(`Destination kind ${JSON.stringify(dest.kind)} of ${where} must be a single token`);
    }
    if (dest.name !== undefined && LINE_BREAK_RE.test(dest.name)) {
      unwritable(`Destination name of ${where} contains a line break`);
    }
    if (dest.value !== undefined && LINE_BREAK_RE.test(dest.value)) {
      unwritable(`Destination value of ${where} contains a line break`);
    }
  });

  return errors;
}

/**
 * Everything that must hold before a collection is written.
 */
export function checkBeforeWrite(collection: BookmarkCollection): Diagnostic[] {
  return [...checkPageNumbers(collection), ...checkWritableValues(collection)];
}

/**
 * Validate `.bkm` text: structural parse errors, tolerated-input warnings, and
 * page-number consistency of the parsed tree.
 */
export function validateBookmarksText(
  text: string,
  options: ParseBookmarksOptions = {}
): ValidateBookmarksResult {
  const parsed = parseBookmarksText(text, options);
  const errors = [...parsed.errors];
  if (parsed.collection) errors.push(...checkPageNumbers(parsed.collection));
  return { errors, warnings: parsed.warnings };
}
