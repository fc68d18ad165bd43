import { formatColor } from './color.js';
import { DEFAULT_VIEW_TITLE, FILE_HEADER_KEY, INDENT_WIDTH, TITLE_HEADER_KEY } from './constants.js';
import { BookmarkFormatError } from './diagnostics.js';
import type { BookmarkCollection, OutlineDestination, OutlineNode } from './model.js';
import { FONT_BOLD, FONT_ITALIC, hasFontFlag } from './model.js';
import { encodeQuoted } from './quoted.js';
import { checkBeforeWrite } from './validate.js';

export interface SerializeOptions {
  /**
   * `independent` writes `open-toggled` from `isOpenToggled`.
   * `mirror-default` writes it whenever `isOpenDefault` is set, like older
   * writers did.
   */
  openToggled?: 'independent' | 'mirror-default';
  /** Title written to the `title:` header of every document. */
  viewTitle?: string;
}

function serializeDestination(dest: OutlineDestination): string {
  let out = ` destkind:${dest.kind}`;
  if (dest.name !== undefined) out += ` destname:${encodeQuoted(dest.name)}`;
  if (dest.value !== undefined) out += ` destvalue:${encodeQuoted(dest.value)}`;
  if (dest.pageNo > 0) out += ` destpage:${dest.pageNo}`;
  const r = dest.rect;
  if (r) out += ` destrect:${r.x},${r.y},${r.dx},${r.dy}`;
  return out;
}

/**
 * Render a single entry line (without indentation or newline).
 *
 * Field order is fixed: italic, bold, color, page, open flags, unchecked,
 * destination.
 */
export function serializeOutlineNode(node: OutlineNode, options: SerializeOptions = {}): string {
  let out = encodeQuoted(node.title);
  if (hasFontFlag(node, FONT_ITALIC)) out += ' font:italic';
  if (hasFontFlag(node, FONT_BOLD)) out += ' font:bold';
  if (node.color !== undefined) out += ` color:${formatColor(node.color)}`;
  if (node.pageNo !== 0) out += ` page:${node.pageNo}`;
  if (node.isOpenDefault) out += ' open-default';

  const toggled =
    options.openToggled === 'mirror-default' ? node.isOpenDefault : node.isOpenToggled;
  if (toggled) out += ' open-toggled';

  if (node.isUnchecked) out += ' unchecked';
  if (node.destination) out += serializeDestination(node.destination);
  return out;
}

/**
 * Append entry lines for `items` and their subtrees, pre-order.
 *
 * Uses an explicit stack so deeply nested outlines do not hit recursion limits.
 */
export function serializeOutlineItems(
  items: OutlineNode[],
  level: number,
  out: string[],
  options: SerializeOptions = {}
): void {
  const stack: { node: OutlineNode; level: number }[] = [];
  for (let index = items.length - 1; index >= 0; index -= 1) {
    const node = items[index];
    if (node) stack.push({ node, level });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;

    out.push(`${' '.repeat(frame.level * INDENT_WIDTH)}${serializeOutlineNode(frame.node, options)}`);

    const children = frame.node.children;
    for (let index = children.length - 1; index >= 0; index -= 1) {
      const child = children[index];
      if (child) stack.push({ node: child, level: frame.level + 1 });
    }
  }
}

/**
 * Render a collection as `.bkm` text.
 *
 * Documents are separated by an empty line. Throws `BookmarkFormatError` if a
 * node's page disagrees with its destination page, or a value cannot be
 * written on one line (see `checkWritableValues`).
 */
export function serializeBookmarks(
  collection: BookmarkCollection,
  options: SerializeOptions = {}
): string {
  const problems = checkBeforeWrite(collection);
  if (problems.length > 0) {
    throw new BookmarkFormatError('Outline cannot be written as .bkm text', problems);
  }

  const viewTitle = options.viewTitle ?? DEFAULT_VIEW_TITLE;
  if (!viewTitle.trim() || /[\r\n]/.test(viewTitle)) {
    throw new BookmarkFormatError(`Invalid view title: ${JSON.stringify(viewTitle)}`);
  }
  const blocks = collection.documents.map((document) => {
    const lines = [
      `${FILE_HEADER_KEY}: ${document.sourcePath}`,
      `${TITLE_HEADER_KEY}: ${viewTitle}`,
    ];
    serializeOutlineItems(document.items, 0, lines, options);
    return `${lines.join('\n')}\n`;
  });

  return blocks.join('\n');
}
