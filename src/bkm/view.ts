import { formatColor } from './color.js';
import type { OutlineDestination, OutlineDocument, OutlineNode } from './model.js';
import { FONT_BOLD, FONT_ITALIC, hasFontFlag } from './model.js';

/**
 * View/presentation helpers for bookmark views.
 *
 * Tool/CLI output uses these stable JSON shapes rather than `OutlineNode`:
 * flags become booleans, colors become `#rrggbb` strings and unset fields are
 * omitted.
 *
 * Notes:
 * - Uses explicit stacks to avoid recursion depth issues on deeply nested outlines.
 * - `path` is the list of titles from the top level down to the node.
 */
export type OutlineViewFields = {
  title: string;
  bold: boolean;
  italic: boolean;
  color?: string;
  pageNo?: number;
  openDefault: boolean;
  openToggled: boolean;
  unchecked: boolean;
  destination?: OutlineDestination;
};

export type OutlineTreeViewNode = OutlineViewFields & {
  children: OutlineTreeViewNode[];
};

export type OutlineFlatRow = OutlineViewFields & {
  level: number;
  path: string[];
};

function toViewFields(node: OutlineNode): OutlineViewFields {
  const fields: OutlineViewFields = {
    title: node.title,
    bold: hasFontFlag(node, FONT_BOLD),
    italic: hasFontFlag(node, FONT_ITALIC),
    openDefault: node.isOpenDefault,
    openToggled: node.isOpenToggled,
    unchecked: node.isUnchecked,
  };
  if (node.color !== undefined) fields.color = formatColor(node.color);
  if (node.pageNo > 0) fields.pageNo = node.pageNo;
  if (node.destination) fields.destination = { ...node.destination };
  return fields;
}

export function buildOutlineTreeView(items: OutlineNode[]): OutlineTreeViewNode[] {
  const out: OutlineTreeViewNode[] = [];
  const stack: { node: OutlineNode; outArray: OutlineTreeViewNode[] }[] = [];

  // Seed the stack in reverse so we push into `out` in the original order.
  for (let index = items.length - 1; index >= 0; index -= 1) {
    const node = items[index];
    if (!node) continue;
    stack.push({ node, outArray: out });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;

    const viewNode: OutlineTreeViewNode = { ...toViewFields(frame.node), children: [] };
    frame.outArray.push(viewNode);

    for (let index = frame.node.children.length - 1; index >= 0; index -= 1) {
      const child = frame.node.children[index];
      if (!child) continue;
      stack.push({ node: child, outArray: viewNode.children });
    }
  }

  return out;
}

export function buildOutlineFlatRows(items: OutlineNode[]): OutlineFlatRow[] {
  const out: OutlineFlatRow[] = [];
  const stack: { node: OutlineNode; level: number; path: string[] }[] = [];

  for (let index = items.length - 1; index >= 0; index -= 1) {
    const node = items[index];
    if (node) stack.push({ node, level: 0, path: [node.title] });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;

    out.push({ ...toViewFields(frame.node), level: frame.level, path: frame.path });

    for (let index = frame.node.children.length - 1; index >= 0; index -= 1) {
      const child = frame.node.children[index];
      if (!child) continue;
      stack.push({ node: child, level: frame.level + 1, path: [...frame.path, child.title] });
    }
  }

  return out;
}

/**
 * Count nodes in a document (all levels).
 */
export function countOutlineNodes(document: OutlineDocument): number {
  let count = 0;
  const stack: OutlineNode[] = [...document.items];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) continue;
    count += 1;
    stack.push(...node.children);
  }
  return count;
}
