import type { OutlineNode } from './model.js';

/**
 * Rebuild the outline tree from entries in file order.
 *
 * Attach rules, comparing each entry to the one before it:
 * - same level: next sibling of the previous entry
 * - deeper (by any amount): first child of the previous entry
 * - shallower: trailing sibling of the most recent earlier entry with the same
 *   level; if there is none, a trailing top-level entry
 *
 * The "most recent earlier entry at a level" is tracked in a map, so each
 * entry is attached in constant time.
 */
export interface LeveledNode {
  node: OutlineNode;
  level: number;
}

export function reconstructOutline(entries: LeveledNode[]): OutlineNode[] | undefined {
  const first = entries[0];
  if (!first) return undefined;

  const topLevel: OutlineNode[] = [first.node];
  // Sibling list of the latest entry seen at each level.
  const listAtLevel = new Map<number, OutlineNode[]>([[first.level, topLevel]]);

  for (let index = 1; index < entries.length; index += 1) {
    const prev = entries[index - 1];
    const curr = entries[index];
    if (!prev || !curr) continue;

    let target: OutlineNode[];
    if (curr.level === prev.level) {
      target = listAtLevel.get(prev.level) ?? topLevel;
    } else if (curr.level > prev.level) {
      target = prev.node.children;
    } else {
      target = listAtLevel.get(curr.level) ?? topLevel;
    }

    target.push(curr.node);
    listAtLevel.set(curr.level, target);
  }

  return topLevel;
}
