/**
 * In-memory representation of a bookmark view.
 *
 * Notes:
 * - Each node owns its children array; a node is never shared between arrays.
 * - Line numbers are 0-based to match typical array indexing in JS/TS.
 */
export type FontFlags = number;

export const FONT_BOLD: FontFlags = 1;
export const FONT_ITALIC: FontFlags = 2;

export interface DestinationRect {
  x: number;
  y: number;
  dx: number;
  dy: number;
}

export interface OutlineDestination {
  /** Destination kind tag (ex: `ScrollTo`, `LaunchURL`). */
  kind: string;
  name?: string;
  value?: string;
  /** Target page, 0 when the destination has none. */
  pageNo: number;
  rect?: DestinationRect;
}

export interface OutlineNode {
  title: string;
  /** Bitset of `FONT_BOLD` / `FONT_ITALIC`. */
  fontFlags: FontFlags;
  /** 0xRRGGBB; `undefined` means unset (0 is black). */
  color?: number;
  /** Direct page target, 0 when there is none. */
  pageNo: number;
  isOpenDefault: boolean;
  isOpenToggled: boolean;
  isUnchecked: boolean;
  destination?: OutlineDestination;
  children: OutlineNode[];
}

export interface OutlineDocument {
  /** Identifier of the document the view belongs to (the `file:` header). */
  sourcePath: string;
  /** View name (the `title:` header). */
  title: string;
  /** Top-level entries in file order. */
  items: OutlineNode[];
}

export interface BookmarkCollection {
  documents: OutlineDocument[];
}

export function createOutlineNode(title = ''): OutlineNode {
  return {
    title,
    fontFlags: 0,
    pageNo: 0,
    isOpenDefault: false,
    isOpenToggled: false,
    isUnchecked: false,
    children: [],
  };
}

export function hasFontFlag(node: OutlineNode, flag: FontFlags): boolean {
  return (node.fontFlags & flag) !== 0;
}
