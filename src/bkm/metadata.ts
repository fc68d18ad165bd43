import type { ColorParser } from './color.js';
import { decodeQuoted } from './quoted.js';
import type { DestinationRect, OutlineDestination, OutlineNode } from './model.js';
import { FONT_BOLD, FONT_ITALIC } from './model.js';
import { countLeading, parseUntil } from './tokens.js';

/**
 * Parser for the metadata tokens that follow a quoted title.
 *
 * Tokens are separated by spaces. A `key:"..."` token carries a quoted value
 * (which may contain spaces); every other token runs up to the next space.
 * Unrecognized tokens and unparseable values are skipped.
 */
export interface MetadataToken {
  /** Token text; for quoted tokens this is the `key:` prefix only. */
  text: string;
  quotedValue?: string;
}

const QUOTED_KEY_RE = /^([A-Za-z][A-Za-z0-9-]*:)"/;
const UNSIGNED_INT_RE = /^\d+$/;
const FLOAT_RE = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

/**
 * Split a metadata remainder into tokens. Empty tokens (runs of spaces) are
 * dropped.
 */
export function scanMetadataTokens(text: string): MetadataToken[] {
  const tokens: MetadataToken[] = [];
  let rest = text;

  while (rest.length > 0) {
    rest = rest.slice(countLeading(rest, ' '));
    if (rest.length === 0) break;

    const keyMatch = rest.match(QUOTED_KEY_RE);
    if (keyMatch) {
      const key = keyMatch[1] ?? '';
      const decoded = decodeQuoted(rest.slice(key.length));
      if (decoded.ok) {
        tokens.push({ text: key, quotedValue: decoded.value });
        rest = decoded.rest;
        continue;
      }
    }

    const { part, rest: after } = parseUntil(rest, ' ');
    tokens.push({ text: part });
    rest = after;
  }

  return tokens;
}

function parsePositiveInt(text: string): number | undefined {
  if (!UNSIGNED_INT_RE.test(text)) return undefined;
  const value = Number(text);
  return Number.isSafeInteger(value) && value > 0 ? value : undefined;
}

function parseFloatStrict(text: string): number | undefined {
  if (!FLOAT_RE.test(text)) return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Parse `x,y,dx,dy`.
 */
export function parseRect(text: string): DestinationRect | undefined {
  const parts = text.split(',');
  if (parts.length !== 4) return undefined;
  const values = parts.map(parseFloatStrict);
  const [x, y, dx, dy] = values;
  if (x === undefined || y === undefined || dx === undefined || dy === undefined) {
    return undefined;
  }
  return { x, y, dx, dy };
}

/**
 * Value of a `key:value` token, or `undefined` when the token has another key.
 * Quoted tokens yield their decoded value.
 */
function valueFor(token: MetadataToken, key: string): string | undefined {
  const prefix = `${key}:`;
  if (!token.text.startsWith(prefix)) return undefined;
  if (token.quotedValue !== undefined) {
    return token.text === prefix ? token.quotedValue : undefined;
  }
  return token.text.slice(prefix.length);
}

interface PendingDestination {
  kind?: string;
  name?: string;
  value?: string;
  pageNo: number;
  rect?: DestinationRect;
}

/**
 * Apply one token to `node` (or to the pending destination).
 *
 * Returns false if the token was not recognized.
 */
function applyToken(
  node: OutlineNode,
  dest: PendingDestination,
  token: MetadataToken,
  parseColor: ColorParser
): boolean {
  const text = token.text;
  const plain = token.quotedValue === undefined;

  if (plain && text === 'font:bold') {
    node.fontFlags |= FONT_BOLD;
    return true;
  }
  if (plain && text === 'font:italic') {
    node.fontFlags |= FONT_ITALIC;
    return true;
  }

  const colorText = valueFor(token, 'color');
  if (colorText !== undefined) {
    const color = parseColor(colorText);
    if (!color.ok) return false;
    node.color = color.value;
    return true;
  }

  if (plain) {
    const lower = text.toLowerCase();
    if (lower === 'open-default') {
      node.isOpenDefault = true;
      return true;
    }
    if (lower === 'open-toggled') {
      node.isOpenToggled = true;
      return true;
    }
    if (text === 'unchecked') {
      node.isUnchecked = true;
      return true;
    }
  }

  const pageText = valueFor(token, 'page');
  if (pageText !== undefined) {
    const pageNo = parsePositiveInt(pageText);
    if (pageNo === undefined) return false;
    node.pageNo = pageNo;
    return true;
  }

  const kind = valueFor(token, 'destkind');
  if (kind !== undefined) {
    if (!kind) return false;
    dest.kind = kind;
    return true;
  }

  const name = valueFor(token, 'destname');
  if (name !== undefined) {
    dest.name = name;
    return true;
  }

  const value = valueFor(token, 'destvalue');
  if (value !== undefined) {
    dest.value = value;
    return true;
  }

  const destPageText = valueFor(token, 'destpage');
  if (destPageText !== undefined) {
    const pageNo = parsePositiveInt(destPageText);
    if (pageNo === undefined) return false;
    dest.pageNo = pageNo;
    return true;
  }

  const rectText = valueFor(token, 'destrect');
  if (rectText !== undefined) {
    const rect = parseRect(rectText);
    if (!rect) return false;
    dest.rect = rect;
    return true;
  }

  return false;
}

/**
 * Classify every token in `text` and store the recognized fields on `node`.
 *
 * Returns the tokens that were ignored so callers can report them if they
 * want to; ignoring them is never an error.
 */
export function applyMetadata(
  node: OutlineNode,
  text: string,
  parseColor: ColorParser
): MetadataToken[] {
  const ignored: MetadataToken[] = [];
  const dest: PendingDestination = { pageNo: 0 };

  for (const token of scanMetadataTokens(text)) {
    if (!applyToken(node, dest, token, parseColor)) ignored.push(token);
  }

  if (dest.kind !== undefined) {
    const destination: OutlineDestination = { kind: dest.kind, pageNo: dest.pageNo };
    if (dest.name !== undefined) destination.name = dest.name;
    if (dest.value !== undefined) destination.value = dest.value;
    if (dest.rect) destination.rect = dest.rect;
    node.destination = destination;
  }

  return ignored;
}
