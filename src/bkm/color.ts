/**
 * Default color collaborator.
 *
 * Colors are stored as 0xRRGGBB numbers. Callers with their own color syntax
 * (named colors, alpha) pass a different `ColorParser` to the parser.
 */
export type ColorParseResult = { ok: true; value: number } | { ok: false };

export type ColorParser = (token: string) => ColorParseResult;

const HEX6_RE = /^#([0-9a-fA-F]{6})$/;
const HEX3_RE = /^#([0-9a-fA-F])([0-9a-fA-F])([0-9a-fA-F])$/;

/**
 * Parse `#rrggbb` or `#rgb`.
 */
export const parseColor: ColorParser = (token) => {
  const long = token.match(HEX6_RE);
  if (long) return { ok: true, value: Number.parseInt(long[1] ?? '', 16) };

  const short = token.match(HEX3_RE);
  if (short) {
    const expanded = `${short[1]}${short[1]}${short[2]}${short[2]}${short[3]}${short[3]}`;
    return { ok: true, value: Number.parseInt(expanded, 16) };
  }

  return { ok: false };
};

/**
 * Format a 0xRRGGBB value as `#rrggbb`.
 */
export function formatColor(value: number): string {
  return `#${(value & 0xffffff).toString(16).padStart(6, '0')}`;
}
