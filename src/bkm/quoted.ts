/**
 * Codec for the double-quoted title literal.
 *
 * Only `\\` and `\"` are escapes. Any other backslash is kept as-is, so
 * `"C:\path"` decodes to `C:\path`.
 */
export type DecodeQuotedResult =
  | { ok: true; value: string; rest: string }
  | { ok: false; rest: string };

/**
 * Decode a quoted literal at the very start of `text`.
 *
 * On success `rest` is the text after the closing quote. On failure (shorter
 * than `""`, no opening quote, or no closing quote) `rest` is `text` unchanged.
 */
export function decodeQuoted(text: string): DecodeQuotedResult {
  if (text.length < 2 || text[0] !== '"') return { ok: false, rest: text };

  let value = '';
  let index = 1;
  while (index < text.length) {
    const ch = text[index];
    if (ch === '"') {
      return { ok: true, value, rest: text.slice(index + 1) };
    }
    if (ch !== '\\') {
      value += ch;
      index += 1;
      continue;
    }

    const next = text[index + 1];
    if (next === undefined) break;
    if (next === '\\' || next === '"') {
      value += next;
      index += 2;
      continue;
    }
    value += ch;
    index += 1;
  }

  return { ok: false, rest: text };
}

export function encodeQuoted(value: string): string {
  return `"${value.replace(/[\\"]/g, (ch) => `\\${ch}`)}"`;
}
