/**
 * Line and token primitives shared by the header, line and metadata parsers.
 *
 * Functions here never throw; "not found" is reported as `undefined`.
 */
export interface SplitResult {
  part: string;
  rest: string;
}

/**
 * Split text into lines, accepting both `\n` and `\r\n`.
 *
 * A trailing newline does not produce an extra empty line, so the last line of
 * `"a\n"` is `a`.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (text.endsWith('\n') && lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Number of consecutive `ch` characters at the start of `text`.
 */
export function countLeading(text: string, ch: string): number {
  let count = 0;
  while (count < text.length && text[count] === ch) count += 1;
  return count;
}

/**
 * Take everything up to the first `separator`; the separator itself is
 * consumed. Without a separator the whole text is the part.
 */
export function parseUntil(text: string, separator: string): SplitResult {
  const index = text.indexOf(separator);
  if (index === -1) return { part: text, rest: '' };
  return { part: text.slice(0, index), rest: text.slice(index + separator.length) };
}

/**
 * Parse a `key: value` header line.
 *
 * The key ends at `:`, a space or end of line and must equal `expectedKey`
 * exactly. Returns the trimmed value, or `undefined` when the key differs, the
 * colon is missing or the value is empty.
 */
export function parseKeyValue(line: string, expectedKey: string): string | undefined {
  const text = line.slice(countLeading(line, ' '));

  let keyEnd = 0;
  while (keyEnd < text.length && text[keyEnd] !== ':' && text[keyEnd] !== ' ') keyEnd += 1;
  if (text.slice(0, keyEnd) !== expectedKey) return undefined;

  const afterKey = text.slice(keyEnd).trimStart();
  if (!afterKey.startsWith(':')) return undefined;

  const value = afterKey.slice(1).trim();
  return value || undefined;
}
