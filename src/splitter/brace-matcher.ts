/**
 * Find the `}` that closes the `{` at `openIndex`, skipping braces inside
 * string literals, char literals and comments.
 *
 * Returns -1 when `openIndex` is not a `{` or the text ends before the
 * depth returns to zero.
 *
 * A quote counts as escaped when the character right before it is a
 * backslash, so `"\\"` is read as an unterminated string. A `/*` opens a
 * block comment even inside a line comment, and the block comment then
 * outlives the newline.
 */
export function findMatchingBrace(text: string, openIndex: number): number {
  if (text[openIndex] !== '{') return -1;

  let depth = 1;
  let inString = false;
  let inChar = false;
  let inLineComment = false;
  let inBlockComment = false;

  for (let i = openIndex + 1; i < text.length; i++) {
    const ch = text[i];
    const next = text[i + 1];
    const escaped = text[i - 1] === '\\';

    if (ch === '"' && !escaped && !inChar && !inLineComment && !inBlockComment) {
      inString = !inString;
    } else if (ch === "'" && !escaped && !inString && !inLineComment && !inBlockComment) {
      inChar = !inChar;
    } else if (ch === '/' && next === '/' && !inString && !inChar && !inBlockComment) {
      inLineComment = true;
    } else if (ch === '\n' && inLineComment) {
      inLineComment = false;
    } else if (ch === '/' && next === '*' && !inString && !inChar) {
      inBlockComment = true;
    } else if (ch === '*' && next === '/' && inBlockComment) {
      inBlockComment = false;
      i++;
    } else if (!inString && !inChar && !inLineComment && !inBlockComment) {
      if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        depth--;
        if (depth === 0) return i;
      }
    }
  }

  return -1;
}
