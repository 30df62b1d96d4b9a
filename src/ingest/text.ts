// Whitespace as rows already in the store were trimmed: includes U+0085 and
// U+001C..U+001F, excludes U+FEFF.
const SPACE = '\\t\\n\\v\\f\\r\\x1c-\\x1f \\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000';
const EDGE_SPACE = new RegExp(`^[${SPACE}]+|[${SPACE}]+$`, 'g');

export function trimText(text: string): string {
  return text.replace(EDGE_SPACE, '');
}

/** Length in code points, so an emoji counts once. */
export function textLength(text: string): number {
  return [...text].length;
}
