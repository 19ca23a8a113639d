// \s leaves out NEL (U+0085), which Unicode lists as white space.
const HORIZONTAL_WHITESPACE_RUN = /(?:[^\S\r\n]|\u0085)+/gu;

/**
 * Collapses each run of whitespace that holds no line break into a single
 * space. `\n` and `\r` are left where they are.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(HORIZONTAL_WHITESPACE_RUN, " ");
}
