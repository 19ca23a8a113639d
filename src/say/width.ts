import stringWidth from "string-width";

const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });
const PICTOGRAPHIC = /\p{Extended_Pictographic}/u;
const ZERO_WIDTH = /[\p{Mn}\p{Me}\p{Cf}]/gu;

/**
 * Number of terminal columns the text occupies: wide glyphs count as two,
 * combining marks, format characters and control characters as zero.
 *
 * string-width removes ANSI escape sequences before measuring, so escapes
 * count as zero columns too. The bubble never carries styling.
 */
export function displayWidth(text: string): number {
  let width = 0;
  for (const { segment } of graphemes.segment(text)) {
    // Emoji sequences keep their joiners and selectors; string-width sizes
    // the whole sequence.
    width += PICTOGRAPHIC.test(segment)
      ? stringWidth(segment)
      : stringWidth(segment.replace(ZERO_WIDTH, ""));
  }
  return width;
}

export function longestLineWidth(lines: readonly string[]): number {
  let longest = 0;
  for (const line of lines) {
    longest = Math.max(longest, displayWidth(line));
  }
  return longest;
}
