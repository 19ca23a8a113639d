import { displayWidth, longestLineWidth } from "./width.js";

interface BorderTokens {
  readonly left: string;
  readonly right: string;
}

const SINGLE_LINE: BorderTokens = { left: "< ", right: " >" };
const FIRST_LINE: BorderTokens = { left: "/ ", right: " \\" };
const LAST_LINE: BorderTokens = { left: "\\ ", right: " /" };
const MIDDLE_LINE: BorderTokens = { left: "| ", right: " |" };

function selectBorderTokens(index: number, lineCount: number): BorderTokens {
  if (lineCount === 1) {
    return SINGLE_LINE;
  }
  if (index === 0) {
    return FIRST_LINE;
  }
  if (index === lineCount - 1) {
    return LAST_LINE;
  }
  return MIDDLE_LINE;
}

/**
 * Draws the speech bubble around already wrapped lines. The result ends
 * with the bottom border and no trailing line break.
 */
export function renderBubble(lines: readonly string[]): string {
  const actualWidth = longestLineWidth(lines);
  const rows: string[] = [` ${"_".repeat(actualWidth + 2)}\n`];

  lines.forEach((line, index) => {
    const { left, right } = selectBorderTokens(index, lines.length);
    const padding = " ".repeat(actualWidth - displayWidth(line));
    rows.push(`${left}${line}${padding}${right}\n`);
  });

  rows.push(` ${"-".repeat(actualWidth + 2)}`);
  return rows.join("");
}
