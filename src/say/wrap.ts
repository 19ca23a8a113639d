import { displayWidth } from "./width.js";

const LINE_BREAK = /\r?\n/u;

export function wrapText(text: string, maxWidth: number): string[] {
  const paragraphs = text.split(LINE_BREAK);
  if (paragraphs.length > 1 && paragraphs[paragraphs.length - 1] === "") {
    paragraphs.pop();
  }

  return paragraphs.flatMap((paragraph) => wrapParagraph(paragraph, maxWidth));
}

function wrapParagraph(paragraph: string, maxWidth: number): string[] {
  const words = paragraph.trimEnd().split(" ");

  const lines: string[] = [];
  let current = words[0] ?? "";
  let currentWidth = displayWidth(current);
  for (const word of words.slice(1)) {
    const wordWidth = displayWidth(word);
    if (currentWidth + 1 + wordWidth <= maxWidth) {
      current = `${current} ${word}`;
      currentWidth += 1 + wordWidth;
      continue;
    }
    // A leading space that cannot share a line with the first word is dropped.
    if (current.length > 0) {
      lines.push(current);
    }
    current = word;
    currentWidth = wordWidth;
  }

  lines.push(current);
  return lines;
}
