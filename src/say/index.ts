import { renderBubble } from "./bubble.js";
import { DEFAULT_MASCOT, getMascot, type MascotName } from "./mascots.js";
import { normalizeWhitespace } from "./normalize.js";
import type { ByteSink } from "./sink.js";
import { wrapText } from "./wrap.js";

export interface SayOptions {
  mascot?: MascotName;
}

/**
 * Renders `input` inside a speech bubble followed by the mascot and
 * returns the text.
 *
 * @example
 * ```ts
 * formatSay("Hello fellow Rustaceans!", 24);
 * //  __________________________
 * // < Hello fellow Rustaceans! >
 * //  --------------------------
 * //         \
 * //          \
 * //             _~^~^~_
 * //         \) /  o o  \ (/
 * //           '_   -   _'
 * //           / '-----' \
 * ```
 */
export function formatSay(
  input: string,
  maxWidth: number,
  options: SayOptions = {},
): string {
  const lines = wrapText(normalizeWhitespace(input), maxWidth);
  return renderBubble(lines) + getMascot(options.mascot ?? DEFAULT_MASCOT);
}

/**
 * Writes the rendered bubble and mascot to `sink` as UTF-8 in a single
 * write. Errors thrown by the sink reach the caller untouched.
 */
export function say(
  input: string,
  maxWidth: number,
  sink: ByteSink,
  options: SayOptions = {},
): void {
  sink.write(Buffer.from(formatSay(input, maxWidth, options), "utf8"));
}
