export { renderBubble } from "./say/bubble.js";
export { formatSay, say, type SayOptions } from "./say/index.js";
export {
  DEFAULT_MASCOT,
  getMascot,
  MASCOT_NAMES,
  type MascotName,
} from "./say/mascots.js";
export { normalizeWhitespace } from "./say/normalize.js";
export {
  type BufferSink,
  type ByteSink,
  createBufferSink,
  createFileDescriptorSink,
  type FileDescriptorSinkOptions,
} from "./say/sink.js";
export { displayWidth } from "./say/width.js";
export { wrapText } from "./say/wrap.js";
