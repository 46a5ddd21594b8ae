/**
 * streamtab-tui — Terminal primitives shared by streamtab renderers.
 *
 * @module streamtab-tui
 */

export { CLEAR_LINE, CURSOR_UP, eraseLines } from "./ansi.js";
export {
  OutputWriteError,
  sampleTerminalSize,
  TerminalWriter,
  type OutputSink,
  type TerminalSize,
} from "./terminal-writer.js";
export { charLength, countLines, ELLIPSIS, fit, padToLength, takeLines } from "./text-utils.js";
