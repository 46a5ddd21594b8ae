import { ProcessTerminal } from "@mariozechner/pi-tui";
import { sampleTerminalSize } from "streamtab-tui";
import { Renderer, type RendererOptions } from "./renderer.js";

/**
 * Renderer bound to the process's standard output. The terminal size is
 * read here, once; later resizes are not observed.
 */
export function createStdoutRenderer(
  options: Omit<RendererOptions, "output" | "terminalSize"> = {}
): Renderer {
  const terminal = new ProcessTerminal();
  const terminalSize = sampleTerminalSize(terminal, process.stdout.isTTY === true);
  return new Renderer({ ...options, output: terminal, terminalSize });
}
