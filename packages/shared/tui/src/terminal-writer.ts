/**
 * TerminalWriter — Buffered terminal write helper.
 *
 * Wraps the write side of pi-tui's Terminal interface so that one render
 * (erase sequence plus new content) reaches the sink as a single write.
 */

import type { Terminal } from "@mariozechner/pi-tui";
import * as ansi from "./ansi.js";

/** Anything that accepts rendered text: a pi-tui Terminal or a test recorder. */
export type OutputSink = Pick<Terminal, "write">;

/** Terminal dimensions, sampled once. */
export interface TerminalSize {
  /** Columns. */
  width: number;
  /** Rows. */
  height: number;
}

/** Raised when the underlying sink rejects a write. */
export class OutputWriteError extends Error {
  override readonly name = "OutputWriteError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Snapshot the size of an interactive terminal. Returns null for
 * non-interactive output, which callers treat as "no terminal".
 */
export function sampleTerminalSize(
  terminal: Pick<Terminal, "columns" | "rows">,
  isTTY: boolean
): TerminalSize | null {
  if (!isTTY) return null;
  return { width: terminal.columns, height: terminal.rows };
}

export class TerminalWriter {
  private buf = "";

  constructor(private readonly sink: OutputSink) {}

  // ── Buffered output ────────────────────────────────────────────────

  /** Append raw data to the write buffer. */
  write(data: string): void {
    this.buf += data;
  }

  /** Queue an erase of the `count` lines above the cursor. */
  eraseLines(count: number): void {
    this.write(ansi.eraseLines(count));
  }

  /**
   * Flush the buffer to the sink in a single write. The buffer is
   * discarded whether or not the write succeeds.
   */
  flush(): void {
    if (this.buf.length === 0) return;
    const data = this.buf;
    this.buf = "";
    try {
      this.sink.write(data);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new OutputWriteError(`write to output failed: ${detail}`, { cause: err });
    }
  }

  /** Characters waiting to be flushed. */
  get pending(): number {
    return this.buf.length;
  }
}
