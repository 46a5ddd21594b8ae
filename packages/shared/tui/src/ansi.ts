/**
 * ANSI escape sequence constants and factory functions.
 *
 * Low-level terminal control primitives used to erase a previous
 * in-place render before drawing the next one.
 */

// ── Cursor movement ────────────────────────────────────────────────────────

/** Move cursor up one row, keeping the column. */
export const CURSOR_UP = "\x1b[1A";

// ── Line control ───────────────────────────────────────────────────────────

export const CLEAR_LINE = "\x1b[2K";

/**
 * Erase the `count` lines above the cursor, leaving the cursor at the
 * start of the topmost erased line.
 */
export const eraseLines = (count: number): string =>
  count > 0 ? (CURSOR_UP + CLEAR_LINE).repeat(count) : "";
