/**
 * Error types raised by streamtab-render.
 *
 * Output failures are raised by streamtab-tui's TerminalWriter and
 * re-exported from the package index as OutputWriteError.
 */

/** A format template referenced a missing field or could not be parsed. */
export class TemplateError extends Error {
  override readonly name = "TemplateError";
}

/** Invalid renderer configuration. */
export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

/** Shrink-to-fit left the table wider than its budget. Indicates a bug. */
export class LayoutInvariantError extends Error {
  override readonly name = "LayoutInvariantError";
}
