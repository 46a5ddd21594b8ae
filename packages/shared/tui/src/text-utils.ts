/** Marker appended to text cut short by {@link fit}. */
export const ELLIPSIS = "…";

/**
 * Number of Unicode scalar values in `text`. Surrogate pairs count once,
 * which `String#length` does not do.
 */
export function charLength(text: string): number {
  return [...text].length;
}

/** First `count` scalar values of `text`. */
function takeChars(text: string, count: number): string {
  return count > 0 ? [...text].slice(0, count).join("") : "";
}

/** Right-pad `text` with spaces to `width` scalar values. Never truncates. */
export function padToLength(text: string, width: number): string {
  const pad = width - charLength(text);
  return pad > 0 ? text + " ".repeat(pad) : text;
}

/**
 * Fit `text` into exactly `width` scalar values.
 *
 * Longer text keeps its head and ends in `"… "`; shorter text is padded.
 * Below two columns there is no room for the marker and the text is cut.
 */
export function fit(text: string, width: number): string {
  const len = charLength(text);
  if (len <= width) return padToLength(text, width);

  const prelimit = width - charLength(ELLIPSIS) - 1;
  if (prelimit < 0) return padToLength(takeChars(text, width), width);
  return `${takeChars(text, prelimit)}${ELLIPSIS} `;
}

/**
 * The first `count` lines of `text`, each newline-terminated. A single
 * trailing newline does not start an extra empty line.
 */
export function takeLines(text: string, count: number): string {
  if (count <= 0) return "";
  const body = text.endsWith("\n") ? text.slice(0, -1) : text;
  return `${body.split("\n").slice(0, count).join("\n")}\n`;
}

/** Number of newline characters in `text`. */
export function countLines(text: string): number {
  let n = 0;
  for (let i = text.indexOf("\n"); i !== -1; i = text.indexOf("\n", i + 1)) n++;
  return n;
}
