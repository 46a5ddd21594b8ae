/**
 * Shrink-to-fit for aggregate tables.
 *
 * A single left-to-right greedy pass: each column may take at most an even
 * share of what is left, and columns narrower than their share hand the
 * difference on to the columns after them. The result depends on column
 * order and is not globally fair.
 */

/**
 * Redistribute `budget` columns over `ordering`.
 *
 * `trackedCount` is the number of columns the layout currently tracks and
 * divides the remaining budget; it is at least `ordering.length`.
 * Columns missing from `widths` count as zero-width.
 */
export function shrinkToFit(
  widths: ReadonlyMap<string, number>,
  ordering: readonly string[],
  budget: number,
  trackedCount: number
): Map<string, number> {
  const shrunk = new Map<string, number>();
  let remaining = budget;

  ordering.forEach((column, i) => {
    const width = widths.get(column) ?? 0;
    const divisor = Math.max(1, trackedCount - i);
    const fairShare = Math.floor(remaining / divisor);
    const allotted = width < fairShare ? width : fairShare;
    remaining -= allotted;
    shrunk.set(column, allotted);
  });

  return shrunk;
}

export function totalWidth(widths: ReadonlyMap<string, number>): number {
  let sum = 0;
  for (const w of widths.values()) sum += w;
  return sum;
}
