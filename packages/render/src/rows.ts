import type { AggregateRow, Fields, RecordRow, Value } from "./types.js";
import { stringValue } from "./values.js";

export function record(raw: string, fields: Fields = {}): RecordRow {
  return { kind: "record", raw, fields };
}

export function aggregate(columns: readonly string[], rows: readonly Fields[]): AggregateRow {
  return { kind: "aggregate", columns: [...columns], rows };
}

/**
 * Build an aggregate from grouped results: one row per group, key columns
 * first, the aggregate column last.
 */
export function groupedAggregate(
  keyColumns: readonly string[],
  aggregateColumn: string,
  groups: readonly (readonly [Readonly<Record<string, string>>, Value])[]
): AggregateRow {
  const rows = groups.map(([keys, value]): Fields => {
    const entries: [string, Value][] = Object.entries(keys).map(([name, key]) => [
      name,
      stringValue(key),
    ]);
    entries.push([aggregateColumn, value]);
    return Object.fromEntries(entries);
  });
  return aggregate([...keyColumns, aggregateColumn], rows);
}
