/**
 * Built-in Value implementations.
 *
 * Pipelines may bring their own Value types; these cover the JSON shapes
 * most producers emit.
 */
import type { Fields, Value } from "./types.js";

export function intValue(n: number): Value {
  const text = String(Math.trunc(n));
  return { render: () => text };
}

export function floatValue(n: number): Value {
  return { render: ({ floatingPoints }) => n.toFixed(floatingPoints) };
}

export function stringValue(s: string): Value {
  return { render: () => s };
}

export function boolValue(b: boolean): Value {
  const text = b ? "true" : "false";
  return { render: () => text };
}

/** Placeholder for a missing value. */
export const NONE: Value = { render: () => "None" };

/** Map a parsed JSON value onto a built-in Value. */
export function fromJson(v: unknown): Value {
  if (v === null || v === undefined) return NONE;
  switch (typeof v) {
    case "number":
      return Number.isInteger(v) ? intValue(v) : floatValue(v);
    case "string":
      return stringValue(v);
    case "boolean":
      return boolValue(v);
    case "bigint":
      return stringValue(v.toString());
    default:
      return stringValue(JSON.stringify(v) ?? String(v));
  }
}

/** Convert each property of a parsed JSON object into a Value. */
export function fieldsFromJson(obj: Readonly<Record<string, unknown>>): Fields {
  const entries = Object.entries(obj).map(([key, v]): [string, Value] => [key, fromJson(v)]);
  return Object.fromEntries(entries);
}
