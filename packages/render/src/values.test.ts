import { describe, expect, it } from "vitest";
import { aggregate, groupedAggregate, record } from "./rows.js";
import {
  boolValue,
  fieldsFromJson,
  floatValue,
  fromJson,
  intValue,
  NONE,
  stringValue,
} from "./values.js";

const opts = { floatingPoints: 2 };

describe("values", () => {
  it("renders floats at the configured precision", () => {
    expect(floatValue(5.5000001).render(opts)).toBe("5.50");
    expect(floatValue(5.5000001).render({ floatingPoints: 0 })).toBe("6");
  });

  it("renders ints, strings, bools and None", () => {
    expect(intValue(955).render(opts)).toBe("955");
    expect(stringValue("str").render(opts)).toBe("str");
    expect(boolValue(false).render(opts)).toBe("false");
    expect(NONE.render(opts)).toBe("None");
  });
});

describe("fromJson", () => {
  it("maps numbers by integrality", () => {
    expect(fromJson(5).render(opts)).toBe("5");
    expect(fromJson(5.25).render(opts)).toBe("5.25");
  });

  it("maps null to None", () => {
    expect(fromJson(null).render(opts)).toBe("None");
  });

  it("renders nested values as compact JSON", () => {
    expect(fromJson({ a: [1, 2] }).render(opts)).toBe('{"a":[1,2]}');
  });

  it("keeps a property named __proto__", () => {
    const fields = fieldsFromJson(JSON.parse(`{"__proto__": 1, "a": 2}`));
    expect(Object.keys(fields)).toEqual(["__proto__", "a"]);
    expect(Object.getPrototypeOf(fields)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(fields, "__proto__")?.value.render(opts)).toBe("1");
  });

  it("converts each property of an object", () => {
    const fields = fieldsFromJson({ k1: 5, k2: 5.5000001, k3: "str", ok: true });
    expect(Object.keys(fields)).toEqual(["k1", "k2", "k3", "ok"]);
    expect(fields.k2.render(opts)).toBe("5.50");
    expect(fields.ok.render(opts)).toBe("true");
  });
});

describe("rows", () => {
  it("builds a raw-only record by default", () => {
    expect(record("line")).toEqual({ kind: "record", raw: "line", fields: {} });
  });

  it("copies the column list of an aggregate", () => {
    const columns = ["a"];
    const agg = aggregate(columns, []);
    columns.push("b");
    expect(agg.columns).toEqual(["a"]);
  });

  it("keeps a key column named __proto__", () => {
    const keys: Record<string, string> = JSON.parse(`{"__proto__": "k"}`);
    const agg = groupedAggregate(["__proto__"], "n", [[keys, intValue(1)]]);
    expect(Object.keys(agg.rows[0])).toEqual(["__proto__", "n"]);
    expect(agg.rows[0]["__proto__"].render(opts)).toBe("k");
  });

  it("puts the aggregate column after the key columns", () => {
    const agg = groupedAggregate(["host"], "count", [[{ host: "web" }, intValue(3)]]);
    expect(agg.columns).toEqual(["host", "count"]);
    expect(agg.rows[0].host.render(opts)).toBe("web");
    expect(agg.rows[0].count.render(opts)).toBe("3");
  });
});
