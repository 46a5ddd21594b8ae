/**
 * Record templates.
 *
 * The layout engine only sees the Interpolator interface; FormatInterpolator
 * is the default implementation, understanding placeholders of the form
 *
 *   {name}            field text as-is
 *   {name:>8}         right-aligned in 8 columns
 *   {name:*^10.3}     at most 3 characters, centred in 10, padded with '*'
 *   {{  }}            literal braces
 */
import { TemplateError } from "./errors.js";

export interface Interpolator {
  /** Substitute rendered field text into `template`. Throws TemplateError. */
  interpolate(template: string, fields: Readonly<Record<string, string>>): string;
}

export type Align = "<" | ">" | "^";

export interface Placeholder {
  name: string;
  fill: string;
  align: Align;
  width: number;
  precision: number | null;
}

export type Segment = { kind: "text"; text: string } | { kind: "field"; field: Placeholder };

const SPEC_RE = /^(?:(.)?([<>^]))?(\d+)?(?:\.(\d+))?$/u;

function parseSpec(name: string, spec: string): Placeholder {
  const m = SPEC_RE.exec(spec);
  if (!m) throw new TemplateError(`invalid format spec "${spec}" for field "${name}"`);
  const [, fill, align, width, precision] = m;
  return {
    name,
    fill: fill ?? " ",
    align: align === ">" || align === "^" ? align : "<",
    width: width ? Number(width) : 0,
    precision: precision ? Number(precision) : null,
  };
}

/** Split a template into literal text and placeholders. */
export function parseTemplate(template: string): Segment[] {
  const segments: Segment[] = [];
  let text = "";
  let i = 0;

  while (i < template.length) {
    const ch = template[i];
    if (ch === "}") {
      if (template[i + 1] !== "}") throw new TemplateError(`unmatched "}" at offset ${i}`);
      text += "}";
      i += 2;
      continue;
    }
    if (ch !== "{") {
      text += ch;
      i++;
      continue;
    }
    if (template[i + 1] === "{") {
      text += "{";
      i += 2;
      continue;
    }

    const close = template.indexOf("}", i + 1);
    if (close === -1) throw new TemplateError(`unterminated "{" at offset ${i}`);
    const body = template.slice(i + 1, close);
    if (body.includes("{")) throw new TemplateError(`nested "{" at offset ${i}`);

    const colon = body.indexOf(":");
    const name = colon === -1 ? body : body.slice(0, colon);
    if (name.length === 0) throw new TemplateError(`empty field name at offset ${i}`);
    const spec = colon === -1 ? "" : body.slice(colon + 1);

    if (text) segments.push({ kind: "text", text });
    text = "";
    segments.push({ kind: "field", field: parseSpec(name, spec) });
    i = close + 1;
  }

  if (text) segments.push({ kind: "text", text });
  return segments;
}

function applySpec(value: string, p: Placeholder): string {
  const chars = [...value];
  const shown = p.precision === null ? chars : chars.slice(0, p.precision);
  const pad = p.width - shown.length;
  const body = shown.join("");
  if (pad <= 0) return body;

  switch (p.align) {
    case ">":
      return p.fill.repeat(pad) + body;
    case "^": {
      const left = Math.floor(pad / 2);
      return p.fill.repeat(left) + body + p.fill.repeat(pad - left);
    }
    default:
      return body + p.fill.repeat(pad);
  }
}

export class FormatInterpolator implements Interpolator {
  private readonly cache = new Map<string, Segment[]>();

  interpolate(template: string, fields: Readonly<Record<string, string>>): string {
    let segments = this.cache.get(template);
    if (!segments) {
      segments = parseTemplate(template);
      this.cache.set(template, segments);
    }

    let out = "";
    for (const seg of segments) {
      if (seg.kind === "text") {
        out += seg.text;
        continue;
      }
      const { name } = seg.field;
      if (!Object.hasOwn(fields, name)) {
        throw new TemplateError(`template references missing field "${name}"`);
      }
      out += applySpec(fields[name], seg.field);
    }
    return out;
  }
}
