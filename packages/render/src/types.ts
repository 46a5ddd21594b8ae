/**
 * streamtab types — the units flowing out of a pipeline into a Renderer.
 */

/** Settings a value needs to render itself. */
export interface ValueRenderOptions {
  /** Digits after the decimal point for floating-point values. */
  floatingPoints: number;
}

/** Opaque renderable datum. The layout engine never inspects its variant. */
export interface Value {
  render(options: ValueRenderOptions): string;
}

/** Named values of one record or one aggregate row. */
export type Fields = Readonly<Record<string, Value>>;

/** One structured event: raw source text plus optional parsed fields. */
export interface RecordRow {
  readonly kind: "record";
  readonly raw: string;
  readonly fields: Fields;
}

/** A complete grouped-result snapshot, replaced wholesale on each update. */
export interface AggregateRow {
  readonly kind: "aggregate";
  /** Display order. */
  readonly columns: readonly string[];
  readonly rows: readonly Fields[];
}

export type Row = RecordRow | AggregateRow;
