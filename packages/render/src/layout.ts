/**
 * Layout engine — turns records and aggregate snapshots into aligned text.
 *
 * Records stream through with an unbounded, growing column set; aggregates
 * are laid out as a fixed table recomputed from each full snapshot. Both
 * share one LayoutState so widths learned from one unit carry to the next.
 */
import { charLength, fit, padToLength, type TerminalSize, takeLines } from "streamtab-tui";
import { DEFAULT_AGGREGATE_WIDTH, type RenderConfig } from "./config.js";
import { debugLog } from "./debug.js";
import { LayoutInvariantError } from "./errors.js";
import { shrinkToFit, totalWidth } from "./shrink.js";
import { FormatInterpolator, type Interpolator } from "./template.js";
import type { AggregateRow, Fields, RecordRow, Value } from "./types.js";
import { NONE } from "./values.js";

/** Cross-call layout memory, owned by one LayoutEngine. */
export interface LayoutState {
  /** Allocated width per column. Grows until a reset. */
  columnWidths: Map<string, number>;
  /** Columns in first-seen order. */
  columnOrder: string[];
}

export function createLayoutState(): LayoutState {
  return { columnWidths: new Map(), columnOrder: [] };
}

export interface LayoutEngineOptions {
  interpolator?: Interpolator;
  state?: LayoutState;
}

/** Characters a cell adds around name and value: `[`, `=` and `]`. */
const CELL_DECORATION = 3;

export class LayoutEngine {
  private readonly state: LayoutState;
  private readonly interpolator: Interpolator;

  constructor(
    private readonly config: RenderConfig,
    private readonly terminalSize: TerminalSize | null,
    options: LayoutEngineOptions = {}
  ) {
    this.state = options.state ?? createLayoutState();
    this.interpolator = options.interpolator ?? new FormatInterpolator();
  }

  /** Current widths, keyed by column. */
  get columnWidths(): ReadonlyMap<string, number> {
    return this.state.columnWidths;
  }

  get columnOrder(): readonly string[] {
    return this.state.columnOrder;
  }

  // ── Width bookkeeping ──────────────────────────────────────────────

  /**
   * Widths the fields would need against the current layout. A column
   * grows only once its value comes within `minBuffer` of the edge, and
   * then jumps straight to `maxBuffer` of slack.
   */
  computeWidths(
    fields: Fields,
    known: ReadonlyMap<string, number> = this.state.columnWidths
  ): Map<string, number> {
    const { minBuffer, maxBuffer } = this.config;
    const widths = new Map<string, number>();
    for (const [name, value] of Object.entries(fields)) {
      const current = known.get(name) ?? 0;
      const valueLen = Math.max(charLength(value.render(this.config)), charLength(name));
      widths.set(name, valueLen + minBuffer > current ? valueLen + maxBuffer : current);
    }
    return widths;
  }

  /** Field names not yet in the column order, sorted. */
  discoverNewColumns(fields: Fields): string[] {
    const known = new Set(this.state.columnOrder);
    return Object.keys(fields)
      .filter((name) => !known.has(name))
      .sort();
  }

  private mergeWidths(widths: ReadonlyMap<string, number>): void {
    for (const [name, width] of widths) {
      this.state.columnWidths.set(name, width);
    }
  }

  private projectedWidth(): number {
    let sum = 0;
    for (const [name, width] of this.state.columnWidths) {
      sum += width + charLength(name) + CELL_DECORATION;
    }
    return sum;
  }

  private overflowsTerminal(): boolean {
    return this.terminalSize !== null && this.projectedWidth() > this.terminalSize.width;
  }

  // ── Records ────────────────────────────────────────────────────────

  /** Records without parsed fields print their raw text on every path. */
  formatRecord(record: RecordRow): string {
    if (Object.keys(record.fields).length === 0) return record.raw.trimEnd();
    const { format } = this.config;
    return format === undefined
      ? this.formatRecordAsColumns(record)
      : this.formatRecordAsTemplate(format, record.fields);
  }

  formatRecordAsColumns(record: RecordRow): string {
    const { fields } = record;
    this.mergeWidths(this.computeWidths(fields));
    this.state.columnOrder.push(...this.discoverNewColumns(fields));
    if (this.state.columnOrder.length === 0) {
      return record.raw.trimEnd();
    }

    let noPadding = false;
    if (this.overflowsTerminal()) {
      // One reset: relearn the layout from this record alone.
      const dropped = this.state.columnOrder.length;
      const widths = this.computeWidths(fields, new Map());
      this.state.columnOrder = [...widths.keys()].sort();
      this.state.columnWidths = widths;
      noPadding = this.overflowsTerminal();
      debugLog(
        `layout reset: ${dropped} -> ${this.state.columnOrder.length} columns` +
          (noPadding ? ", still overflowing, padding disabled" : "")
      );
    }

    const cells = this.state.columnOrder.map((name) => {
      const value = Object.hasOwn(fields, name) ? fields[name] : undefined;
      const cell = value ? `[${name}=${value.render(this.config)}]` : "";
      if (noPadding) return cell;
      const width = this.state.columnWidths.get(name) ?? 0;
      return padToLength(cell, charLength(name) + CELL_DECORATION + width);
    });
    return cells.join("").trimEnd();
  }

  formatRecordAsTemplate(template: string, fields: Fields): string {
    const rendered = Object.fromEntries(
      Object.entries(fields).map(([name, value]): [string, string] => [
        name,
        value.render(this.config),
      ])
    );
    return this.interpolator.interpolate(template, rendered);
  }

  // ── Aggregates ─────────────────────────────────────────────────────

  private aggregateBudget(): number {
    return this.terminalSize?.width ?? DEFAULT_AGGREGATE_WIDTH;
  }

  /** Every listed column, with the placeholder for cells the row lacks. */
  private completeRow(columns: readonly string[], row: Fields): Fields {
    const missing = columns.filter((name) => !Object.hasOwn(row, name));
    if (missing.length === 0) return row;
    const placeholders = missing.map((name): [string, Value] => [name, NONE]);
    return { ...row, ...Object.fromEntries(placeholders) };
  }

  formatAggregate(agg: AggregateRow): string {
    if (agg.rows.length === 0) {
      return "No data\n";
    }

    const rows = agg.rows.map((row) => this.completeRow(agg.columns, row));
    for (const row of rows) {
      this.mergeWidths(this.computeWidths(row));
    }

    const budget = this.aggregateBudget();
    const used = totalWidth(this.state.columnWidths);
    if (used > budget) {
      this.state.columnWidths = shrinkToFit(
        this.state.columnWidths,
        agg.columns,
        budget,
        this.state.columnWidths.size
      );
      debugLog(`aggregate shrink: ${used} -> ${totalWidth(this.state.columnWidths)} of ${budget}`);
      if (totalWidth(this.state.columnWidths) > budget) {
        throw new LayoutInvariantError(
          `aggregate widths exceed budget ${budget}: ${JSON.stringify([...this.state.columnWidths])}`
        );
      }
    }

    const widthOf = (name: string): number => this.state.columnWidths.get(name) ?? 0;

    const header = agg.columns.map((name) => padToLength(name, widthOf(name))).join("");
    const separator = "-".repeat(charLength(header));
    const body = rows.map((row) =>
      agg.columns
        .map((name) => fit(row[name].render(this.config), widthOf(name)))
        .join("")
        .trimEnd()
    );
    const table = `${header.trimEnd()}\n${separator}\n${body.join("\n")}\n`;

    if (this.terminalSize === null) return table;
    return takeLines(table, this.terminalSize.height - 1);
  }
}
