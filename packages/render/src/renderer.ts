/**
 * Renderer — redraw policy on top of the layout engine.
 *
 * Records are written as they arrive. Aggregate snapshots are shown only
 * when final on non-interactive output; on a live terminal they redraw in
 * place, at most once per update interval, erasing the previous render.
 *
 *   idle ──(first aggregate, or final)──▶ live-tracking
 *   live-tracking ──(interval elapsed, or final)──▶ redraw
 *   live-tracking ──(within interval)──▶ drop
 */
import {
  countLines,
  eraseLines,
  type OutputSink,
  type TerminalSize,
  TerminalWriter,
} from "streamtab-tui";
import { type RenderConfig, resolveRenderConfig, resolveUpdateInterval } from "./config.js";
import { debugLog } from "./debug.js";
import { LayoutEngine, type LayoutState } from "./layout.js";
import type { Interpolator } from "./template.js";
import type { AggregateRow, Row } from "./types.js";

/** Monotonic milliseconds. */
export type Clock = () => number;

export interface RendererOptions {
  output: OutputSink;
  /** Sampled once by the caller; null when output is not a terminal. */
  terminalSize: TerminalSize | null;
  config?: Partial<RenderConfig>;
  /** Minimum time between live aggregate redraws. Defaults to 100 ms. */
  updateIntervalMs?: number;
  clock?: Clock;
  interpolator?: Interpolator;
  layoutState?: LayoutState;
}

export class Renderer {
  /** True when output is an interactive terminal. */
  readonly isLive: boolean;
  readonly layout: LayoutEngine;

  private readonly writer: TerminalWriter;
  private readonly updateIntervalMs: number;
  private readonly clock: Clock;

  private lastPrintTime: number | null = null;
  private pendingErase = "";

  constructor(options: RendererOptions) {
    const config = resolveRenderConfig(options.config);
    this.updateIntervalMs = resolveUpdateInterval(options.updateIntervalMs);
    this.clock = options.clock ?? (() => performance.now());
    this.isLive = options.terminalSize !== null;
    this.writer = new TerminalWriter(options.output);
    this.layout = new LayoutEngine(config, options.terminalSize, {
      interpolator: options.interpolator,
      state: options.layoutState,
    });
  }

  /**
   * Render one unit. `isFinal` marks the last unit of a finite stream and
   * forces an aggregate out regardless of throttling or TTY state.
   *
   * Throws OutputWriteError when the output rejects the write and
   * TemplateError when a record does not fit the configured template; in
   * the latter case nothing is written and later rows render normally.
   */
  render(row: Row, isFinal = false): void {
    if (row.kind === "record") {
      this.writer.write(`${this.layout.formatRecord(row)}\n`);
      this.writer.flush();
      return;
    }

    if (!this.isLive) {
      if (isFinal) this.print(row);
      return;
    }

    if (isFinal || this.shouldRedraw()) {
      this.redraw(row);
    } else {
      debugLog("aggregate update dropped: within update interval");
    }
  }

  /** Whether a live aggregate may be redrawn now. */
  shouldRedraw(): boolean {
    if (!this.isLive) return false;
    if (this.lastPrintTime === null) return true;
    return this.clock() - this.lastPrintTime > this.updateIntervalMs;
  }

  private print(agg: AggregateRow): void {
    this.writer.write(this.layout.formatAggregate(agg));
    this.writer.flush();
  }

  private redraw(agg: AggregateRow): void {
    const output = this.layout.formatAggregate(agg);
    this.writer.write(this.pendingErase);
    this.writer.write(output);
    this.writer.flush();
    this.pendingErase = eraseLines(countLines(output));
    this.lastPrintTime = this.clock();
  }
}
