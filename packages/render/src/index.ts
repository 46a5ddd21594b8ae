/**
 * streamtab-render — Terminal-aware rendering of record streams and
 * live aggregate tables.
 *
 * @module streamtab-render
 */

export { OutputWriteError, type OutputSink, type TerminalSize } from "streamtab-tui";
export {
  DEFAULT_AGGREGATE_WIDTH,
  DEFAULT_RENDER_CONFIG,
  DEFAULT_UPDATE_INTERVAL_MS,
  type RenderConfig,
  RenderConfigSchema,
  resolveRenderConfig,
} from "./config.js";
export { ConfigError, LayoutInvariantError, TemplateError } from "./errors.js";
export {
  createLayoutState,
  LayoutEngine,
  type LayoutEngineOptions,
  type LayoutState,
} from "./layout.js";
export { type Clock, Renderer, type RendererOptions } from "./renderer.js";
export { aggregate, groupedAggregate, record } from "./rows.js";
export { shrinkToFit } from "./shrink.js";
export { createStdoutRenderer } from "./stdout.js";
export { FormatInterpolator, type Interpolator } from "./template.js";
export type { AggregateRow, Fields, RecordRow, Row, Value, ValueRenderOptions } from "./types.js";
export {
  boolValue,
  fieldsFromJson,
  floatValue,
  fromJson,
  intValue,
  NONE,
  stringValue,
} from "./values.js";
