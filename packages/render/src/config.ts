/**
 * Renderer configuration — schema, defaults and validation.
 */
import { type Static, Type } from "@sinclair/typebox";
import { Value as SchemaValue } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";

export const RenderConfigSchema = Type.Object({
  /** Digits after the decimal point for floating-point values. */
  floatingPoints: Type.Integer({ minimum: 0, maximum: 100 }),
  /** Slack that must remain above a value before its column grows. */
  minBuffer: Type.Integer({ minimum: 0 }),
  /** Slack a column is given when it grows. */
  maxBuffer: Type.Integer({ minimum: 0 }),
  /** Optional record template, e.g. "{level:>5} {message}". */
  format: Type.Optional(Type.String()),
});

export type RenderConfig = Static<typeof RenderConfigSchema>;

export const DEFAULT_RENDER_CONFIG: RenderConfig = {
  floatingPoints: 2,
  minBuffer: 1,
  maxBuffer: 4,
};

/** Minimum time between two live redraws of an in-progress aggregate. */
export const DEFAULT_UPDATE_INTERVAL_MS = 100;

/** Width budget for aggregate tables when no terminal is attached. */
export const DEFAULT_AGGREGATE_WIDTH = 240;

/**
 * Fill defaults and validate. Throws ConfigError naming the first
 * offending setting.
 */
export function resolveRenderConfig(input: Partial<RenderConfig> = {}): RenderConfig {
  const config: RenderConfig = { ...DEFAULT_RENDER_CONFIG, ...input };
  if (config.format === undefined) delete config.format;

  const first = SchemaValue.Errors(RenderConfigSchema, config).First();
  if (first) {
    throw new ConfigError(`invalid render config at "${first.path}": ${first.message}`);
  }
  if (config.maxBuffer < config.minBuffer) {
    throw new ConfigError(
      `invalid render config: maxBuffer (${config.maxBuffer}) must be >= minBuffer (${config.minBuffer})`
    );
  }
  return config;
}

export function resolveUpdateInterval(ms: number | undefined): number {
  const interval = ms ?? DEFAULT_UPDATE_INTERVAL_MS;
  if (!Number.isFinite(interval) || interval < 0) {
    throw new ConfigError(`invalid update interval: ${interval}`);
  }
  return interval;
}
