import { z } from "zod";
import type { LogLevel } from "./trace.js";
import { err, ok, type InvalidConfigError, type Result } from "./types.js";

/** Largest length a JavaScript array can have. */
export const MAX_ARRAY_LENGTH = 2 ** 32 - 1;

/**
 * Default element limit per container. Raise it through
 * `CELL_TRACE_MAX_ELEMENTS`, up to {@link MAX_ARRAY_LENGTH}.
 */
export const DEFAULT_MAX_ELEMENTS = 2 ** 24;

export type TraceConfig = {
  logLevel: LogLevel;
  demangle: boolean;
  echo: boolean;
  maxElements: number;
};

export const defaultConfig: TraceConfig = {
  logLevel: "info",
  demangle: true,
  echo: false,
  maxElements: DEFAULT_MAX_ELEMENTS,
};

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default(fallback)
    .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  CELL_TRACE_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default(defaultConfig.logLevel),
  CELL_TRACE_DEMANGLE: flag("true"),
  CELL_TRACE_ECHO: flag("false"),
  CELL_TRACE_MAX_ELEMENTS: z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_ARRAY_LENGTH)
    .default(defaultConfig.maxElements),
});

export type TraceEnv = Record<string, string | undefined>;

/**
 * Reads configuration from environment variables.
 *
 * Unset variables fall back to {@link defaultConfig}; anything present but
 * malformed is reported, one issue per offending variable.
 */
export function loadConfig(
  env: TraceEnv = process.env,
): Result<InvalidConfigError, TraceConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    return err({ invalid_config: { issues } });
  }
  const value = parsed.data;
  return ok({
    logLevel: value.CELL_TRACE_LOG_LEVEL,
    demangle: value.CELL_TRACE_DEMANGLE,
    echo: value.CELL_TRACE_ECHO,
    maxElements: value.CELL_TRACE_MAX_ELEMENTS,
  });
}
