import { defaultConfig, loadConfig, type TraceConfig } from "./config.js";
import {
  ConsoleSink,
  Diagnostics,
  type DiagnosticSink,
  TraceLog,
} from "./trace.js";
import { unwrap } from "./types.js";

/**
 * Everything a construction writes to: configuration, the diagnostics
 * logger and the trace log. Threaded explicitly through the API.
 */
export type TraceState = {
  config: TraceConfig;
  diagnostics: Diagnostics;
  trace: TraceLog;
};

/**
 * Builds an isolated state. A console sink is added when `echo` is set.
 *
 * @example
 * ```ts
 * const sink = new MemorySink();
 * const state = freshState({ logLevel: "debug" }, [sink]);
 * ```
 */
export const freshState = (
  overrides: Partial<TraceConfig> = {},
  sinks: DiagnosticSink[] = [],
): TraceState => {
  const config = { ...defaultConfig, ...overrides };
  const diagnostics = new Diagnostics(config.logLevel, [...sinks]);
  if (config.echo) diagnostics.withSink(new ConsoleSink());
  return { config, diagnostics, trace: new TraceLog(diagnostics) };
};

let processWide: TraceState | undefined;

/**
 * The process-wide state, configured from `process.env` on first use.
 * Throws when the environment holds an invalid configuration.
 */
export function processState(): TraceState {
  if (!processWide) {
    const config = unwrap(loadConfig(process.env), "cell-trace configuration");
    processWide = freshState(config);
  }
  return processWide;
}
