// test/helpers.ts
import type { TraceConfig } from "../src/config.js";
import { freshState, type TraceState } from "../src/state.js";
import { MemorySink } from "../src/trace.js";
import type { Result } from "../src/types.js";

export function testState(overrides: Partial<TraceConfig> = {}): {
  state: TraceState;
  sink: MemorySink;
} {
  const sink = new MemorySink();
  return { state: freshState(overrides, [sink]), sink };
}

export function expectOk<T>(result: Result<unknown, T>, message = "ok"): T {
  if ("err" in result) {
    throw new Error(
      `Expected ok but got error: ${JSON.stringify(result.err)} - ${message}`,
    );
  }
  return result.ok;
}

export function expectErr<E>(result: Result<E, unknown>, message = "err"): E {
  if ("ok" in result) {
    throw new Error(`Expected error but got ok - ${message}`);
  }
  return result.err;
}
