import { afterEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_MAX_ELEMENTS,
  defaultConfig,
  loadConfig,
  MAX_ARRAY_LENGTH,
} from "../src/config.js";
import { doubleType } from "../src/identity.js";
import { InstrumentedCell } from "../src/cell.js";
import { freshState, processState } from "../src/state.js";
import { showError } from "../src/types.js";
import { expectErr, expectOk } from "./helpers.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(expectOk(loadConfig({}))).toEqual(defaultConfig);
    expect(defaultConfig.maxElements).toBe(DEFAULT_MAX_ELEMENTS);
  });

  it("accepts limits up to the array length limit", () => {
    const config = expectOk(
      loadConfig({ CELL_TRACE_MAX_ELEMENTS: String(MAX_ARRAY_LENGTH) }),
    );
    expect(config.maxElements).toBe(MAX_ARRAY_LENGTH);
    expectErr(
      loadConfig({ CELL_TRACE_MAX_ELEMENTS: String(MAX_ARRAY_LENGTH + 1) }),
    );
  });

  it("reads every variable", () => {
    const config = expectOk(
      loadConfig({
        CELL_TRACE_LOG_LEVEL: "debug",
        CELL_TRACE_DEMANGLE: "no",
        CELL_TRACE_ECHO: "1",
        CELL_TRACE_MAX_ELEMENTS: "100",
      }),
    );
    expect(config).toEqual({
      logLevel: "debug",
      demangle: false,
      echo: true,
      maxElements: 100,
    });
  });

  it("reports one issue per bad variable", () => {
    const e = expectErr(
      loadConfig({
        CELL_TRACE_LOG_LEVEL: "loud",
        CELL_TRACE_MAX_ELEMENTS: "-5",
      }),
    );
    const { issues } = e.invalid_config;
    expect(issues).toHaveLength(2);
    expect(issues[0]?.startsWith("CELL_TRACE_LOG_LEVEL: ")).toBe(true);
    expect(issues[1]?.startsWith("CELL_TRACE_MAX_ELEMENTS: ")).toBe(true);
    expect(showError(e).split("\n")[0]).toBe("Invalid configuration:");
  });
});

describe("freshState", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("echoes constructions to the console when asked", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const state = freshState({ echo: true });
    new InstrumentedCell(state, doubleType, { value: 1.3 });
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(
      "[cell-trace] Parameterized constructor of InstrumentedCell<double>",
    );
  });

  it("stays quiet by default", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new InstrumentedCell(freshState(), doubleType, { value: 1.3 });
    expect(log).not.toHaveBeenCalled();
  });
});

describe("processState", () => {
  it("is built once per process", () => {
    expect(processState()).toBe(processState());
  });
});
