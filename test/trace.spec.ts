import { describe, expect, it } from "vitest";
import { Diagnostics, describeEvent, MemorySink, TraceLog } from "../src/trace.js";

describe("Diagnostics", () => {
  it("drops events below its level", () => {
    const sink = new MemorySink();
    const diagnostics = new Diagnostics("warn", [sink]);
    diagnostics.debug("d", { kind: "resolution" });
    diagnostics.info("i", { kind: "copy" });
    diagnostics.warn("w", { kind: "demangle_unavailable" });
    diagnostics.error("e", { kind: "construction_failed" });
    expect(sink.read().map((e) => e.message)).toEqual(["w", "e"]);
    expect(diagnostics.enabled("info")).toBe(false);
  });

  it("tags events with its namespace", () => {
    const sink = new MemorySink();
    new Diagnostics("debug", [], "demo").withSink(sink).info("hello", {
      kind: "default",
      typeName: "int",
    });
    const [event] = sink.read();
    expect(event?.namespace).toBe("demo");
    expect(event?.typeName).toBe("int");
    sink.clear();
    expect(sink.read()).toEqual([]);
  });
});

describe("describeEvent", () => {
  it("renders each kind of construction", () => {
    expect(describeEvent({ kind: "default", typeName: "int" })).toBe(
      "Default constructor of InstrumentedCell<int>",
    );
    expect(
      describeEvent({ kind: "value_init", typeName: "double", payload: "2" }),
    ).toBe("Parameterized constructor of InstrumentedCell<double>");
    expect(
      describeEvent({ kind: "copy", typeName: "double", payload: "1.3" }),
    ).toBe("Copy constructor of InstrumentedCell<double> with value 1.3");
  });
});

describe("TraceLog", () => {
  it("appends in order and counts by kind", () => {
    const log = new TraceLog();
    log.record({ kind: "value_init", typeName: "double", payload: "1" });
    const mark = log.size;
    log.record({ kind: "copy", typeName: "double", payload: "1" });
    log.record({ kind: "copy", typeName: "double", payload: "1" });
    expect(log.size).toBe(3);
    expect(log.since(mark)).toHaveLength(2);
    expect(log.count("copy")).toBe(2);
    expect(log.count("default")).toBe(0);
  });

  it("stores a frozen copy of each event", () => {
    const log = new TraceLog();
    const event = { kind: "default" as const, typeName: "int" };
    const stored = log.record(event);
    expect(stored).not.toBe(event);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it("forwards events to diagnostics", () => {
    const sink = new MemorySink();
    const log = new TraceLog(new Diagnostics("info", [sink]));
    log.record({ kind: "copy", typeName: "bool", payload: "true" });
    expect(sink.ofKind("copy")[0]?.message).toBe(
      "Copy constructor of InstrumentedCell<bool> with value true",
    );
  });
});
