import { describe, expect, it } from "vitest";
import {
  boolLiteral,
  convertScalar,
  defaultScalar,
  doubleLiteral,
  floatLiteral,
  InstrumentedCell,
  intLiteral,
  literal,
  normalizeScalar,
  stringLiteral,
  typeOfArg,
} from "../src/cell.js";
import {
  boolType,
  displayName,
  doubleType,
  floatType,
  intType,
  longType,
  stringType,
} from "../src/identity.js";
import { showType } from "../src/types.js";
import { testState } from "./helpers.js";

describe("InstrumentedCell", () => {
  it("records a default construction", () => {
    const { state } = testState();
    const cell = new InstrumentedCell(state, intType, { default: null });
    expect(cell.get()).toBe(0);
    expect(state.trace.events()).toEqual([{ kind: "default", typeName: "int" }]);
  });

  it("records a value construction with its payload", () => {
    const { state } = testState();
    const cell = new InstrumentedCell(state, doubleType, { value: 1.3 });
    expect(cell.get()).toBe(1.3);
    expect(cell.event).toEqual({
      kind: "value_init",
      typeName: "double",
      payload: "1.3",
    });
  });

  it("records a copy after the original", () => {
    const { state } = testState();
    const original = new InstrumentedCell(state, doubleType, { value: 1.3 });
    const copy = new InstrumentedCell(state, doubleType, { copy: original });
    expect(copy).not.toBe(original);
    expect(copy.get()).toBe(1.3);
    expect(state.trace.events().map((e) => e.kind)).toEqual([
      "value_init",
      "copy",
    ]);
    expect(state.trace.events()[1]?.payload).toBe("1.3");
  });

  it("freezes recorded events", () => {
    const { state } = testState();
    new InstrumentedCell(state, boolType, { value: true });
    expect(Object.isFrozen(state.trace.events()[0])).toBe(true);
  });

  it("holds the default of each kind", () => {
    const { state } = testState();
    expect(new InstrumentedCell(state, longType, { default: null }).get()).toBe(0n);
    expect(new InstrumentedCell(state, boolType, { default: null }).get()).toBe(false);
    expect(new InstrumentedCell(state, stringType, { default: null }).get()).toBe("");
  });

  it("describes itself as a cell type", () => {
    const { state } = testState();
    const cell = new InstrumentedCell(state, doubleType, { value: 2 });
    expect(displayName(state, cell.cellType)).toBe("InstrumentedCell<double>");
  });

  it("forwards each construction to diagnostics", () => {
    const { state, sink } = testState();
    const original = new InstrumentedCell(state, doubleType, { value: 1.3 });
    new InstrumentedCell(state, doubleType, { copy: original });
    expect(sink.read().map((e) => e.message)).toEqual([
      "Parameterized constructor of InstrumentedCell<double>",
      "Copy constructor of InstrumentedCell<double> with value 1.3",
    ]);
    expect(sink.read().every((e) => e.level === "info")).toBe(true);
  });

  it("truncates values held as int", () => {
    const { state } = testState();
    const cell = new InstrumentedCell(state, intType, { value: 1.5 });
    expect(cell.get()).toBe(1);
    expect(cell.event).toEqual({
      kind: "value_init",
      typeName: "int",
      payload: "1",
    });
  });

  it("rounds values held as float to single precision", () => {
    const { state } = testState();
    const cell = new InstrumentedCell(state, floatType, { value: 0.1 });
    expect(cell.get()).toBe(Math.fround(0.1));
    expect(cell.get()).not.toBe(0.1);
  });

  it("uses the raw name when demangling is disabled", () => {
    const { state } = testState({ demangle: false });
    const cell = new InstrumentedCell(state, doubleType, { value: 1 });
    expect(cell.event.typeName).toBe("d");
  });
});

describe("scalars", () => {
  it("infers the kind of bare values and literals", () => {
    const { state } = testState();
    expect(showType(typeOfArg(3))).toBe("int");
    expect(showType(typeOfArg(2.5))).toBe("double");
    expect(showType(typeOfArg(5n))).toBe("long");
    expect(showType(typeOfArg(true))).toBe("bool");
    expect(showType(typeOfArg("s"))).toBe("string");
    expect(showType(typeOfArg(boolLiteral(false)))).toBe("bool");
    expect(showType(typeOfArg(stringLiteral("s")))).toBe("string");
    expect(showType(typeOfArg(doubleLiteral(3)))).toBe("double");
    const cell = new InstrumentedCell(state, doubleType, { value: 3 });
    expect(showType(typeOfArg(cell))).toBe("InstrumentedCell<double>");
  });

  it("normalizes literal values to their kind", () => {
    expect(intLiteral(3.9).literal.value).toBe(3);
    expect(literal(intType, 2.5).literal.value).toBe(2);
    expect(literal(intType, -2.5).literal.value).toBe(-2);
    expect(floatLiteral(2.5).literal.value).toBe(2.5);
    expect(floatLiteral(0.1).literal.value).toBe(Math.fround(0.1));
    expect(doubleLiteral(0.1).literal.value).toBe(0.1);
  });

  it("leaves kinds without a narrower range unchanged", () => {
    expect(normalizeScalar(longType, 7n)).toBe(7n);
    expect(normalizeScalar(boolType, true)).toBe(true);
    expect(normalizeScalar(stringType, "1.5")).toBe("1.5");
  });

  it("converts between numeric kinds without loss", () => {
    expect(convertScalar(doubleType, 10)).toBe(10);
    expect(convertScalar(longType, 3)).toBe(3n);
    expect(convertScalar(intType, 7n)).toBe(7);
    expect(convertScalar(intType, 2.5)).toBeUndefined();
    expect(convertScalar(boolType, 1)).toBeUndefined();
    expect(convertScalar(doubleType, "1")).toBeUndefined();
    expect(convertScalar(floatType, 0.1)).toBe(Math.fround(0.1));
  });

  it("value-initializes each kind", () => {
    expect(defaultScalar(intType)).toBe(0);
    expect(defaultScalar(longType)).toBe(0n);
    expect(defaultScalar(stringType)).toBe("");
  });
});
