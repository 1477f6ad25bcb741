import {
  boolType,
  cellType,
  charType,
  displayName,
  doubleType,
  floatType,
  intType,
  longType,
  stringType,
} from "./identity.js";
import type { TraceState } from "./state.js";
import {
  type AppType,
  type Arg,
  type ConstructionEvent,
  type Literal,
  type Scalar,
  type ScalarName,
  type ScalarType,
  type ScalarValues,
  showScalar,
  type Type,
} from "./types.js";

/**
 * How a cell gets its value: the kind's default, a given value, or a copy
 * of another cell of the same kind.
 */
export type CellInit<N extends ScalarName> =
  | { default: null }
  | { value: ScalarValues[N] }
  | { copy: InstrumentedCell<N> };

const DEFAULT_SCALARS: ScalarValues = {
  int: 0,
  long: 0n,
  float: 0,
  double: 0,
  bool: false,
  char: "\0",
  string: "",
};

type Normalizers = {
  [N in ScalarName]: (value: ScalarValues[N]) => ScalarValues[N];
};

const same = <T>(value: T): T => value;

const NORMALIZERS: Normalizers = {
  int: Math.trunc,
  long: same,
  float: Math.fround,
  double: same,
  bool: same,
  char: same,
  string: same,
};

/**
 * Brings a value into the range of its kind: `int` drops the fraction,
 * `float` rounds to single precision, every other kind is unchanged.
 *
 * ```ts
 * normalizeScalar(intType, 2.5);   // 2
 * normalizeScalar(floatType, 0.1); // 0.10000000149011612
 * ```
 */
export function normalizeScalar<N extends ScalarName>(
  type: ScalarType<N>,
  value: ScalarValues[N],
): ScalarValues[N] {
  const normalize: Normalizers[N] = NORMALIZERS[type.con];
  return normalize(value);
}

/** Value-initialized scalar of the given kind. */
export function defaultScalar<N extends ScalarName>(
  type: ScalarType<N>,
): ScalarValues[N] {
  return DEFAULT_SCALARS[type.con];
}

/**
 * A single read-only value that records how it was built.
 *
 * **What it represents**
 * Every construction (default, by value, by copy) appends exactly one
 * {@link ConstructionEvent} to the state's trace log before the constructor
 * returns, tagged with the display name of the held kind. Containers copy
 * cells into their storage, so copies show up in the log too.
 *
 * @example
 * ```ts
 * const state = freshState();
 * const a = new InstrumentedCell(state, doubleType, { value: 1.3 });
 * const b = new InstrumentedCell(state, doubleType, { copy: a });
 * state.trace.events().map((e) => e.kind); // ["value_init", "copy"]
 * b.get();                                  // 1.3
 * ```
 */
export class InstrumentedCell<N extends ScalarName = ScalarName> {
  private readonly held: ScalarValues[N];
  readonly event: ConstructionEvent;

  constructor(
    state: TraceState,
    readonly type: ScalarType<N>,
    init: CellInit<N>,
  ) {
    const typeName = displayName(state, type);
    if ("copy" in init) {
      this.held = init.copy.get();
      this.event = state.trace.record({
        kind: "copy",
        typeName,
        payload: showScalar(this.held),
      });
    } else if ("value" in init) {
      this.held = normalizeScalar(type, init.value);
      this.event = state.trace.record({
        kind: "value_init",
        typeName,
        payload: showScalar(this.held),
      });
    } else {
      this.held = defaultScalar(type);
      this.event = state.trace.record({ kind: "default", typeName });
    }
  }

  get(): ScalarValues[N] {
    return this.held;
  }

  /** `InstrumentedCell<T>` for this cell's kind. */
  get cellType(): AppType {
    return cellType(this.type);
  }
}

export const literal = <N extends ScalarName>(
  type: ScalarType<N>,
  value: ScalarValues[N],
): Literal<N> => ({ literal: { type, value: normalizeScalar(type, value) } });

export const intLiteral = (value: number) => literal(intType, value);
export const longLiteral = (value: bigint) => literal(longType, value);
export const floatLiteral = (value: number) => literal(floatType, value);
export const doubleLiteral = (value: number) => literal(doubleType, value);
export const boolLiteral = (value: boolean) => literal(boolType, value);
export const charLiteral = (value: string) => literal(charType, value);
export const stringLiteral = (value: string) => literal(stringType, value);

/**
 * Kind of a bare JavaScript value: integral numbers are `int`, other
 * numbers `double`, bigints `long`.
 */
export function inferScalarType(value: Scalar): ScalarType {
  if (typeof value === "number")
    return Number.isInteger(value) ? intType : doubleType;
  if (typeof value === "bigint") return longType;
  if (typeof value === "boolean") return boolType;
  return stringType;
}

export function isLiteral(arg: Arg): arg is Literal {
  return typeof arg === "object" && !(arg instanceof InstrumentedCell);
}

/**
 * Run-time type of any construction argument.
 *
 * ```ts
 * typeOfArg(3);                   // int
 * typeOfArg(doubleLiteral(3));    // double
 * typeOfArg(cell);                // InstrumentedCell<double>
 * ```
 */
export function typeOfArg(arg: Arg): Type {
  if (arg instanceof InstrumentedCell) return arg.cellType;
  if (isLiteral(arg)) return arg.literal.type;
  return inferScalarType(arg);
}

/**
 * Converts between numeric kinds, refusing anything that would lose the
 * value (a fractional `int`, a non-numeric source or target).
 */
export function convertScalar(to: ScalarType, value: Scalar): Scalar | undefined {
  if (typeof value !== "number" && typeof value !== "bigint") return undefined;
  switch (to.con) {
    case "long":
      if (typeof value === "bigint") return value;
      return Number.isInteger(value) ? BigInt(value) : undefined;
    case "int": {
      const n = Number(value);
      return Number.isInteger(n) ? n : undefined;
    }
    case "float":
      return Math.fround(Number(value));
    case "double":
      return Number(value);
    default:
      return undefined;
  }
}
