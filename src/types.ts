import type { InstrumentedCell } from "./cell.js";

/**
 * A named type constructor.
 *
 * **What it represents**
 * Builtin scalar kinds (`int`, `double`, `bool`, ...) as well as any nominal
 * type the caller wants to identify or dispatch on (`Id`, `InstrumentedCell`).
 * On its own a `ConType` is a complete type; applied through {@link AppType}
 * it becomes a generic instantiation.
 *
 * @example
 * ```ts
 * import { conType } from "cell-trace";
 *
 * conType("double");  // double
 * conType("Id");      // Id
 * ```
 */
export type ConType = { con: string };

/**
 * Application of a type constructor to one argument.
 *
 * Multi-argument instantiations are curried left to right, so
 * `Pair<int, double>` is `app(app(Pair, int), double)`. {@link getSpineArgs}
 * walks the spine back into an argument list.
 *
 * @example
 * ```ts
 * import { appType, conType, showType } from "cell-trace";
 *
 * showType(appType(conType("InstrumentedCell"), conType("double")));
 * // "InstrumentedCell<double>"
 * ```
 */
export type AppType = { app: { func: Type; arg: Type } };

/**
 * A type descriptor. Generic arguments are erased from compiled JavaScript,
 * so every run-time question about types is asked of one of these.
 */
export type Type = ConType | AppType;

/**
 * Run-time representation of each builtin scalar kind.
 */
export type ScalarValues = {
  int: number;
  long: bigint;
  float: number;
  double: number;
  bool: boolean;
  char: string;
  string: string;
};

export type ScalarName = keyof ScalarValues;

/**
 * Descriptor of a builtin scalar kind. The name doubles as the type
 * parameter of cells and literals, so `ScalarType<"double">` holds `number`s.
 */
export type ScalarType<N extends ScalarName = ScalarName> = { con: N };

/** Any value a scalar kind can hold. */
export type Scalar = ScalarValues[ScalarName];

/**
 * A scalar with an explicitly stated kind.
 *
 * **Why it's useful**
 * JavaScript has a single `number`, so `10` and `10.0` are indistinguishable.
 * Bare numbers are classified by shape (integers are `int`, everything else
 * `double`); a literal pins the kind down when that guess is wrong.
 *
 * @example
 * ```ts
 * import { doubleLiteral } from "cell-trace";
 *
 * doubleLiteral(10);  // { literal: { type: { con: "double" }, value: 10 } }
 * ```
 */
export type Literal<N extends ScalarName = ScalarName> = {
  literal: { type: ScalarType<N>; value: ScalarValues[N] };
};

/** Anything that may appear as a construction argument. */
export type Arg = Scalar | Literal | InstrumentedCell;

/** A count argument: an integral number, a bigint, or a literal of either. */
export type Count = number | bigint | Literal<"int"> | Literal<"long">;

/** Element of a {@link DynamicArray}: a plain scalar or a cell. */
export type Element = Scalar | InstrumentedCell;

/**
 * Stable per-type token.
 *
 * Witnesses are interned: two witnesses are `===` exactly when their types
 * are structurally equal, for the lifetime of the process. `key` is the raw
 * (mangled) name the witness was interned under.
 */
export type TypeWitness = { readonly witness: number; readonly key: string };

export type EventKind = "default" | "value_init" | "copy";

/**
 * One cell construction, as recorded in the trace log.
 *
 * `typeName` is the display name of the held type (`double` for an
 * `InstrumentedCell<double>`); `payload` is the stringified value for value
 * and copy constructions.
 */
export type ConstructionEvent = {
  readonly kind: EventKind;
  readonly typeName: string;
  readonly payload?: string;
};

/**
 * Arguments accepted inside braces: either cells only, or scalars and
 * literals only. Mixing the two never resolves, so it does not type-check.
 */
export type BracedArgs =
  | readonly InstrumentedCell[]
  | readonly (Scalar | Literal)[];

/**
 * Arguments accepted inside parentheses: nothing, a count, or a count and
 * a fill value.
 */
export type ParenArgs =
  | readonly []
  | readonly [count: Count]
  | readonly [count: Count, value: Scalar | Literal];

/**
 * A construction call as written by the caller.
 *
 * The braced and parenthesized forms stay distinct: a braced list always
 * takes priority over the sized constructors, even when its
 * items look like `(count, value)`.
 *
 * `declared` is an explicitly stated element type. Counts and empty calls
 * need one; everywhere else it must agree with what is deduced.
 *
 * @example
 * ```ts
 * const list: CallSyntax = { braced: [10, 1.3] };   // two cells of double
 * const fill: CallSyntax = { paren: [10, 1.3] };    // ten cells of double
 * const sized: CallSyntax = { paren: [4], declared: intType };
 * ```
 */
export type CallSyntax =
  | { braced: BracedArgs; declared?: ScalarType }
  | { paren: ParenArgs; declared?: ScalarType };

/**
 * The resolver's classification of a call.
 */
export type CallShape =
  | { empty: null }
  | { sized_default: { count: number } }
  | { sized_fill: { count: number; value: Scalar } }
  | { list: { values: Scalar[] } }
  | { list_of_cells: { cells: InstrumentedCell[] } };

export type StrategyName =
  | "Empty"
  | "SizedDefault"
  | "SizedFill"
  | "List"
  | "ListOfCells";

export type RuleNumber = 1 | 2 | 3 | 4 | 5;

/**
 * Outcome of resolving a call.
 *
 * - `rule`: which resolution rule matched.
 * - `element`: the container's element type.
 * - `scalar`: the scalar kind actually held, inside cells when `wrapped`.
 * - `wrapped`: whether population creates cells.
 * - `shape`: the strategy, with the values it populates from.
 */
export type Resolution = {
  rule: RuleNumber;
  element: Type;
  scalar: ScalarType;
  wrapped: boolean;
  shape: CallShape;
};

export type DemangleUnavailableError = {
  demangle_unavailable: { raw: string; reason: string };
};

export type AllocationFailureError = {
  allocation_failure: { requested: number; limit: number };
};

export type AmbiguousCallError = {
  ambiguous_call: { call: string; reason: string };
};

export type InvalidConfigError = { invalid_config: { issues: string[] } };

/** Errors a construction can end in. */
export type ConstructionError = AllocationFailureError | AmbiguousCallError;

export type TraceError =
  | DemangleUnavailableError
  | AllocationFailureError
  | AmbiguousCallError
  | InvalidConfigError;

/**
 * Generic success/error result.
 *
 * Checked with `"ok" in res`; {@link unwrap} turns an error into a throw.
 */
export type Result<TErr, TOk> = { ok: TOk } | { err: TErr };

export const ok = <T>(val: T) => ({ ok: val });

export const err = <T>(val: T) => ({ err: val });

/**
 * Extracts the argument list of a curried application.
 *
 * @example
 * ```ts
 * const pair = appType(appType(conType("Pair"), intType), doubleType);
 * getSpineArgs(pair);  // [int, double]
 * ```
 */
export function getSpineArgs(ty: Type): Type[] {
  const args: Type[] = [];
  let current = ty;
  while ("app" in current) {
    args.unshift(current.app.arg);
    current = current.app.func;
  }
  return args;
}

/** The constructor at the head of an application spine. */
export function getSpineHead(ty: Type): Type {
  let current = ty;
  while ("app" in current) current = current.app.func;
  return current;
}

/**
 * Pretty-prints a type descriptor with conventional generic notation.
 *
 * @example
 * ```ts
 * showType(conType("int"));                                   // "int"
 * showType(appType(conType("Id"), conType("float")));         // "Id<float>"
 * showType(appType(appType(conType("Pair"), intType), boolType));
 * // "Pair<int, bool>"
 * ```
 */
export function showType(t: Type): string {
  if ("con" in t) return t.con;
  const head = getSpineHead(t);
  const args = getSpineArgs(t);
  return `${showType(head)}<${args.map(showType).join(", ")}>`;
}

/** Plain text form of a scalar. */
export function showScalar(value: Scalar): string {
  if (typeof value === "string") return value;
  return String(value);
}

export function strategyOf(shape: CallShape): StrategyName {
  if ("empty" in shape) return "Empty";
  if ("sized_default" in shape) return "SizedDefault";
  if ("sized_fill" in shape) return "SizedFill";
  if ("list" in shape) return "List";
  return "ListOfCells";
}

export function showShape(shape: CallShape): string {
  if ("empty" in shape) return "Empty";
  if ("sized_default" in shape)
    return `SizedDefault(${shape.sized_default.count})`;
  if ("sized_fill" in shape) {
    const { count, value } = shape.sized_fill;
    return `SizedFill(${count}, ${showScalar(value)})`;
  }
  if ("list" in shape)
    return `List(${shape.list.values.map(showScalar).join(", ")})`;
  return `ListOfCells(${shape.list_of_cells.cells
    .map((c) => showScalar(c.get()))
    .join(", ")})`;
}

export function showResolution(r: Resolution): string {
  return `rule ${r.rule}: ${showShape(r.shape)} → ${showType(r.element)}`;
}

export function showError(err: TraceError): string {
  if ("demangle_unavailable" in err) {
    const { raw, reason } = err.demangle_unavailable;
    return `Demangling unavailable for '${raw}': ${reason}`;
  }

  if ("allocation_failure" in err) {
    const { requested, limit } = err.allocation_failure;
    return `Allocation failure:\n  Requested: ${requested}\n  Limit:     ${limit}`;
  }

  if ("ambiguous_call" in err) {
    const { call, reason } = err.ambiguous_call;
    return `Ambiguous call shape ${call}:\n  ${reason}`;
  }

  if ("invalid_config" in err) {
    return `Invalid configuration:\n  ${err.invalid_config.issues.join("\n  ")}`;
  }

  return "Unknown trace error";
}

/**
 * Extracts the success value, throwing `${msg}: ${showError(err)}` otherwise.
 *
 * @example
 * ```ts
 * const arr = unwrap(construct(state, { paren: [5, 1.3] }), "fill");
 * ```
 */
export const unwrap = <TOk = unknown>(
  result: Result<TraceError, TOk>,
  msg: string = "Failed",
): TOk => {
  if ("ok" in result) return result.ok;
  throw new Error(`${msg}: ${showError(result.err)}`);
};
