// ./src/resolver.ts
import {
  convertScalar,
  inferScalarType,
  InstrumentedCell,
  isLiteral,
} from "./cell.js";
import { cellType, isCountType, isNumericType, typesEqual } from "./identity.js";
import {
  type AmbiguousCallError,
  type Arg,
  type CallSyntax,
  err,
  ok,
  type Resolution,
  type Result,
  type RuleNumber,
  type Scalar,
  type ScalarType,
  showScalar,
  showType,
} from "./types.js";

/**
 * An argument after classification: a scalar (explicitly typed when it came
 * from a literal) or a cell.
 */
export type ClassifiedArg =
  | { scalar: { type: ScalarType; value: Scalar; typed: boolean } }
  | { cell: InstrumentedCell };

export type ClassifiedCall = {
  braced: boolean;
  args: ClassifiedArg[];
  declared: ScalarType | undefined;
  text: string;
};

type ScalarArg = Extract<ClassifiedArg, { scalar: unknown }>["scalar"];

type RuleOutcome = Result<AmbiguousCallError, Resolution> | undefined;

export type ResolutionRule = {
  rule: RuleNumber;
  name: string;
  apply: (call: ClassifiedCall) => RuleOutcome;
};

export function classifyArg(arg: Arg): ClassifiedArg {
  if (arg instanceof InstrumentedCell) return { cell: arg };
  if (isLiteral(arg)) {
    const { type, value } = arg.literal;
    return { scalar: { type, value, typed: true } };
  }
  return { scalar: { type: inferScalarType(arg), value: arg, typed: false } };
}

export function showArg(arg: ClassifiedArg): string {
  if ("cell" in arg)
    return `${showType(arg.cell.cellType)}{${showScalar(arg.cell.get())}}`;
  const { type, value, typed } = arg.scalar;
  const text = typeof value === "string" ? JSON.stringify(value) : showScalar(value);
  return typed ? `${showType(type)}(${text})` : text;
}

export function showCall(call: CallSyntax): string {
  const items: readonly Arg[] = "braced" in call ? call.braced : call.paren;
  const args = items.map((a) => showArg(classifyArg(a)));
  const [open, close] = "braced" in call ? ["{", "}"] : ["(", ")"];
  const declared = call.declared ? `<${showType(call.declared)}>` : "";
  return `DynamicArray${declared}${open}${args.join(", ")}${close}`;
}

const ambiguous = (call: ClassifiedCall, reason: string) =>
  err({ ambiguous_call: { call: call.text, reason } });

function scalarsOf(call: ClassifiedCall): ScalarArg[] | undefined {
  const scalars: ScalarArg[] = [];
  for (const arg of call.args) {
    if (!("scalar" in arg)) return undefined;
    scalars.push(arg.scalar);
  }
  return scalars;
}

function cellsOf(call: ClassifiedCall): InstrumentedCell[] | undefined {
  const cells: InstrumentedCell[] = [];
  for (const arg of call.args) {
    if (!("cell" in arg)) return undefined;
    cells.push(arg.cell);
  }
  return cells;
}

function uniformType(types: ScalarType[]): ScalarType | undefined {
  const [first, ...rest] = types;
  if (!first) return undefined;
  return rest.every((t) => typesEqual(t, first)) ? first : undefined;
}

/**
 * Checks an explicitly declared element type against the deduced one.
 */
function withDeclared(call: ClassifiedCall, resolution: Resolution): RuleOutcome {
  if (call.declared && !typesEqual(call.declared, resolution.scalar)) {
    return ambiguous(
      call,
      `declared element type ${showType(call.declared)} conflicts with deduced ${showType(resolution.scalar)}`,
    );
  }
  return ok(resolution);
}

function countOf(arg: ScalarArg): number | undefined {
  if (!isCountType(arg.type)) return undefined;
  return Number(arg.value);
}

const typedList = (call: ClassifiedCall): RuleOutcome => {
  if (!call.braced || call.args.length === 0) return undefined;

  const cells = cellsOf(call);
  if (cells) {
    const inner = uniformType(cells.map((c) => c.type));
    if (!inner) return undefined;
    return withDeclared(call, {
      rule: 1,
      element: cellType(inner),
      scalar: inner,
      wrapped: false,
      shape: { list_of_cells: { cells } },
    });
  }

  const scalars = scalarsOf(call);
  if (!scalars || !scalars.every((s) => s.typed)) return undefined;
  const type = uniformType(scalars.map((s) => s.type));
  if (!type) return undefined;
  return withDeclared(call, {
    rule: 1,
    element: type,
    scalar: type,
    wrapped: false,
    shape: { list: { values: scalars.map((s) => s.value) } },
  });
};

/**
 * Bare scalars inside braces. A uniform list is taken as is; a two-item
 * `{count, value}` list still lets the sized-fill deduction pick the element
 * type, but the list constructor wins, so both items become cells.
 */
const bareList = (call: ClassifiedCall): RuleOutcome => {
  if (!call.braced || call.args.length === 0) return undefined;
  const scalars = scalarsOf(call);
  if (!scalars) return undefined;

  const type = uniformType(scalars.map((s) => s.type));
  if (type) {
    return withDeclared(call, {
      rule: 2,
      element: type,
      scalar: type,
      wrapped: false,
      shape: { list: { values: scalars.map((s) => s.value) } },
    });
  }

  const [count, value] = scalars;
  if (scalars.length !== 2 || !count || !value) return undefined;
  if (!isCountType(count.type) || !isNumericType(value.type)) return undefined;
  const converted = convertScalar(value.type, count.value);
  if (converted === undefined) return undefined;
  return withDeclared(call, {
    rule: 2,
    element: cellType(value.type),
    scalar: value.type,
    wrapped: true,
    shape: { list: { values: [converted, value.value] } },
  });
};

const sizedFill = (call: ClassifiedCall): RuleOutcome => {
  if (call.braced || call.args.length !== 2) return undefined;
  const scalars = scalarsOf(call);
  const [first, value] = scalars ?? [];
  if (!first || !value) return undefined;
  const count = countOf(first);
  if (count === undefined) return undefined;
  return withDeclared(call, {
    rule: 3,
    element: cellType(value.type),
    scalar: value.type,
    wrapped: true,
    shape: { sized_fill: { count, value: value.value } },
  });
};

const sizedDefault = (call: ClassifiedCall): RuleOutcome => {
  if (call.braced || call.args.length !== 1) return undefined;
  const [first] = scalarsOf(call) ?? [];
  if (!first) return undefined;
  const count = countOf(first);
  if (count === undefined) return undefined;
  if (!call.declared) {
    return ambiguous(call, "element type cannot be deduced from a count alone");
  }
  return ok<Resolution>({
    rule: 4,
    element: call.declared,
    scalar: call.declared,
    wrapped: false,
    shape: { sized_default: { count } },
  });
};

const emptyCall = (call: ClassifiedCall): RuleOutcome => {
  if (call.args.length !== 0) return undefined;
  if (!call.declared) {
    return ambiguous(call, "element type cannot be deduced without arguments");
  }
  return ok<Resolution>({
    rule: 5,
    element: call.declared,
    scalar: call.declared,
    wrapped: false,
    shape: { empty: null },
  });
};

/**
 * Resolution rules in priority order. Braced lists (1, 2) are tried before
 * the sized constructors (3, 4), so `{10, 1.3}` is never read as ten
 * elements.
 */
export const RESOLUTION_RULES: readonly ResolutionRule[] = [
  { rule: 1, name: "typed-list", apply: typedList },
  { rule: 2, name: "bare-list", apply: bareList },
  { rule: 3, name: "sized-fill", apply: sizedFill },
  { rule: 4, name: "sized-default", apply: sizedDefault },
  { rule: 5, name: "empty", apply: emptyCall },
];

export function classifyCall(call: CallSyntax): ClassifiedCall {
  const args: readonly Arg[] = "braced" in call ? call.braced : call.paren;
  return {
    braced: "braced" in call,
    args: args.map(classifyArg),
    declared: call.declared,
    text: showCall(call),
  };
}

/**
 * Decides the element type, the wrapping and the population strategy of a
 * construction call.
 *
 * **Properties**
 * - Pure: builds no cell and writes no trace.
 * - The first matching rule of {@link RESOLUTION_RULES} decides.
 * - A call no rule accepts is an `ambiguous_call` error.
 *
 * @example
 * ```ts
 * resolve({ braced: [10, 1.3] });
 * // ok: rule 2, List(10, 1.3), element InstrumentedCell<double>, wrapped
 *
 * resolve({ paren: [10, 1.3] });
 * // ok: rule 3, SizedFill(10, 1.3), element InstrumentedCell<double>
 *
 * resolve({ paren: [4] });
 * // err: element type cannot be deduced from a count alone
 * ```
 */
export function resolve(call: CallSyntax): Result<AmbiguousCallError, Resolution> {
  const classified = classifyCall(call);
  for (const { apply } of RESOLUTION_RULES) {
    const outcome = apply(classified);
    if (outcome) return outcome;
  }
  return ambiguous(
    classified,
    classified.braced
      ? "braced items share no element type"
      : "expected (), (count) or (count, value)",
  );
}
