import type { TraceState } from "./state.js";
import {
  type AppType,
  type ConType,
  type DemangleUnavailableError,
  err,
  getSpineArgs,
  getSpineHead,
  ok,
  type Result,
  type ScalarName,
  type ScalarType,
  showError,
  showType,
  type Type,
  type TypeWitness,
} from "./types.js";

/**
 * Constructs a named type.
 *
 * @example
 * ```ts
 * conType("Id");                            // Id
 * appType(conType("Id"), conType("float")); // Id<float>
 * ```
 */
export const conType = (con: string): ConType => ({ con });

/** Applies a type constructor to one argument (curried). */
export const appType = (func: Type, arg: Type): AppType => ({
  app: { func, arg },
});

export const intType: ScalarType<"int"> = { con: "int" };
export const longType: ScalarType<"long"> = { con: "long" };
export const floatType: ScalarType<"float"> = { con: "float" };
export const doubleType: ScalarType<"double"> = { con: "double" };
export const boolType: ScalarType<"bool"> = { con: "bool" };
export const charType: ScalarType<"char"> = { con: "char" };
export const stringType: ScalarType<"string"> = { con: "string" };
export const voidType: ConType = { con: "void" };

export const SCALAR_NAMES: readonly ScalarName[] = [
  "int",
  "long",
  "float",
  "double",
  "bool",
  "char",
  "string",
];

export const CELL_TYPE_NAME = "InstrumentedCell";

/** `InstrumentedCell<inner>` as a descriptor. */
export const cellType = (inner: Type): AppType =>
  appType(conType(CELL_TYPE_NAME), inner);

export function isScalarType(t: Type): t is ScalarType {
  return "con" in t && SCALAR_NAMES.some((name) => name === t.con);
}

/** Scalar kinds a count may be written in. */
export function isCountType(t: Type): boolean {
  return "con" in t && (t.con === "int" || t.con === "long");
}

export function isNumericType(t: Type): boolean {
  return (
    "con" in t &&
    (t.con === "int" ||
      t.con === "long" ||
      t.con === "float" ||
      t.con === "double")
  );
}

/**
 * Structural equality of descriptors: same constructor names, same spine.
 *
 * ```ts
 * typesEqual(cellType(doubleType), cellType(doubleType)); // true
 * typesEqual(intType, longType);                          // false
 * ```
 */
export function typesEqual(left: Type, right: Type): boolean {
  if ("con" in left && "con" in right) return left.con === right.con;
  if ("app" in left && "app" in right) {
    return (
      typesEqual(left.app.func, right.app.func) &&
      typesEqual(left.app.arg, right.app.arg)
    );
  }
  return false;
}

const BUILTIN_CODES: ReadonlyMap<string, string> = new Map([
  ["int", "i"],
  ["long", "l"],
  ["float", "f"],
  ["double", "d"],
  ["bool", "b"],
  ["char", "c"],
  ["void", "v"],
]);

const STRING_CODE = "Ss";

const BUILTIN_NAMES: ReadonlyMap<string, string> = new Map(
  [...BUILTIN_CODES].map(([name, code]) => [code, name]),
);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Raw, mangled identifier of a type.
 *
 * **Format**
 * - builtins: a single code letter (`i`, `l`, `f`, `d`, `b`, `c`, `v`),
 *   `Ss` for `string`
 * - other constructors: `<length><name>`
 * - applications: the head followed by `I<args>E`
 *
 * Injective; witnesses are keyed by it. For a readable name see
 * {@link displayName}.
 *
 * @example
 * ```ts
 * rawName(doubleType);                          // "d"
 * rawName(cellType(doubleType));                // "16InstrumentedCellIdE"
 * rawName(appType(conType("Id"), floatType));   // "2IdIfE"
 * ```
 */
export function rawName(t: Type): string {
  if ("con" in t) {
    if (t.con === "string") return STRING_CODE;
    return BUILTIN_CODES.get(t.con) ?? `${t.con.length}${t.con}`;
  }
  const args = getSpineArgs(t).map(rawName).join("");
  return `${rawName(getSpineHead(t))}I${args}E`;
}

type Parsed = [Type, number];

function parseMangled(raw: string, pos: number): Result<string, Parsed> {
  if (pos >= raw.length) return err(`unexpected end of input at ${pos}`);

  let head: Type;
  let next: number;
  const builtin = BUILTIN_NAMES.get(raw.charAt(pos));
  if (raw.startsWith(STRING_CODE, pos)) {
    head = conType("string");
    next = pos + STRING_CODE.length;
  } else if (builtin !== undefined) {
    head = conType(builtin);
    next = pos + 1;
  } else {
    const digits = /^\d+/.exec(raw.slice(pos));
    if (!digits) return err(`unexpected '${raw.charAt(pos)}' at ${pos}`);
    const start = pos + digits[0].length;
    const name = raw.slice(start, start + Number(digits[0]));
    if (name.length !== Number(digits[0]))
      return err(`truncated name at ${start}`);
    if (!IDENTIFIER.test(name)) return err(`'${name}' is not an identifier`);
    head = conType(name);
    next = start + name.length;
  }

  if (raw.charAt(next) !== "I") return ok<Parsed>([head, next]);
  next++;
  if (raw.charAt(next) === "E")
    return err(`empty template argument list at ${next}`);

  let ty: Type = head;
  while (raw.charAt(next) !== "E") {
    if (next >= raw.length)
      return err(`unterminated template argument list`);
    const arg = parseMangled(raw, next);
    if ("err" in arg) return arg;
    ty = appType(ty, arg.ok[0]);
    next = arg.ok[1];
  }
  return ok<Parsed>([ty, next + 1]);
}

/**
 * Parses a raw name produced by {@link rawName} back into a descriptor.
 *
 * Fails with `demangle_unavailable` on malformed input, trailing characters,
 * or a constructor name that is not an identifier.
 */
export function demangle(raw: string): Result<DemangleUnavailableError, Type> {
  const parsed = parseMangled(raw, 0);
  if ("err" in parsed)
    return err({ demangle_unavailable: { raw, reason: parsed.err } });
  const [ty, end] = parsed.ok;
  if (end !== raw.length) {
    return err({
      demangle_unavailable: { raw, reason: `trailing input at ${end}` },
    });
  }
  return ok(ty);
}

let witnessTable: Map<string, TypeWitness> | undefined;

/**
 * Returns the process-stable witness of `t`.
 *
 * The table behind it is created on first use and only ever grows, so a
 * witness handed out once stays valid (and `===`) for the rest of the process.
 *
 * @example
 * ```ts
 * identify(cellType(doubleType)) === identify(cellType(doubleType)); // true
 * identify(intType) === identify(longType);                          // false
 * ```
 */
export function identify(t: Type): TypeWitness {
  witnessTable ??= new Map();
  const key = rawName(t);
  const existing = witnessTable.get(key);
  if (existing) return existing;
  const witness: TypeWitness = Object.freeze({
    witness: witnessTable.size,
    key,
  });
  witnessTable.set(key, witness);
  return witness;
}

/**
 * Human-readable name of `t`, recovered from its raw name.
 *
 * Never throws. When demangling is switched off or fails, the raw name is
 * returned and a `demangle_unavailable` warning goes to diagnostics.
 *
 * @example
 * ```ts
 * displayName(state, cellType(doubleType)); // "InstrumentedCell<double>"
 * displayName(freshState({ demangle: false }), doubleType); // "d"
 * ```
 */
export function displayName(state: TraceState, t: Type): string {
  const raw = rawName(t);
  if (!state.config.demangle) {
    return reportUnavailable(state, {
      demangle_unavailable: { raw, reason: "demangling is disabled" },
    });
  }
  const demangled = demangle(raw);
  if ("err" in demangled) return reportUnavailable(state, demangled.err);
  return showType(demangled.ok);
}

function reportUnavailable(
  state: TraceState,
  error: DemangleUnavailableError,
): string {
  const { raw, reason } = error.demangle_unavailable;
  state.diagnostics.warn(showError(error), {
    kind: "demangle_unavailable",
    typeName: raw,
    payload: reason,
  });
  return raw;
}
