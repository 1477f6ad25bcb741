import { typeOfArg } from "./cell.js";
import { identify } from "./identity.js";
import type { Arg, Type, TypeWitness } from "./types.js";

export type DispatchHandler<R> = (value: Arg, type: Type) => R;

export type DispatchCase<R> = readonly [type: Type, handler: DispatchHandler<R>];

export type Dispatcher<R> = {
  /** Dispatches on the run-time type of `value`. */
  dispatch(value: Arg): R;
  /** Dispatches on an explicitly given type. */
  dispatchType(type: Type, value: Arg): R;
  /** Whether the witness table has been built yet. */
  readonly compiled: boolean;
};

/**
 * Builds an exact-type dispatcher.
 *
 * **Semantics**
 * - A case fires only when its type is the same type as the argument's:
 *   `int` never matches `long` or `double`, `Id<float>` never matches
 *   `Id<double>`.
 * - When a type is registered twice, the first case wins.
 * - `fallback` runs for every unregistered type; exactly one handler runs
 *   per call.
 *
 * The witness table is built once, on first use, and reused afterwards.
 *
 * @example
 * ```ts
 * const describe = createDispatcher<string>(
 *   [
 *     [intType, () => "int"],
 *     [doubleType, () => "double"],
 *     [cellType(floatType), () => "InstrumentedCell<float>"],
 *   ],
 *   () => "something else",
 * );
 * describe.dispatch(42);     // "int"
 * describe.dispatch("hi");   // "something else"
 * ```
 */
export function createDispatcher<R>(
  cases: readonly DispatchCase<R>[],
  fallback: DispatchHandler<R>,
): Dispatcher<R> {
  let table: Map<TypeWitness, DispatchHandler<R>> | undefined;

  const compile = () => {
    const built = new Map<TypeWitness, DispatchHandler<R>>();
    for (const [type, handler] of cases) {
      const witness = identify(type);
      if (!built.has(witness)) built.set(witness, handler);
    }
    return built;
  };

  const dispatchType = (type: Type, value: Arg): R => {
    table ??= compile();
    const handler = table.get(identify(type)) ?? fallback;
    return handler(value, type);
  };

  return {
    dispatch: (value) => dispatchType(typeOfArg(value), value),
    dispatchType,
    get compiled() {
      return table !== undefined;
    },
  };
}

/** One-shot form of {@link createDispatcher}. */
export function staticDispatch<R>(
  value: Arg,
  cases: readonly DispatchCase<R>[],
  fallback: DispatchHandler<R>,
): R {
  return createDispatcher(cases, fallback).dispatch(value);
}

/** One-shot dispatch on a descriptor rather than a value's run-time type. */
export function dispatchOnType<R>(
  type: Type,
  value: Arg,
  cases: readonly DispatchCase<R>[],
  fallback: DispatchHandler<R>,
): R {
  return createDispatcher(cases, fallback).dispatchType(type, value);
}
