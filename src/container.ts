// ./src/container.ts
import { defaultScalar, InstrumentedCell } from "./cell.js";
import { resolve, showCall } from "./resolver.js";
import type { TraceState } from "./state.js";
import {
  type AllocationFailureError,
  type CallSyntax,
  type ConstructionError,
  type Count,
  type Element,
  err,
  type Literal,
  ok,
  type Resolution,
  type Result,
  type Scalar,
  type ScalarName,
  type ScalarType,
  showError,
  showResolution,
  showType,
  type StrategyName,
  strategyOf,
  type Type,
} from "./types.js";

/**
 * Ordered sequence whose element type was resolved from its construction
 * call. Elements are fixed once built.
 *
 * @example
 * ```ts
 * const state = freshState();
 * const arr = unwrap(DynamicArray.filled(state, 3, 1.3));
 * arr.strategy;                 // "SizedFill"
 * showType(arr.elementType);    // "InstrumentedCell<double>"
 * arr.values();                 // [1.3, 1.3, 1.3]
 * state.trace.size;             // 6
 * ```
 */
export class DynamicArray {
  private constructor(
    readonly resolution: Resolution,
    private readonly items: Element[],
  ) {}

  get elementType(): Type {
    return this.resolution.element;
  }

  get strategy(): StrategyName {
    return strategyOf(this.resolution.shape);
  }

  get length(): number {
    return this.items.length;
  }

  /** Read-only view over the backing storage. */
  getElements(): readonly Element[] {
    return this.items;
  }

  /** Whether every element is a cell. */
  isWrapped(): boolean {
    return this.resolution.wrapped || "list_of_cells" in this.resolution.shape;
  }

  /** The elements that are cells, in order. */
  getCells(): InstrumentedCell[] {
    return this.items.flatMap((item) =>
      item instanceof InstrumentedCell ? [item] : [],
    );
  }

  /** Held values, looking through cells. */
  values(): Scalar[] {
    return this.items.map((item) =>
      item instanceof InstrumentedCell ? item.get() : item,
    );
  }

  [Symbol.iterator](): Iterator<Element> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Populates a container from an already computed resolution.
   *
   * The element count is checked against `config.maxElements` (by default
   * `DEFAULT_MAX_ELEMENTS`, 2^24) before any cell is built, so a failed
   * allocation leaves the trace log untouched. Counts under the limit are
   * allocated in full.
   */
  static populate(
    state: TraceState,
    resolution: Resolution,
  ): Result<AllocationFailureError, DynamicArray> {
    const { shape, scalar } = resolution;
    const size = sizeOf(resolution);
    const limit = state.config.maxElements;
    if (!Number.isSafeInteger(size) || size < 0 || size > limit) {
      return err({ allocation_failure: { requested: size, limit } });
    }

    const items: Element[] = [];
    if ("sized_default" in shape) {
      for (let i = 0; i < size; i++) items.push(defaultScalar(scalar));
    } else if ("sized_fill" in shape) {
      const value = shape.sized_fill.value;
      for (let i = 0; i < size; i++) {
        const temporary = new InstrumentedCell(state, scalar, { value });
        items.push(new InstrumentedCell(state, scalar, { copy: temporary }));
      }
    } else if ("list" in shape) {
      for (const value of shape.list.values) {
        items.push(
          resolution.wrapped
            ? new InstrumentedCell(state, scalar, { value })
            : value,
        );
      }
    } else if ("list_of_cells" in shape) {
      for (const cell of shape.list_of_cells.cells) {
        items.push(new InstrumentedCell(state, cell.type, { copy: cell }));
      }
    }
    return ok(new DynamicArray(resolution, items));
  }

  /** `DynamicArray<T>()` */
  static empty(
    state: TraceState,
    type: ScalarType,
  ): Result<ConstructionError, DynamicArray> {
    return construct(state, { paren: [], declared: type });
  }

  /** `DynamicArray<T>(count)`: `count` default values, no cells. */
  static sized(
    state: TraceState,
    type: ScalarType,
    count: Count,
  ): Result<ConstructionError, DynamicArray> {
    return construct(state, { paren: [count], declared: type });
  }

  /** `DynamicArray(count, value)`: `count` cells copied from `value`. */
  static filled(
    state: TraceState,
    count: Count,
    value: Scalar | Literal,
  ): Result<ConstructionError, DynamicArray> {
    return construct(state, { paren: [count, value] });
  }

  /** `DynamicArray{a, b, ...}` over scalars. */
  static list(
    state: TraceState,
    values: readonly (Scalar | Literal)[],
  ): Result<ConstructionError, DynamicArray> {
    return construct(state, { braced: values });
  }

  /** `DynamicArray{cell, ...}`: each cell copied into storage. */
  static cells<N extends ScalarName>(
    state: TraceState,
    cells: readonly InstrumentedCell<N>[],
  ): Result<ConstructionError, DynamicArray> {
    return construct(state, { braced: cells });
  }
}

function sizeOf(resolution: Resolution): number {
  const { shape } = resolution;
  if ("empty" in shape) return 0;
  if ("sized_default" in shape) return shape.sized_default.count;
  if ("sized_fill" in shape) return shape.sized_fill.count;
  if ("list" in shape) return shape.list.values.length;
  return shape.list_of_cells.cells.length;
}

/**
 * Resolves `call` and populates a container accordingly.
 *
 * Resolutions are logged at `debug`; failures at `error`, after which the
 * error is returned and no container exists.
 *
 * @example
 * ```ts
 * construct(state, { braced: [10, 1.3] });  // two cells of double
 * construct(state, { paren: [10, 1.3] });   // ten cells of double
 * construct(state, { paren: [4], declared: intType }); // [0, 0, 0, 0]
 * ```
 */
export function construct(
  state: TraceState,
  call: CallSyntax,
): Result<ConstructionError, DynamicArray> {
  const resolved = resolve(call);
  if ("err" in resolved) return failed(state, call, resolved.err);

  const resolution = resolved.ok;
  state.diagnostics.debug(`${showCall(call)}: ${showResolution(resolution)}`, {
    kind: "resolution",
    typeName: showType(resolution.element),
  });

  const populated = DynamicArray.populate(state, resolution);
  if ("err" in populated) return failed(state, call, populated.err);
  return populated;
}

function failed(
  state: TraceState,
  call: CallSyntax,
  error: ConstructionError,
): Result<ConstructionError, DynamicArray> {
  state.diagnostics.error(`${showCall(call)}: ${showError(error)}`, {
    kind: "construction_failed",
  });
  return err(error);
}
