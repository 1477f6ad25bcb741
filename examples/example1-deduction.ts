// example1-deduction.ts
import {
  construct,
  describeEvent,
  doubleLiteral,
  DynamicArray,
  doubleType,
  freshState,
  InstrumentedCell,
  intType,
  showResolution,
  showType,
  unwrap,
} from "../src/index.js";

async function main() {
  const state = freshState();

  // Braced list of bare ints: a plain List<int>, nothing wrapped
  const ints = unwrap(construct(state, { braced: [0] }));
  console.log("{0} →", showType(ints.elementType), ints.values());

  // Explicit doubles: a plain List<double>
  const doubles = unwrap(
    construct(state, { braced: [doubleLiteral(10), 1.3] }),
  );
  console.log("{10.0, 1.3} →", showType(doubles.elementType), doubles.values());

  // The tie-break: two cells of double, not ten
  const mark = state.trace.size;
  const tie = unwrap(construct(state, { braced: [10, 1.3] }));
  console.log("{10, 1.3} →", showResolution(tie.resolution));
  for (const event of state.trace.since(mark)) console.log("  ", describeEvent(event));

  // Parentheses: ten cells, each a temporary and a copy
  const before = state.trace.size;
  const filled = unwrap(construct(state, { paren: [10, 1.3] }));
  console.log("(10, 1.3) →", showResolution(filled.resolution));
  console.log("   events:", state.trace.size - before); // 20

  // Cells go in as they are
  const cells = [
    new InstrumentedCell(state, doubleType, { value: 10.34 }),
    new InstrumentedCell(state, doubleType, { value: 9.23 }),
  ];
  const copied = unwrap(DynamicArray.cells(state, cells));
  console.log("{cell, cell} →", showType(copied.elementType), copied.values());

  // A count alone needs a declared type
  const sized = unwrap(DynamicArray.sized(state, intType, 4));
  console.log("<int>(4) →", sized.values()); // [0, 0, 0, 0]

  // This throws: the element type of (4) cannot be deduced
  unwrap(construct(state, { paren: [4] }), "(4)");
}

main().catch((e) => {
  console.error("Error:", e instanceof Error ? e.message : e);
  process.exit(1);
});
