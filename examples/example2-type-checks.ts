// example2-type-checks.ts
import {
  appType,
  type Arg,
  cellType,
  conType,
  displayName,
  doubleType,
  floatType,
  freshState,
  identify,
  InstrumentedCell,
  intType,
  MemorySink,
  rawName,
  staticDispatch,
} from "../src/index.js";

const sink = new MemorySink();
const state = freshState({}, [sink]);

const id = (t: typeof floatType | typeof doubleType) => appType(conType("Id"), t);

console.log("Id<float> == Id<float>:", identify(id(floatType)) === identify(id(floatType)));
console.log("Id<float> == Id<double>:", identify(id(floatType)) === identify(id(doubleType)));

for (const t of [doubleType, cellType(doubleType), id(floatType)]) {
  console.log(rawName(t), "→", displayName(state, t));
}

const check = (value: Arg) =>
  staticDispatch<string>(
    value,
    [
      [intType, () => "int"],
      [doubleType, () => "double"],
      [cellType(floatType), () => "InstrumentedCell<float>"],
    ],
    (_, type) => `something else (${displayName(state, type)})`,
  );

console.log(check(42));
console.log(check(4.2));
console.log(check(new InstrumentedCell(state, floatType, { value: 2.5 })));
console.log(check("hello"));

// Raw names are what you get when demangling is off
const raw = freshState({ demangle: false }, [sink]);
console.log(displayName(raw, cellType(doubleType)));
console.log(sink.ofKind("demangle_unavailable").map((e) => e.message));
