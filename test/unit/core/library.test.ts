import assert from "node:assert/strict";
import { test } from "vitest";

import { SpindleError } from "../../../src/core/errors.js";
import {
  Library,
  booleanParam,
  createStandardLibrary,
  function0,
  function2,
  numberParam,
  stringParam,
  visitCount,
} from "../../../src/core/library.js";
import { MemoryVariableStorage } from "../../../src/core/variable-storage.js";

const expectCode = (fn: () => unknown, code: string): void => {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof SpindleError);
    assert.equal(error.code, code);
    return true;
  });
};

test("registered functions convert arguments and check arity", () => {
  const library = new Library().register(
    "repeat",
    function2([stringParam, numberParam], stringParam, (text, times) => text.repeat(times))
  );
  assert.equal(library.call("repeat", ["ab", "3"]), "ababab");
  expectCode(() => library.call("repeat", ["ab"]), "LIBRARY_ARITY_MISMATCH");
  expectCode(() => library.call("repeat", []), "LIBRARY_ARITY_MISMATCH");
  expectCode(() => library.call("repeat", ["ab", 2, 3]), "LIBRARY_ARITY_MISMATCH");
  expectCode(() => library.call("repeat", ["ab", "lots"]), "LIBRARY_ARGUMENT_KIND");
  expectCode(() => library.call("missing", []), "LIBRARY_FUNCTION_NOT_FOUND");
});

test("declarations describe each function's signature", () => {
  const library = new Library()
    .register("coin", function0(booleanParam, () => true))
    .register("add", function2([numberParam, numberParam], numberParam, (a, b) => a + b));
  const declarations = library.declarations();
  assert.deepEqual(
    declarations.map((declaration) => declaration.name),
    ["add", "coin"]
  );
  assert.deepEqual(declarations[1].type, {
    kind: "function",
    parameters: [],
    returnType: { kind: "primitive", name: "boolean" },
  });
  assert.equal(declarations[0].provenance, "explicit");
});

test("importLibrary replaces same-named functions", () => {
  const base = new Library().register("answer", function0(numberParam, () => 1));
  base.importLibrary(new Library().register("answer", function0(numberParam, () => 42)));
  assert.equal(base.call("answer", []), 42);
  assert.equal(base.has("answer"), true);
});

test("standard library operators and builtins", () => {
  const library = createStandardLibrary();
  assert.equal(library.call("Number.Add", [2, 3]), 5);
  assert.equal(library.call("String.Add", ["a", "b"]), "ab");
  assert.equal(library.call("Bool.Xor", [true, true]), false);
  assert.equal(library.call("Number.UnaryMinus", [4]), -4);
  assert.equal(library.call("round_places", [3.14159, 2]), 3.14);
  assert.equal(library.call("inc", [1.2]), 2);
  assert.equal(library.call("dec", [3]), 2);
  assert.equal(library.call("int", [-2.7]), -2);
  assert.equal(library.call("decimal", [2.5]), 0.5);
});

test("seeded random functions repeat and stay in range", () => {
  const first = createStandardLibrary(new MemoryVariableStorage(), { randomSeed: 7 });
  const second = createStandardLibrary(new MemoryVariableStorage(), { randomSeed: 7 });
  const rolls = [1, 2, 3, 4, 5].map(() => first.call("dice", [6]));
  assert.deepEqual(rolls, [1, 2, 3, 4, 5].map(() => second.call("dice", [6])));
  for (const roll of rolls) {
    assert.ok(typeof roll === "number" && roll >= 1 && roll <= 6);
  }
});

test("visited functions read the shared storage", () => {
  const storage = new MemoryVariableStorage();
  const library = createStandardLibrary(storage);
  assert.equal(library.call("visited", ["Harbour"]), false);
  storage.set(Library.generateUniqueVisitedVariableForNode("Harbour"), 2);
  assert.equal(library.call("visited", ["Harbour"]), true);
  assert.equal(library.call("visited_count", ["Harbour"]), 2);
  assert.equal(visitCount(storage, "Nowhere"), 0);
  assert.equal(Library.generateUniqueVisitedVariableForNode("Harbour"), "$Yarn.Internal.Visiting.Harbour");
});
