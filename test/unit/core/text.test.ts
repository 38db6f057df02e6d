import assert from "node:assert/strict";
import { test } from "vitest";

import { expandSubstitutions, splitCommandText } from "../../../src/core/text.js";

test("expandSubstitutions replaces known indices only", () => {
  assert.equal(expandSubstitutions("{0} has {1} coins", ["Ada", "3"]), "Ada has 3 coins");
  assert.equal(expandSubstitutions("{0} and {2}", ["x"]), "x and {2}");
  assert.equal(expandSubstitutions("no placeholders", []), "no placeholders");
});

test("splitCommandText keeps quoted runs together", () => {
  assert.deepEqual(splitCommandText("walk  Ada \"the long way\""), ["walk", "Ada", "the long way"]);
  assert.deepEqual(splitCommandText("say \"\""), ["say", ""]);
  assert.deepEqual(splitCommandText("say \"a \\\"b\\\"\""), ["say", "a \"b\""]);
  assert.deepEqual(splitCommandText("   "), []);
});
