import assert from "node:assert/strict";
import { test } from "vitest";

import { DEFAULT_RANDOM_SEED, createRandomSource, isUint32Integer } from "../../../src/core/random.js";

test("random source is deterministic per seed", () => {
  const a = createRandomSource(99);
  const b = createRandomSource(99);
  const values = [a.next(), a.next(), a.next()];
  assert.deepEqual(values, [b.next(), b.next(), b.next()]);
  for (const value of values) {
    assert.ok(value >= 0 && value < 1);
  }
  assert.equal(a.state, b.state);
});

test("invalid seeds fall back to the default", () => {
  assert.equal(createRandomSource(-3).state, DEFAULT_RANDOM_SEED);
  assert.equal(createRandomSource(1.5).state, DEFAULT_RANDOM_SEED);
  assert.equal(isUint32Integer(0xffffffff), true);
  assert.equal(isUint32Integer(0x100000000), false);
});
