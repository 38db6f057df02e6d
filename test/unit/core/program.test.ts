import assert from "node:assert/strict";
import { test } from "vitest";

import { SpindleError } from "../../../src/core/errors.js";
import { combinePrograms, emptyProgram, lineIdsForNode, rawTextStringId } from "../../../src/core/program.js";
import type { Node, Program } from "../../../src/core/types.js";

const node = (name: string): Node => ({
  name,
  instructions: [
    { opcode: "runLine", lineId: `line:${name}-0`, substitutionCount: 0, metadata: [] },
    { opcode: "addOption", lineId: `line:${name}-1`, label: "L0", substitutionCount: 0, hasCondition: false, metadata: [] },
    { opcode: "showOptions" },
  ],
  labels: {},
  tags: [],
  tracked: false,
  sourceTextStringId: null,
});

const program = (names: string[], initialValues: Program["initialValues"] = {}): Program => ({
  nodes: Object.fromEntries(names.map((name) => [name, node(name)])),
  initialValues,
});

test("combinePrograms merges nodes and keeps the first initial value", () => {
  const combined = combinePrograms(program(["A"], { $x: 1 }), program(["B"], { $x: 2, $y: true }));
  assert.deepEqual(Object.keys(combined.nodes), ["A", "B"]);
  assert.deepEqual(combined.initialValues, { $x: 1, $y: true });
});

test("combinePrograms is associative over disjoint node sets", () => {
  const a = program(["A"], { $a: 1 });
  const b = program(["B"], { $b: 2 });
  const c = program(["C"], { $c: 3 });
  assert.deepEqual(combinePrograms(combinePrograms(a, b), c), combinePrograms(a, combinePrograms(b, c)));
  assert.deepEqual(combinePrograms(), emptyProgram());
});

test("combinePrograms rejects a node defined twice", () => {
  assert.throws(
    () => combinePrograms(program(["A"]), program(["A"])),
    (error: unknown) => error instanceof SpindleError && error.code === "PROGRAM_NODE_CONFLICT"
  );
});

test("lineIdsForNode lists lines and options in order", () => {
  assert.deepEqual(lineIdsForNode(node("Start")), ["line:Start-0", "line:Start-1"]);
  assert.equal(rawTextStringId("Notes"), "line:Notes");
});
