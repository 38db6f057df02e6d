import assert from "node:assert/strict";

import { test } from "vitest";

import { replayScenario, startScenario } from "../../../../src/cli/core/dialogue-runner.js";
import type { LoadedScenario } from "../../../../src/cli/core/source-loader.js";
import { SpindleError } from "../../../../src/core/errors.js";

const scenario: LoadedScenario = {
  id: "scripts-dir:/virtual/story",
  title: "Scripts story",
  files: {
    "story.yarn": `title: Start
---
Pick a door.
-> Red
    <<open red>>
    Warm light.
-> Blue
    Cold air.
Again?
-> Yes
    <<jump Start>>
-> No
===
`,
  },
};

test("startScenario runs to the first option group", () => {
  const run = startScenario(scenario, "Start");
  assert.deepEqual(run.boundary, {
    event: "OPTIONS",
    output: [{ kind: "text", text: "Pick a door." }],
    options: [
      { id: 0, text: "Red", available: true },
      { id: 1, text: "Blue", available: true },
    ],
  });

  const next = run.choose(0);
  assert.deepEqual(next.output, [
    { kind: "command", text: "open red" },
    { kind: "text", text: "Warm light." },
    { kind: "text", text: "Again?" },
  ]);
  assert.deepEqual(
    next.options.map((option) => option.text),
    ["Yes", "No"]
  );
  assert.deepEqual(run.session.selections, [0]);

  assert.deepEqual(run.choose(1), { event: "END", output: [], options: [] });
  assert.deepEqual(run.session.selections, [0, 1]);
});

test("choose rejects ids that were not offered", () => {
  const run = startScenario(scenario, "Start");
  assert.throws(
    () => run.choose(4),
    (error: unknown) => error instanceof SpindleError && error.code === "CLI_OPTION_OUT_OF_RANGE"
  );
  assert.deepEqual(run.session.selections, []);
});

test("replayScenario reaches the same boundary as live play", () => {
  const live = startScenario(scenario, "Start");
  live.choose(1);
  const liveBoundary = live.choose(0);

  const replayed = replayScenario(scenario, "Start", 1, [1, 0]);
  assert.deepEqual(replayed.boundary, liveBoundary);
  assert.deepEqual(replayed.boundary.output, [{ kind: "text", text: "Pick a door." }]);
  assert.deepEqual(replayed.session.selections, [1, 0]);

  assert.throws(
    () => replayScenario(scenario, "Start", 1, [0, 1, 0]),
    (error: unknown) => error instanceof SpindleError && error.code === "CLI_STATE_INVALID"
  );
});
