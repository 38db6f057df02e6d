import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { test } from "vitest";

import {
  PLAYER_STATE_SCHEMA,
  createPlayerState,
  loadPlayerState,
  parsePlayerState,
  savePlayerState,
} from "../../../../src/cli/core/state-store.js";
import { SpindleError } from "../../../../src/core/errors.js";

const expectCode = (fn: () => unknown, code: string): void => {
  assert.throws(fn, (error: unknown) => error instanceof SpindleError && error.code === code);
};

const valid = {
  schemaVersion: PLAYER_STATE_SCHEMA,
  scenarioId: "scripts-dir:/tmp/story",
  startNode: "Start",
  randomSeed: 7,
  selections: [0, 2],
};

test("state store save and load roundtrip", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "spindle-state-"));
  const statePath = path.join(dir, "nested", "save.json");
  const selections = [1];
  const state = createPlayerState("scripts-dir:/tmp/story", "Start", 42, selections);
  selections.push(5);

  savePlayerState(statePath, state);
  assert.deepEqual(loadPlayerState(statePath), {
    schemaVersion: PLAYER_STATE_SCHEMA,
    scenarioId: "scripts-dir:/tmp/story",
    startNode: "Start",
    randomSeed: 42,
    selections: [1],
  });
});

test("parsePlayerState validates every field", () => {
  assert.deepEqual(parsePlayerState(JSON.stringify(valid)), valid);

  expectCode(() => parsePlayerState("{"), "CLI_STATE_INVALID");
  expectCode(() => parsePlayerState("[]"), "CLI_STATE_INVALID");
  expectCode(() => parsePlayerState(JSON.stringify({ ...valid, schemaVersion: "player-state.v0" })), "CLI_STATE_SCHEMA");
  expectCode(() => parsePlayerState(JSON.stringify({ ...valid, scenarioId: "" })), "CLI_STATE_INVALID");
  expectCode(() => parsePlayerState(JSON.stringify({ ...valid, startNode: 3 })), "CLI_STATE_INVALID");
  expectCode(() => parsePlayerState(JSON.stringify({ ...valid, randomSeed: -1 })), "CLI_STATE_INVALID");
  expectCode(() => parsePlayerState(JSON.stringify({ ...valid, selections: [0, 1.5] })), "CLI_STATE_INVALID");
});

test("loading a missing state file fails", () => {
  expectCode(() => loadPlayerState(path.join(os.tmpdir(), "spindle-no-such-state.json")), "CLI_STATE_NOT_FOUND");
});
