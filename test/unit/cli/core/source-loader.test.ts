import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { test } from "vitest";

import {
  getExamplesScriptsRoot,
  loadExampleScenario,
  loadSourceByRef,
  loadSourceByScriptsDir,
  makeScriptsDirScenarioId,
  readScriptFilesFromDir,
} from "../../../../src/cli/core/source-loader.js";
import { SpindleError } from "../../../../src/core/errors.js";

const expectCode = (fn: () => unknown, code: string): void => {
  assert.throws(fn, (error: unknown) => error instanceof SpindleError && error.code === code);
};

test("scripts are read recursively with posix keys", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "spindle-scripts-"));
  fs.mkdirSync(path.join(dir, "chapter"));
  fs.writeFileSync(path.join(dir, "b.yarn"), "B", "utf8");
  fs.writeFileSync(path.join(dir, "chapter", "a.yarn"), "A", "utf8");
  fs.writeFileSync(path.join(dir, "notes.txt"), "ignored", "utf8");

  assert.deepEqual(readScriptFilesFromDir(dir), { "b.yarn": "B", "chapter/a.yarn": "A" });

  const scenario = loadSourceByScriptsDir(dir);
  assert.equal(scenario.id, makeScriptsDirScenarioId(path.resolve(dir)));
  assert.equal(scenario.title, `Scripts ${path.basename(dir)}`);
  assert.deepEqual(loadSourceByRef(scenario.id).files, scenario.files);
});

test("source loader errors", () => {
  const empty = fs.mkdtempSync(path.join(os.tmpdir(), "spindle-empty-"));
  expectCode(() => loadSourceByScriptsDir(empty), "CLI_SCRIPTS_DIR_EMPTY");
  expectCode(() => loadSourceByScriptsDir(path.join(empty, "missing")), "CLI_SCRIPTS_DIR_NOT_FOUND");

  const file = path.join(empty, "plain.yarn");
  fs.writeFileSync(file, "", "utf8");
  expectCode(() => loadSourceByScriptsDir(file), "CLI_SCRIPTS_DIR_NOT_FOUND");

  expectCode(() => loadSourceByRef("example:02-market"), "CLI_STATE_INVALID");
  expectCode(() => loadExampleScenario("no-such-example"), "CLI_SCENARIO_NOT_FOUND");
});

test("bundled examples load by id", () => {
  const scenario = loadExampleScenario("02-market");
  assert.equal(scenario.id, makeScriptsDirScenarioId(path.join(getExamplesScriptsRoot(), "02-market")));
  assert.deepEqual(Object.keys(scenario.files), ["market.yarn", "outside.yarn"]);
});
