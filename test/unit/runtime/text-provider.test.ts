import assert from "node:assert/strict";
import { test } from "vitest";

import { SpindleError } from "../../../src/core/errors.js";
import type { StringTable } from "../../../src/core/types.js";
import {
  createStringTableTextProvider,
  extendTranslation,
  getLineText,
  resolveLineText,
} from "../../../src/runtime/text-provider.js";

const TABLE: StringTable = {
  "line:hi": { text: "Hello, {0}.", nodeName: "Start", lineNumber: 1, fileName: "a.yarn", isImplicitTag: false, metadata: [] },
  "line:bye": { text: "Goodbye.", nodeName: "Start", lineNumber: 2, fileName: "a.yarn", isImplicitTag: false, metadata: [] },
};

test("string table provider resolves base text and substitutions", () => {
  const provider = createStringTableTextProvider(TABLE);
  assert.equal(getLineText(provider, "line:bye"), "Goodbye.");
  assert.equal(getLineText(provider, "line:missing"), undefined);
  assert.equal(resolveLineText(provider, { id: "line:hi", substitutions: ["Ada"], metadata: [] }), "Hello, Ada.");
});

test("translations override per line and fall back to the base language", () => {
  const base = createStringTableTextProvider(TABLE);
  const german = extendTranslation(base, "de", { "line:hi": "Hallo, {0}." });
  assert.equal(resolveLineText(german, { id: "line:hi", substitutions: ["Ada"], metadata: [] }, "de"), "Hallo, Ada.");
  assert.equal(getLineText(german, "line:bye", "de"), "Goodbye.");
  assert.equal(getLineText(german, "line:hi", "en"), "Hello, {0}.");
  assert.equal(getLineText(base, "line:hi", "de"), "Hello, {0}.");
});

test("missing text and custom providers", () => {
  const provider = createStringTableTextProvider(TABLE);
  assert.throws(
    () => resolveLineText(provider, { id: "line:missing", substitutions: [], metadata: [] }),
    (error: unknown) => error instanceof SpindleError && error.code === "TEXT_NOT_FOUND"
  );

  const custom = { kind: "custom" as const, getText: (id: string, language: string | null) => `${language ?? "base"}/${id}` };
  assert.equal(getLineText(custom, "line:x", "fr"), "fr/line:x");
  assert.equal(getLineText(custom, "line:x"), "base/line:x");
  assert.throws(
    () => extendTranslation(custom, "fr", {}),
    (error: unknown) => error instanceof SpindleError && error.code === "TEXT_PROVIDER_UNSUPPORTED"
  );
});
