import assert from "node:assert/strict";
import { test } from "vitest";

import type { Statement } from "../../../src/compiler/ast.js";
import { parseSource, parseText, stripComment } from "../../../src/compiler/parser.js";

const kinds = (statements: Statement[]): string[] => statements.map((statement) => statement.kind);

const SOURCE = `# chapter1
title: Start
tags: intro  camp
colour: blue
---
Hello {$name}! #greeting
<<declare $gold = 10 as number>>
<<if $gold > 5>>
    Rich.
<<elseif $gold > 0>>
    Poor.
<<else>>
    Broke.
<<endif>>
-> Buy <<if $gold > 2>> #shop
    <<set $gold to $gold - 2>>
-> Leave // walks away
<<jump {$next}>>
<<wait 2>>
<<stop>>
===
`;

test("parseSource reads headers, tags and statements", () => {
  const { file, diagnostics } = parseSource("start.yarn", SOURCE);
  assert.deepEqual(diagnostics, []);
  assert.deepEqual(file.tags, ["chapter1"]);
  assert.equal(file.nodes.length, 1);

  const [node] = file.nodes;
  assert.equal(node.title, "Start");
  assert.deepEqual(node.tags, ["intro", "camp"]);
  assert.deepEqual(
    node.headers.map((header) => `${header.key}=${header.value}`),
    ["title=Start", "tags=intro  camp", "colour=blue"]
  );
  assert.deepEqual(kinds(node.body), ["line", "declare", "if", "options", "jump", "command", "stop"]);
});

test("lines keep text parts and hashtags", () => {
  const { file } = parseSource("start.yarn", SOURCE);
  const line = file.nodes[0].body[0];
  assert.ok(line.kind === "line");
  assert.deepEqual(
    line.parts.map((part) => (part.kind === "text" ? part.value : "<expr>")),
    ["Hello ", "<expr>", "!"]
  );
  assert.deepEqual(line.hashtags, ["greeting"]);
  assert.deepEqual(line.span.start, { line: 6, column: 1 });
});

test("declare, if and options statements", () => {
  const { file } = parseSource("start.yarn", SOURCE);
  const [, declare, conditional, options, jump, command] = file.nodes[0].body;

  assert.ok(declare.kind === "declare");
  assert.equal(declare.variable, "$gold");
  assert.equal(declare.typeName, "number");

  assert.ok(conditional.kind === "if");
  assert.equal(conditional.clauses.length, 3);
  assert.equal(conditional.clauses[2].condition, null);
  assert.deepEqual(
    conditional.clauses.map((clause) => kinds(clause.body)),
    [["line"], ["line"], ["line"]]
  );

  assert.ok(options.kind === "options");
  assert.equal(options.options.length, 2);
  const [buy, leave] = options.options;
  assert.deepEqual(buy.parts, [{ kind: "text", value: "Buy" }]);
  assert.ok(buy.condition !== null);
  assert.deepEqual(buy.hashtags, ["shop"]);
  assert.deepEqual(kinds(buy.body), ["set"]);
  assert.deepEqual(leave.parts, [{ kind: "text", value: "Leave" }]);
  assert.equal(leave.condition, null);
  assert.deepEqual(leave.body, []);

  assert.ok(jump.kind === "jump" && jump.target.kind === "expression");
  assert.ok(command.kind === "command");
  assert.deepEqual(command.parts, [{ kind: "text", value: "wait 2" }]);
});

test("rawText nodes keep their body source unparsed", () => {
  const { file, diagnostics } = parseSource(
    "notes.yarn",
    "title: Notes\ntags: rawText\n---\nAnything <<goes>> here\n  even {broken\n===\n"
  );
  assert.deepEqual(diagnostics, []);
  assert.deepEqual(file.nodes[0].body, []);
  assert.equal(file.nodes[0].bodySource, "Anything <<goes>> here\n  even {broken");
});

test("parse problems become diagnostics", () => {
  const messages = (source: string): string[] =>
    parseSource("bad.yarn", source).diagnostics.map((entry) => entry.message);

  assert.deepEqual(messages("title: A\n---\n<<if true>>\nYes.\n"), [
    "Node body is not closed with \"===\".",
    "Missing <<endif>>.",
  ]);
  assert.deepEqual(messages("tags: x\n---\nHi\n===\n"), ["Node is missing a \"title:\" header."]);
  assert.deepEqual(messages("title: 9lives\n---\n===\n"), ["Invalid node title \"9lives\"."]);
  assert.deepEqual(messages("title: __proto__\n---\n===\n"), ["Invalid node title \"__proto__\"."]);
  assert.deepEqual(messages("title: A\n---\n<<jump __proto__>>\n===\n"), ["Invalid jump target \"__proto__\"."]);
  assert.deepEqual(messages("title: A\n---\n<<else>>\n===\n"), [
    "Unexpected \"<<else>>\" without a matching <<if>>.",
  ]);
  assert.deepEqual(messages("title: A\n---\n<<set $x>>\n===\n"), [
    "Malformed <<set>>; expected \"<<set $name = value>>\".",
  ]);
  assert.deepEqual(messages("title: A\n"), ["Node headers are not followed by \"---\"."]);
});

test("expression errors carry the source position", () => {
  const { diagnostics } = parseSource("bad.yarn", "title: A\n---\nHello {1 +}\n===\n");
  assert.equal(diagnostics.length, 1);
  assert.deepEqual(diagnostics[0], {
    severity: "error",
    code: "PARSE_ERROR",
    message: "Unexpected end of expression.",
    fileName: "bad.yarn",
    span: { start: { line: 3, column: 11 }, end: { line: 3, column: 12 } },
  });
});

test("stripComment and parseText helpers", () => {
  assert.equal(stripComment("Hello // there"), "Hello ");
  assert.equal(stripComment("{\"a // b\"} text"), "{\"a // b\"} text");
  assert.equal(stripComment("http://example"), "http://example");

  const parsed = parseText("Cost: \\{5\\} #price #line:cost", 1, 1, { hashtags: true, condition: false });
  assert.deepEqual(parsed.parts, [{ kind: "text", value: "Cost: {5}" }]);
  assert.deepEqual(parsed.hashtags, ["price", "line:cost"]);
});
