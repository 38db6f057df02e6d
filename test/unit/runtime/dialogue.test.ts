import assert from "node:assert/strict";
import { test } from "vitest";

import { compileFiles, createDialogueFromSource } from "../../../src/api.js";
import { SpindleError } from "../../../src/core/errors.js";
import { Library, function1, numberParam } from "../../../src/core/library.js";
import { createLogger, silentLogger, type LogSink } from "../../../src/core/logger.js";
import { expandSubstitutions } from "../../../src/core/text.js";
import type { Line, StringTable } from "../../../src/core/types.js";
import { MemoryVariableStorage, type VariableStorage } from "../../../src/core/variable-storage.js";
import { Dialogue } from "../../../src/runtime/dialogue.js";

interface HarnessOptions {
  variableStorage?: VariableStorage;
  library?: Library;
  commands?: boolean;
  onLine?: (dialogue: Dialogue) => void;
  sink?: LogSink;
}

const harness = (source: string, options: HarnessOptions = {}) => {
  const events: string[] = [];
  const holder: { dialogue: Dialogue | null; table: StringTable } = { dialogue: null, table: {} };
  const text = (line: Line): string =>
    expandSubstitutions(Object.hasOwn(holder.table, line.id) ? holder.table[line.id].text : line.id, line.substitutions);

  const { dialogue, compilation } = createDialogueFromSource({
    sources: { "test.yarn": source },
    variableStorage: options.variableStorage,
    library: options.library,
    logger: options.sink ? createLogger({ name: "t", level: "warn", sink: options.sink }) : silentLogger(),
    handlers: {
      line: (line) => {
        events.push(`line:${text(line)}`);
        if (options.onLine && holder.dialogue) {
          options.onLine(holder.dialogue);
        }
      },
      options: (items) => {
        const rendered = items.map((item) => `${item.id}=${text(item.line)}${item.isAvailable ? "" : "(unavailable)"}`);
        events.push(`options:${rendered.join("|")}`);
      },
      command:
        options.commands === false
          ? undefined
          : (command) => {
              events.push(`command:${command.name}:${command.parameters.join(",")}`);
            },
      nodeStart: (name) => {
        events.push(`start:${name}`);
      },
      nodeComplete: (name) => {
        events.push(`complete:${name}`);
      },
      dialogueComplete: () => {
        events.push("end");
      },
    },
  });
  holder.dialogue = dialogue;
  holder.table = compilation.stringTable;

  const continueAll = (): void => {
    while (dialogue.executionState === "waitingForContinue") {
      dialogue.continue();
    }
  };
  return { dialogue, events, continueAll };
};

const expectCode = (fn: () => unknown, code: string): void => {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof SpindleError);
    assert.equal(error.code, code);
    return true;
  });
};

test("lines are delivered one continue at a time", () => {
  const { dialogue, events, continueAll } = harness("title: test\n---\nfoo\nbar\na {1 + 3} cool expression\n===\n");
  assert.deepEqual(events, ["start:test"]);
  dialogue.continue();
  assert.deepEqual(events, ["start:test", "line:foo"]);
  assert.equal(dialogue.executionState, "waitingForContinue");
  continueAll();
  assert.deepEqual(events, [
    "start:test",
    "line:foo",
    "line:bar",
    "line:a 4 cool expression",
    "complete:test",
    "end",
  ]);
  assert.equal(dialogue.executionState, "stopped");
  assert.equal(dialogue.isActive(), false);
});

const MARKET = `title: Start
---
<<declare $gold = 5>>
Welcome.
-> Bread
    Bought bread.
-> Sword <<if $gold >= 10>>
    Bought a sword.
-> Leave
Done.
===
`;

test("options wait for a selection and resume at the chosen body", () => {
  const { dialogue, events, continueAll } = harness(MARKET);
  continueAll();
  assert.deepEqual(events.slice(1), ["line:Welcome.", "options:0=Bread|1=Sword(unavailable)|2=Leave"]);
  assert.equal(dialogue.executionState, "waitingOnOptionSelection");

  expectCode(() => dialogue.continue(), "VM_WAITING_ON_OPTION");
  expectCode(() => dialogue.setSelectedOption(7), "VM_OPTION_UNKNOWN");
  assert.equal(dialogue.executionState, "waitingOnOptionSelection");

  dialogue.setSelectedOption(0);
  expectCode(() => dialogue.setSelectedOption(0), "VM_NOT_WAITING_ON_OPTION");
  continueAll();
  assert.deepEqual(events.slice(3), ["line:Bought bread.", "line:Done.", "complete:Start", "end"]);
});

test("selecting an option before any are shown fails", () => {
  const { dialogue } = harness(MARKET);
  expectCode(() => dialogue.setSelectedOption(0), "VM_NOT_WAITING_ON_OPTION");
});

test("continue from inside a handler has no effect", () => {
  const { dialogue, events } = harness("title: test\n---\nfoo\nbar\n===\n", {
    onLine: (current) => current.continue(),
  });
  dialogue.continue();
  assert.deepEqual(events, ["start:test", "line:foo"]);
  assert.equal(dialogue.executionState, "waitingForContinue");
});

test("setNode from inside a handler is rejected and stops the dialogue", () => {
  const { dialogue } = harness("title: test\n---\nfoo\n===\n", {
    onLine: (current) => current.setNode("test"),
  });
  expectCode(() => dialogue.continue(), "VM_RUNNING");
  assert.equal(dialogue.executionState, "stopped");
});

test("stop from inside a handler ends without completion events", () => {
  const { dialogue, events } = harness("title: test\n---\nfoo\nbar\n===\n", {
    onLine: (current) => current.stop(),
  });
  dialogue.continue();
  assert.deepEqual(events, ["start:test", "line:foo"]);
  assert.equal(dialogue.executionState, "stopped");
  expectCode(() => dialogue.continue(), "VM_NO_NODE");
});

test("visited is false before a node completes and true afterwards", () => {
  const { events, continueAll } = harness(`title: Start
---
Before {visited("Cave")} {visited_count("Cave")}
<<jump Cave>>
===
title: Cave
---
In cave {visited("Cave")}
<<jump After>>
===
title: After
---
After {visited("Cave")} {visited_count("Cave")}
===
`);
  continueAll();
  assert.deepEqual(events, [
    "start:Start",
    "line:Before false 0",
    "complete:Start",
    "start:Cave",
    "line:In cave false",
    "complete:Cave",
    "start:After",
    "line:After true 1",
    "complete:After",
    "end",
  ]);
});

const GOLD = `title: Start
---
<<declare $gold = 5>>
Gold {$gold}
<<set $gold to $gold + 1>>
Gold {$gold}
===
`;

test("variables start from initial values and write to storage", () => {
  const storage = new MemoryVariableStorage();
  const { events, continueAll } = harness(GOLD, { variableStorage: storage });
  continueAll();
  assert.deepEqual(events.slice(1, 3), ["line:Gold 5", "line:Gold 6"]);
  assert.equal(storage.get("$gold"), 6);
});

test("stored values take precedence over initial values", () => {
  const { events, continueAll } = harness(GOLD, { variableStorage: new MemoryVariableStorage({ $gold: 10 }) });
  continueAll();
  assert.deepEqual(events.slice(1, 3), ["line:Gold 10", "line:Gold 11"]);
});

test("if, elseif and else pick one branch", () => {
  const { events, continueAll } = harness(`title: Start
---
<<declare $n = 2>>
<<if $n == 1>>
One.
<<elseif $n == 2>>
Two.
<<else>>
Many.
<<endif>>
===
`);
  continueAll();
  assert.deepEqual(events, ["start:Start", "line:Two.", "complete:Start", "end"]);
});

test("commands are split into name and parameters", () => {
  const { events, continueAll } = harness("title: Start\n---\n<<wave \"big hello\" {1 + 1}>>\nAfter.\n===\n");
  continueAll();
  assert.deepEqual(events, ["start:Start", "command:wave:big hello,2", "line:After.", "complete:Start", "end"]);
});

test("commands without a handler are logged and skipped", () => {
  const warnings: string[] = [];
  const sink: LogSink = {
    error: (line) => warnings.push(line),
    warn: (line) => warnings.push(line),
    info: () => {},
    debug: () => {},
  };
  const { events, continueAll } = harness("title: Start\n---\n<<wave>>\nAfter.\n===\n", { commands: false, sink });
  continueAll();
  assert.deepEqual(events, ["start:Start", "line:After.", "complete:Start", "end"]);
  assert.deepEqual(warnings, ["[t:vm] WARN: command ignored; no command handler is set {\"command\":\"wave\"}"]);
});

test("jumps through an expression target", () => {
  const { events, continueAll } = harness(
    "title: Start\n---\n<<set $next to \"End\">>\n<<jump {$next}>>\n===\ntitle: End\n---\nArrived.\n===\n"
  );
  continueAll();
  assert.deepEqual(events, ["start:Start", "complete:Start", "start:End", "line:Arrived.", "complete:End", "end"]);
});

test("host library functions are callable from scripts", () => {
  const library = new Library().register("double", function1([numberParam], numberParam, (value) => value * 2));
  const { events, continueAll } = harness("title: Start\n---\nTwice is {double(4)}\n===\n", { library });
  continueAll();
  assert.equal(events[1], "line:Twice is 8");
});

test("node queries and program management", () => {
  const errors: string[] = [];
  const sink: LogSink = { error: (line) => errors.push(line), warn: () => {}, info: () => {}, debug: () => {} };
  const { dialogue } = harness("title: Start\ntags: intro\n---\nHi.\n===\ntitle: Notes\ntags: rawText\n---\nfree\n===\n", {
    sink,
  });
  assert.deepEqual(dialogue.nodeNames(), ["Notes", "Start"]);
  assert.equal(dialogue.currentNode(), "Start");
  assert.deepEqual(dialogue.getTagsForNode("Start"), ["intro"]);
  assert.equal(dialogue.getStringIdForNode("Notes"), "line:Notes");
  assert.equal(dialogue.readOnly().nodeExists("Notes"), true);
  assert.equal(dialogue.expandSubstitutions("{0}!", ["hey"]), "hey!");

  assert.equal(dialogue.getTagsForNode("Missing"), undefined);
  assert.deepEqual(errors, ["[t] ERROR: no node with this name is loaded {\"node\":\"Missing\"}"]);

  dialogue.addProgram(compileFiles({ "extra.yarn": "title: Extra\n---\nMore.\n===\n" }).program);
  assert.deepEqual(dialogue.nodeNames(), ["Extra", "Notes", "Start"]);
  expectCode(
    () => dialogue.addProgram(compileFiles({ "again.yarn": "title: Start\n---\nAgain.\n===\n" }).program),
    "PROGRAM_NODE_CONFLICT"
  );

  dialogue.unloadAll();
  assert.deepEqual(dialogue.nodeNames(), []);
  assert.equal(dialogue.executionState, "stopped");
  expectCode(() => dialogue.setNode("Start"), "VM_NODE_NOT_FOUND");
});

test("misuse without a node or handlers is fatal", () => {
  const program = compileFiles({ "p.yarn": "title: Start\n---\nHi. #line:hi\n-> Go #line:go\n===\n" }).program;

  expectCode(() => new Dialogue({ logger: silentLogger() }).continue(), "VM_NO_NODE");

  const bare = new Dialogue({ logger: silentLogger() });
  bare.setProgram(program);
  expectCode(() => bare.setNode("Nowhere"), "VM_NODE_NOT_FOUND");
  bare.setStartNode();
  expectCode(() => bare.continue(), "VM_HANDLER_MISSING");
});

test("prepareForLines receives every line the node can deliver", () => {
  const prepared: string[][] = [];
  const dialogue = new Dialogue({
    logger: silentLogger(),
    handlers: {
      line: () => {},
      options: () => {},
      prepareForLines: (ids) => {
        prepared.push(ids);
      },
    },
  });
  dialogue.setProgram(compileFiles({ "p.yarn": "title: Start\n---\nHi. #line:hi\n-> Go #line:go\n===\n" }).program);
  dialogue.setNode("Start");
  assert.deepEqual(prepared, [["line:hi", "line:go"]]);
});

test("long straight-line nodes run without tripping the execution guard", () => {
  const sets = Array.from({ length: 2600 }, () => "<<set $x to $x + 1>>").join("\n");
  const { events, continueAll } = harness(`title: Start\n---\n<<declare $x = 0>>\n${sets}\nDone {$x}\n===\n`);
  continueAll();
  assert.deepEqual(events, ["start:Start", "line:Done 2600", "complete:Start", "end"]);
});

test("a cycle of node jumps trips the execution guard", () => {
  const { dialogue } = harness("title: Start\n---\n<<jump Loop>>\n===\ntitle: Loop\n---\n<<jump Start>>\n===\n");
  expectCode(() => dialogue.continue(), "VM_GUARD_EXCEEDED");
  assert.equal(dialogue.executionState, "stopped");
});

test("lines and options carry their hashtags as metadata", () => {
  const delivered: string[][] = [];
  const dialogue = new Dialogue({
    logger: silentLogger(),
    handlers: {
      line: (line) => {
        delivered.push(line.metadata);
      },
      options: (options) => {
        options.forEach((option) => delivered.push(option.line.metadata));
      },
    },
  });
  dialogue.setProgram(
    compileFiles({ "m.yarn": "title: Start\n---\nPick one. #mood:calm\n-> Yes #happy\n-> No\n===\n" }).program
  );
  dialogue.setStartNode();
  dialogue.continue();
  dialogue.continue();
  assert.deepEqual(delivered, [["mood:calm", "lastline"], ["happy"], []]);
});
