import { createDialogueFromSource } from "../../api.js";
import { SpindleError } from "../../core/errors.js";
import { createLogger } from "../../core/logger.js";
import { DEFAULT_RANDOM_SEED } from "../../core/random.js";
import type { DialogueOption } from "../../core/types.js";
import type { Dialogue } from "../../runtime/dialogue.js";
import {
  createStringTableTextProvider,
  resolveLineText,
  type TextProvider,
} from "../../runtime/text-provider.js";
import type { LoadedScenario } from "./source-loader.js";

const PLAYER_STEP_GUARD = 10000;

export type OutputItem = { kind: "text"; text: string } | { kind: "command"; text: string };

export interface OptionItem {
  id: number;
  text: string;
  available: boolean;
}

export interface BoundaryResult {
  event: "OPTIONS" | "END";
  output: OutputItem[];
  options: OptionItem[];
}

export interface PlayerSession {
  dialogue: Dialogue;
  startNode: string;
  randomSeed: number;
  selections: number[];
}

export interface StartedScenario {
  session: PlayerSession;
  boundary: BoundaryResult;
}

interface SessionBuffers {
  output: OutputItem[];
  options: DialogueOption[];
}

const toOptionItem = (provider: TextProvider, option: DialogueOption): OptionItem => ({
  id: option.id,
  text: resolveLineText(provider, option.line),
  available: option.isAvailable,
});

/** Runs the dialogue until it waits on an option group or stops. */
const runToBoundary = (session: PlayerSession, buffers: SessionBuffers, provider: TextProvider): BoundaryResult => {
  const { dialogue } = session;
  let steps = 0;
  while (dialogue.executionState === "waitingForContinue") {
    steps += 1;
    if (steps > PLAYER_STEP_GUARD) {
      throw new SpindleError("CLI_STEP_GUARD", `Dialogue did not reach options or an end within ${PLAYER_STEP_GUARD} steps.`);
    }
    dialogue.continue();
  }
  const output = buffers.output.splice(0);
  if (dialogue.executionState === "waitingOnOptionSelection") {
    return { event: "OPTIONS", output, options: buffers.options.map((option) => toOptionItem(provider, option)) };
  }
  return { event: "END", output, options: [] };
};

export interface PlayerRun extends StartedScenario {
  choose: (optionId: number) => BoundaryResult;
}

export const startScenario = (
  scenario: LoadedScenario,
  startNode: string,
  randomSeed: number = DEFAULT_RANDOM_SEED
): PlayerRun => {
  const buffers: SessionBuffers = { output: [], options: [] };
  let provider: TextProvider | null = null;
  const requireProvider = (): TextProvider => {
    if (!provider) {
      throw new SpindleError("CLI_STATE_INVALID", "Dialogue produced output before its program was loaded.");
    }
    return provider;
  };

  const { dialogue, compilation } = createDialogueFromSource({
    sources: scenario.files,
    startNode,
    randomSeed,
    logger: createLogger({ name: "spindle:player" }),
    handlers: {
      line: (line) => {
        buffers.output.push({ kind: "text", text: resolveLineText(requireProvider(), line) });
      },
      options: (options) => {
        buffers.options = options;
      },
      command: (command) => {
        buffers.output.push({ kind: "command", text: command.raw });
      },
    },
  });
  provider = createStringTableTextProvider(compilation.stringTable);
  const textProvider = provider;

  const session: PlayerSession = { dialogue, startNode, randomSeed, selections: [] };
  return {
    session,
    boundary: runToBoundary(session, buffers, textProvider),
    choose: (optionId) => {
      const option = buffers.options.find((candidate) => candidate.id === optionId);
      if (!option) {
        throw new SpindleError("CLI_OPTION_OUT_OF_RANGE", `Option ${optionId} is not available here.`);
      }
      if (!option.isAvailable) {
        throw new SpindleError("CLI_OPTION_UNAVAILABLE", `Option ${optionId} is currently unavailable.`);
      }
      dialogue.setSelectedOption(optionId);
      buffers.options = [];
      session.selections.push(optionId);
      return runToBoundary(session, buffers, textProvider);
    },
  };
};

/** Rebuilds a run from its recorded selections; returns the boundary after the last one. */
export const replayScenario = (
  scenario: LoadedScenario,
  startNode: string,
  randomSeed: number,
  selections: readonly number[]
): PlayerRun => {
  const started = startScenario(scenario, startNode, randomSeed);
  let boundary = started.boundary;
  for (const optionId of selections) {
    if (boundary.event !== "OPTIONS") {
      throw new SpindleError("CLI_STATE_INVALID", "Saved selections continue past the end of the dialogue.");
    }
    boundary = started.choose(optionId);
  }
  return { ...started, boundary };
};
