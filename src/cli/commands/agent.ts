import { SpindleCompileError, SpindleError } from "../../core/errors.js";
import { DEFAULT_RANDOM_SEED, isUint32Integer } from "../../core/random.js";
import { DEFAULT_START_NODE } from "../../runtime/dialogue.js";
import { replayScenario, startScenario, type BoundaryResult, type PlayerSession } from "../core/dialogue-runner.js";
import { loadSourceByRef, loadSourceByScriptsDir } from "../core/source-loader.js";
import { createPlayerState, loadPlayerState, savePlayerState } from "../core/state-store.js";

type WriteLine = (line: string) => void;

export const parseFlags = (args: string[]): Record<string, string> => {
  const flags: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith("--")) {
      throw new SpindleError("CLI_ARG_FORMAT", `Unexpected argument: ${token}`);
    }
    const name = token.slice(2);
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new SpindleError("CLI_ARG_MISSING", `Missing value for --${name}`);
    }
    flags[name] = value;
    i += 1;
  }
  return flags;
};

const getRequiredFlag = (flags: Record<string, string>, name: string): string => {
  const value = flags[name];
  if (value === undefined) {
    throw new SpindleError("CLI_ARG_REQUIRED", `Missing required argument --${name}`);
  }
  return value;
};

const parseInteger = (raw: string, code: string, label: string): number => {
  if (!/^\d+$/.test(raw)) {
    throw new SpindleError(code, `Invalid ${label}: ${raw}`);
  }
  return Number.parseInt(raw, 10);
};

const emitError = (writeLine: WriteLine, error: unknown): number => {
  const code = error instanceof SpindleError ? error.code : "CLI_ERROR";
  const message = error instanceof Error ? error.message : "Unknown CLI error.";
  writeLine("RESULT:ERROR");
  writeLine(`ERROR_CODE:${code}`);
  writeLine(`ERROR_MSG_JSON:${JSON.stringify(message)}`);
  if (error instanceof SpindleCompileError) {
    for (const entry of error.diagnostics) {
      writeLine(`DIAGNOSTIC_JSON:${JSON.stringify(entry)}`);
    }
  }
  return 1;
};

const emitBoundary = (writeLine: WriteLine, boundary: BoundaryResult, stateOut: string | null): number => {
  writeLine("RESULT:OK");
  writeLine(`EVENT:${boundary.event}`);
  for (const item of boundary.output) {
    writeLine(item.kind === "text" ? `TEXT_JSON:${JSON.stringify(item.text)}` : `COMMAND_JSON:${JSON.stringify(item.text)}`);
  }
  for (const option of boundary.options) {
    const prefix = option.available ? "OPTION" : "OPTION_UNAVAILABLE";
    writeLine(`${prefix}:${option.id}|${JSON.stringify(option.text)}`);
  }
  writeLine(`STATE_OUT:${stateOut ?? "NONE"}`);
  return 0;
};

/** Saves only while options are pending; a finished run has nothing to resume. */
const finish = (
  writeLine: WriteLine,
  scenarioId: string,
  session: PlayerSession,
  boundary: BoundaryResult,
  stateOut: string
): number => {
  if (boundary.event !== "OPTIONS") {
    return emitBoundary(writeLine, boundary, null);
  }
  savePlayerState(stateOut, createPlayerState(scenarioId, session.startNode, session.randomSeed, session.selections));
  return emitBoundary(writeLine, boundary, stateOut);
};

const runStart = (args: string[], writeLine: WriteLine): number => {
  const flags = parseFlags(args);
  const stateOut = getRequiredFlag(flags, "state-out");
  const scriptsDir = getRequiredFlag(flags, "scripts-dir");
  const startNode = flags.node ?? DEFAULT_START_NODE;
  const randomSeed = flags.seed === undefined ? DEFAULT_RANDOM_SEED : parseInteger(flags.seed, "CLI_SEED_PARSE", "seed");
  if (!isUint32Integer(randomSeed)) {
    throw new SpindleError("CLI_SEED_PARSE", `Seed must be an unsigned 32-bit integer: ${randomSeed}`);
  }

  const scenario = loadSourceByScriptsDir(scriptsDir);
  const { session, boundary } = startScenario(scenario, startNode, randomSeed);
  return finish(writeLine, scenario.id, session, boundary, stateOut);
};

const runChoose = (args: string[], writeLine: WriteLine): number => {
  const flags = parseFlags(args);
  const stateIn = getRequiredFlag(flags, "state-in");
  const stateOut = getRequiredFlag(flags, "state-out");
  const option = parseInteger(getRequiredFlag(flags, "option"), "CLI_OPTION_PARSE", "option id");

  const state = loadPlayerState(stateIn);
  const scenario = loadSourceByRef(state.scenarioId);
  const replayed = replayScenario(scenario, state.startNode, state.randomSeed, state.selections);
  if (replayed.boundary.event !== "OPTIONS") {
    throw new SpindleError("CLI_STATE_INVALID", "Saved run is not waiting on an option selection.");
  }
  const boundary = replayed.choose(option);
  return finish(writeLine, scenario.id, replayed.session, boundary, stateOut);
};

export const runAgentCommand = (
  argv: string[],
  writeLine: WriteLine = (line) => {
    process.stdout.write(`${line}\n`);
  }
): number => {
  try {
    const [subcommand, ...rest] = argv;
    if (!subcommand) {
      throw new SpindleError("CLI_AGENT_USAGE", "Missing agent subcommand. Use start/choose.");
    }
    if (subcommand === "start") {
      return runStart(rest, writeLine);
    }
    if (subcommand === "choose") {
      return runChoose(rest, writeLine);
    }
    throw new SpindleError("CLI_AGENT_USAGE", `Unknown agent subcommand: ${subcommand}. Use start/choose.`);
  } catch (error) {
    return emitError(writeLine, error);
  }
};
