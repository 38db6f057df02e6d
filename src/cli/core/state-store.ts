import fs from "node:fs";
import path from "node:path";

import { SpindleError } from "../../core/errors.js";
import { isUint32Integer } from "../../core/random.js";

export const PLAYER_STATE_SCHEMA = "player-state.v1";

/**
 * The player keeps no virtual machine state on disk. A save records where
 * the run started and which options were picked; loading replays them
 * against a freshly compiled program with the same random seed.
 */
export interface PlayerState {
  schemaVersion: typeof PLAYER_STATE_SCHEMA;
  scenarioId: string;
  startNode: string;
  randomSeed: number;
  selections: number[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isSelectionList = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((item) => typeof item === "number" && Number.isInteger(item) && item >= 0);

export const createPlayerState = (
  scenarioId: string,
  startNode: string,
  randomSeed: number,
  selections: readonly number[]
): PlayerState => ({
  schemaVersion: PLAYER_STATE_SCHEMA,
  scenarioId,
  startNode,
  randomSeed,
  selections: [...selections],
});

export const savePlayerState = (statePath: string, state: PlayerState): void => {
  fs.mkdirSync(path.dirname(statePath), { recursive: true });
  fs.writeFileSync(statePath, JSON.stringify(state), "utf8");
};

export const parsePlayerState = (raw: string): PlayerState => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new SpindleError("CLI_STATE_INVALID", "State file is invalid.");
  }
  if (!isRecord(parsed)) {
    throw new SpindleError("CLI_STATE_INVALID", "State file is invalid.");
  }
  if (parsed.schemaVersion !== PLAYER_STATE_SCHEMA) {
    throw new SpindleError("CLI_STATE_SCHEMA", `Unsupported player state schema: ${String(parsed.schemaVersion)}`);
  }
  const { scenarioId, startNode, randomSeed, selections } = parsed;
  if (typeof scenarioId !== "string" || scenarioId.length === 0) {
    throw new SpindleError("CLI_STATE_INVALID", "State is missing scenarioId.");
  }
  if (typeof startNode !== "string" || startNode.length === 0) {
    throw new SpindleError("CLI_STATE_INVALID", "State is missing startNode.");
  }
  if (!isUint32Integer(randomSeed)) {
    throw new SpindleError("CLI_STATE_INVALID", "State randomSeed must be an unsigned 32-bit integer.");
  }
  if (!isSelectionList(selections)) {
    throw new SpindleError("CLI_STATE_INVALID", "State selections must be a list of option ids.");
  }
  return createPlayerState(scenarioId, startNode, randomSeed, selections);
};

export const loadPlayerState = (statePath: string): PlayerState => {
  if (!fs.existsSync(statePath)) {
    throw new SpindleError("CLI_STATE_NOT_FOUND", `State file does not exist: ${statePath}`);
  }
  return parsePlayerState(fs.readFileSync(statePath, "utf8"));
};
