import { SpindleError } from "./errors.js";
import type { Node, Program, YarnValue } from "./types.js";

/** String table id holding the body of a `rawText` node. */
export const rawTextStringId = (nodeName: string): string => `line:${nodeName}`;

export const emptyProgram = (): Program => ({ nodes: {}, initialValues: {} });

/**
 * Merges node sets. A node name defined by two programs throws
 * `PROGRAM_NODE_CONFLICT`; for initial values the first program wins.
 */
export const combinePrograms = (...programs: Program[]): Program => {
  const nodes: Record<string, Node> = {};
  const initialValues: Record<string, YarnValue> = {};
  for (const program of programs) {
    for (const [name, node] of Object.entries(program.nodes)) {
      if (Object.hasOwn(nodes, name)) {
        throw new SpindleError("PROGRAM_NODE_CONFLICT", `Node "${name}" is defined by more than one program.`);
      }
      nodes[name] = node;
    }
    for (const [name, value] of Object.entries(program.initialValues)) {
      if (!Object.hasOwn(initialValues, name)) {
        initialValues[name] = value;
      }
    }
  }
  return { nodes, initialValues };
};

/** Every line id the node can deliver, in instruction order. */
export const lineIdsForNode = (node: Node): string[] => {
  const ids: string[] = [];
  for (const instruction of node.instructions) {
    if (instruction.opcode === "runLine" || instruction.opcode === "addOption") {
      ids.push(instruction.lineId);
    }
  }
  return ids;
};
