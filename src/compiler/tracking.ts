import { Library } from "../core/library.js";
import type { Declaration } from "../core/types.js";
import { primitiveType } from "../core/value.js";
import { forEachExpression, forEachStatement, statementExpressions, type FileSyntax } from "./ast.js";
import { findDeclaration, type CompilerPass } from "./state.js";

const VISIT_FUNCTIONS: ReadonlySet<string> = new Set(["visited", "visited_count"]);
const TRACKING_HEADER = "tracking";

const trackingHeader = (file: FileSyntax, value: "always" | "never"): string[] =>
  file.nodes
    .filter((node) => node.headers.some((header) => header.key === TRACKING_HEADER && header.value === value))
    .map((node) => node.title);

/** Node names passed as string literals to `visited` or `visited_count`. */
export const visitedNodeReferences = (file: FileSyntax): string[] => {
  const names: string[] = [];
  for (const node of file.nodes) {
    forEachStatement(node.body, (statement) => {
      for (const root of statementExpressions(statement)) {
        forEachExpression(root, (expression) => {
          if (expression.kind !== "call" || !VISIT_FUNCTIONS.has(expression.name) || expression.args.length !== 1) {
            return;
          }
          const argument = expression.args[0];
          if (argument.kind === "string") {
            names.push(argument.value);
          }
        });
      }
    });
  }
  return names;
};

export const findTrackingNodes: CompilerPass = (state) => {
  const tracked = new Set(state.trackingNodes);
  const optedOut = new Set<string>();
  for (const file of state.parsedFiles) {
    visitedNodeReferences(file).forEach((name) => tracked.add(name));
    trackingHeader(file, "always").forEach((name) => tracked.add(name));
    trackingHeader(file, "never").forEach((name) => optedOut.add(name));
  }
  const trackingNodes = [...tracked].filter((name) => !optedOut.has(name)).sort();
  state.logger.debug("found tracking nodes", { trackingNodes });
  return { ...state, trackingNodes };
};

export const addTrackingDeclarations: CompilerPass = (state) => {
  const additions: Declaration[] = state.trackingNodes
    .map((node) => ({ node, name: Library.generateUniqueVisitedVariableForNode(node) }))
    .filter(({ name }) => !findDeclaration(state.knownDeclarations, name))
    .map(({ node, name }): Declaration => ({
      name,
      type: primitiveType("number"),
      defaultValue: 0,
      description: `The number of times the node ${node} has been visited`,
      provenance: "derived",
      sourceFileName: null,
      span: null,
    }));
  return {
    ...state,
    knownDeclarations: [...state.knownDeclarations, ...additions],
    derivedDeclarations: [...state.derivedDeclarations, ...additions],
  };
};
