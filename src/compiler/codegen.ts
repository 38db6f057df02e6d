import { SpindleError } from "../core/errors.js";
import { combinePrograms, rawTextStringId } from "../core/program.js";
import type {
  Instruction,
  Node,
  NodeDebugInfo,
  Program,
  SourceLocation,
  SourceSpan,
  ValueKind,
} from "../core/types.js";
import { operatorTypeName } from "../core/value.js";
import type { Expression, FileSyntax, NodeSyntax, OptionsStatement, IfStatement, Statement, TextPart } from "./ast.js";
import { RAW_TEXT_TAG } from "./parser.js";
import { lineIdOf, lineMetadataOf, textWithPlaceholders } from "./register-strings.js";
import { diagnostic, hasErrors, type CompilerPass } from "./state.js";

export interface GeneratedFile {
  program: Program;
  debugInfo: Record<string, NodeDebugInfo>;
}

class NodeEmitter {
  readonly instructions: Instruction[] = [];
  readonly labels: Record<string, number> = {};
  readonly lineInfos: Record<number, SourceLocation> = {};
  private labelCounter = 0;

  constructor(
    private readonly nodeName: string,
    private readonly knownTypes: ReadonlyMap<Expression, ValueKind>
  ) {}

  emitBlock(statements: readonly Statement[]): void {
    statements.forEach((statement) => this.emitStatement(statement));
  }

  private emit(instruction: Instruction, span: SourceSpan): void {
    this.lineInfos[this.instructions.length] = span.start;
    this.instructions.push(instruction);
  }

  private newLabel(purpose: string): string {
    const label = `L${this.labelCounter}_${purpose}`;
    this.labelCounter += 1;
    return label;
  }

  private placeLabel(label: string): void {
    this.labels[label] = this.instructions.length;
  }

  private lineId(hashtags: readonly string[]): string {
    const id = lineIdOf(hashtags);
    if (!id) {
      throw new SpindleError("COMPILER_INTERNAL", `A line in node ${this.nodeName} has no line id.`);
    }
    return id;
  }

  private emitSubstitutions(parts: readonly TextPart[]): number {
    let count = 0;
    for (const part of parts) {
      if (part.kind === "expression") {
        this.emitExpression(part.expression);
        count += 1;
      }
    }
    return count;
  }

  private emitStatement(statement: Statement): void {
    switch (statement.kind) {
      case "line": {
        const substitutionCount = this.emitSubstitutions(statement.parts);
        this.emit(
          {
            opcode: "runLine",
            lineId: this.lineId(statement.hashtags),
            substitutionCount,
            metadata: lineMetadataOf(statement.hashtags),
          },
          statement.span
        );
        return;
      }
      case "command": {
        const substitutionCount = this.emitSubstitutions(statement.parts);
        this.emit({ opcode: "runCommand", text: textWithPlaceholders(statement.parts), substitutionCount }, statement.span);
        return;
      }
      case "options":
        this.emitOptions(statement);
        return;
      case "if":
        this.emitIf(statement);
        return;
      case "set":
        this.emitExpression(statement.expression);
        this.emit({ opcode: "storeVariable", name: statement.variable }, statement.span);
        return;
      case "declare":
        // Declarations become initial values, not instructions.
        return;
      case "jump":
        if (statement.target.kind === "node") {
          this.emit({ opcode: "runNode", node: statement.target.name }, statement.span);
        } else {
          this.emitExpression(statement.target.expression);
          this.emit({ opcode: "runNodeFromStack" }, statement.span);
        }
        return;
      case "stop":
        this.emit({ opcode: "stop" }, statement.span);
        return;
    }
  }

  private emitOptions(statement: OptionsStatement): void {
    const endLabel = this.newLabel("group_end");
    const optionLabels = statement.options.map((option, index) => {
      const label = this.newLabel(`option_${index + 1}`);
      const substitutionCount = this.emitSubstitutions(option.parts);
      if (option.condition) {
        this.emitExpression(option.condition);
      }
      this.emit(
        {
          opcode: "addOption",
          lineId: this.lineId(option.hashtags),
          label,
          substitutionCount,
          hasCondition: option.condition !== null,
          metadata: lineMetadataOf(option.hashtags),
        },
        option.span
      );
      return label;
    });

    this.emit({ opcode: "showOptions" }, statement.span);
    // The selected option's label is pushed by the virtual machine.
    this.emit({ opcode: "jumpToStackLabel" }, statement.span);

    statement.options.forEach((option, index) => {
      this.placeLabel(optionLabels[index]);
      this.emitBlock(option.body);
      this.emit({ opcode: "jumpTo", label: endLabel }, option.span);
    });
    this.placeLabel(endLabel);
  }

  private emitIf(statement: IfStatement): void {
    const endLabel = this.newLabel("endif");
    for (const clause of statement.clauses) {
      if (!clause.condition) {
        this.emitBlock(clause.body);
        this.emit({ opcode: "jumpTo", label: endLabel }, clause.span);
        continue;
      }
      const skipLabel = this.newLabel("skipclause");
      this.emitExpression(clause.condition);
      this.emit({ opcode: "jumpIfFalse", label: skipLabel }, clause.span);
      this.emit({ opcode: "pop" }, clause.span);
      this.emitBlock(clause.body);
      this.emit({ opcode: "jumpTo", label: endLabel }, clause.span);
      this.placeLabel(skipLabel);
      this.emit({ opcode: "pop" }, clause.span);
    }
    this.placeLabel(endLabel);
  }

  private operandKind(operand: Expression): ValueKind {
    const kind = this.knownTypes.get(operand);
    if (!kind) {
      throw new SpindleError("COMPILER_INTERNAL", `An operand in node ${this.nodeName} has no known type.`, operand.span);
    }
    return kind;
  }

  private emitExpression(expression: Expression): void {
    switch (expression.kind) {
      case "number":
        this.emit({ opcode: "pushNumber", value: expression.value }, expression.span);
        return;
      case "string":
        this.emit({ opcode: "pushString", value: expression.value }, expression.span);
        return;
      case "boolean":
        this.emit({ opcode: "pushBool", value: expression.value }, expression.span);
        return;
      case "variable":
        this.emit({ opcode: "pushVariable", name: expression.name }, expression.span);
        return;
      case "call":
        expression.args.forEach((arg) => this.emitExpression(arg));
        this.emit({ opcode: "callFunction", name: expression.name, argumentCount: expression.args.length }, expression.span);
        return;
      case "unary": {
        this.emitExpression(expression.operand);
        const name = `${operatorTypeName(this.operandKind(expression.operand))}.${expression.operator}`;
        this.emit({ opcode: "callFunction", name, argumentCount: 1 }, expression.span);
        return;
      }
      case "binary": {
        this.emitExpression(expression.left);
        this.emitExpression(expression.right);
        const name = `${operatorTypeName(this.operandKind(expression.left))}.${expression.operator}`;
        this.emit({ opcode: "callFunction", name, argumentCount: 2 }, expression.span);
        return;
      }
    }
  }
}

const generateNode = (
  node: NodeSyntax,
  fileName: string,
  knownTypes: ReadonlyMap<Expression, ValueKind>,
  tracked: boolean
): { node: Node; debugInfo: NodeDebugInfo } => {
  const rawText = node.tags.includes(RAW_TEXT_TAG);
  const emitter = new NodeEmitter(node.title, knownTypes);
  emitter.emitBlock(node.body);
  return {
    node: {
      name: node.title,
      instructions: emitter.instructions,
      labels: emitter.labels,
      tags: [...node.tags],
      tracked,
      sourceTextStringId: rawText ? rawTextStringId(node.title) : null,
    },
    debugInfo: { fileName, nodeName: node.title, lineInfos: emitter.lineInfos },
  };
};

export const generateFile = (
  file: FileSyntax,
  knownTypes: ReadonlyMap<Expression, ValueKind>,
  trackingNodes: ReadonlySet<string>
): GeneratedFile => {
  const program: Program = { nodes: {}, initialValues: {} };
  const debugInfo: Record<string, NodeDebugInfo> = {};
  for (const syntax of file.nodes) {
    const generated = generateNode(syntax, file.fileName, knownTypes, trackingNodes.has(syntax.title));
    program.nodes[syntax.title] = generated.node;
    debugInfo[syntax.title] = generated.debugInfo;
  }
  return { program, debugInfo };
};

export const generateCode: CompilerPass = (state) => {
  if (hasErrors(state.diagnostics)) {
    state.logger.debug("skipping code generation", { errors: state.diagnostics.length });
    return state;
  }

  const diagnostics = [...state.diagnostics];
  const owners = new Map<string, string>();
  for (const file of state.parsedFiles) {
    for (const node of file.nodes) {
      const owner = owners.get(node.title);
      if (owner !== undefined) {
        diagnostics.push(
          diagnostic("error", "NODE_DUPLICATE", `Node "${node.title}" is already defined in ${owner}.`, file.fileName, node.span)
        );
      } else {
        owners.set(node.title, file.fileName);
      }
    }
  }
  if (hasErrors(diagnostics)) {
    return { ...state, diagnostics };
  }

  const tracking = new Set(state.trackingNodes);
  const generated = state.parsedFiles.map((file) => generateFile(file, state.knownTypes, tracking));
  const program = combinePrograms(...generated.map((entry) => entry.program));
  const debugInfo: Record<string, NodeDebugInfo> = { ...state.debugInfo };
  for (const entry of generated) {
    Object.assign(debugInfo, entry.debugInfo);
  }
  state.logger.debug("generated code", { nodes: Object.keys(program.nodes).length });
  return { ...state, diagnostics, program, debugInfo };
};
