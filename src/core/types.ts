export type ValueKind = "string" | "number" | "boolean";

export type YarnValue = string | number | boolean;

export interface SourceLocation {
  line: number;
  column: number;
}

export interface SourceSpan {
  start: SourceLocation;
  end: SourceLocation;
}

export type ScriptType =
  | { kind: "primitive"; name: ValueKind }
  | { kind: "function"; parameters: ScriptType[]; returnType: ScriptType };

export type DeclarationProvenance = "explicit" | "inferred" | "derived";

export interface Declaration {
  name: string;
  type: ScriptType;
  defaultValue?: YarnValue;
  description: string;
  provenance: DeclarationProvenance;
  sourceFileName: string | null;
  span: SourceSpan | null;
}

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: string;
  message: string;
  fileName: string | null;
  span: SourceSpan | null;
}

export type LineId = string;

export interface StringInfo {
  text: string;
  nodeName: string | null;
  lineNumber: number;
  fileName: string;
  isImplicitTag: boolean;
  metadata: string[];
}

export type StringTable = Record<LineId, StringInfo>;

export type Instruction =
  | { opcode: "jumpTo"; label: string }
  | { opcode: "jumpToStackLabel" }
  | { opcode: "jumpIfFalse"; label: string }
  | { opcode: "runLine"; lineId: LineId; substitutionCount: number; metadata: string[] }
  | { opcode: "runCommand"; text: string; substitutionCount: number }
  | {
      opcode: "addOption";
      lineId: LineId;
      label: string;
      substitutionCount: number;
      hasCondition: boolean;
      metadata: string[];
    }
  | { opcode: "showOptions" }
  | { opcode: "pushString"; value: string }
  | { opcode: "pushNumber"; value: number }
  | { opcode: "pushBool"; value: boolean }
  | { opcode: "pop" }
  | { opcode: "callFunction"; name: string; argumentCount: number }
  | { opcode: "pushVariable"; name: string }
  | { opcode: "storeVariable"; name: string }
  | { opcode: "runNode"; node: string }
  | { opcode: "runNodeFromStack" }
  | { opcode: "stop" };

export type Opcode = Instruction["opcode"];

export interface Node {
  name: string;
  instructions: Instruction[];
  labels: Record<string, number>;
  tags: string[];
  tracked: boolean;
  sourceTextStringId: string | null;
}

export interface Program {
  nodes: Record<string, Node>;
  initialValues: Record<string, YarnValue>;
}

export interface NodeDebugInfo {
  fileName: string;
  nodeName: string;
  lineInfos: Record<number, SourceLocation>;
}

export interface CompilationResult {
  program?: Program;
  diagnostics: Diagnostic[];
  stringTable: StringTable;
  declarations: Declaration[];
  debugInfo: Record<string, NodeDebugInfo>;
  containsImplicitStringTags: boolean;
  fileTags: Record<string, string[]>;
}

export type OptionId = number;

export interface Line {
  id: LineId;
  substitutions: string[];
  /** The line's hashtags other than its `line:` id, such as `lastline`. */
  metadata: string[];
}

export interface DialogueOption {
  id: OptionId;
  line: Line;
  destinationLabel: string;
  isAvailable: boolean;
}

export interface Command {
  raw: string;
  name: string;
  parameters: string[];
}

export type ExecutionState =
  | "stopped"
  | "waitingForContinue"
  | "waitingOnOptionSelection"
  | "running";
