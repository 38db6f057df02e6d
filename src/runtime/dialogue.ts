import { createStandardLibrary, type Library } from "../core/library.js";
import { createLogger, type Logger } from "../core/logger.js";
import { combinePrograms, rawTextStringId } from "../core/program.js";
import { expandSubstitutions } from "../core/text.js";
import type { Command, DialogueOption, ExecutionState, Line, OptionId, Program } from "../core/types.js";
import { MemoryVariableStorage, type VariableStorage } from "../core/variable-storage.js";
import { VirtualMachine } from "./virtual-machine.js";

export const DEFAULT_START_NODE = "Start";

/** What handlers may see of a running dialogue. Nothing here changes execution state. */
export interface ReadOnlyDialogue {
  nodeNames(): string[];
  currentNode(): string | null;
  nodeExists(name: string): boolean;
  getTagsForNode(name: string): string[] | undefined;
  getStringIdForNode(name: string): string | undefined;
  expandSubstitutions(text: string, substitutions: readonly string[]): string;
}

export type LineHandler = (line: Line, dialogue: ReadOnlyDialogue) => void;
export type OptionsHandler = (options: DialogueOption[], dialogue: ReadOnlyDialogue) => void;
export type CommandHandler = (command: Command, dialogue: ReadOnlyDialogue) => void;
export type NodeStartHandler = (nodeName: string, dialogue: ReadOnlyDialogue) => void;
export type NodeCompleteHandler = (nodeName: string, dialogue: ReadOnlyDialogue) => void;
export type DialogueCompleteHandler = (dialogue: ReadOnlyDialogue) => void;
export type PrepareForLinesHandler = (lineIds: string[], dialogue: ReadOnlyDialogue) => void;

export interface DialogueHandlers {
  line?: LineHandler;
  options?: OptionsHandler;
  command?: CommandHandler;
  nodeStart?: NodeStartHandler;
  nodeComplete?: NodeCompleteHandler;
  dialogueComplete?: DialogueCompleteHandler;
  prepareForLines?: PrepareForLinesHandler;
}

export interface DialogueOptions {
  /** Shared with the library's `visited` functions. Defaults to an in-memory store. */
  variableStorage?: VariableStorage;
  /** Extra functions, layered over the standard library. */
  library?: Library;
  handlers?: DialogueHandlers;
  logger?: Logger;
  randomSeed?: number;
}

export class Dialogue {
  readonly library: Library;
  readonly variableStorage: VariableStorage;
  private readonly logger: Logger;
  private readonly vm: VirtualMachine;
  private readonly view: ReadOnlyDialogue;
  private program: Program | null = null;

  constructor(options: DialogueOptions = {}) {
    this.variableStorage = options.variableStorage ?? new MemoryVariableStorage();
    this.library = createStandardLibrary(this.variableStorage, { randomSeed: options.randomSeed });
    if (options.library) {
      this.library.importLibrary(options.library);
    }
    this.logger = options.logger ?? createLogger({ name: "spindle:dialogue" });
    this.view = {
      nodeNames: () => this.nodeNames(),
      currentNode: () => this.currentNode(),
      nodeExists: (name) => this.nodeExists(name),
      getTagsForNode: (name) => this.getTagsForNode(name),
      getStringIdForNode: (name) => this.getStringIdForNode(name),
      expandSubstitutions: (text, substitutions) => expandSubstitutions(text, substitutions),
    };

    const { line, options: optionsHandler, command, nodeStart, nodeComplete, dialogueComplete, prepareForLines } =
      options.handlers ?? {};
    this.vm = new VirtualMachine({
      library: this.library,
      variableStorage: this.variableStorage,
      logger: this.logger.child("vm"),
      handlers: {
        line: line && ((value: Line) => line(value, this.view)),
        options: optionsHandler && ((value: DialogueOption[]) => optionsHandler(value, this.view)),
        command: command && ((value: Command) => command(value, this.view)),
        nodeStart: nodeStart && ((name: string) => nodeStart(name, this.view)),
        nodeComplete: nodeComplete && ((name: string) => nodeComplete(name, this.view)),
        dialogueComplete: dialogueComplete && (() => dialogueComplete(this.view)),
        prepareForLines: prepareForLines && ((ids: string[]) => prepareForLines(ids, this.view)),
      },
    });
  }

  get executionState(): ExecutionState {
    return this.vm.executionState;
  }

  isActive(): boolean {
    return this.vm.executionState !== "stopped";
  }

  readOnly(): ReadOnlyDialogue {
    return this.view;
  }

  setProgram(program: Program): void {
    this.program = program;
    this.vm.setProgram(program);
    this.logger.debug("program loaded", { nodes: Object.keys(program.nodes).length });
  }

  /** Adds nodes to the loaded program; a node name already present throws `PROGRAM_NODE_CONFLICT`. */
  addProgram(program: Program): void {
    this.setProgram(this.program ? combinePrograms(this.program, program) : program);
  }

  unloadAll(): void {
    this.vm.unloadPrograms();
    this.program = null;
    this.logger.debug("programs unloaded");
  }

  setNode(name: string): void {
    this.logger.debug("starting node", { node: name });
    this.vm.setNode(name);
  }

  setStartNode(): void {
    this.setNode(DEFAULT_START_NODE);
  }

  continue(): void {
    this.vm.continue();
  }

  setSelectedOption(id: OptionId): void {
    this.logger.debug("option selected", { option: id, node: this.vm.currentNodeName });
    this.vm.setSelectedOption(id);
  }

  stop(): void {
    this.vm.stop();
  }

  nodeNames(): string[] {
    return this.program ? Object.keys(this.program.nodes).sort() : [];
  }

  currentNode(): string | null {
    return this.vm.currentNodeName;
  }

  nodeExists(name: string): boolean {
    return this.program !== null && Object.hasOwn(this.program.nodes, name);
  }

  getTagsForNode(name: string): string[] | undefined {
    if (!this.program || !Object.hasOwn(this.program.nodes, name)) {
      this.logger.error("no node with this name is loaded", { node: name });
      return undefined;
    }
    return [...this.program.nodes[name].tags];
  }

  getStringIdForNode(name: string): string | undefined {
    if (!this.nodeExists(name)) {
      this.logger.error("no node with this name is loaded", { node: name });
      return undefined;
    }
    return rawTextStringId(name);
  }

  expandSubstitutions(text: string, substitutions: readonly string[]): string {
    return expandSubstitutions(text, substitutions);
  }
}
