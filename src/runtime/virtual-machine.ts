import { SpindleError } from "../core/errors.js";
import { Library } from "../core/library.js";
import type { Logger } from "../core/logger.js";
import { lineIdsForNode } from "../core/program.js";
import { expandSubstitutions, splitCommandText } from "../core/text.js";
import type {
  Command,
  DialogueOption,
  ExecutionState,
  Instruction,
  Line,
  Node,
  OptionId,
  Program,
  YarnValue,
} from "../core/types.js";
import { formatValue, kindOf, toBoolean } from "../core/value.js";
import type { VariableStorage } from "../core/variable-storage.js";

// Node entries and backward jumps allowed in one continue().
const EXECUTION_GUARD = 10000;

export interface VirtualMachineHandlers {
  line?: (line: Line) => void;
  options?: (options: DialogueOption[]) => void;
  command?: (command: Command) => void;
  nodeStart?: (nodeName: string) => void;
  nodeComplete?: (nodeName: string) => void;
  dialogueComplete?: () => void;
  prepareForLines?: (lineIds: string[]) => void;
}

export interface VirtualMachineOptions {
  library: Library;
  variableStorage: VariableStorage;
  handlers: VirtualMachineHandlers;
  logger: Logger;
}

export class VirtualMachine {
  private readonly library: Library;
  private readonly storage: VariableStorage;
  private readonly handlers: VirtualMachineHandlers;
  private readonly logger: Logger;

  private program: Program | null = null;
  private state: ExecutionState = "stopped";
  private node: Node | null = null;
  private programCounter = 0;
  private stack: YarnValue[] = [];
  private pendingOptions: DialogueOption[] = [];
  private presentedOptions: DialogueOption[] = [];
  private loopSteps = 0;

  constructor(options: VirtualMachineOptions) {
    this.library = options.library;
    this.storage = options.variableStorage;
    this.handlers = options.handlers;
    this.logger = options.logger;
  }

  get executionState(): ExecutionState {
    return this.state;
  }

  get currentNodeName(): string | null {
    return this.node?.name ?? null;
  }

  get loadedProgram(): Program | null {
    return this.program;
  }

  setProgram(program: Program): void {
    this.program = program;
  }

  unloadPrograms(): void {
    this.stop();
    this.program = null;
  }

  setNode(name: string): void {
    if (this.state === "running") {
      throw new SpindleError("VM_RUNNING", `Cannot switch to node "${name}" while a node is executing.`);
    }
    this.enterNode(name);
    this.state = "waitingForContinue";
  }

  /** Ends execution immediately; no handler fires. */
  stop(): void {
    this.state = "stopped";
    this.node = null;
    this.resetExecution();
  }

  setSelectedOption(id: OptionId): void {
    if (this.state !== "waitingOnOptionSelection") {
      throw new SpindleError(
        "VM_NOT_WAITING_ON_OPTION",
        `Cannot select option ${id}: the dialogue is not waiting for an option selection.`
      );
    }
    const option = this.presentedOptions.find((candidate) => candidate.id === id);
    if (!option) {
      throw new SpindleError(
        "VM_OPTION_UNKNOWN",
        `Option ${id} is not one of the presented options (${this.presentedOptions.map((entry) => entry.id).join(", ")}).`
      );
    }
    this.stack.push(option.destinationLabel);
    this.presentedOptions = [];
    this.state = "waitingForContinue";
  }

  /**
   * Runs until the next line, option group, command or the end of the
   * dialogue. Calling it again from inside a handler has no effect.
   */
  continue(): void {
    if (this.state === "running") {
      return;
    }
    if (this.state === "waitingOnOptionSelection") {
      throw new SpindleError("VM_WAITING_ON_OPTION", "Select an option before continuing.");
    }
    if (!this.program || !this.node || this.state === "stopped") {
      throw new SpindleError("VM_NO_NODE", "No node is selected; call setNode() before continue().");
    }
    if (!this.handlers.line || !this.handlers.options) {
      throw new SpindleError("VM_HANDLER_MISSING", "Both a line handler and an options handler are required.");
    }

    this.state = "running";
    this.loopSteps = 0;
    try {
      while (this.state === "running") {
        const node = this.requireNode();
        if (this.programCounter >= node.instructions.length) {
          this.finishDialogue();
          return;
        }
        const instruction = node.instructions[this.programCounter];
        this.programCounter += 1;
        this.execute(instruction);
      }
    } catch (error) {
      this.stop();
      throw error;
    }
  }

  private countLoopStep(): void {
    this.loopSteps += 1;
    if (this.loopSteps > EXECUTION_GUARD) {
      throw new SpindleError(
        "VM_GUARD_EXCEEDED",
        `Execution guard exceeded ${EXECUTION_GUARD} node jumps or backward jumps without reaching a line, option or command.`
      );
    }
  }

  private requireNode(): Node {
    if (!this.node) {
      throw new SpindleError("VM_NO_NODE", "No node is executing.");
    }
    return this.node;
  }

  private resetExecution(): void {
    this.programCounter = 0;
    this.stack = [];
    this.pendingOptions = [];
    this.presentedOptions = [];
  }

  private enterNode(name: string): void {
    const node = this.program && Object.hasOwn(this.program.nodes, name) ? this.program.nodes[name] : undefined;
    if (!node) {
      throw new SpindleError("VM_NODE_NOT_FOUND", `Node "${name}" is not in the loaded program.`);
    }
    this.logger.debug("entering node", { node: name });
    this.node = node;
    this.resetExecution();
    this.handlers.prepareForLines?.(lineIdsForNode(node));
    this.handlers.nodeStart?.(name);
  }

  /** Only yields if a handler did not already stop the machine. */
  private yieldAs(state: ExecutionState): void {
    if (this.state === "running") {
      this.state = state;
    }
  }

  private completeNode(): void {
    const node = this.requireNode();
    if (node.tracked) {
      const name = Library.generateUniqueVisitedVariableForNode(node.name);
      const current = this.readVariable(name, 0);
      this.storage.set(name, (typeof current === "number" ? current : 0) + 1);
    }
    this.handlers.nodeComplete?.(node.name);
  }

  private finishDialogue(): void {
    this.completeNode();
    this.state = "stopped";
    this.node = null;
    this.resetExecution();
    this.handlers.dialogueComplete?.();
  }

  private jumpToNode(name: string): void {
    this.countLoopStep();
    this.completeNode();
    this.enterNode(name);
  }

  private readVariable(name: string, fallback?: YarnValue): YarnValue {
    const stored = this.storage.get(name);
    if (stored !== undefined) {
      return stored;
    }
    if (this.program && Object.hasOwn(this.program.initialValues, name)) {
      return this.program.initialValues[name];
    }
    if (fallback !== undefined) {
      return fallback;
    }
    throw new SpindleError("VM_UNDEFINED_VARIABLE", `Variable ${name} has no value and no initial value.`);
  }

  private jumpToLabel(label: string): void {
    const target = this.labelIndex(label);
    if (target < this.programCounter) {
      this.countLoopStep();
    }
    this.programCounter = target;
  }

  private labelIndex(label: string): number {
    const node = this.requireNode();
    if (!Object.hasOwn(node.labels, label)) {
      throw new SpindleError("VM_LABEL_NOT_FOUND", `Label "${label}" does not exist in node ${node.name}.`);
    }
    return node.labels[label];
  }

  private pop(): YarnValue {
    const value = this.stack.pop();
    if (value === undefined) {
      throw new SpindleError("VM_STACK_UNDERFLOW", "The value stack is empty.");
    }
    return value;
  }

  private popMany(count: number): YarnValue[] {
    if (this.stack.length < count) {
      throw new SpindleError("VM_STACK_UNDERFLOW", `Expected ${count} value(s) on the stack, found ${this.stack.length}.`);
    }
    return this.stack.splice(this.stack.length - count, count);
  }

  private popString(): string {
    const value = this.pop();
    if (typeof value !== "string") {
      throw new SpindleError("VM_TYPE_MISMATCH", `Expected a string on the stack, found ${kindOf(value)}.`);
    }
    return value;
  }

  private popBoolean(): boolean {
    const value = toBoolean(this.pop());
    if (value === undefined) {
      throw new SpindleError("VM_TYPE_MISMATCH", "Expected a boolean on the stack.");
    }
    return value;
  }

  private peekBoolean(): boolean {
    if (this.stack.length === 0) {
      throw new SpindleError("VM_STACK_UNDERFLOW", "The value stack is empty.");
    }
    const value = toBoolean(this.stack[this.stack.length - 1]);
    if (value === undefined) {
      throw new SpindleError("VM_TYPE_MISMATCH", "Expected a boolean on top of the stack.");
    }
    return value;
  }

  private popSubstitutions(count: number): string[] {
    return this.popMany(count).map(formatValue);
  }

  private execute(instruction: Instruction): void {
    switch (instruction.opcode) {
      case "jumpTo":
        this.jumpToLabel(instruction.label);
        return;
      case "jumpToStackLabel":
        this.jumpToLabel(this.popString());
        return;
      case "jumpIfFalse":
        if (!this.peekBoolean()) {
          this.programCounter = this.labelIndex(instruction.label);
        }
        return;
      case "runLine": {
        const line: Line = {
          id: instruction.lineId,
          substitutions: this.popSubstitutions(instruction.substitutionCount),
          metadata: [...instruction.metadata],
        };
        this.handlers.line?.(line);
        this.yieldAs("waitingForContinue");
        return;
      }
      case "runCommand": {
        const raw = expandSubstitutions(instruction.text, this.popSubstitutions(instruction.substitutionCount));
        const [name = "", ...parameters] = splitCommandText(raw);
        if (this.handlers.command) {
          this.handlers.command({ raw, name, parameters });
        } else {
          this.logger.warn("command ignored; no command handler is set", { command: raw });
        }
        this.yieldAs("waitingForContinue");
        return;
      }
      case "addOption": {
        const isAvailable = instruction.hasCondition ? this.popBoolean() : true;
        const substitutions = this.popSubstitutions(instruction.substitutionCount);
        this.pendingOptions.push({
          id: this.pendingOptions.length,
          line: { id: instruction.lineId, substitutions, metadata: [...instruction.metadata] },
          destinationLabel: instruction.label,
          isAvailable,
        });
        return;
      }
      case "showOptions": {
        const options = this.pendingOptions;
        this.pendingOptions = [];
        if (options.length === 0) {
          this.logger.warn("option group has no options; ending the dialogue", { node: this.currentNodeName });
          this.finishDialogue();
          return;
        }
        this.presentedOptions = options;
        this.handlers.options?.(
          options.map((option) => ({ ...option, line: { ...option.line, metadata: [...option.line.metadata] } }))
        );
        this.yieldAs("waitingOnOptionSelection");
        return;
      }
      case "pushString":
      case "pushNumber":
      case "pushBool":
        this.stack.push(instruction.value);
        return;
      case "pop":
        this.pop();
        return;
      case "callFunction": {
        const args = this.popMany(instruction.argumentCount);
        this.stack.push(this.library.call(instruction.name, args));
        return;
      }
      case "pushVariable":
        this.stack.push(this.readVariable(instruction.name));
        return;
      case "storeVariable":
        this.storage.set(instruction.name, this.pop());
        return;
      case "runNode":
        this.jumpToNode(instruction.node);
        return;
      case "runNodeFromStack":
        this.jumpToNode(this.popString());
        return;
      case "stop":
        this.finishDialogue();
        return;
    }
  }
}
