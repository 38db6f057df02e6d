import { SpindleError } from "./errors.js";
import type { YarnValue } from "./types.js";

/**
 * Store for script variables. The same instance is shared by a Dialogue,
 * its virtual machine and the library functions that read visit counts, so
 * implementations backed by persistent storage must tolerate calls from any
 * of them.
 */
export interface VariableStorage {
  get(name: string): YarnValue | undefined;
  set(name: string, value: YarnValue): void;
  clear?(): void;
}

export const assertVariableName = (name: string): void => {
  if (!name.startsWith("$")) {
    throw new SpindleError(
      "STORAGE_INVALID_NAME",
      `Variable name "${name}" must start with "$".`
    );
  }
};

export class MemoryVariableStorage implements VariableStorage {
  private readonly values = new Map<string, YarnValue>();

  constructor(initial: Record<string, YarnValue> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.set(name, value);
    }
  }

  get(name: string): YarnValue | undefined {
    return this.values.get(name);
  }

  set(name: string, value: YarnValue): void {
    assertVariableName(name);
    this.values.set(name, value);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  clear(): void {
    this.values.clear();
  }

  entries(): Record<string, YarnValue> {
    return Object.fromEntries(this.values.entries());
  }
}
