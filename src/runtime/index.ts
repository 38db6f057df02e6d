export * from "./dialogue.js";
export * from "./text-provider.js";
export { VirtualMachine, type VirtualMachineHandlers, type VirtualMachineOptions } from "./virtual-machine.js";
