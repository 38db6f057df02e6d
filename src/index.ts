export const SPINDLE_VERSION = "0.1.0";

export * from "./core/errors.js";
export type * from "./core/types.js";
export * from "./core/library.js";
export * from "./core/logger.js";
export * from "./core/program.js";
export * from "./core/text.js";
export * from "./core/value.js";
export * from "./core/variable-storage.js";
export * from "./compiler/index.js";
export * from "./runtime/index.js";
export * from "./api.js";
