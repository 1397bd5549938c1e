/**
 * blockvm - a closure-compiling virtual machine for structured stack
 * bytecode, with fuel metering and suspendable execution.
 *
 * @packageDocumentation
 */

// Value exports
export * from "./value/index.js";

// Bytecode exports
export * from "./bytecode/index.js";

// Compiler exports
export * from "./compiler/index.js";

// Host exports
export * from "./host/index.js";

// VM exports
export * from "./vm/index.js";
