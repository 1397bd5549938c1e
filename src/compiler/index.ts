/**
 * Compiler module exports.
 */

export { CompileError, FunctionCompiler } from "./compiler.js";
export type { CompilerConfig, ModuleContext } from "./compiler.js";

export { compileModule } from "./loader.js";
export type { HostResolver } from "./loader.js";

export { ActionKind, BlockKind, CallKind, FunctionKind, CompiledFunction } from "./block.js";
export type {
  Action,
  Block,
  Unit,
  HostImport,
  FunctionEntry,
  CompiledGlobal,
  CompiledModule,
} from "./block.js";
