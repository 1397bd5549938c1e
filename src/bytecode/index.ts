/**
 * Bytecode module exports.
 */

export { Op, isOp, opInfo, opName, lookupMnemonic } from "./opcode.js";
export type { OpcodeInfo } from "./opcode.js";

export type {
  Instruction,
  BlockInstruction,
  BranchInstruction,
  BranchTableInstruction,
  CallInstruction,
  IndirectCallInstruction,
  VariableInstruction,
  MemoryInstruction,
  NumberConstInstruction,
  BigIntConstInstruction,
  PlainInstruction,
  LoadOp,
  StoreOp,
} from "./instruction.js";

export { ModuleBuilder, funcType, sameType, formatType } from "./module.js";
export type {
  FunctionType,
  ImportDef,
  FunctionDef,
  GlobalDef,
  MemoryDef,
  ElementSegment,
  TableDef,
  DataSegment,
  ModuleDef,
  FunctionInit,
} from "./module.js";

export { AssemblerError, assemble } from "./assembler.js";
