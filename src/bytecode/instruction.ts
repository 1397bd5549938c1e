/**
 * Decoded instructions.
 */

import { Op } from "./opcode.js";
import { ValueType } from "../value/value.js";

export type BlockOp = Op.Block | Op.Loop | Op.If;
export type BranchOp = Op.Br | Op.BrIf;
export type CallOp = Op.Call | Op.ReturnCall;
export type IndirectCallOp = Op.CallIndirect | Op.ReturnCallIndirect;
export type LocalOp = Op.LocalGet | Op.LocalSet | Op.LocalTee;
export type GlobalOp = Op.GlobalGet | Op.GlobalSet;

export type LoadOp =
  | Op.I32Load
  | Op.I64Load
  | Op.F32Load
  | Op.F64Load
  | Op.I32Load8S
  | Op.I32Load8U
  | Op.I32Load16S
  | Op.I32Load16U
  | Op.I64Load8S
  | Op.I64Load8U
  | Op.I64Load16S
  | Op.I64Load16U
  | Op.I64Load32S
  | Op.I64Load32U;

export type StoreOp =
  | Op.I32Store
  | Op.I64Store
  | Op.F32Store
  | Op.F64Store
  | Op.I32Store8
  | Op.I32Store16
  | Op.I64Store8
  | Op.I64Store16
  | Op.I64Store32;

export type NumberConstOp = Op.I32Const | Op.F32Const | Op.F64Const;

/** Opcodes that carry no immediate. */
export type PlainOp = Exclude<
  Op,
  | BlockOp
  | Op.BrTable
  | BranchOp
  | CallOp
  | IndirectCallOp
  | LocalOp
  | GlobalOp
  | LoadOp
  | StoreOp
  | NumberConstOp
  | Op.I64Const
>;

export interface BlockInstruction {
  readonly op: BlockOp;
  /** Result type; absent for an empty block type. */
  readonly result?: ValueType;
}

export interface BranchInstruction {
  readonly op: BranchOp;
  readonly depth: number;
}

export interface BranchTableInstruction {
  readonly op: Op.BrTable;
  readonly depths: readonly number[];
  readonly fallback: number;
}

export interface CallInstruction {
  readonly op: CallOp;
  /** Index in the module's function index space (imports first). */
  readonly func: number;
}

export interface IndirectCallInstruction {
  readonly op: IndirectCallOp;
  /** Index in the module's type section. */
  readonly type: number;
}

export interface VariableInstruction {
  readonly op: LocalOp | GlobalOp;
  readonly index: number;
}

export interface MemoryInstruction {
  readonly op: LoadOp | StoreOp;
  readonly offset: number;
}

export interface NumberConstInstruction {
  readonly op: NumberConstOp;
  readonly value: number;
}

export interface BigIntConstInstruction {
  readonly op: Op.I64Const;
  readonly value: bigint;
}

export interface PlainInstruction {
  readonly op: PlainOp;
}

/**
 * One decoded instruction. The `op` field discriminates the immediates.
 */
export type Instruction =
  | BlockInstruction
  | BranchInstruction
  | BranchTableInstruction
  | CallInstruction
  | IndirectCallInstruction
  | VariableInstruction
  | MemoryInstruction
  | NumberConstInstruction
  | BigIntConstInstruction
  | PlainInstruction;
