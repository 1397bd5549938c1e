/**
 * Memory access per load/store opcode.
 */

import { Op } from "../bytecode/opcode.js";
import { LoadOp, StoreOp } from "../bytecode/instruction.js";
import { Memory } from "../vm/memory.js";
import { StackValue, asBigInt, asNumber } from "../value/value.js";

export type LoadFn = (memory: Memory, address: number, offset: number) => StackValue;
export type StoreFn = (memory: Memory, address: number, offset: number, value: StackValue) => void;

export function loader(op: LoadOp): LoadFn {
  switch (op) {
    case Op.I32Load:
      return (m, a, o) => m.i32(a, o);
    case Op.I64Load:
      return (m, a, o) => m.i64(a, o);
    case Op.F32Load:
      return (m, a, o) => m.f32(a, o);
    case Op.F64Load:
      return (m, a, o) => m.f64(a, o);
    case Op.I32Load8S:
      return (m, a, o) => m.i8(a, o);
    case Op.I32Load8U:
      return (m, a, o) => m.u8(a, o);
    case Op.I32Load16S:
      return (m, a, o) => m.i16(a, o);
    case Op.I32Load16U:
      return (m, a, o) => m.u16(a, o);
    case Op.I64Load8S:
      return (m, a, o) => BigInt(m.i8(a, o));
    case Op.I64Load8U:
      return (m, a, o) => BigInt(m.u8(a, o));
    case Op.I64Load16S:
      return (m, a, o) => BigInt(m.i16(a, o));
    case Op.I64Load16U:
      return (m, a, o) => BigInt(m.u16(a, o));
    case Op.I64Load32S:
      return (m, a, o) => BigInt(m.i32(a, o));
    case Op.I64Load32U:
      return (m, a, o) => BigInt(m.u32(a, o));
  }
}

export function storer(op: StoreOp): StoreFn {
  switch (op) {
    case Op.I32Store:
      return (m, a, o, v) => m.setI32(a, o, asNumber(v));
    case Op.I64Store:
      return (m, a, o, v) => m.setI64(a, o, asBigInt(v));
    case Op.F32Store:
      return (m, a, o, v) => m.setF32(a, o, asNumber(v));
    case Op.F64Store:
      return (m, a, o, v) => m.setF64(a, o, asNumber(v));
    case Op.I32Store8:
      return (m, a, o, v) => m.setI8(a, o, asNumber(v));
    case Op.I32Store16:
      return (m, a, o, v) => m.setI16(a, o, asNumber(v));
    case Op.I64Store8:
      return (m, a, o, v) => m.setI8(a, o, Number(BigInt.asUintN(8, asBigInt(v))));
    case Op.I64Store16:
      return (m, a, o, v) => m.setI16(a, o, Number(BigInt.asUintN(16, asBigInt(v))));
    case Op.I64Store32:
      return (m, a, o, v) => m.setI32(a, o, Number(BigInt.asIntN(32, asBigInt(v))));
  }
}
