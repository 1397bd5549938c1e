/**
 * Flat text assembler.
 *
 * Accepts one instruction per line in WebAssembly text mnemonics:
 *
 *     local.get 0
 *     i32.const 1
 *     i32.add
 *     block i32 ;; result type
 *     br_table 0 1 2 ;; last entry is the default
 *     i32.load offset=4
 *
 * Comments start with `;;`.
 */

import { Op, isOp, lookupMnemonic } from "./opcode.js";
import { Instruction } from "./instruction.js";
import { ValueType, parseValueType } from "../value/value.js";
import { roundF32 } from "../value/numeric.js";

const DECIMAL = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;
const HEX_INTEGER = /^([+-]?)0x([0-9a-fA-F]+)$/;

/**
 * Parse a decimal or hex integer literal directly to the nearest f32.
 */
function f32Literal(token: string): number | undefined {
  const hex = HEX_INTEGER.exec(token);
  if (hex) {
    const magnitude = roundF32(BigInt(`0x${hex[2]}`), 0);
    return hex[1] === "-" ? -magnitude : magnitude;
  }
  const match = DECIMAL.exec(token);
  if (!match) return undefined;
  const [, sign, whole, fraction = "", exponent = "0"] = match;
  if (whole === "" && fraction === "") return undefined;

  const digits = (whole + fraction).replace(/^0+/, "");
  const scale = Number(exponent) - fraction.length;
  let magnitude: number;
  if (digits === "" || digits.length + scale < -50) {
    magnitude = 0;
  } else if (digits.length + scale > 40) {
    magnitude = Infinity;
  } else if (scale >= 0) {
    magnitude = roundF32(BigInt(digits) * 10n ** BigInt(scale), 0);
  } else {
    // 151 fraction bits reach below the smallest subnormal's rounding bit.
    const divisor = 10n ** BigInt(-scale);
    const scaled = BigInt(digits) << 151n;
    const sticky = scaled % divisor === 0n ? 0n : 1n;
    magnitude = roundF32(((scaled / divisor) << 1n) | sticky, -152);
  }
  return sign === "-" ? -magnitude : magnitude;
}

/**
 * Assembler error with the 1-based source line.
 */
export class AssemblerError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`${message} at line ${line}`);
    this.name = "AssemblerError";
  }
}

/**
 * Assemble text into instructions.
 */
export function assemble(source: string): Instruction[] {
  const out: Instruction[] = [];
  const lines = source.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const text = stripComment(lines[i]).trim();
    if (text === "") continue;
    out.push(new LineParser(text, i + 1).parse());
  }
  return out;
}

function stripComment(line: string): string {
  const at = line.indexOf(";;");
  return at === -1 ? line : line.slice(0, at);
}

class LineParser {
  private readonly tokens: string[];
  private pos = 1;

  constructor(
    text: string,
    private readonly line: number
  ) {
    this.tokens = text.split(/\s+/);
  }

  parse(): Instruction {
    const mnemonic = this.tokens[0];
    const info = lookupMnemonic(mnemonic);
    if (!info || !isOp(info.code)) {
      throw new AssemblerError(`unknown instruction "${mnemonic}"`, this.line);
    }
    const instr = this.build(info.code);
    if (this.pos < this.tokens.length) {
      throw new AssemblerError(`unexpected operand "${this.tokens[this.pos]}"`, this.line);
    }
    return instr;
  }

  private build(op: Op): Instruction {
    switch (op) {
      case Op.Block:
      case Op.Loop:
      case Op.If: {
        const result = this.optionalType();
        return result === undefined ? { op } : { op, result };
      }

      case Op.Br:
      case Op.BrIf:
        return { op, depth: this.index() };

      case Op.BrTable: {
        const depths = [this.index()];
        while (this.pos < this.tokens.length) {
          depths.push(this.index());
        }
        const fallback = depths.pop() ?? 0;
        return { op, depths, fallback };
      }

      case Op.Call:
      case Op.ReturnCall:
        return { op, func: this.index() };

      case Op.CallIndirect:
      case Op.ReturnCallIndirect:
        return { op, type: this.index() };

      case Op.LocalGet:
      case Op.LocalSet:
      case Op.LocalTee:
      case Op.GlobalGet:
      case Op.GlobalSet:
        return { op, index: this.index() };

      case Op.I32Load:
      case Op.I64Load:
      case Op.F32Load:
      case Op.F64Load:
      case Op.I32Load8S:
      case Op.I32Load8U:
      case Op.I32Load16S:
      case Op.I32Load16U:
      case Op.I64Load8S:
      case Op.I64Load8U:
      case Op.I64Load16S:
      case Op.I64Load16U:
      case Op.I64Load32S:
      case Op.I64Load32U:
      case Op.I32Store:
      case Op.I64Store:
      case Op.F32Store:
      case Op.F64Store:
      case Op.I32Store8:
      case Op.I32Store16:
      case Op.I64Store8:
      case Op.I64Store16:
      case Op.I64Store32:
        return { op, offset: this.memarg() };

      case Op.I32Const:
        return { op, value: Number(this.integer(32)) };

      case Op.I64Const:
        return { op, value: this.integer(64) };

      case Op.F32Const:
        return { op, value: this.float(true) };

      case Op.F64Const:
        return { op, value: this.float(false) };

      default:
        return { op };
    }
  }

  private next(what: string): string {
    const token = this.tokens[this.pos];
    if (token === undefined) {
      throw new AssemblerError(`expected ${what}`, this.line);
    }
    this.pos++;
    return token;
  }

  private optionalType(): ValueType | undefined {
    const token = this.tokens[this.pos];
    if (token === undefined) return undefined;
    const type = parseValueType(token);
    if (type === undefined) {
      throw new AssemblerError(`bad block type "${token}"`, this.line);
    }
    this.pos++;
    return type;
  }

  private index(): number {
    const token = this.next("an index");
    if (!/^\d+$/.test(token)) {
      throw new AssemblerError(`bad index "${token}"`, this.line);
    }
    return Number(token);
  }

  private memarg(): number {
    let offset = 0;
    while (this.pos < this.tokens.length) {
      const token = this.tokens[this.pos++];
      const match = /^(offset|align)=(\d+|0x[0-9a-fA-F]+)$/.exec(token);
      if (!match) {
        throw new AssemblerError(`bad memory operand "${token}"`, this.line);
      }
      if (match[1] === "offset") {
        offset = Number(match[2]);
      }
    }
    return offset;
  }

  /**
   * Parse an integer literal and wrap it to the given width, signed.
   */
  private integer(bits: 32 | 64): bigint {
    const token = this.next("an integer").replace(/_/g, "");
    const match = /^([+-]?)(\d+|0x[0-9a-fA-F]+)$/.exec(token);
    if (!match) {
      throw new AssemblerError(`bad integer "${token}"`, this.line);
    }
    const magnitude = BigInt(match[2]);
    const value = match[1] === "-" ? -magnitude : magnitude;
    const min = -(1n << BigInt(bits - 1));
    const max = (1n << BigInt(bits)) - 1n;
    if (value < min || value > max) {
      throw new AssemblerError(`integer "${token}" out of range for i${bits}`, this.line);
    }
    return BigInt.asIntN(bits, value);
  }

  private float(single: boolean): number {
    const token = this.next("a number").replace(/_/g, "");
    switch (token) {
      case "nan":
      case "+nan":
      case "-nan":
        return NaN;
      case "inf":
      case "+inf":
        return Infinity;
      case "-inf":
        return -Infinity;
    }
    const value = single ? f32Literal(token) : Number(token);
    if (token === "" || value === undefined || Number.isNaN(value)) {
      throw new AssemblerError(`bad float "${token}"`, this.line);
    }
    return value;
  }
}
