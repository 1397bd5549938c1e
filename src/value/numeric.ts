/**
 * Numeric operator semantics.
 *
 * Integer arithmetic wraps; division, remainder and float-to-int truncation
 * trap where the instruction set requires it. Operators are looked up by
 * mnemonic.
 */

import { Trap, TrapKind } from "../vm/errors.js";
import { StackValue, asNumber, asBigInt } from "./value.js";

export type UnaryFn = (a: StackValue) => StackValue;
export type BinaryFn = (a: StackValue, b: StackValue) => StackValue;

const I32_MIN = -2147483648;
const I64_MIN = -9223372036854775808n;
const TWO_POW_63 = 9223372036854775808;
const TWO_POW_64 = 18446744073709551616;

const scratch = new DataView(new ArrayBuffer(8));

const wrap64 = (x: bigint): bigint => BigInt.asIntN(64, x);
const u64 = (x: bigint): bigint => BigInt.asUintN(64, x);
const bool = (b: boolean): number => (b ? 1 : 0);

function divisionByZero(): never {
  throw new Trap(TrapKind.DivisionByZero);
}

function overflow(): never {
  throw new Trap(TrapKind.IntegerOverflow);
}

// =========================================================================
// Integer helpers
// =========================================================================

function popcnt32(a: number): number {
  let v = a >>> 0;
  v = v - ((v >>> 1) & 0x55555555);
  v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
  return Math.imul((v + (v >>> 4)) & 0x0f0f0f0f, 0x01010101) >>> 24;
}

function ctz32(a: number): number {
  return a === 0 ? 32 : 31 - Math.clz32(a & -a);
}

function clz64(a: bigint): bigint {
  const x = u64(a);
  return x === 0n ? 64n : BigInt(64 - x.toString(2).length);
}

function ctz64(a: bigint): bigint {
  const x = u64(a);
  if (x === 0n) return 64n;
  return BigInt((x & -x).toString(2).length - 1);
}

function popcnt64(a: bigint): bigint {
  let count = 0;
  for (const digit of u64(a).toString(2)) {
    if (digit === "1") count++;
  }
  return BigInt(count);
}

function rotl64(a: bigint, b: bigint): bigint {
  const k = b & 63n;
  const x = u64(a);
  return wrap64((x << k) | (x >> ((64n - k) & 63n)));
}

function rotr64(a: bigint, b: bigint): bigint {
  const k = b & 63n;
  const x = u64(a);
  return wrap64((x >> k) | (x << ((64n - k) & 63n)));
}

// =========================================================================
// Float helpers
// =========================================================================

/** Round to nearest, ties to even. */
function nearest(x: number): number {
  const r = Math.round(x);
  if (Math.abs(r - x) === 0.5 && r % 2 !== 0) return r - 1;
  return r;
}

function signBit(x: number): boolean {
  scratch.setFloat64(0, x);
  return (scratch.getUint8(0) & 0x80) !== 0;
}

function copysign(a: number, b: number): number {
  const magnitude = Math.abs(a);
  return signBit(b) ? -magnitude : magnitude;
}

/**
 * Round `magnitude * 2 ** exponent` to the nearest f32, ties to even.
 * Everything below the top 26 bits collapses into one sticky bit, so the
 * double handed to `Math.fround` is exact and rounding happens once.
 */
export function roundF32(magnitude: bigint, exponent: number): number {
  const bits = magnitude.toString(2).length;
  if (bits <= 26) {
    return Math.fround(Number(magnitude) * 2 ** exponent);
  }
  const shift = bits - 26;
  let kept = magnitude >> BigInt(shift);
  if ((magnitude & ((1n << BigInt(shift)) - 1n)) !== 0n) kept |= 1n;
  return Math.fround(Number(kept) * 2 ** (exponent + shift));
}

function bigToF32(a: bigint): number {
  return a < 0n ? -roundF32(-a, 0) : roundF32(a, 0);
}

function truncate(x: number, min: number, maxExclusive: number): number {
  if (Number.isNaN(x)) {
    throw new Trap(TrapKind.InvalidConversionToInt);
  }
  const t = Math.trunc(x);
  if (t < min || t >= maxExclusive) overflow();
  return t;
}

// =========================================================================
// Operand narrowing
// =========================================================================

const num = (f: (a: number) => number): UnaryFn => (a) => f(asNumber(a));
const widen = (f: (a: number) => bigint): UnaryFn => (a) => f(asNumber(a));
const big = (f: (a: bigint) => StackValue): UnaryFn => (a) => f(asBigInt(a));
const num2 =
  (f: (a: number, b: number) => number): BinaryFn =>
  (a, b) =>
    f(asNumber(a), asNumber(b));
const big2 =
  (f: (a: bigint, b: bigint) => StackValue): BinaryFn =>
  (a, b) =>
    f(asBigInt(a), asBigInt(b));
const f32 = (f: (a: number) => number): UnaryFn => (a) => Math.fround(f(asNumber(a)));
const f32x2 =
  (f: (a: number, b: number) => number): BinaryFn =>
  (a, b) =>
    Math.fround(f(asNumber(a), asNumber(b)));

const UNARY = new Map<string, UnaryFn>([
  // i32
  ["i32.eqz", num((a) => bool(a === 0))],
  ["i32.clz", num(Math.clz32)],
  ["i32.ctz", num(ctz32)],
  ["i32.popcnt", num(popcnt32)],
  ["i32.extend8_s", num((a) => (a << 24) >> 24)],
  ["i32.extend16_s", num((a) => (a << 16) >> 16)],

  // i64
  ["i64.eqz", big((a) => bool(a === 0n))],
  ["i64.clz", big(clz64)],
  ["i64.ctz", big(ctz64)],
  ["i64.popcnt", big(popcnt64)],
  ["i64.extend8_s", big((a) => BigInt.asIntN(8, a))],
  ["i64.extend16_s", big((a) => BigInt.asIntN(16, a))],
  ["i64.extend32_s", big((a) => BigInt.asIntN(32, a))],

  // f32
  ["f32.abs", f32(Math.abs)],
  ["f32.neg", f32((a) => -a)],
  ["f32.ceil", f32(Math.ceil)],
  ["f32.floor", f32(Math.floor)],
  ["f32.trunc", f32(Math.trunc)],
  ["f32.nearest", f32(nearest)],
  ["f32.sqrt", f32(Math.sqrt)],

  // f64
  ["f64.abs", num(Math.abs)],
  ["f64.neg", num((a) => -a)],
  ["f64.ceil", num(Math.ceil)],
  ["f64.floor", num(Math.floor)],
  ["f64.trunc", num(Math.trunc)],
  ["f64.nearest", num(nearest)],
  ["f64.sqrt", num(Math.sqrt)],

  // Conversions
  ["i32.wrap_i64", big((a) => Number(BigInt.asIntN(32, a)))],
  ["i32.trunc_f32_s", num((a) => truncate(a, I32_MIN, 2147483648) | 0)],
  ["i32.trunc_f32_u", num((a) => truncate(a, 0, 4294967296) | 0)],
  ["i32.trunc_f64_s", num((a) => truncate(a, I32_MIN, 2147483648) | 0)],
  ["i32.trunc_f64_u", num((a) => truncate(a, 0, 4294967296) | 0)],
  ["i64.extend_i32_s", widen((a) => BigInt(a))],
  ["i64.extend_i32_u", widen((a) => BigInt(a >>> 0))],
  ["i64.trunc_f32_s", widen((a) => BigInt(truncate(a, -TWO_POW_63, TWO_POW_63)))],
  ["i64.trunc_f32_u", widen((a) => wrap64(BigInt(truncate(a, 0, TWO_POW_64))))],
  ["i64.trunc_f64_s", widen((a) => BigInt(truncate(a, -TWO_POW_63, TWO_POW_63)))],
  ["i64.trunc_f64_u", widen((a) => wrap64(BigInt(truncate(a, 0, TWO_POW_64))))],
  ["f32.convert_i32_s", num((a) => Math.fround(a))],
  ["f32.convert_i32_u", num((a) => Math.fround(a >>> 0))],
  ["f32.convert_i64_s", big(bigToF32)],
  ["f32.convert_i64_u", big((a) => bigToF32(u64(a)))],
  ["f32.demote_f64", num(Math.fround)],
  ["f64.convert_i32_s", num((a) => a)],
  ["f64.convert_i32_u", num((a) => a >>> 0)],
  ["f64.convert_i64_s", big((a) => Number(a))],
  ["f64.convert_i64_u", big((a) => Number(u64(a)))],
  ["f64.promote_f32", num((a) => a)],
  [
    "i32.reinterpret_f32",
    num((a) => {
      scratch.setFloat32(0, a, true);
      return scratch.getInt32(0, true);
    }),
  ],
  [
    "i64.reinterpret_f64",
    widen((a) => {
      scratch.setFloat64(0, a, true);
      return scratch.getBigInt64(0, true);
    }),
  ],
  [
    "f32.reinterpret_i32",
    num((a) => {
      scratch.setInt32(0, a, true);
      return scratch.getFloat32(0, true);
    }),
  ],
  [
    "f64.reinterpret_i64",
    big((a) => {
      scratch.setBigInt64(0, a, true);
      return scratch.getFloat64(0, true);
    }),
  ],
]);

const BINARY = new Map<string, BinaryFn>([
  // i32 comparison
  ["i32.eq", num2((a, b) => bool(a === b))],
  ["i32.ne", num2((a, b) => bool(a !== b))],
  ["i32.lt_s", num2((a, b) => bool(a < b))],
  ["i32.lt_u", num2((a, b) => bool(a >>> 0 < b >>> 0))],
  ["i32.gt_s", num2((a, b) => bool(a > b))],
  ["i32.gt_u", num2((a, b) => bool(a >>> 0 > b >>> 0))],
  ["i32.le_s", num2((a, b) => bool(a <= b))],
  ["i32.le_u", num2((a, b) => bool(a >>> 0 <= b >>> 0))],
  ["i32.ge_s", num2((a, b) => bool(a >= b))],
  ["i32.ge_u", num2((a, b) => bool(a >>> 0 >= b >>> 0))],

  // i32 arithmetic
  ["i32.add", num2((a, b) => (a + b) | 0)],
  ["i32.sub", num2((a, b) => (a - b) | 0)],
  ["i32.mul", num2(Math.imul)],
  [
    "i32.div_s",
    num2((a, b) => {
      if (b === 0) divisionByZero();
      if (a === I32_MIN && b === -1) overflow();
      return (a / b) | 0;
    }),
  ],
  [
    "i32.div_u",
    num2((a, b) => {
      if (b === 0) divisionByZero();
      return ((a >>> 0) / (b >>> 0)) | 0;
    }),
  ],
  [
    "i32.rem_s",
    num2((a, b) => {
      if (b === 0) divisionByZero();
      return b === -1 ? 0 : (a % b) | 0;
    }),
  ],
  [
    "i32.rem_u",
    num2((a, b) => {
      if (b === 0) divisionByZero();
      return ((a >>> 0) % (b >>> 0)) | 0;
    }),
  ],
  ["i32.and", num2((a, b) => a & b)],
  ["i32.or", num2((a, b) => a | b)],
  ["i32.xor", num2((a, b) => a ^ b)],
  ["i32.shl", num2((a, b) => a << b)],
  ["i32.shr_s", num2((a, b) => a >> b)],
  ["i32.shr_u", num2((a, b) => (a >>> b) | 0)],
  ["i32.rotl", num2((a, b) => (a << (b & 31)) | (a >>> ((32 - b) & 31)))],
  ["i32.rotr", num2((a, b) => (a >>> (b & 31)) | (a << ((32 - b) & 31)))],

  // i64 comparison
  ["i64.eq", big2((a, b) => bool(a === b))],
  ["i64.ne", big2((a, b) => bool(a !== b))],
  ["i64.lt_s", big2((a, b) => bool(a < b))],
  ["i64.lt_u", big2((a, b) => bool(u64(a) < u64(b)))],
  ["i64.gt_s", big2((a, b) => bool(a > b))],
  ["i64.gt_u", big2((a, b) => bool(u64(a) > u64(b)))],
  ["i64.le_s", big2((a, b) => bool(a <= b))],
  ["i64.le_u", big2((a, b) => bool(u64(a) <= u64(b)))],
  ["i64.ge_s", big2((a, b) => bool(a >= b))],
  ["i64.ge_u", big2((a, b) => bool(u64(a) >= u64(b)))],

  // i64 arithmetic
  ["i64.add", big2((a, b) => wrap64(a + b))],
  ["i64.sub", big2((a, b) => wrap64(a - b))],
  ["i64.mul", big2((a, b) => wrap64(a * b))],
  [
    "i64.div_s",
    big2((a, b) => {
      if (b === 0n) divisionByZero();
      if (a === I64_MIN && b === -1n) overflow();
      return a / b;
    }),
  ],
  [
    "i64.div_u",
    big2((a, b) => {
      if (b === 0n) divisionByZero();
      return wrap64(u64(a) / u64(b));
    }),
  ],
  [
    "i64.rem_s",
    big2((a, b) => {
      if (b === 0n) divisionByZero();
      return a % b;
    }),
  ],
  [
    "i64.rem_u",
    big2((a, b) => {
      if (b === 0n) divisionByZero();
      return wrap64(u64(a) % u64(b));
    }),
  ],
  ["i64.and", big2((a, b) => a & b)],
  ["i64.or", big2((a, b) => a | b)],
  ["i64.xor", big2((a, b) => a ^ b)],
  ["i64.shl", big2((a, b) => wrap64(a << (b & 63n)))],
  ["i64.shr_s", big2((a, b) => a >> (b & 63n))],
  ["i64.shr_u", big2((a, b) => wrap64(u64(a) >> (b & 63n)))],
  ["i64.rotl", big2(rotl64)],
  ["i64.rotr", big2(rotr64)],

  // f32
  ["f32.eq", num2((a, b) => bool(a === b))],
  ["f32.ne", num2((a, b) => bool(a !== b))],
  ["f32.lt", num2((a, b) => bool(a < b))],
  ["f32.gt", num2((a, b) => bool(a > b))],
  ["f32.le", num2((a, b) => bool(a <= b))],
  ["f32.ge", num2((a, b) => bool(a >= b))],
  ["f32.add", f32x2((a, b) => a + b)],
  ["f32.sub", f32x2((a, b) => a - b)],
  ["f32.mul", f32x2((a, b) => a * b)],
  ["f32.div", f32x2((a, b) => a / b)],
  ["f32.min", f32x2(Math.min)],
  ["f32.max", f32x2(Math.max)],
  ["f32.copysign", f32x2(copysign)],

  // f64
  ["f64.eq", num2((a, b) => bool(a === b))],
  ["f64.ne", num2((a, b) => bool(a !== b))],
  ["f64.lt", num2((a, b) => bool(a < b))],
  ["f64.gt", num2((a, b) => bool(a > b))],
  ["f64.le", num2((a, b) => bool(a <= b))],
  ["f64.ge", num2((a, b) => bool(a >= b))],
  ["f64.add", num2((a, b) => a + b)],
  ["f64.sub", num2((a, b) => a - b)],
  ["f64.mul", num2((a, b) => a * b)],
  ["f64.div", num2((a, b) => a / b)],
  ["f64.min", num2(Math.min)],
  ["f64.max", num2(Math.max)],
  ["f64.copysign", num2(copysign)],
]);

/**
 * Look up a one-operand operator (tests, conversions, unary arithmetic).
 */
export function unaryOp(name: string): UnaryFn | undefined {
  return UNARY.get(name);
}

/**
 * Look up a two-operand operator (comparisons, binary arithmetic).
 */
export function binaryOp(name: string): BinaryFn | undefined {
  return BINARY.get(name);
}
