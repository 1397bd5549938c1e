/**
 * Value types and runtime value representation.
 *
 * On the operand stack values are untagged: i32 and the float types are
 * JavaScript numbers, i64 is a bigint kept in signed 64-bit range. The tagged
 * `Value` form is used at the embedding boundary only.
 */

import { Trap, TrapKind } from "../vm/errors.js";

/**
 * Value types, numbered as in the binary format.
 */
export const enum ValueType {
  I32 = 0x7f,
  I64 = 0x7e,
  F32 = 0x7d,
  F64 = 0x7c,
}

/** Untagged operand-stack value. */
export type StackValue = number | bigint;

/** Tagged value passed across the embedding boundary. */
export type Value =
  | { readonly type: ValueType.I32; readonly value: number }
  | { readonly type: ValueType.I64; readonly value: bigint }
  | { readonly type: ValueType.F32; readonly value: number }
  | { readonly type: ValueType.F64; readonly value: number };

export function i32(value: number): Value {
  return { type: ValueType.I32, value: value | 0 };
}

export function i64(value: bigint | number): Value {
  return { type: ValueType.I64, value: BigInt.asIntN(64, BigInt(value)) };
}

export function f32(value: number): Value {
  return { type: ValueType.F32, value: Math.fround(value) };
}

export function f64(value: number): Value {
  return { type: ValueType.F64, value };
}

/**
 * Get the text name of a value type.
 */
export function valueTypeName(type: ValueType): string {
  switch (type) {
    case ValueType.I32:
      return "i32";
    case ValueType.I64:
      return "i64";
    case ValueType.F32:
      return "f32";
    case ValueType.F64:
      return "f64";
    default:
      return `Unknown(${type})`;
  }
}

/**
 * Parse a value type from its text name.
 */
export function parseValueType(name: string): ValueType | undefined {
  switch (name) {
    case "i32":
      return ValueType.I32;
    case "i64":
      return ValueType.I64;
    case "f32":
      return ValueType.F32;
    case "f64":
      return ValueType.F64;
    default:
      return undefined;
  }
}

/**
 * Zero value of a type, used to initialize locals.
 */
export function defaultValue(type: ValueType): StackValue {
  return type === ValueType.I64 ? 0n : 0;
}

export function asNumber(value: StackValue): number {
  if (typeof value !== "number") {
    throw new Trap(TrapKind.TypeMismatch, "expected a 32-bit or float operand, got i64");
  }
  return value;
}

export function asBigInt(value: StackValue): bigint {
  if (typeof value !== "bigint") {
    throw new Trap(TrapKind.TypeMismatch, "expected an i64 operand");
  }
  return value;
}

/**
 * Check that a raw value fits a type and normalize it to the stack form.
 * Traps with TypeMismatch when the JavaScript type is wrong.
 */
export function normalize(type: ValueType, value: StackValue): StackValue {
  switch (type) {
    case ValueType.I32:
      return asNumber(value) | 0;
    case ValueType.I64:
      return BigInt.asIntN(64, asBigInt(value));
    case ValueType.F32:
      return Math.fround(asNumber(value));
    case ValueType.F64:
      return asNumber(value);
  }
}

/**
 * Tag a stack value with its type.
 */
export function toValue(type: ValueType, value: StackValue): Value {
  switch (type) {
    case ValueType.I32:
      return { type, value: asNumber(value) };
    case ValueType.I64:
      return { type, value: asBigInt(value) };
    case ValueType.F32:
      return { type, value: asNumber(value) };
    case ValueType.F64:
      return { type, value: asNumber(value) };
  }
}

/**
 * Format a value for diagnostics, e.g. `i64:-1`.
 */
export function formatValue(value: Value): string {
  return `${valueTypeName(value.type)}:${value.value}`;
}
