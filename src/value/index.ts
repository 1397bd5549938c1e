/**
 * Value module exports.
 */

export {
  ValueType,
  i32,
  i64,
  f32,
  f64,
  valueTypeName,
  parseValueType,
  defaultValue,
  normalize,
  toValue,
  formatValue,
} from "./value.js";
export type { StackValue, Value } from "./value.js";
export { unaryOp, binaryOp, roundF32 } from "./numeric.js";
export type { UnaryFn, BinaryFn } from "./numeric.js";
