/**
 * Operand stack.
 */

import { Trap, TrapKind } from "./errors.js";
import { StackValue } from "../value/value.js";

/** Default operand stack capacity. */
export const STACK_LIMIT = 1 << 20;

/**
 * Value stack shared by all frames of a Store. Frames address their region
 * through a base height.
 */
export class OperandStack {
  private readonly values: StackValue[] = [];
  /** Stack pointer (index of next free slot). */
  sp: number = 0;

  constructor(readonly limit: number = STACK_LIMIT) {}

  push(value: StackValue): void {
    if (this.sp >= this.limit) {
      throw new Trap(TrapKind.StackOverflow);
    }
    this.values[this.sp++] = value;
  }

  pop(): StackValue {
    if (this.sp === 0) {
      throw new Trap(TrapKind.TypeMismatch, "operand stack underflow");
    }
    return this.values[--this.sp];
  }

  peek(): StackValue | undefined {
    return this.sp > 0 ? this.values[this.sp - 1] : undefined;
  }

  get height(): number {
    return this.sp;
  }

  /**
   * Drop everything above `height`.
   */
  truncate(height: number): void {
    this.sp = height;
  }

  /**
   * Copy of the live values, bottom first.
   */
  toArray(): StackValue[] {
    return this.values.slice(0, this.sp);
  }
}
