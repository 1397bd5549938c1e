/**
 * Call frame management.
 */

import { Block, BlockKind, CompiledFunction } from "../compiler/block.js";
import { OperandStack } from "./stack.js";
import { StackValue } from "../value/value.js";

/**
 * A call frame representing a function invocation.
 *
 * Instead of an instruction pointer the frame keeps one cursor per entered
 * block: the block and the index of its next unit.
 */
export class CallFrame {
  /** The function being executed. */
  func: CompiledFunction;
  /** Local variables, parameters first. Fixed length for the call. */
  locals: StackValue[];
  /** Base pointer - start of this frame's operand stack region. */
  base: number;
  /** Entered blocks, outermost (function body) first. */
  readonly blocks: Block[];
  /** Next unit index per entered block. */
  readonly pcs: number[];

  constructor(func: CompiledFunction, locals: StackValue[], base: number) {
    this.func = func;
    this.locals = locals;
    this.base = base;
    this.blocks = [func.body];
    this.pcs = [0];
  }

  /**
   * Create a frame for `func`, popping its arguments off the stack.
   */
  static create(func: CompiledFunction, stack: OperandStack): CallFrame {
    const locals = takeArguments(func, stack, undefined);
    return new CallFrame(func, locals, stack.sp);
  }

  /**
   * Reuse this frame for a tail call to `func`. Arguments are popped, the
   * frame's stack region is cleared and its cursors reset.
   */
  reuse(func: CompiledFunction, stack: OperandStack): void {
    const locals = takeArguments(func, stack, this.locals);
    stack.truncate(this.base);
    this.func = func;
    this.locals = locals;
    this.blocks.length = 1;
    this.pcs.length = 1;
    this.blocks[0] = func.body;
    this.pcs[0] = 0;
  }

  /**
   * Enter a nested block.
   */
  enter(block: Block): void {
    this.blocks.push(block);
    this.pcs.push(0);
  }

  /**
   * Leave the innermost block.
   */
  exit(): void {
    this.blocks.pop();
    this.pcs.pop();
  }

  /**
   * Branch to the label `depth` levels up: restart it if it is a loop,
   * leave it otherwise.
   */
  branch(depth: number): void {
    const target = this.blocks.length - 1 - depth;
    if (this.blocks[target].kind === BlockKind.Loop) {
      this.blocks.length = target + 1;
      this.pcs.length = target + 1;
      this.pcs[target] = 0;
    } else {
      this.blocks.length = target;
      this.pcs.length = target;
    }
  }
}

function takeArguments(
  func: CompiledFunction,
  stack: OperandStack,
  recycled: StackValue[] | undefined
): StackValue[] {
  const count = func.defaults.length;
  let locals: StackValue[];
  if (recycled !== undefined && recycled.length === count) {
    locals = recycled;
    for (let i = 0; i < count; i++) locals[i] = func.defaults[i];
  } else {
    locals = func.defaults.slice();
  }
  for (let i = func.paramCount - 1; i >= 0; i--) {
    locals[i] = stack.pop();
  }
  return locals;
}
