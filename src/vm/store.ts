/**
 * Mutable per-instance execution state.
 */

import { CompiledModule, FunctionEntry } from "../compiler/block.js";
import { CallFrame } from "./frame.js";
import { Memory } from "./memory.js";
import { OperandStack } from "./stack.js";
import { ResourceLimiter } from "./limiter.js";
import { Trap, TrapKind, VMError } from "./errors.js";
import { StackValue } from "../value/value.js";

export const enum StoreStatus {
  Idle = 0,
  Running = 1,
  Suspended = 2,
}

/**
 * Operand stack, linear memory, globals, table and call frames of one
 * instance. Owned by exactly one VM.
 */
export class Store {
  readonly stack: OperandStack;
  readonly memory: Memory;
  readonly globals: StackValue[];
  readonly table: (FunctionEntry | null)[];
  /** Active call frames, outermost first. */
  readonly frames: CallFrame[] = [];
  status: StoreStatus = StoreStatus.Idle;
  /** Largest frame count seen since the last reset. */
  peakDepth: number = 0;

  constructor(
    readonly module: CompiledModule,
    readonly limiter: ResourceLimiter,
    stackLimit?: number
  ) {
    this.stack = new OperandStack(stackLimit);

    const memory = module.memory;
    if (memory && !limiter.memoryGrowing(0, memory.initial)) {
      throw new VMError(
        `module "${module.name}" needs ${memory.initial} memory pages, above the configured limit`
      );
    }
    this.memory = memory ? new Memory(memory.initial, memory.maximum) : new Memory(0, 0);
    for (const segment of module.data) {
      this.memory.write(segment.offset, segment.bytes);
    }

    this.globals = module.globals.map((g) => g.init);
    this.table = module.table
      ? module.table.elements.map((index) => (index === null ? null : module.functions[index]))
      : [];
  }

  /** Whether an operation is in flight. */
  get busy(): boolean {
    return this.status !== StoreStatus.Idle;
  }

  /**
   * Grow memory by `delta` pages (an i32 read as unsigned). Returns the old
   * page count, or -1 past the module's maximum; traps past the limiter cap.
   */
  growMemory(delta: number): number {
    const current = this.memory.pages;
    const desired = current + (delta >>> 0);
    if (desired > this.memory.maximum) {
      return -1;
    }
    if (!this.limiter.memoryGrowing(current, desired)) {
      throw new Trap(TrapKind.MemoryLimitExceeded, `memory limit exceeded growing to ${desired} pages`);
    }
    return this.memory.grow(delta >>> 0);
  }

  /**
   * Drop all frames and operand values.
   */
  reset(): void {
    this.frames.length = 0;
    this.stack.truncate(0);
  }
}
