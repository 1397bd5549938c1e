/**
 * Compile-time operand descriptors.
 *
 * While lowering a straight-line run the compiler keeps a stack of Inputs
 * instead of emitting a push for every value. An Input says where an operand
 * will come from at run time: a local slot, a constant, a deferred
 * computation, or the operand stack.
 *
 * The compile-time stack always has the shape `[Stack*, pending*]`, and only
 * the lowest pending entry may pop operand-stack values.
 */

import type { Reader } from "./block.js";
import type { CallFrame } from "../vm/frame.js";
import type { Store } from "../vm/store.js";
import { StackValue, ValueType } from "../value/value.js";

export const enum InputKind {
  /** Already materialized on the operand stack. */
  Stack = 0,
  Local = 1,
  Const = 2,
  /** Deferred computation. */
  Op = 3,
}

interface InputBase {
  readonly type: ValueType;
  /** Opcodes folded into this input, charged by its consumer. */
  readonly cost: number;
  /** Mnemonics folded into this input, joined by `+`. */
  readonly label: string;
}

export interface StackInput extends InputBase {
  readonly kind: InputKind.Stack;
}

export interface LocalInput extends InputBase {
  readonly kind: InputKind.Local;
  readonly index: number;
}

export interface ConstInput extends InputBase {
  readonly kind: InputKind.Const;
  readonly value: StackValue;
}

export interface OpInput extends InputBase {
  readonly kind: InputKind.Op;
  readonly read: Reader;
  /** Whether evaluating this input pops the operand stack. */
  readonly pops: boolean;
}

export type Input = StackInput | LocalInput | ConstInput | OpInput;

export function stackInput(type: ValueType): StackInput {
  return { kind: InputKind.Stack, type, cost: 0, label: "" };
}

export function isPending(input: Input): boolean {
  return input.kind !== InputKind.Stack;
}

export function pops(input: Input): boolean {
  return input.kind === InputKind.Stack || (input.kind === InputKind.Op && input.pops);
}

/**
 * Build a reader for any input.
 */
export function reader(input: Input): Reader {
  switch (input.kind) {
    case InputKind.Stack:
      return (_frame, store) => store.stack.pop();
    case InputKind.Local: {
      const index = input.index;
      return (frame) => frame.locals[index];
    }
    case InputKind.Const: {
      const value = input.value;
      return () => value;
    }
    case InputKind.Op:
      return input.read;
  }
}

/**
 * Join the labels of consumed inputs with the consumer's mnemonic.
 */
export function joinLabels(inputs: readonly Input[], name: string): string {
  const parts: string[] = [];
  for (const input of inputs) {
    if (input.label !== "") parts.push(input.label);
  }
  if (name !== "") parts.push(name);
  return parts.join("+");
}

export function totalCost(inputs: readonly Input[]): number {
  let cost = 0;
  for (const input of inputs) cost += input.cost;
  return cost;
}

/**
 * Evaluation order for a window of operands (bottom to top).
 *
 * The pending input that pops runs first, since the values it consumes sit
 * above the window's stack entries at run time. Stack entries are then popped
 * top-down, and the remaining pending inputs run in program order.
 */
export function evaluationOrder(window: readonly Input[]): number[] {
  const order: number[] = [];
  let firstPending = window.findIndex(isPending);
  if (firstPending === -1) firstPending = window.length;
  if (firstPending < window.length && pops(window[firstPending])) {
    order.push(firstPending);
  }
  for (let i = firstPending - 1; i >= 0; i--) {
    order.push(i);
  }
  for (let i = firstPending; i < window.length; i++) {
    if (order[0] !== i) order.push(i);
  }
  return order;
}

/**
 * Build a reader that evaluates a whole operand window into an array, in
 * stack order.
 */
export function windowReader(window: readonly Input[]): (frame: CallFrame, store: Store) => StackValue[] {
  const readers = window.map(reader);
  const order = evaluationOrder(window);
  const n = window.length;
  if (n === 0) {
    return () => [];
  }
  return (frame, store) => {
    const values = new Array<StackValue>(n);
    for (const i of order) {
      values[i] = readers[i](frame, store);
    }
    return values;
  };
}

/**
 * Build a function that materializes the pending part of a window on the
 * operand stack, in stack order. Returns undefined when nothing is pending.
 */
export function windowPusher(
  window: readonly Input[]
): ((frame: CallFrame, store: Store) => void) | undefined {
  const pending = window.filter(isPending).map(reader);
  if (pending.length === 0) return undefined;
  return (frame, store) => {
    for (const read of pending) {
      store.stack.push(read(frame, store));
    }
  };
}
