/**
 * Compiled artifacts: blocks, units, actions and compiled functions.
 */

import type { CallFrame } from "../vm/frame.js";
import type { Store } from "../vm/store.js";
import type { HostFunction } from "../host/host.js";
import type { FunctionType } from "../bytecode/module.js";
import { StackValue, ValueType, defaultValue } from "../value/value.js";

/**
 * Structured block kinds.
 */
export const enum BlockKind {
  Block = 0,
  Loop = 1,
  If = 2,
  Else = 3,
}

/**
 * What a unit asks the driver to do next.
 */
export const enum ActionKind {
  /** Continue with the next unit. */
  End = 0,
  /** Leave (or restart, for a loop) the label `depth` levels up. */
  Branch = 1,
  /** Return from the current function. */
  Return = 2,
  /** Evaluate a nested block. */
  Enter = 3,
  /** Push a frame for a module function; arguments are on the stack. */
  Call = 4,
  /** Replace the current frame with a call to a module function. */
  TailCall = 5,
  /** Suspend until a host promise settles. */
  Await = 6,
}

export type Action =
  | { readonly kind: ActionKind.End }
  | { readonly kind: ActionKind.Branch; readonly depth: number }
  | { readonly kind: ActionKind.Return; readonly value: StackValue | undefined }
  | { readonly kind: ActionKind.Enter; readonly block: Block }
  | { readonly kind: ActionKind.Call; readonly callee: CompiledFunction }
  | { readonly kind: ActionKind.TailCall; readonly callee: CompiledFunction }
  | {
      readonly kind: ActionKind.Await;
      readonly promise: Promise<StackValue | undefined>;
      readonly host: HostImport;
      /** Return the host result from the current function once it arrives. */
      readonly tail: boolean;
    };

/** Compiled unit body. */
export type EvalFunc = (frame: CallFrame, store: Store) => Action;

/** Deferred operand computation. */
export type Reader = (frame: CallFrame, store: Store) => StackValue;

/**
 * One executable step: a single opcode or a merged run of opcodes.
 */
export interface Unit {
  /** Mnemonics of the opcodes this unit covers, joined by `+`. */
  readonly name: string;
  /** Fuel charged before the unit runs. */
  readonly cost: number;
  readonly run: EvalFunc;
}

export interface Block {
  readonly kind: BlockKind;
  /** Nesting level; the function body is 0. */
  readonly depth: number;
  readonly units: readonly Unit[];
  /** Cached action that enters this block. */
  readonly enter: Action;
}

export const END: Action = Object.freeze({ kind: ActionKind.End });
export const RETURN_VOID: Action = Object.freeze({ kind: ActionKind.Return, value: undefined });

const branches: Action[] = [];

/**
 * Shared branch action for a depth.
 */
export function branchAction(depth: number): Action {
  let action = branches[depth];
  if (action === undefined) {
    action = Object.freeze({ kind: ActionKind.Branch, depth });
    branches[depth] = action;
  }
  return action;
}

export function createBlock(kind: BlockKind, depth: number, units: readonly Unit[]): Block {
  const block: { kind: BlockKind; depth: number; units: readonly Unit[]; enter: Action } = {
    kind,
    depth,
    units: Object.freeze([...units]),
    enter: END,
  };
  block.enter = Object.freeze({ kind: ActionKind.Enter, block });
  return Object.freeze(block);
}

/**
 * Call dispatch chosen at compile time.
 */
export const enum CallKind {
  Call = 0,
  TailCall = 1,
  Host = 2,
  Async = 3,
}

export const enum FunctionKind {
  Module = 0,
  Host = 1,
}

/**
 * An imported function bound to a registered host function.
 */
export interface HostImport {
  readonly kind: FunctionKind.Host;
  /** `module.name` of the import. */
  readonly name: string;
  /** Stable index in the State's host registry. */
  readonly hostIndex: number;
  readonly type: FunctionType;
  readonly host: HostFunction;
}

const EMPTY_BODY = createBlock(BlockKind.Block, 0, []);

/**
 * A module function's compiled form. Created before its body is compiled so
 * that call units can reference it; frozen once the body is set.
 */
export class CompiledFunction {
  readonly kind: FunctionKind.Module = FunctionKind.Module;
  /** Cached call action. */
  readonly call: Action;
  /** Cached tail call action. */
  readonly tail: Action;
  /** Initial local values, parameters included. */
  readonly defaults: readonly StackValue[];
  body: Block = EMPTY_BODY;

  constructor(
    readonly name: string,
    readonly index: number,
    readonly type: FunctionType,
    readonly locals: readonly ValueType[],
    readonly mayAwait: boolean
  ) {
    this.call = Object.freeze({ kind: ActionKind.Call, callee: this });
    this.tail = Object.freeze({ kind: ActionKind.TailCall, callee: this });
    this.defaults = Object.freeze(locals.map(defaultValue));
  }

  get paramCount(): number {
    return this.type.params.length;
  }

  /**
   * Set the compiled body and freeze.
   */
  finish(body: Block): void {
    this.body = body;
    Object.freeze(this);
  }
}

export type FunctionEntry = CompiledFunction | HostImport;

/**
 * Global slot metadata.
 */
export interface CompiledGlobal {
  readonly type: ValueType;
  readonly mutable: boolean;
  readonly init: StackValue;
}

/**
 * A loaded module: immutable and shareable across Stores.
 */
export interface CompiledModule {
  readonly name: string;
  readonly types: readonly FunctionType[];
  /** Function index space: imports first, then defined functions. */
  readonly functions: readonly FunctionEntry[];
  readonly exports: ReadonlyMap<string, number>;
  readonly start: number | undefined;
  readonly memory: { readonly initial: number; readonly maximum: number } | undefined;
  readonly globals: readonly CompiledGlobal[];
  readonly table: { readonly size: number; readonly elements: readonly (number | null)[] } | undefined;
  readonly data: readonly { readonly offset: number; readonly bytes: Uint8Array }[];
}
