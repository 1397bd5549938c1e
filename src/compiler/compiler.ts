/**
 * Single-pass function compiler.
 *
 * Lowers one function's instruction stream into a tree of blocks of compiled
 * units. Value-producing instructions do not emit code: they push an Input
 * describing the value, and the instruction that finally consumes it builds
 * one closure covering the whole run. Any instruction with an effect first
 * materializes the pending inputs below its operands, so evaluation order
 * (and trap order) matches one-opcode-at-a-time interpretation.
 */

import { Op, opInfo, opName } from "../bytecode/opcode.js";
import {
  BlockInstruction,
  CallInstruction,
  IndirectCallInstruction,
  Instruction,
  LoadOp,
  StoreOp,
} from "../bytecode/instruction.js";
import { FunctionType, sameType } from "../bytecode/module.js";
import {
  Action,
  ActionKind,
  Block,
  BlockKind,
  CallKind,
  CompiledFunction,
  CompiledGlobal,
  END,
  EvalFunc,
  FunctionEntry,
  FunctionKind,
  RETURN_VOID,
  Reader,
  Unit,
  branchAction,
  createBlock,
} from "./block.js";
import {
  Input,
  InputKind,
  OpInput,
  isPending,
  joinLabels,
  pops,
  reader,
  stackInput,
  totalCost,
  windowPusher,
  windowReader,
} from "./input.js";
import { loader, storer } from "./memory-ops.js";
import type { CallFrame } from "../vm/frame.js";
import type { Store } from "../vm/store.js";
import { Trap, TrapKind } from "../vm/errors.js";
import { callHost, startAsyncHost } from "../host/host.js";
import { BinaryFn, UnaryFn, binaryOp, unaryOp } from "../value/numeric.js";
import { StackValue, ValueType, asNumber, valueTypeName } from "../value/value.js";

/**
 * Compilation error. Raised before any code of the module runs.
 */
export class CompileError extends Error {
  constructor(
    message: string,
    public readonly func?: string,
    public readonly position?: number
  ) {
    super(
      func === undefined
        ? message
        : `${message} in function "${func}"${position === undefined ? "" : ` at instruction ${position}`}`
    );
    this.name = "CompileError";
  }
}

/**
 * Compiler configuration.
 */
export interface CompilerConfig {
  /**
   * Defer and fuse value-producing instructions into their consumers
   * (default true). When false every opcode becomes its own unit.
   */
  merge?: boolean;
}

/**
 * Module-level facts a function body is compiled against.
 */
export interface ModuleContext {
  readonly types: readonly FunctionType[];
  /** Function index space, imports first. */
  readonly functions: readonly FunctionEntry[];
  readonly globals: readonly CompiledGlobal[];
  readonly hasMemory: boolean;
  readonly hasTable: boolean;
}

/**
 * A structured control label being compiled.
 */
interface Label {
  readonly kind: BlockKind;
  readonly result: ValueType | undefined;
  /** Compile-time stack height at entry; everything below is materialized. */
  readonly height: number;
  units: Unit[];
  unreachable: boolean;
  /** Condition of an `if`. */
  cond?: Input;
  /** Then-arm units, once `else` was seen. */
  thenUnits?: Unit[];
}

/**
 * Branch behavior resolved for one target label.
 */
type BranchTaker = (frame: CallFrame, store: Store) => Action;

function trapLocal(index: number): Reader {
  return () => {
    throw new Trap(TrapKind.LocalOutOfBounds, `local ${index} out of bounds`);
  };
}

function trapGlobal(index: number): Reader {
  return () => {
    throw new Trap(TrapKind.GlobalOutOfBounds, `global ${index} out of bounds`);
  };
}

function pushLabel(input: Input): string {
  return input.label === "" ? "push" : input.label;
}

/**
 * Compiles one function body.
 */
export class FunctionCompiler {
  private readonly inputs: Input[] = [];
  private readonly labels: Label[] = [];
  private readonly localTypes: readonly ValueType[];
  private readonly merge: boolean;
  /** Nesting depth inside skipped (unreachable) code. */
  private skipDepth = 0;
  private position = 0;
  private root: Block | undefined;

  constructor(
    private readonly ctx: ModuleContext,
    private readonly fn: CompiledFunction,
    config: CompilerConfig = {}
  ) {
    this.localTypes = fn.locals;
    this.merge = config.merge ?? true;
  }

  /**
   * Compile a body into the function's root block.
   */
  compile(body: readonly Instruction[]): Block {
    this.labels.push({
      kind: BlockKind.Block,
      result: this.fn.type.results[0],
      height: 0,
      units: [],
      unreachable: false,
    });

    for (let i = 0; i < body.length; i++) {
      this.position = i;
      if (this.root !== undefined) {
        throw this.error("instruction after the final end");
      }
      this.instruction(body[i]);
      if (!this.merge && this.root === undefined) {
        this.flush(0);
      }
    }

    if (this.root === undefined) {
      this.position = body.length;
      if (this.labels.length > 1) {
        throw this.error("unterminated block");
      }
      this.endFunction();
    }
    if (this.root === undefined) {
      throw this.error("function body did not close");
    }
    return this.root;
  }

  // =========================================================================
  // Compile-time stack
  // =========================================================================

  private get current(): Label {
    return this.labels[this.labels.length - 1];
  }

  private error(message: string): CompileError {
    return new CompileError(message, this.fn.name, this.position);
  }

  private emit(name: string, cost: number, run: EvalFunc): void {
    this.current.units.push(Object.freeze({ name, cost, run }));
  }

  private push(input: Input): void {
    this.inputs.push(input);
  }

  /**
   * Pop `n` inputs (bottom first) without materializing anything.
   */
  private pop(n: number): Input[] {
    if (this.inputs.length - n < this.current.height) {
      throw this.error("operand stack underflow");
    }
    return this.inputs.splice(this.inputs.length - n, n);
  }

  private popTyped(types: readonly ValueType[]): Input[] {
    const window = this.pop(types.length);
    for (let i = 0; i < types.length; i++) {
      this.expectType(window[i], types[i]);
    }
    return window;
  }

  private expectType(input: Input, type: ValueType): void {
    if (input.type !== type) {
      throw this.error(`type mismatch: expected ${valueTypeName(type)}, got ${valueTypeName(input.type)}`);
    }
  }

  /**
   * Materialize every pending input except the top `keep`.
   */
  private flush(keep: number): void {
    const end = this.inputs.length - keep;
    for (let i = this.current.height; i < end; i++) {
      const input = this.inputs[i];
      if (!isPending(input)) continue;
      this.emit(pushLabel(input), input.cost, this.pushUnit(input));
      this.inputs[i] = stackInput(input.type);
    }
  }

  private pushUnit(input: Input): EvalFunc {
    if (input.kind === InputKind.Local) {
      const index = input.index;
      return (frame, store) => {
        store.stack.push(frame.locals[index]);
        return END;
      };
    }
    const read = reader(input);
    return (frame, store) => {
      store.stack.push(read(frame, store));
      return END;
    };
  }

  /**
   * Materialize everything below the top `n` inputs, then pop and type-check
   * them. Used by instructions with effects.
   */
  private consume(types: readonly ValueType[]): Input[] {
    this.flush(types.length);
    return this.popTyped(types);
  }

  private deferred(type: ValueType, read: Reader, window: readonly Input[], name: string): OpInput {
    return {
      kind: InputKind.Op,
      type,
      read,
      pops: window.some(pops),
      cost: totalCost(window) + 1,
      label: joinLabels(window, name),
    };
  }

  private markUnreachable(): void {
    const label = this.current;
    label.unreachable = true;
    this.inputs.length = label.height;
  }

  // =========================================================================
  // Dispatch
  // =========================================================================

  private instruction(instr: Instruction): void {
    if (this.current.unreachable) {
      this.skip(instr);
      return;
    }

    switch (instr.op) {
      case Op.Nop:
        return;
      case Op.Unreachable:
        this.flush(0);
        this.emit("unreachable", 1, () => {
          throw new Trap(TrapKind.Unreachable);
        });
        this.markUnreachable();
        return;

      case Op.Block:
      case Op.Loop:
      case Op.If:
        this.open(instr);
        return;
      case Op.Else:
        this.else();
        return;
      case Op.End:
        this.end();
        return;

      case Op.Br:
        this.br(instr.depth);
        return;
      case Op.BrIf:
        this.brIf(instr.depth);
        return;
      case Op.BrTable:
        this.brTable(instr.depths, instr.fallback);
        return;
      case Op.Return:
        this.return("return");
        return;

      case Op.Call:
      case Op.ReturnCall:
        this.call(instr);
        return;
      case Op.CallIndirect:
      case Op.ReturnCallIndirect:
        this.callIndirect(instr);
        return;

      case Op.Drop:
        this.drop();
        return;
      case Op.Select:
        this.select();
        return;

      case Op.LocalGet:
        this.localGet(instr.index);
        return;
      case Op.LocalSet:
        this.localSet(instr.index, false);
        return;
      case Op.LocalTee:
        this.localSet(instr.index, true);
        return;
      case Op.GlobalGet:
        this.globalGet(instr.index);
        return;
      case Op.GlobalSet:
        this.globalSet(instr.index);
        return;

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
        this.load(instr.op, instr.offset);
        return;
      case Op.I32Store:
      case Op.I64Store:
      case Op.F32Store:
      case Op.F64Store:
      case Op.I32Store8:
      case Op.I32Store16:
      case Op.I64Store8:
      case Op.I64Store16:
      case Op.I64Store32:
        this.store(instr.op, instr.offset);
        return;
      case Op.MemorySize:
        this.memorySize();
        return;
      case Op.MemoryGrow:
        this.memoryGrow();
        return;

      case Op.I32Const:
        this.constant(ValueType.I32, instr.value, "i32.const");
        return;
      case Op.I64Const:
        this.constant(ValueType.I64, instr.value, "i64.const");
        return;
      case Op.F32Const:
        this.constant(ValueType.F32, Math.fround(instr.value), "f32.const");
        return;
      case Op.F64Const:
        this.constant(ValueType.F64, instr.value, "f64.const");
        return;

      default:
        this.numeric(instr.op);
        return;
    }
  }

  /**
   * Skip dead code up to the `else` or `end` that closes the current label.
   */
  private skip(instr: Instruction): void {
    switch (instr.op) {
      case Op.Block:
      case Op.Loop:
      case Op.If:
        this.skipDepth++;
        return;
      case Op.Else:
        if (this.skipDepth === 0) this.else();
        return;
      case Op.End:
        if (this.skipDepth > 0) {
          this.skipDepth--;
        } else {
          this.end();
        }
        return;
      default:
        return;
    }
  }

  // =========================================================================
  // Values
  // =========================================================================

  private constant(type: ValueType, value: StackValue, name: string): void {
    this.push({ kind: InputKind.Const, type, value, cost: 1, label: name });
  }

  private numeric(op: Op): void {
    const info = opInfo(op);
    const params = info?.params;
    const result = info?.result;
    if (info === undefined || params === undefined || result === undefined) {
      throw this.error(`unsupported instruction ${opName(op)}`);
    }
    if (params.length === 1) {
      const fn = unaryOp(info.name);
      if (!fn) throw this.error(`unsupported instruction ${info.name}`);
      const [a] = this.popTyped(params);
      this.push(this.unary(info.name, result, fn, a));
    } else if (params.length === 2) {
      const fn = binaryOp(info.name);
      if (!fn) throw this.error(`unsupported instruction ${info.name}`);
      const [a, b] = this.popTyped(params);
      this.push(this.binary(info.name, result, fn, a, b));
    } else {
      throw this.error(`unsupported instruction ${info.name}`);
    }
  }

  private unary(name: string, type: ValueType, fn: UnaryFn, a: Input): Input {
    let read: Reader;
    switch (a.kind) {
      case InputKind.Local: {
        const i = a.index;
        read = (frame) => fn(frame.locals[i]);
        break;
      }
      case InputKind.Stack:
        read = (_frame, store) => fn(store.stack.pop());
        break;
      default: {
        const ra = reader(a);
        read = (frame, store) => fn(ra(frame, store));
        break;
      }
    }
    return this.deferred(type, read, [a], name);
  }

  private binary(name: string, type: ValueType, fn: BinaryFn, a: Input, b: Input): Input {
    let read: Reader;
    if (a.kind === InputKind.Local && b.kind === InputKind.Const) {
      const i = a.index;
      const c = b.value;
      read = (frame) => fn(frame.locals[i], c);
    } else if (a.kind === InputKind.Local && b.kind === InputKind.Local) {
      const i = a.index;
      const j = b.index;
      read = (frame) => fn(frame.locals[i], frame.locals[j]);
    } else if (a.kind === InputKind.Stack && b.kind === InputKind.Stack) {
      read = (_frame, store) => {
        const y = store.stack.pop();
        return fn(store.stack.pop(), y);
      };
    } else if (b.kind === InputKind.Const) {
      const ra = reader(a);
      const c = b.value;
      read = (frame, store) => fn(ra(frame, store), c);
    } else {
      const ra = reader(a);
      const rb = reader(b);
      read = pops(b)
        ? (frame, store) => {
            const y = rb(frame, store);
            return fn(ra(frame, store), y);
          }
        : (frame, store) => {
            const x = ra(frame, store);
            return fn(x, rb(frame, store));
          };
    }
    return this.deferred(type, read, [a, b], name);
  }

  private select(): void {
    const [a, b, c] = this.pop(3);
    this.expectType(c, ValueType.I32);
    this.expectType(b, a.type);
    const read = windowReader([a, b, c]);
    this.push(
      this.deferred(
        a.type,
        (frame, store) => {
          const v = read(frame, store);
          return asNumber(v[2]) !== 0 ? v[0] : v[1];
        },
        [a, b, c],
        "select"
      )
    );
  }

  private drop(): void {
    const [x] = this.pop(1);
    this.flush(0);
    const name = joinLabels([x], "drop");
    const cost = x.cost + 1;
    if (x.kind === InputKind.Stack) {
      this.emit(name, cost, (_frame, store) => {
        store.stack.pop();
        return END;
      });
    } else if (x.kind === InputKind.Op) {
      const read = x.read;
      this.emit(name, cost, (frame, store) => {
        read(frame, store);
        return END;
      });
    } else {
      this.emit(name, cost, () => END);
    }
  }

  // =========================================================================
  // Variables
  // =========================================================================

  private localGet(index: number): void {
    const type = this.localTypes[index];
    if (type === undefined) {
      this.push({
        kind: InputKind.Op,
        type: ValueType.I32,
        read: trapLocal(index),
        pops: false,
        cost: 1,
        label: "local.get",
      });
      return;
    }
    this.push({ kind: InputKind.Local, type, index, cost: 1, label: "local.get" });
  }

  private localSet(index: number, tee: boolean): void {
    const mnemonic = tee ? "local.tee" : "local.set";
    const type = this.localTypes[index];
    const [x] = type === undefined ? this.pop(1) : this.popTyped([type]);
    this.flush(0);
    const name = joinLabels([x], mnemonic);
    const cost = x.cost + 1;
    const read = reader(x);

    if (type === undefined) {
      this.emit(name, cost, (frame, store) => {
        read(frame, store);
        throw new Trap(TrapKind.LocalOutOfBounds, `local ${index} out of bounds`);
      });
      if (tee) this.push(stackInput(x.type));
      return;
    }

    if (tee && !this.merge) {
      this.emit(name, cost, (frame, store) => {
        const value = read(frame, store);
        frame.locals[index] = value;
        store.stack.push(value);
        return END;
      });
      this.push(stackInput(type));
      return;
    }

    this.emit(
      name,
      cost,
      x.kind === InputKind.Stack
        ? (frame, store) => {
            frame.locals[index] = store.stack.pop();
            return END;
          }
        : (frame, store) => {
            frame.locals[index] = read(frame, store);
            return END;
          }
    );
    if (tee) {
      // Later writes to the slot flush this read first.
      this.push({ kind: InputKind.Local, type, index, cost: 0, label: "" });
    }
  }

  private globalGet(index: number): void {
    const global = this.ctx.globals[index];
    if (global === undefined) {
      this.push({
        kind: InputKind.Op,
        type: ValueType.I32,
        read: trapGlobal(index),
        pops: false,
        cost: 1,
        label: "global.get",
      });
      return;
    }
    this.push(this.deferred(global.type, (_frame, store) => store.globals[index], [], "global.get"));
  }

  private globalSet(index: number): void {
    const global = this.ctx.globals[index];
    if (global !== undefined && !global.mutable) {
      throw this.error(`global ${index} is immutable`);
    }
    const [x] = global === undefined ? this.pop(1) : this.popTyped([global.type]);
    this.flush(0);
    const read = reader(x);
    this.emit(
      joinLabels([x], "global.set"),
      x.cost + 1,
      global === undefined
        ? (frame, store) => {
            read(frame, store);
            throw new Trap(TrapKind.GlobalOutOfBounds, `global ${index} out of bounds`);
          }
        : (frame, store) => {
            store.globals[index] = read(frame, store);
            return END;
          }
    );
  }

  // =========================================================================
  // Memory
  // =========================================================================

  private requireMemory(name: string): void {
    if (!this.ctx.hasMemory) {
      throw this.error(`${name} requires a memory`);
    }
  }

  private load(op: LoadOp, offset: number): void {
    const name = opName(op);
    this.requireMemory(name);
    const info = opInfo(op);
    const type = info?.result ?? ValueType.I32;
    const [addr] = this.popTyped([ValueType.I32]);
    const fn = loader(op);
    let read: Reader;
    if (addr.kind === InputKind.Local) {
      const i = addr.index;
      read = (frame, store) => fn(store.memory, asNumber(frame.locals[i]), offset);
    } else {
      const ra = reader(addr);
      read = (frame, store) => fn(store.memory, asNumber(ra(frame, store)), offset);
    }
    this.push(this.deferred(type, read, [addr], name));
  }

  private store(op: StoreOp, offset: number): void {
    const name = opName(op);
    this.requireMemory(name);
    const info = opInfo(op);
    const valueType = info?.params?.[1] ?? ValueType.I32;
    const window = this.consume([ValueType.I32, valueType]);
    const [addr, value] = window;
    const fn = storer(op);
    const ra = reader(addr);
    const rv = reader(value);
    this.emit(
      joinLabels(window, name),
      totalCost(window) + 1,
      pops(value)
        ? (frame, store) => {
            const v = rv(frame, store);
            fn(store.memory, asNumber(ra(frame, store)), offset, v);
            return END;
          }
        : (frame, store) => {
            const a = asNumber(ra(frame, store));
            fn(store.memory, a, offset, rv(frame, store));
            return END;
          }
    );
  }

  private memorySize(): void {
    this.requireMemory("memory.size");
    this.push(this.deferred(ValueType.I32, (_frame, store) => store.memory.pages, [], "memory.size"));
  }

  private memoryGrow(): void {
    this.requireMemory("memory.grow");
    const [delta] = this.consume([ValueType.I32]);
    const read = reader(delta);
    this.emit(joinLabels([delta], "memory.grow"), delta.cost + 1, (frame, store) => {
      store.stack.push(store.growMemory(asNumber(read(frame, store))));
      return END;
    });
    this.push(stackInput(ValueType.I32));
  }

  // =========================================================================
  // Structured control
  // =========================================================================

  private open(instr: BlockInstruction): void {
    if (instr.op === Op.If) {
      const [cond] = this.consume([ValueType.I32]);
      this.labels.push({
        kind: BlockKind.If,
        result: instr.result,
        height: this.inputs.length,
        units: [],
        unreachable: false,
        cond,
      });
      return;
    }
    this.flush(0);
    this.labels.push({
      kind: instr.op === Op.Loop ? BlockKind.Loop : BlockKind.Block,
      result: instr.result,
      height: this.inputs.length,
      units: [],
      unreachable: false,
    });
  }

  /**
   * Check that a finished arm left exactly the label's results.
   */
  private closeArm(label: Label): void {
    if (label.unreachable) {
      return;
    }
    this.flush(0);
    const arity = label.result === undefined ? 0 : 1;
    if (this.inputs.length !== label.height + arity) {
      throw this.error(
        `block leaves ${this.inputs.length - label.height} values, expected ${arity}`
      );
    }
    if (label.result !== undefined) {
      this.expectType(this.inputs[this.inputs.length - 1], label.result);
    }
  }

  private else(): void {
    const label = this.current;
    if (label.kind !== BlockKind.If || label.thenUnits !== undefined) {
      throw this.error("else without if");
    }
    this.closeArm(label);
    label.thenUnits = label.units;
    label.units = [];
    label.unreachable = false;
    this.inputs.length = label.height;
  }

  private end(): void {
    if (this.labels.length === 1) {
      this.endFunction();
      return;
    }
    const label = this.current;
    this.closeArm(label);
    this.labels.pop();
    this.inputs.length = label.height;
    const depth = this.labels.length;

    if (label.kind === BlockKind.If) {
      this.endIf(label, depth);
    } else {
      const block = createBlock(label.kind, depth, label.units);
      const enter = block.enter;
      this.emit(label.kind === BlockKind.Loop ? "loop" : "block", 1, () => enter);
    }

    if (label.result !== undefined) {
      this.push(stackInput(label.result));
    }
  }

  private endIf(label: Label, depth: number): void {
    const cond = label.cond;
    if (cond === undefined) {
      throw this.error("if without condition");
    }
    const hasElse = label.thenUnits !== undefined;
    if (label.result !== undefined && !hasElse) {
      throw this.error("if with a result needs an else");
    }
    const thenBlock = createBlock(BlockKind.If, depth, label.thenUnits ?? label.units);
    const thenEnter = thenBlock.enter;
    const read = reader(cond);
    const name = joinLabels([cond], "if");
    const cost = cond.cost + 1;
    if (hasElse) {
      const elseEnter = createBlock(BlockKind.Else, depth, label.units).enter;
      this.emit(name, cost, (frame, store) => (asNumber(read(frame, store)) !== 0 ? thenEnter : elseEnter));
    } else {
      this.emit(name, cost, (frame, store) => (asNumber(read(frame, store)) !== 0 ? thenEnter : END));
    }
  }

  private endFunction(): void {
    const label = this.labels[0];
    if (!label.unreachable) {
      const results = this.fn.type.results;
      const [x] = this.consume(results);
      if (this.inputs.length !== 0) {
        throw this.error(`function leaves ${this.inputs.length + results.length} values, expected ${results.length}`);
      }
      if (x === undefined) {
        this.emit("end", 0, () => RETURN_VOID);
      } else {
        this.emit(joinLabels([x], "end"), x.cost, this.returnUnit(x));
      }
    }
    this.labels.pop();
    this.root = createBlock(BlockKind.Block, 0, label.units);
  }

  private returnUnit(x: Input): EvalFunc {
    if (x.kind === InputKind.Stack) {
      return (_frame, store) => ({ kind: ActionKind.Return, value: store.stack.pop() });
    }
    const read = reader(x);
    return (frame, store) => ({ kind: ActionKind.Return, value: read(frame, store) });
  }

  // =========================================================================
  // Branches
  // =========================================================================

  private target(depth: number): { label: Label; index: number; arity: number } {
    const index = this.labels.length - 1 - depth;
    if (index < 0) {
      throw this.error(`branch depth ${depth} out of range`);
    }
    const label = this.labels[index];
    const arity = label.kind === BlockKind.Loop || label.result === undefined ? 0 : 1;
    return { label, index, arity };
  }

  /**
   * Build the taken path of a branch whose values are already materialized
   * on the operand stack. `height` is the compile-time height below them.
   */
  private taker(depth: number, height: number): BranchTaker {
    const { label, index, arity } = this.target(depth);
    if (index === 0) {
      const results = this.fn.type.results.length;
      return results === 0
        ? () => RETURN_VOID
        : (_frame, store) => ({ kind: ActionKind.Return, value: store.stack.pop() });
    }
    const action = branchAction(depth);
    const targetHeight = label.height;
    if (height === targetHeight) {
      return () => action;
    }
    if (arity === 0) {
      return (frame, store) => {
        store.stack.truncate(frame.base + targetHeight);
        return action;
      };
    }
    return (frame, store) => {
      const value = store.stack.pop();
      store.stack.truncate(frame.base + targetHeight);
      store.stack.push(value);
      return action;
    };
  }

  private branchTypes(depth: number): ValueType[] {
    const { label, index, arity } = this.target(depth);
    if (index === 0) {
      return [...this.fn.type.results];
    }
    return arity === 0 || label.result === undefined ? [] : [label.result];
  }

  private br(depth: number): void {
    const { index } = this.target(depth);
    if (index === 0) {
      this.return("br");
      return;
    }
    const types = this.branchTypes(depth);
    const window = this.consume(types);
    // Materialize the branch values in place, then take the branch.
    const push = windowPusher(window);
    const take = this.taker(depth, this.inputs.length);
    const name = joinLabels(window, "br");
    const cost = totalCost(window) + 1;
    if (push === undefined) {
      this.emit(name, cost, take);
    } else {
      this.emit(name, cost, (frame, store) => {
        push(frame, store);
        return take(frame, store);
      });
    }
    this.markUnreachable();
  }

  private brIf(depth: number): void {
    const [cond] = this.consume([ValueType.I32]);
    const types = this.branchTypes(depth);
    const values = this.inputs.slice(this.inputs.length - types.length);
    if (this.inputs.length - types.length < this.current.height) {
      throw this.error("operand stack underflow");
    }
    values.forEach((v, i) => this.expectType(v, types[i]));
    const take = this.taker(depth, this.inputs.length - types.length);
    const read = reader(cond);
    this.emit(joinLabels([cond], "br_if"), cond.cost + 1, (frame, store) =>
      asNumber(read(frame, store)) !== 0 ? take(frame, store) : END
    );
  }

  private brTable(depths: readonly number[], fallback: number): void {
    const [cond] = this.consume([ValueType.I32]);
    const types = this.branchTypes(fallback);
    for (const depth of depths) {
      const other = this.branchTypes(depth);
      if (other.length !== types.length || other.some((t, i) => t !== types[i])) {
        throw this.error("br_table targets have different result types");
      }
    }
    if (this.inputs.length - types.length < this.current.height) {
      throw this.error("operand stack underflow");
    }
    const height = this.inputs.length - types.length;
    const takers = depths.map((d) => this.taker(d, height));
    const fallbackTaker = this.taker(fallback, height);
    const read = reader(cond);
    const n = takers.length;
    this.emit(joinLabels([cond], "br_table"), cond.cost + 1, (frame, store) => {
      const i = asNumber(read(frame, store)) >>> 0;
      return (i < n ? takers[i] : fallbackTaker)(frame, store);
    });
    this.markUnreachable();
  }

  private return(mnemonic: string): void {
    const window = this.consume(this.fn.type.results);
    const [x] = window;
    this.emit(
      joinLabels(window, mnemonic),
      totalCost(window) + 1,
      x === undefined ? () => RETURN_VOID : this.returnUnit(x)
    );
    this.markUnreachable();
  }

  // =========================================================================
  // Calls
  // =========================================================================

  private checkTail(type: FunctionType): void {
    const results = this.fn.type.results;
    if (type.results.length !== results.length || type.results.some((t, i) => t !== results[i])) {
      throw this.error("tail call result type differs from the caller's");
    }
  }

  private callKind(entry: FunctionEntry, tail: boolean): CallKind {
    if (entry.kind === FunctionKind.Host) {
      return entry.host.async ? CallKind.Async : CallKind.Host;
    }
    if (tail) return CallKind.TailCall;
    return entry.mayAwait ? CallKind.Async : CallKind.Call;
  }

  private call(instr: CallInstruction): void {
    const entry = this.ctx.functions[instr.func];
    if (entry === undefined) {
      throw this.error(`unknown function ${instr.func}`);
    }
    const tail = instr.op === Op.ReturnCall;
    const type = entry.type;
    if (tail) this.checkTail(type);
    const args = this.consume(type.params);
    const mnemonic = tail ? "return_call" : "call";
    const cost = totalCost(args) + 1;
    const kind = this.callKind(entry, tail);

    if (entry.kind === FunctionKind.Module) {
      const action = tail ? entry.tail : entry.call;
      const push = windowPusher(args);
      const name = joinLabels(args, kind === CallKind.Async ? `${mnemonic}.async` : mnemonic);
      this.emit(
        name,
        cost,
        push === undefined
          ? () => action
          : (frame, store) => {
              push(frame, store);
              return action;
            }
      );
    } else {
      const read = windowReader(args);
      const host = entry.host;
      const label = entry.name;
      if (host.async) {
        this.emit(joinLabels(args, `${mnemonic}.async`), cost, (frame, store) => ({
          kind: ActionKind.Await,
          promise: startAsyncHost(label, host, read(frame, store), store),
          host: entry,
          tail,
        }));
      } else if (tail) {
        this.emit(joinLabels(args, `${mnemonic}.host`), cost, (frame, store) => ({
          kind: ActionKind.Return,
          value: callHost(label, host, read(frame, store), store),
        }));
      } else {
        this.emit(joinLabels(args, `${mnemonic}.host`), cost, (frame, store) => {
          const result = callHost(label, host, read(frame, store), store);
          if (result !== undefined) store.stack.push(result);
          return END;
        });
      }
    }

    if (tail) {
      this.markUnreachable();
    } else if (type.results.length > 0) {
      this.push(stackInput(type.results[0]));
    }
  }

  private callIndirect(instr: IndirectCallInstruction): void {
    if (!this.ctx.hasTable) {
      throw this.error(`${opName(instr.op)} requires a table`);
    }
    const expected = this.ctx.types[instr.type];
    if (expected === undefined) {
      throw this.error(`unknown type ${instr.type}`);
    }
    const tail = instr.op === Op.ReturnCallIndirect;
    if (tail) this.checkTail(expected);
    const window = this.consume([...expected.params, ValueType.I32]);
    const read = windowReader(window);
    const n = expected.params.length;

    this.emit(joinLabels(window, opName(instr.op)), totalCost(window) + 1, (frame, store): Action => {
      const values = read(frame, store);
      const index = asNumber(values[n]) >>> 0;
      const entry = index < store.table.length ? store.table[index] : null;
      if (entry === null) {
        throw new Trap(TrapKind.UndefinedElement, `undefined table element ${index}`);
      }
      if (!sameType(entry.type, expected)) {
        throw new Trap(TrapKind.IndirectCallTypeMismatch);
      }
      values.length = n;
      if (entry.kind === FunctionKind.Module) {
        for (const value of values) store.stack.push(value);
        return tail ? entry.tail : entry.call;
      }
      const host = entry.host;
      if (host.async) {
        return {
          kind: ActionKind.Await,
          promise: startAsyncHost(entry.name, host, values, store),
          host: entry,
          tail,
        };
      }
      const result = callHost(entry.name, host, values, store);
      if (tail) {
        return { kind: ActionKind.Return, value: result };
      }
      if (result !== undefined) store.stack.push(result);
      return END;
    });

    if (tail) {
      this.markUnreachable();
    } else if (expected.results.length > 0) {
      this.push(stackInput(expected.results[0]));
    }
  }
}
