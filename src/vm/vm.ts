/**
 * Virtual machine - drives compiled blocks for one module instance.
 *
 * Execution is a trampoline over the Store's frame list: units return
 * actions instead of recursing, so neither nested blocks nor calls grow the
 * native stack, and a suspended execution is just the frame list left in
 * place.
 */

import {
  Action,
  ActionKind,
  CompiledFunction,
  CompiledModule,
  FunctionKind,
} from "../compiler/block.js";
import { checkResult } from "../host/host.js";
import { CallFrame } from "./frame.js";
import { DefaultLimiter, ResourceLimiter, ResourceLimits } from "./limiter.js";
import {
  HostSettlement,
  Outcome,
  OutcomeKind,
  SuspendReason,
  Suspension,
  TraceEvent,
  TraceHandler,
  completed,
  suspended,
  trapped,
} from "./outcome.js";
import { State } from "./state.js";
import { Store, StoreStatus } from "./store.js";
import { Trap, TrapKind, VMError } from "./errors.js";
import { StackValue, Value, ValueType, normalize, toValue, valueTypeName } from "../value/value.js";
import { setImmediate } from "node:timers/promises";

/** Engine cap on call frames, independent of configured limits. */
export const MAX_FRAME_DEPTH = 65536;

/**
 * VM configuration options.
 */
export interface VMConfig {
  /** Resource limits for the default limiter. */
  limits?: ResourceLimits;
  /** Custom limiter; takes precedence over `limits`. */
  limiter?: ResourceLimiter;
  /** Receives execution events. */
  trace?: TraceHandler;
  /** Operand stack capacity. */
  stackLimit?: number;
}

/**
 * Executes one module instance.
 */
export class VM {
  /** Instance state: memory, globals, table, frames and operands. */
  readonly store: Store;
  private readonly module: CompiledModule;
  private readonly limiter: ResourceLimiter;
  private readonly trace: TraceHandler | undefined;
  /** Fuel left in the current slice. */
  private fuel: number = Infinity;
  /** The outstanding suspension handle, if any. */
  private suspension: Suspension | undefined;
  /** Result type of the top-level call in flight. */
  private resultType: ValueType | undefined;

  constructor(state: State, moduleName: string, config: VMConfig = {}) {
    this.module = state.module(moduleName);
    this.limiter = config.limiter ?? new DefaultLimiter(config.limits);
    this.trace = config.trace;
    this.store = new Store(this.module, this.limiter, config.stackLimit);
  }

  /** Fuel left in the current or last slice. */
  get fuelRemaining(): number {
    return this.fuel;
  }

  /**
   * Call an exported function.
   */
  call(name: string, args: readonly Value[] = []): Outcome {
    this.checkIdle();
    const index = this.module.exports.get(name);
    if (index === undefined) {
      throw new VMError(`unknown export "${name}"`);
    }
    const func = this.module.functions[index];
    if (func.kind === FunctionKind.Host) {
      throw new VMError(`export "${name}" is a host import`);
    }
    const params = func.type.params;
    if (args.length !== params.length) {
      throw new VMError(`"${name}" takes ${params.length} arguments, got ${args.length}`);
    }
    const values = args.map((arg, i): StackValue => {
      if (arg.type !== params[i]) {
        throw new VMError(
          `argument ${i} of "${name}" must be ${valueTypeName(params[i])}, got ${valueTypeName(arg.type)}`
        );
      }
      return normalize(arg.type, arg.value);
    });
    return this.begin(func, values);
  }

  /**
   * Run the module's start function, if it has one.
   */
  start(): Outcome {
    this.checkIdle();
    const start = this.module.start;
    if (start === undefined) {
      return completed(undefined);
    }
    const func = this.module.functions[start];
    if (func.kind === FunctionKind.Host) {
      throw new VMError(`start function ${start} is a host import`);
    }
    return this.begin(func, []);
  }

  /**
   * Continue a suspended execution. For an await, `value` is the host
   * function's result.
   */
  resume(suspension: Suspension, value?: StackValue): Outcome {
    this.claim(suspension);
    this.fuel = this.limiter.sliceFuel();
    this.emit({ kind: "resume", reason: suspension.reason });
    try {
      if (suspension.reason === SuspendReason.Await) {
        const host = suspension.host;
        const result = checkResult(host.name, host.type, value);
        if (suspension.tail) {
          const done = this.return(result);
          if (done !== undefined) return done;
        } else if (result !== undefined) {
          this.store.stack.push(result);
        }
      }
      return this.execute();
    } catch (err) {
      return this.fail(err);
    }
  }

  /**
   * Abandon a suspended execution. Unwinds every frame and reports a trap:
   * HostError for an await, FuelExhausted for a fuel suspension.
   */
  abort(suspension: Suspension, reason?: unknown): Outcome {
    this.claim(suspension);
    if (reason instanceof Trap) {
      return this.fail(reason);
    }
    if (suspension.reason === SuspendReason.Fuel) {
      return this.fail(new Trap(TrapKind.FuelExhausted, "execution aborted while out of fuel", { cause: reason }));
    }
    const message = reason instanceof Error ? reason.message : String(reason);
    return this.fail(
      new Trap(TrapKind.HostError, `host function "${suspension.host.name}" failed: ${message}`, { cause: reason })
    );
  }

  /**
   * Call an export and drive it to completion, awaiting async host calls
   * and yielding to the event loop between fuel slices.
   */
  async callAsync(name: string, args: readonly Value[] = []): Promise<Outcome> {
    let outcome = this.call(name, args);
    while (outcome.kind === OutcomeKind.Suspended) {
      const suspension = outcome.suspension;
      if (suspension.reason === SuspendReason.Await) {
        const settled = await suspension.settled;
        outcome = settled.ok ? this.resume(suspension, settled.value) : this.abort(suspension, settled.error);
      } else {
        await setImmediate();
        outcome = this.resume(suspension);
      }
    }
    return outcome;
  }

  // =========================================================================
  // Driver
  // =========================================================================

  private checkIdle(): void {
    if (this.store.busy) {
      throw new VMError(`module "${this.module.name}" is busy`);
    }
  }

  private claim(suspension: Suspension): void {
    if (suspension !== this.suspension || this.store.status !== StoreStatus.Suspended) {
      throw new VMError("stale suspension handle");
    }
    this.suspension = undefined;
    this.store.status = StoreStatus.Running;
  }

  private emit(event: TraceEvent): void {
    if (this.trace !== undefined) this.trace(event);
  }

  private begin(func: CompiledFunction, args: readonly StackValue[]): Outcome {
    const store = this.store;
    store.status = StoreStatus.Running;
    store.peakDepth = 0;
    this.resultType = func.type.results[0];
    this.fuel = this.limiter.sliceFuel();
    try {
      for (const arg of args) store.stack.push(arg);
      this.invoke(func);
      return this.execute();
    } catch (err) {
      return this.fail(err);
    }
  }

  /**
   * Run units until the outermost frame returns, a trap is thrown, or the
   * slice suspends.
   */
  private execute(): Outcome {
    const store = this.store;
    const frames = store.frames;
    let ran = false;

    for (;;) {
      const frame = frames[frames.length - 1];
      const top = frame.blocks.length - 1;
      const block = frame.blocks[top];
      const pc = frame.pcs[top];

      let action: Action;
      if (pc >= block.units.length) {
        if (top > 0) {
          frame.exit();
          continue;
        }
        action = {
          kind: ActionKind.Return,
          value: frame.func.type.results.length > 0 ? store.stack.pop() : undefined,
        };
      } else {
        const unit = block.units[pc];
        if (unit.cost > this.fuel) {
          if (!this.limiter.suspendOnFuelExhausted()) {
            throw new Trap(TrapKind.FuelExhausted, `fuel exhausted before "${unit.name}"`);
          }
          if (ran) {
            return this.suspend({ reason: SuspendReason.Fuel });
          }
          this.fuel = 0;
        } else {
          this.fuel -= unit.cost;
        }
        ran = true;
        frame.pcs[top] = pc + 1;
        action = unit.run(frame, store);
      }

      switch (action.kind) {
        case ActionKind.End:
          break;
        case ActionKind.Enter:
          frame.enter(action.block);
          break;
        case ActionKind.Branch:
          frame.branch(action.depth);
          break;
        case ActionKind.Return: {
          const done = this.return(action.value);
          if (done !== undefined) return done;
          break;
        }
        case ActionKind.Call:
          this.invoke(action.callee);
          break;
        case ActionKind.TailCall:
          this.emit({ kind: "call", func: action.callee.name, depth: frames.length, tail: true });
          frame.reuse(action.callee, store.stack);
          break;
        case ActionKind.Await:
          return this.suspend({
            reason: SuspendReason.Await,
            host: action.host,
            tail: action.tail,
            settled: action.promise.then(
              (value): HostSettlement => ({ ok: true, value }),
              (error: unknown): HostSettlement => ({ ok: false, error })
            ),
          });
      }
    }
  }

  /**
   * Push a frame for `func`; its arguments are on the operand stack.
   */
  private invoke(func: CompiledFunction): void {
    const store = this.store;
    const depth = store.frames.length + 1;
    if (!this.limiter.callDepth(depth)) {
      throw new Trap(TrapKind.CallDepthExceeded, `call depth ${depth} exceeds the configured limit`);
    }
    if (depth > MAX_FRAME_DEPTH) {
      throw new Trap(TrapKind.CallStackExhausted);
    }
    store.frames.push(CallFrame.create(func, store.stack));
    if (depth > store.peakDepth) store.peakDepth = depth;
    this.emit({ kind: "call", func: func.name, depth, tail: false });
  }

  /**
   * Pop the current frame. Returns the final outcome once the outermost
   * frame has returned.
   */
  private return(value: StackValue | undefined): Outcome | undefined {
    const store = this.store;
    const frame = store.frames.pop();
    if (frame === undefined) {
      throw new VMError("return without a frame");
    }
    store.stack.truncate(frame.base);
    this.emit({ kind: "return", func: frame.func.name, depth: store.frames.length + 1 });
    if (store.frames.length > 0) {
      if (value !== undefined) store.stack.push(value);
      return undefined;
    }
    store.reset();
    store.status = StoreStatus.Idle;
    const type = this.resultType;
    return completed(type === undefined || value === undefined ? undefined : toValue(type, value));
  }

  private suspend(suspension: Suspension): Outcome {
    this.suspension = suspension;
    this.store.status = StoreStatus.Suspended;
    this.emit({ kind: "suspend", reason: suspension.reason });
    return suspended(suspension);
  }

  /**
   * Unwind everything. Traps become an outcome; anything else is rethrown.
   */
  private fail(err: unknown): Outcome {
    this.store.reset();
    this.store.status = StoreStatus.Idle;
    this.suspension = undefined;
    if (err instanceof Trap) {
      this.emit({ kind: "trap", trap: err });
      return trapped(err);
    }
    throw err;
  }
}

