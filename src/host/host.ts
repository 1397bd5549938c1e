/**
 * Host function bindings.
 *
 * Host functions receive their arguments as stack values and the calling
 * Store (for memory access). They cannot call back into the VM: the Store is
 * busy for the duration of the call.
 */

import type { Store } from "../vm/store.js";
import { FunctionType } from "../bytecode/module.js";
import { Trap, TrapKind } from "../vm/errors.js";
import { StackValue, normalize, valueTypeName } from "../value/value.js";

export type HostResult = StackValue | undefined;

export interface SyncHostFunction {
  readonly type: FunctionType;
  readonly async: false;
  readonly call: (args: StackValue[], store: Store) => HostResult;
}

export interface AsyncHostFunction {
  readonly type: FunctionType;
  readonly async: true;
  readonly call: (args: StackValue[], store: Store) => Promise<HostResult>;
}

export type HostFunction = SyncHostFunction | AsyncHostFunction;

/**
 * Define a synchronous host function.
 */
export function defineHost(type: FunctionType, call: SyncHostFunction["call"]): SyncHostFunction {
  return Object.freeze({ type, async: false, call });
}

/**
 * Define a host function that may suspend the caller until its promise
 * settles.
 */
export function defineAsyncHost(type: FunctionType, call: AsyncHostFunction["call"]): AsyncHostFunction {
  return Object.freeze({ type, async: true, call });
}

function hostFailure(name: string, err: unknown): Trap {
  if (err instanceof Trap) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new Trap(TrapKind.HostError, `host function "${name}" failed: ${message}`, { cause: err });
}

/**
 * Check a host result against the declared signature.
 */
export function checkResult(name: string, type: FunctionType, value: HostResult): HostResult {
  const expected = type.results[0];
  if (expected === undefined) {
    return undefined;
  }
  if (value === undefined) {
    throw new Trap(
      TrapKind.TypeMismatch,
      `host function "${name}" returned nothing, expected ${valueTypeName(expected)}`
    );
  }
  return normalize(expected, value);
}

/**
 * Invoke a synchronous host function. Thrown errors become HostError traps.
 */
export function callHost(name: string, host: SyncHostFunction, args: StackValue[], store: Store): HostResult {
  let result: HostResult;
  try {
    result = host.call(args, store);
  } catch (err) {
    throw hostFailure(name, err);
  }
  return checkResult(name, host.type, result);
}

/**
 * Start an asynchronous host function. A synchronous throw becomes a
 * HostError trap; a rejection is reported when the promise is awaited.
 */
export function startAsyncHost(
  name: string,
  host: AsyncHostFunction,
  args: StackValue[],
  store: Store
): Promise<HostResult> {
  try {
    return host.call(args, store).catch((err: unknown) => {
      throw hostFailure(name, err);
    });
  } catch (err) {
    throw hostFailure(name, err);
  }
}
