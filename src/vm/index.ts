/**
 * VM module exports.
 */

export { VM, MAX_FRAME_DEPTH } from "./vm.js";
export type { VMConfig } from "./vm.js";
export { State } from "./state.js";
export { Store, StoreStatus } from "./store.js";
export { CallFrame } from "./frame.js";
export { Memory, PAGE_SIZE, MAX_PAGES } from "./memory.js";
export { OperandStack, STACK_LIMIT } from "./stack.js";
export { DefaultLimiter } from "./limiter.js";
export type { ResourceLimiter, ResourceLimits } from "./limiter.js";
export { Trap, TrapKind, VMError, trapKindName } from "./errors.js";
export { OutcomeKind, SuspendReason, completed, trapped, suspended } from "./outcome.js";
export type {
  Outcome,
  Suspension,
  FuelSuspension,
  AwaitSuspension,
  HostSettlement,
  TraceEvent,
  TraceHandler,
} from "./outcome.js";
