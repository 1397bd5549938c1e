/**
 * Results of running code: outcomes, suspensions and trace events.
 */

import type { HostImport } from "../compiler/block.js";
import type { HostResult } from "../host/host.js";
import { Trap } from "./errors.js";
import { Value } from "../value/value.js";

export const enum OutcomeKind {
  Completed = 0,
  Trapped = 1,
  Suspended = 2,
}

export const enum SuspendReason {
  /** The fuel slice ran out under the "suspend" policy. */
  Fuel = 0,
  /** An async host call is pending. */
  Await = 1,
}

/**
 * How an async host call settled. Never rejects.
 */
export type HostSettlement = { readonly ok: true; readonly value: HostResult } | { readonly ok: false; readonly error: unknown };

export interface FuelSuspension {
  readonly reason: SuspendReason.Fuel;
}

export interface AwaitSuspension {
  readonly reason: SuspendReason.Await;
  /** The host function being awaited. */
  readonly host: HostImport;
  /** Whether the host result becomes the caller's result directly. */
  readonly tail: boolean;
  readonly settled: Promise<HostSettlement>;
}

/**
 * Handle to a suspended execution. Valid until it is resumed or aborted.
 */
export type Suspension = FuelSuspension | AwaitSuspension;

export type Outcome =
  | { readonly kind: OutcomeKind.Completed; readonly value: Value | undefined }
  | { readonly kind: OutcomeKind.Trapped; readonly trap: Trap }
  | { readonly kind: OutcomeKind.Suspended; readonly suspension: Suspension };

export function completed(value: Value | undefined): Outcome {
  return { kind: OutcomeKind.Completed, value };
}

export function trapped(trap: Trap): Outcome {
  return { kind: OutcomeKind.Trapped, trap };
}

export function suspended(suspension: Suspension): Outcome {
  return { kind: OutcomeKind.Suspended, suspension };
}

/**
 * Structured execution events delivered to `VMConfig.trace`.
 */
export type TraceEvent =
  | { readonly kind: "call"; readonly func: string; readonly depth: number; readonly tail: boolean }
  | { readonly kind: "return"; readonly func: string; readonly depth: number }
  | { readonly kind: "suspend"; readonly reason: SuspendReason }
  | { readonly kind: "resume"; readonly reason: SuspendReason }
  | { readonly kind: "trap"; readonly trap: Trap };

export type TraceHandler = (event: TraceEvent) => void;
