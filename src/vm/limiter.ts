/**
 * Resource limits.
 */

import { VMError } from "./errors.js";

/**
 * Recognized resource limit options. Each is enforced independently and
 * breaches trap with their own kind.
 */
export interface ResourceLimits {
  /** Fuel per call or resume slice. Unlimited when absent. */
  fuel?: number;
  /** What to do when a slice runs out of fuel. Defaults to "trap". */
  onFuelExhausted?: "trap" | "suspend";
  /** Linear memory cap in pages. */
  maxMemoryPages?: number;
  /** Call frame depth cap. */
  maxCallDepth?: number;
}

/**
 * Policy consulted by the driver.
 */
export interface ResourceLimiter {
  /** Fuel granted to a new slice; `Infinity` for unlimited. */
  sliceFuel(): number;
  /** Whether an exhausted slice suspends instead of trapping. */
  suspendOnFuelExhausted(): boolean;
  /** Whether memory may grow from `current` to `desired` pages. */
  memoryGrowing(current: number, desired: number): boolean;
  /** Whether a call may push the frame list to `depth` frames. */
  callDepth(depth: number): boolean;
}

function checkLimit(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new VMError(`limit "${name}" must be a non-negative integer, got ${value}`);
  }
}

/**
 * Limiter built from `ResourceLimits`.
 */
export class DefaultLimiter implements ResourceLimiter {
  private readonly limits: ResourceLimits;

  constructor(limits: ResourceLimits = {}) {
    checkLimit("fuel", limits.fuel);
    checkLimit("maxMemoryPages", limits.maxMemoryPages);
    checkLimit("maxCallDepth", limits.maxCallDepth);
    this.limits = { ...limits };
  }

  sliceFuel(): number {
    return this.limits.fuel ?? Infinity;
  }

  suspendOnFuelExhausted(): boolean {
    return this.limits.onFuelExhausted === "suspend";
  }

  memoryGrowing(_current: number, desired: number): boolean {
    const max = this.limits.maxMemoryPages;
    return max === undefined || desired <= max;
  }

  callDepth(depth: number): boolean {
    const max = this.limits.maxCallDepth;
    return max === undefined || depth <= max;
  }
}
