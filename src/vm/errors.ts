/**
 * Runtime error types.
 */

/**
 * Trap kinds. A trap ends the current top-level call.
 */
export const enum TrapKind {
  // =========================================================================
  // Runtime faults
  // =========================================================================
  Unreachable = 1,
  DivisionByZero = 2,
  IntegerOverflow = 3,
  InvalidConversionToInt = 4,
  MemoryOutOfBounds = 5,
  LocalOutOfBounds = 6,
  GlobalOutOfBounds = 7,
  UndefinedElement = 8,
  IndirectCallTypeMismatch = 9,
  StackOverflow = 10, // Operand stack limit
  CallStackExhausted = 11, // Engine frame limit
  TypeMismatch = 12,

  // =========================================================================
  // Resource limits
  // =========================================================================
  FuelExhausted = 20,
  MemoryLimitExceeded = 21,
  CallDepthExceeded = 22,

  // =========================================================================
  // Host
  // =========================================================================
  HostError = 30,
}

/**
 * Get the name of a trap kind for debugging.
 */
export function trapKindName(kind: TrapKind): string {
  switch (kind) {
    case TrapKind.Unreachable:
      return "Unreachable";
    case TrapKind.DivisionByZero:
      return "DivisionByZero";
    case TrapKind.IntegerOverflow:
      return "IntegerOverflow";
    case TrapKind.InvalidConversionToInt:
      return "InvalidConversionToInt";
    case TrapKind.MemoryOutOfBounds:
      return "MemoryOutOfBounds";
    case TrapKind.LocalOutOfBounds:
      return "LocalOutOfBounds";
    case TrapKind.GlobalOutOfBounds:
      return "GlobalOutOfBounds";
    case TrapKind.UndefinedElement:
      return "UndefinedElement";
    case TrapKind.IndirectCallTypeMismatch:
      return "IndirectCallTypeMismatch";
    case TrapKind.StackOverflow:
      return "StackOverflow";
    case TrapKind.CallStackExhausted:
      return "CallStackExhausted";
    case TrapKind.TypeMismatch:
      return "TypeMismatch";
    case TrapKind.FuelExhausted:
      return "FuelExhausted";
    case TrapKind.MemoryLimitExceeded:
      return "MemoryLimitExceeded";
    case TrapKind.CallDepthExceeded:
      return "CallDepthExceeded";
    case TrapKind.HostError:
      return "HostError";
    default:
      return `Unknown(${kind})`;
  }
}

function defaultMessage(kind: TrapKind): string {
  switch (kind) {
    case TrapKind.Unreachable:
      return "unreachable executed";
    case TrapKind.DivisionByZero:
      return "integer divide by zero";
    case TrapKind.IntegerOverflow:
      return "integer overflow";
    case TrapKind.InvalidConversionToInt:
      return "invalid conversion to integer";
    case TrapKind.MemoryOutOfBounds:
      return "out of bounds memory access";
    case TrapKind.LocalOutOfBounds:
      return "local index out of bounds";
    case TrapKind.GlobalOutOfBounds:
      return "global index out of bounds";
    case TrapKind.UndefinedElement:
      return "undefined element";
    case TrapKind.IndirectCallTypeMismatch:
      return "indirect call type mismatch";
    case TrapKind.StackOverflow:
      return "operand stack overflow";
    case TrapKind.CallStackExhausted:
      return "call stack exhausted";
    case TrapKind.TypeMismatch:
      return "type mismatch";
    case TrapKind.FuelExhausted:
      return "fuel exhausted";
    case TrapKind.MemoryLimitExceeded:
      return "memory limit exceeded";
    case TrapKind.CallDepthExceeded:
      return "call depth exceeded";
    case TrapKind.HostError:
      return "host function failed";
    default:
      return "trap";
  }
}

/**
 * A terminal execution fault raised by a compiled unit.
 */
export class Trap extends Error {
  constructor(
    public readonly kind: TrapKind,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? defaultMessage(kind), options);
    this.name = "Trap";
  }
}

/**
 * VM misuse error (unknown export, busy store, bad arguments).
 */
export class VMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VMError";
  }
}
