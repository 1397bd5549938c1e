/**
 * VM tests.
 */

import { describe, it, expect } from "vitest";
import { VM, VMConfig } from "./vm.js";
import { State } from "./state.js";
import { Outcome, OutcomeKind, TraceEvent } from "./outcome.js";
import { Trap, TrapKind, VMError } from "./errors.js";
import { ModuleBuilder, funcType } from "../bytecode/module.js";
import { defineHost } from "../host/host.js";
import { Value, ValueType, f64, i32, i64 } from "../value/value.js";

const I32 = ValueType.I32;
const I64 = ValueType.I64;
const F64 = ValueType.F64;

type Setup = (builder: ModuleBuilder, state: State) => void;

function instantiate(setup: Setup, config: VMConfig = {}): VM {
  const state = new State();
  const builder = new ModuleBuilder();
  setup(builder, state);
  state.load("main", builder.build());
  return new VM(state, "main", config);
}

function valueOf(outcome: Outcome): Value | undefined {
  if (outcome.kind === OutcomeKind.Trapped) {
    throw new Error(`expected completion, got trap: ${outcome.trap.message}`);
  }
  if (outcome.kind !== OutcomeKind.Completed) {
    throw new Error("expected completion, got a suspension");
  }
  return outcome.value;
}

function trapOf(outcome: Outcome): Trap {
  if (outcome.kind !== OutcomeKind.Trapped) {
    throw new Error("expected a trap");
  }
  return outcome.trap;
}

function single(body: string, results: ValueType[] = [I32], params: ValueType[] = [], locals: ValueType[] = []): VM {
  return instantiate((b) => {
    b.addFunction({ params, results, locals, body, export: "f" });
  });
}

const FIB = `
local.get 0
i32.const 2
i32.lt_s
if i32
  local.get 0
else
  local.get 0
  i32.const 1
  i32.sub
  call 0
  local.get 0
  i32.const 2
  i32.sub
  call 0
  i32.add
end
`;

const SUM = `
block
  loop
    local.get 0
    i32.eqz
    br_if 1
    local.get 1
    local.get 0
    i32.add
    local.set 1
    local.get 0
    i32.const 1
    i32.sub
    local.set 0
    br 0
  end
end
local.get 1
`;

const SWITCH = `
block
  block
    block
      local.get 0
      br_table 0 1 2
    end
    i32.const 10
    return
  end
  i32.const 20
  return
end
i32.const 30
`;

describe("VM", () => {
  describe("arithmetic", () => {
    it("should compute fib(10) with ordinary calls", () => {
      const vm = single(FIB, [I32], [I32]);
      expect(valueOf(vm.call("f", [i32(10)]))).toEqual(i32(55));
    });

    it("should wrap i64 addition", () => {
      const vm = single("local.get 0\ni64.const 1\ni64.add", [I64], [I64]);
      expect(valueOf(vm.call("f", [i64(9223372036854775807n)]))).toEqual(i64(-9223372036854775808n));
    });

    it("should wrap i64 constants folded into one unit", () => {
      const vm = single("i64.const 9223372036854775807\ni64.const 1\ni64.add", [I64]);
      expect(valueOf(vm.call("f"))).toEqual(i64(-9223372036854775808n));
    });

    it("should compute with floats", () => {
      const vm = single("local.get 0\nf64.sqrt\nf64.const 0.5\nf64.mul", [F64], [F64]);
      expect(valueOf(vm.call("f", [f64(16)]))).toEqual(f64(2));
    });

    it("should return nothing from a void function", () => {
      const vm = single("nop", []);
      expect(valueOf(vm.call("f"))).toBeUndefined();
    });
  });

  describe("control flow", () => {
    it("should run loops", () => {
      const vm = single(SUM, [I32], [I32], [I32]);
      expect(valueOf(vm.call("f", [i32(100)]))).toEqual(i32(5050));
    });

    it("should dispatch br_table", () => {
      const vm = single(SWITCH, [I32], [I32]);
      expect(valueOf(vm.call("f", [i32(0)]))).toEqual(i32(10));
      expect(valueOf(vm.call("f", [i32(1)]))).toEqual(i32(20));
      expect(valueOf(vm.call("f", [i32(2)]))).toEqual(i32(30));
      expect(valueOf(vm.call("f", [i32(-1)]))).toEqual(i32(30));
    });

    it("should carry a branch value out of a block and drop what is below it", () => {
      const vm = single("block i32\ni32.const 1\ni32.const 2\nbr 0\nend", [I32]);
      expect(valueOf(vm.call("f"))).toEqual(i32(2));
    });

    it("should take the else arm", () => {
      const vm = single("local.get 0\nif i32\ni32.const 1\nelse\ni32.const 2\nend", [I32], [I32]);
      expect(valueOf(vm.call("f", [i32(1)]))).toEqual(i32(1));
      expect(valueOf(vm.call("f", [i32(0)]))).toEqual(i32(2));
    });

    it("should select", () => {
      const vm = single("i32.const 10\ni32.const 20\nlocal.get 0\nselect", [I32], [I32]);
      expect(valueOf(vm.call("f", [i32(1)]))).toEqual(i32(10));
      expect(valueOf(vm.call("f", [i32(0)]))).toEqual(i32(20));
    });

    it("should keep the value written by local.tee", () => {
      const vm = single("i32.const 5\nlocal.tee 0\ni32.const 6\nlocal.set 0\nlocal.get 0\ni32.add", [I32], [], [I32]);
      expect(valueOf(vm.call("f"))).toEqual(i32(11));
    });
  });

  describe("traps", () => {
    it("should trap on local.get beyond the local count", () => {
      const vm = single("local.get 5");
      expect(trapOf(vm.call("f")).kind).toBe(TrapKind.LocalOutOfBounds);
    });

    it("should trap on local.set and local.tee beyond the local count", () => {
      expect(trapOf(single("i32.const 1\nlocal.set 3", []).call("f")).kind).toBe(TrapKind.LocalOutOfBounds);
      expect(trapOf(single("i32.const 1\nlocal.tee 3").call("f")).kind).toBe(TrapKind.LocalOutOfBounds);
    });

    it("should trap on unreachable", () => {
      const vm = single("unreachable");
      expect(trapOf(vm.call("f")).kind).toBe(TrapKind.Unreachable);
    });

    it("should unwind every frame and stay usable", () => {
      const vm = instantiate((b) => {
        b.addFunction({ params: [I32], results: [I32], body: "i32.const 10\nlocal.get 0\ni32.div_s" });
        b.addFunction({ params: [I32], results: [I32], body: "i32.const 1\nlocal.get 0\ncall 0\ni32.add", export: "f" });
      });
      expect(trapOf(vm.call("f", [i32(0)])).kind).toBe(TrapKind.DivisionByZero);
      expect(vm.store.frames.length).toBe(0);
      expect(vm.store.stack.height).toBe(0);
      expect(valueOf(vm.call("f", [i32(5)]))).toEqual(i32(3));
    });

    it("should keep memory writes made before a trap", () => {
      const vm = instantiate((b) => {
        b.setMemory(1);
        b.addFunction({ body: "i32.const 0\ni32.const 99\ni32.store\nunreachable", export: "f" });
      });
      expect(trapOf(vm.call("f")).kind).toBe(TrapKind.Unreachable);
      expect(vm.store.memory.i32(0)).toBe(99);
    });
  });

  describe("globals", () => {
    it("should read and write mutable globals", () => {
      const vm = instantiate((b) => {
        b.addGlobal(I32, 5, true);
        b.addFunction({
          results: [I32],
          body: "global.get 0\ni32.const 1\ni32.add\nglobal.set 0\nglobal.get 0",
          export: "inc",
        });
      });
      expect(valueOf(vm.call("inc"))).toEqual(i32(6));
      expect(valueOf(vm.call("inc"))).toEqual(i32(7));
      expect(vm.store.globals[0]).toBe(7);
    });

    it("should trap on global.get beyond the global count", () => {
      const vm = single("global.get 3");
      expect(trapOf(vm.call("f")).kind).toBe(TrapKind.GlobalOutOfBounds);
    });
  });

  describe("memory", () => {
    it("should store and load i64 values", () => {
      const vm = instantiate((b) => {
        b.setMemory(1);
        b.addFunction({ results: [I64], body: "i32.const 8\ni64.const -2\ni64.store\ni32.const 8\ni64.load", export: "f" });
        b.addFunction({ results: [I32], body: "i32.const 8\ni32.load8_u", export: "g" });
      });
      expect(valueOf(vm.call("f"))).toEqual(i64(-2n));
      expect(valueOf(vm.call("g"))).toEqual(i32(254));
    });

    it("should apply static offsets", () => {
      const vm = instantiate((b) => {
        b.setMemory(1);
        b.addFunction({ results: [I32], body: "i32.const 4\ni32.const 7\ni32.store offset=12\ni32.const 16\ni32.load", export: "f" });
      });
      expect(valueOf(vm.call("f"))).toEqual(i32(7));
    });

    it("should initialize data segments", () => {
      const vm = instantiate((b) => {
        b.setMemory(1);
        b.addData(0, "hi");
        b.addFunction({ results: [I32], body: "i32.const 1\ni32.load8_u", export: "f" });
      });
      expect(valueOf(vm.call("f"))).toEqual(i32(105));
      expect(vm.store.memory.readString(0, 2)).toBe("hi");
    });

    it("should grow up to the declared maximum", () => {
      const vm = instantiate((b) => {
        b.setMemory(1, 2);
        b.addFunction({ results: [I32], body: "i32.const 1\nmemory.grow", export: "grow" });
        b.addFunction({ results: [I32], body: "memory.size", export: "size" });
      });
      expect(valueOf(vm.call("grow"))).toEqual(i32(1));
      expect(valueOf(vm.call("grow"))).toEqual(i32(-1));
      expect(valueOf(vm.call("size"))).toEqual(i32(2));
    });

    it("should trap on out-of-bounds access", () => {
      const vm = instantiate((b) => {
        b.setMemory(1);
        b.addFunction({ results: [I32], body: "i32.const 65535\ni32.load", export: "f" });
      });
      expect(trapOf(vm.call("f")).kind).toBe(TrapKind.MemoryOutOfBounds);
    });
  });

  describe("indirect calls", () => {
    function dispatcher(): VM {
      return instantiate((b) => {
        const unary = b.addType(funcType([I32], [I32]));
        const double = b.addFunction({ params: [I32], results: [I32], body: "local.get 0\ni32.const 2\ni32.mul" });
        const triple = b.addFunction({ params: [I32], results: [I32], body: "local.get 0\ni32.const 3\ni32.mul" });
        const other = b.addFunction({ results: [I64], body: "i64.const 0" });
        b.setTable(4);
        b.addElements(0, [double, triple, other]);
        b.addFunction({
          params: [I32, I32],
          results: [I32],
          body: `local.get 1\nlocal.get 0\ncall_indirect ${unary}`,
          export: "dispatch",
        });
      });
    }

    it("should call through the table", () => {
      const vm = dispatcher();
      expect(valueOf(vm.call("dispatch", [i32(0), i32(7)]))).toEqual(i32(14));
      expect(valueOf(vm.call("dispatch", [i32(1), i32(7)]))).toEqual(i32(21));
    });

    it("should trap on an empty slot", () => {
      expect(trapOf(dispatcher().call("dispatch", [i32(3), i32(7)])).kind).toBe(TrapKind.UndefinedElement);
      expect(trapOf(dispatcher().call("dispatch", [i32(9), i32(7)])).kind).toBe(TrapKind.UndefinedElement);
    });

    it("should trap on a signature mismatch", () => {
      expect(trapOf(dispatcher().call("dispatch", [i32(2), i32(7)])).kind).toBe(TrapKind.IndirectCallTypeMismatch);
    });
  });

  describe("host functions", () => {
    it("should call a synchronous host function", () => {
      const vm = instantiate((b, state) => {
        state.registerHost("env", "add", defineHost(funcType([I32, I32], [I32]), ([x, y]) => Number(x) + Number(y)));
        const add = b.addImport("env", "add", funcType([I32, I32], [I32]));
        b.addFunction({ results: [I32], body: `i32.const 2\ni32.const 3\ncall ${add}`, export: "f" });
      });
      expect(valueOf(vm.call("f"))).toEqual(i32(5));
    });

    it("should let host functions read memory", () => {
      const seen: string[] = [];
      const vm = instantiate((b, state) => {
        state.registerHost(
          "env",
          "print",
          defineHost(funcType([I32, I32], []), ([ptr, len], store) => {
            seen.push(store.memory.readString(Number(ptr), Number(len)));
            return undefined;
          })
        );
        const print = b.addImport("env", "print", funcType([I32, I32], []));
        b.setMemory(1);
        b.addData(16, "hello");
        b.addFunction({ body: `i32.const 16\ni32.const 5\ncall ${print}`, export: "f" });
      });
      expect(valueOf(vm.call("f"))).toBeUndefined();
      expect(seen).toEqual(["hello"]);
    });

    it("should turn host exceptions into HostError traps", () => {
      const failure = new Error("disk on fire");
      const vm = instantiate((b, state) => {
        state.registerHost(
          "env",
          "fail",
          defineHost(funcType([], []), () => {
            throw failure;
          })
        );
        const fail = b.addImport("env", "fail", funcType([], []));
        b.addFunction({ body: `call ${fail}`, export: "f" });
      });
      const trap = trapOf(vm.call("f"));
      expect(trap.kind).toBe(TrapKind.HostError);
      expect(trap.message).toBe('host function "env.fail" failed: disk on fire');
      expect(trap.cause).toBe(failure);
    });

    it("should refuse re-entrant calls", () => {
      const holder: { vm?: VM } = {};
      const vm = instantiate((b, state) => {
        state.registerHost(
          "env",
          "reenter",
          defineHost(funcType([], []), () => {
            holder.vm?.call("g");
            return undefined;
          })
        );
        const reenter = b.addImport("env", "reenter", funcType([], []));
        b.addFunction({ body: `call ${reenter}`, export: "f" });
        b.addFunction({ body: "nop", export: "g" });
      });
      holder.vm = vm;
      const trap = trapOf(vm.call("f"));
      expect(trap.kind).toBe(TrapKind.HostError);
      expect(trap.cause).toBeInstanceOf(VMError);
    });

    it("should trap when a host returns the wrong type", () => {
      const vm = instantiate((b, state) => {
        state.registerHost("env", "big", defineHost(funcType([], [I32]), () => 1n));
        const big = b.addImport("env", "big", funcType([], [I32]));
        b.addFunction({ results: [I32], body: `call ${big}`, export: "f" });
      });
      expect(trapOf(vm.call("f")).kind).toBe(TrapKind.TypeMismatch);
    });
  });

  describe("embedding", () => {
    it("should validate arguments", () => {
      const vm = single(FIB, [I32], [I32]);
      expect(() => vm.call("f")).toThrow('"f" takes 1 arguments, got 0');
      expect(() => vm.call("f", [i64(1n)])).toThrow('argument 0 of "f" must be i32, got i64');
      expect(() => vm.call("nope")).toThrow('unknown export "nope"');
    });

    it("should reject unknown modules", () => {
      expect(() => new VM(new State(), "missing")).toThrow(VMError);
    });

    it("should run the start function", () => {
      const vm = instantiate((b) => {
        b.addGlobal(I32, 0, true);
        const init = b.addFunction({ body: "i32.const 42\nglobal.set 0" });
        b.setStart(init);
      });
      expect(valueOf(vm.start())).toBeUndefined();
      expect(vm.store.globals[0]).toBe(42);
    });

    it("should report calls and returns to the trace handler", () => {
      const events: TraceEvent[] = [];
      const state = new State();
      const builder = new ModuleBuilder();
      const inner = builder.addFunction({ name: "inner", body: "nop" });
      builder.addFunction({ name: "outer", body: `call ${inner}`, export: "outer" });
      state.load("main", builder.build());
      const vm = new VM(state, "main", { trace: (e) => events.push(e) });

      valueOf(vm.call("outer"));
      expect(events).toEqual([
        { kind: "call", func: "outer", depth: 1, tail: false },
        { kind: "call", func: "inner", depth: 2, tail: false },
        { kind: "return", func: "inner", depth: 2 },
        { kind: "return", func: "outer", depth: 1 },
      ]);
    });

    it("should share one loaded module between VMs", () => {
      const state = new State();
      const builder = new ModuleBuilder();
      builder.addGlobal(I32, 0, true);
      builder.addFunction({ results: [I32], body: "global.get 0\ni32.const 1\ni32.add\nglobal.set 0\nglobal.get 0", export: "inc" });
      state.load("counter", builder.build());
      const a = new VM(state, "counter");
      const b = new VM(state, "counter");
      valueOf(a.call("inc"));
      expect(valueOf(a.call("inc"))).toEqual(i32(2));
      expect(valueOf(b.call("inc"))).toEqual(i32(1));
    });
  });
});
