/**
 * Merged and unmerged compilation must be observably identical.
 */

import { describe, it, expect } from "vitest";
import { VM } from "./vm.js";
import { State } from "./state.js";
import { Outcome, OutcomeKind } from "./outcome.js";
import { trapKindName } from "./errors.js";
import { ModuleBuilder } from "../bytecode/module.js";
import { StackValue, Value, ValueType, formatValue, i32, i64 } from "../value/value.js";

const I32 = ValueType.I32;
const I64 = ValueType.I64;

type Setup = (builder: ModuleBuilder) => void;

interface Snapshot {
  result: string;
  memory: number[];
  globals: StackValue[];
}

function describeOutcome(outcome: Outcome): string {
  switch (outcome.kind) {
    case OutcomeKind.Completed:
      return outcome.value === undefined ? "void" : formatValue(outcome.value);
    case OutcomeKind.Trapped:
      return `trap:${trapKindName(outcome.trap.kind)}`;
    case OutcomeKind.Suspended:
      return "suspended";
  }
}

function snapshot(setup: Setup, merge: boolean, name: string, args: Value[]): Snapshot {
  const state = new State();
  const builder = new ModuleBuilder();
  setup(builder);
  state.load("main", builder.build(), { merge });
  const vm = new VM(state, "main");
  const result = describeOutcome(vm.call(name, args));
  return {
    result,
    memory: Array.from(vm.store.memory.bytes.subarray(0, 256)),
    globals: [...vm.store.globals],
  };
}

function runBoth(setup: Setup, name: string, args: Value[] = []): Snapshot {
  const merged = snapshot(setup, true, name, args);
  const unmerged = snapshot(setup, false, name, args);
  expect(merged).toEqual(unmerged);
  return merged;
}

function single(body: string, params: ValueType[], results: ValueType[], locals: ValueType[] = []): Setup {
  return (b) => {
    b.addFunction({ params, results, locals, body, export: "f" });
  };
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

const SQUARES = `
block
  loop
    local.get 1
    local.get 0
    i32.ge_s
    br_if 1
    local.get 1
    i32.const 4
    i32.mul
    local.get 1
    local.get 1
    i32.mul
    local.tee 2
    i32.store
    global.get 0
    local.get 2
    i32.add
    global.set 0
    local.get 1
    i32.const 1
    i32.add
    local.set 1
    br 0
  end
end
global.get 0
`;

describe("merge equivalence", () => {
  it("should agree on recursive calls", () => {
    expect(runBoth(single(FIB, [I32], [I32]), "f", [i32(15)]).result).toBe("i32:610");
  });

  it("should agree on memory and globals", () => {
    const setup: Setup = (b) => {
      b.setMemory(1);
      b.addGlobal(I32, 0, true);
      b.addFunction({ params: [I32], results: [I32], locals: [I32, I32], body: SQUARES, export: "f" });
    };
    const result = runBoth(setup, "f", [i32(20)]);
    expect(result.result).toBe("i32:2470");
    expect(result.globals).toEqual([2470]);
    expect(result.memory.slice(12, 16)).toEqual([9, 0, 0, 0]);
  });

  it("should agree on i64 wraparound", () => {
    const body = `
local.get 0
i64.const 3
i64.mul
i64.const 9223372036854775807
i64.add
local.get 0
i64.rotl
i64.const 1
i64.shr_u
`;
    runBoth(single(body, [I64], [I64]), "f", [i64(-6148914691236517206n)]);
    expect(runBoth(single("local.get 0\ni64.const 1\ni64.add", [I64], [I64]), "f", [i64(9223372036854775807n)]).result).toBe(
      "i64:-9223372036854775808"
    );
  });

  it("should agree on i32 wraparound", () => {
    const body = "local.get 0\ni32.const 2147483647\ni32.add\ni32.const 65536\ni32.mul";
    expect(runBoth(single(body, [I32], [I32]), "f", [i32(1)]).result).toBe("i32:0");
  });

  it("should trap on the first faulting opcode in program order", () => {
    const divideFirst = "i32.const 1\ni32.const 0\ni32.div_s\nlocal.get 9\ni32.add";
    const localFirst = "local.get 9\ni32.const 1\ni32.const 0\ni32.div_s\ni32.add";
    expect(runBoth(single(divideFirst, [], [I32]), "f").result).toBe("trap:DivisionByZero");
    expect(runBoth(single(localFirst, [], [I32]), "f").result).toBe("trap:LocalOutOfBounds");
  });

  it("should agree on stores that happen before a trap", () => {
    const setup: Setup = (b) => {
      b.setMemory(1);
      b.addFunction({
        results: [I32],
        body: "i32.const 8\ni32.const 77\ni32.store\ni32.const 1\ni32.const 0\ni32.rem_u",
        export: "f",
      });
    };
    const result = runBoth(setup, "f");
    expect(result.result).toBe("trap:DivisionByZero");
    expect(result.memory.slice(8, 12)).toEqual([77, 0, 0, 0]);
  });

  it("should agree on select over computed operands", () => {
    const body = "i32.const 1\ni32.const 2\ni32.add\nlocal.get 0\ni32.const 5\ni32.mul\nlocal.get 0\nselect";
    expect(runBoth(single(body, [I32], [I32]), "f", [i32(4)]).result).toBe("i32:3");
    expect(runBoth(single(body, [I32], [I32]), "f", [i32(0)]).result).toBe("i32:0");
  });

  it("should agree on values carried by branches", () => {
    const body = "block i32\ni32.const 1\nlocal.get 0\nbr_if 0\ndrop\ni32.const 2\nend";
    expect(runBoth(single(body, [I32], [I32]), "f", [i32(1)]).result).toBe("i32:1");
    expect(runBoth(single(body, [I32], [I32]), "f", [i32(0)]).result).toBe("i32:2");
  });
});
