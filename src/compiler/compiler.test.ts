/**
 * Compiler tests.
 */

import { describe, it, expect } from "vitest";
import { CompileError } from "./compiler.js";
import { CompiledFunction, FunctionEntry } from "./block.js";
import { ModuleBuilder, funcType } from "../bytecode/module.js";
import { State } from "../vm/state.js";
import { VMError } from "../vm/errors.js";
import { defineAsyncHost, defineHost } from "../host/host.js";
import { ValueType } from "../value/value.js";

const I32 = ValueType.I32;
const I64 = ValueType.I64;

interface FunctionOptions {
  params?: ValueType[];
  results?: ValueType[];
  locals?: ValueType[];
  merge?: boolean;
  memory?: boolean;
}

function moduleFunction(entry: FunctionEntry | undefined): CompiledFunction {
  if (!(entry instanceof CompiledFunction)) {
    throw new Error("expected a module function");
  }
  return entry;
}

function compileFunction(body: string, options: FunctionOptions = {}): CompiledFunction {
  const builder = new ModuleBuilder();
  if (options.memory) builder.setMemory(1);
  builder.addFunction({
    name: "f",
    params: options.params,
    results: options.results,
    locals: options.locals,
    body,
  });
  const module = new State().load("test", builder.build(), { merge: options.merge });
  return moduleFunction(module.functions[0]);
}

function unitNames(body: string, options: FunctionOptions = {}): string[] {
  return compileFunction(body, options).body.units.map((u) => u.name);
}

function unitCosts(body: string, options: FunctionOptions = {}): number[] {
  return compileFunction(body, options).body.units.map((u) => u.cost);
}

function compileError(body: string, options: FunctionOptions = {}): string {
  try {
    compileFunction(body, options);
  } catch (err) {
    if (err instanceof CompileError) return err.message;
    throw err;
  }
  throw new Error("expected a compile error");
}

const INCREMENT = "local.get 0\ni32.const 1\ni32.add\nlocal.set 0";

describe("Compiler", () => {
  describe("merging", () => {
    it("should fuse a straight-line run into one unit", () => {
      expect(unitNames(INCREMENT, { params: [I32] })).toEqual(["local.get+i32.const+i32.add+local.set", "end"]);
      expect(unitCosts(INCREMENT, { params: [I32] })).toEqual([4, 0]);
    });

    it("should emit one unit per opcode when merging is off", () => {
      const options = { params: [I32], merge: false };
      expect(unitNames(INCREMENT, options)).toEqual(["local.get", "i32.const", "i32.add", "local.set", "end"]);
      expect(unitCosts(INCREMENT, options)).toEqual([1, 1, 1, 1, 0]);
    });

    it("should fold the returned value into the end unit", () => {
      const body = "local.get 0\nlocal.get 1\ni32.add";
      expect(unitNames(body, { params: [I32, I32], results: [I32] })).toEqual(["local.get+local.get+i32.add+end"]);
      expect(unitCosts(body, { params: [I32, I32], results: [I32] })).toEqual([3]);
    });

    it("should charge nothing for nop", () => {
      expect(unitCosts("nop\nnop", {})).toEqual([0]);
    });

    it("should materialize pending values before an effect", () => {
      const body = "i32.const 7\ni32.const 0\ni32.const 1\ni32.store\ni32.const 2\ni32.add";
      expect(unitNames(body, { results: [I32], memory: true })).toEqual([
        "i32.const",
        "i32.const+i32.const+i32.store",
        "i32.const+i32.add+end",
      ]);
    });

    it("should keep drop as a unit", () => {
      expect(unitNames("i32.const 1\ndrop", {})).toEqual(["i32.const+drop", "end"]);
    });
  });

  describe("structured control", () => {
    it("should emit one unit per nested block", () => {
      const body = "block\nlocal.get 0\nbr_if 0\ni32.const 1\nlocal.set 0\nend";
      expect(unitNames(body, { params: [I32] })).toEqual(["block", "end"]);
    });

    it("should fold the condition into the if unit", () => {
      expect(unitNames("local.get 0\nif\nnop\nend", { params: [I32] })).toEqual(["local.get+if", "end"]);
      expect(unitCosts("local.get 0\nif\nnop\nend", { params: [I32] })).toEqual([2, 0]);
    });

    it("should compile a branch to the function body as a return", () => {
      expect(unitNames("i32.const 3\nbr 0", { results: [I32] })).toEqual(["i32.const+br"]);
    });

    it("should skip unreachable code", () => {
      expect(unitNames("return\ni32.const 1\ndrop\nblock\nend", {})).toEqual(["return"]);
    });
  });

  describe("errors", () => {
    it("should reject operand type mismatches", () => {
      expect(compileError("i64.const 1\ni32.const 1\ni32.add", { results: [I32] })).toBe(
        'type mismatch: expected i32, got i64 in function "f" at instruction 2'
      );
    });

    it("should reject stack underflow", () => {
      expect(compileError("i32.add", { results: [I32] })).toBe(
        'operand stack underflow in function "f" at instruction 0'
      );
    });

    it("should reject leftover values", () => {
      expect(compileError("i32.const 1", {})).toBe('function leaves 1 values, expected 0 in function "f" at instruction 1');
    });

    it("should reject an if with a result but no else", () => {
      expect(compileError("i32.const 1\nif i32\ni32.const 2\nend", { results: [I32] })).toBe(
        'if with a result needs an else in function "f" at instruction 3'
      );
    });

    it("should reject unbalanced blocks", () => {
      expect(compileError("block", {})).toBe('unterminated block in function "f" at instruction 1');
      expect(compileError("else", {})).toBe('else without if in function "f" at instruction 0');
      expect(compileError("end\nnop", {})).toBe('instruction after the final end in function "f" at instruction 1');
    });

    it("should reject memory access without a memory", () => {
      expect(compileError("i32.const 0\ni32.load", { results: [I32] })).toBe(
        'i32.load requires a memory in function "f" at instruction 1'
      );
    });

    it("should reject branches past the function body", () => {
      expect(compileError("br 1", {})).toBe('branch depth 1 out of range in function "f" at instruction 0');
    });

    it("should reject br_table targets of different arity", () => {
      const body = "block i32\ni32.const 1\ni32.const 0\nbr_table 0 1\nend\ndrop";
      expect(compileError(body, {})).toBe(
        'br_table targets have different result types in function "f" at instruction 3'
      );
    });

    it("should reject writes to immutable globals", () => {
      const builder = new ModuleBuilder();
      builder.addGlobal(I64, 1n);
      builder.addFunction({ name: "f", body: "i64.const 2\nglobal.set 0" });
      expect(() => new State().load("test", builder.build())).toThrow(
        'global 0 is immutable in function "f" at instruction 1'
      );
    });

    it("should reject tail calls with a different result type", () => {
      const builder = new ModuleBuilder();
      builder.addFunction({ name: "g", results: [I64], body: "i64.const 1" });
      builder.addFunction({ name: "f", results: [I32], body: "return_call 0" });
      expect(() => new State().load("test", builder.build())).toThrow(CompileError);
    });
  });

  describe("modules", () => {
    it("should not register a module that fails to compile", () => {
      const state = new State();
      const builder = new ModuleBuilder();
      builder.addFunction({ name: "f", body: "i32.add" });
      expect(() => state.load("broken", builder.build())).toThrow(CompileError);
      expect(state.hasModule("broken")).toBe(false);
    });

    it("should reject duplicate module names", () => {
      const state = new State();
      const def = new ModuleBuilder().build();
      state.load("m", def);
      expect(() => state.load("m", def)).toThrow(VMError);
    });

    it("should reject unresolved imports", () => {
      const builder = new ModuleBuilder();
      builder.addImport("env", "missing", funcType([], []));
      expect(() => new State().load("m", builder.build())).toThrow('unresolved import "env.missing"');
    });

    it("should reject imports whose signature differs from the host", () => {
      const state = new State();
      state.registerHost("env", "log", defineHost(funcType([I32], []), () => undefined));
      const builder = new ModuleBuilder();
      builder.addImport("env", "log", funcType([I64], []));
      expect(() => state.load("m", builder.build())).toThrow(
        'import "env.log" expects (i64) -> (), host provides (i32) -> ()'
      );
    });

    it("should name functions after their exports", () => {
      const builder = new ModuleBuilder();
      builder.addFunction({ body: "nop", export: "run" });
      builder.addFunction({ body: "nop" });
      const module = new State().load("m", builder.build());
      expect(module.functions.map((f) => f.name)).toEqual(["run", "func1"]);
    });

    it("should mark functions that may await", () => {
      const state = new State();
      state.registerHost("env", "wait", defineAsyncHost(funcType([I32], [I32]), async (args) => args[0]));
      const builder = new ModuleBuilder();
      const wait = builder.addImport("env", "wait", funcType([I32], [I32]));
      const inner = builder.addFunction({ name: "inner", params: [I32], results: [I32], body: `local.get 0\ncall ${wait}` });
      const outer = builder.addFunction({ name: "outer", params: [I32], results: [I32], body: `local.get 0\ncall ${inner}` });
      builder.addFunction({ name: "plain", results: [I32], body: "i32.const 1" });
      const module = state.load("m", builder.build());

      const innerFn = moduleFunction(module.functions[inner]);
      const outerFn = moduleFunction(module.functions[outer]);
      expect(innerFn.mayAwait).toBe(true);
      expect(outerFn.mayAwait).toBe(true);
      expect(moduleFunction(module.functions[outer + 1]).mayAwait).toBe(false);
      expect(innerFn.body.units.map((u) => u.name)).toEqual(["local.get+call.async", "end"]);
      expect(outerFn.body.units.map((u) => u.name)).toEqual(["local.get+call.async", "end"]);
    });
  });
});
