/**
 * Module compilation: validates a ModuleDef, binds its imports and compiles
 * every function body. A module either compiles completely or not at all.
 */

import { Op } from "../bytecode/opcode.js";
import { FunctionType, ModuleDef, formatType, sameType } from "../bytecode/module.js";
import {
  CompiledFunction,
  CompiledGlobal,
  CompiledModule,
  FunctionEntry,
  FunctionKind,
  HostImport,
} from "./block.js";
import { CompileError, CompilerConfig, FunctionCompiler, ModuleContext } from "./compiler.js";
import type { HostFunction } from "../host/host.js";
import { VMError } from "../vm/errors.js";
import { PAGE_SIZE, MAX_PAGES } from "../vm/memory.js";
import { StackValue, ValueType, valueTypeName } from "../value/value.js";

/**
 * Host lookup used to bind imports.
 */
export interface HostResolver {
  resolveHost(module: string, name: string): { index: number; host: HostFunction } | undefined;
}

const encoder = new TextEncoder();

function checkTypes(types: readonly FunctionType[]): void {
  types.forEach((type, i) => {
    if (type.results.length > 1) {
      throw new CompileError(`type ${i} has ${type.results.length} results, at most one is supported`);
    }
  });
}

function typeAt(types: readonly FunctionType[], index: number, where: string): FunctionType {
  const type = types[index];
  if (type === undefined) {
    throw new CompileError(`${where} refers to unknown type ${index}`);
  }
  return type;
}

function bindImports(def: ModuleDef, types: readonly FunctionType[], hosts: HostResolver): HostImport[] {
  return (def.imports ?? []).map((imp): HostImport => {
    const type = typeAt(types, imp.type, `import "${imp.module}.${imp.name}"`);
    const resolved = hosts.resolveHost(imp.module, imp.name);
    if (resolved === undefined) {
      throw new VMError(`unresolved import "${imp.module}.${imp.name}"`);
    }
    if (!sameType(resolved.host.type, type)) {
      throw new VMError(
        `import "${imp.module}.${imp.name}" expects ${formatType(type)}, host provides ${formatType(resolved.host.type)}`
      );
    }
    return Object.freeze({
      kind: FunctionKind.Host,
      name: `${imp.module}.${imp.name}`,
      hostIndex: resolved.index,
      type,
      host: resolved.host,
    });
  });
}

/**
 * Build the table's initial contents as function indices.
 */
function buildTable(def: ModuleDef, functionCount: number): CompiledModule["table"] {
  const table = def.table;
  if (table === undefined) {
    return undefined;
  }
  const elements: (number | null)[] = new Array<number | null>(table.size).fill(null);
  for (const segment of table.elements ?? []) {
    if (segment.offset < 0 || segment.offset + segment.funcs.length > table.size) {
      throw new CompileError(`element segment at ${segment.offset} does not fit a table of ${table.size}`);
    }
    segment.funcs.forEach((func, i) => {
      if (func < 0 || func >= functionCount) {
        throw new CompileError(`element segment refers to unknown function ${func}`);
      }
      elements[segment.offset + i] = func;
    });
  }
  return Object.freeze({ size: table.size, elements: Object.freeze(elements) });
}

/**
 * Decide which defined functions may suspend on an async host call,
 * directly or through their callees.
 */
function findAwaiting(def: ModuleDef, imports: readonly HostImport[], table: CompiledModule["table"]): boolean[] {
  const importCount = imports.length;
  const awaits = def.functions.map(() => false);
  const entryAwaits = (index: number): boolean =>
    index < importCount ? imports[index].host.async : awaits[index - importCount];
  const tableAwaits = (): boolean =>
    table !== undefined && table.elements.some((index) => index !== null && entryAwaits(index));

  let changed = true;
  while (changed) {
    changed = false;
    def.functions.forEach((fn, i) => {
      if (awaits[i]) return;
      const found = fn.body.some((instr) => {
        switch (instr.op) {
          case Op.Call:
          case Op.ReturnCall:
            return instr.func >= 0 && instr.func < importCount + awaits.length && entryAwaits(instr.func);
          case Op.CallIndirect:
          case Op.ReturnCallIndirect:
            return tableAwaits();
          default:
            return false;
        }
      });
      if (found) {
        awaits[i] = true;
        changed = true;
      }
    });
  }
  return awaits;
}

function functionNames(def: ModuleDef, importCount: number): Map<number, string> {
  const names = new Map<number, string>();
  for (const [name, index] of Object.entries(def.exports ?? {})) {
    if (!names.has(index)) names.set(index, name);
  }
  def.functions.forEach((fn, i) => {
    if (fn.name !== undefined) names.set(importCount + i, fn.name);
  });
  return names;
}

function compileGlobals(def: ModuleDef): CompiledGlobal[] {
  return (def.globals ?? []).map((g, i): CompiledGlobal => {
    let init: StackValue;
    if (g.type === ValueType.I64) {
      if (typeof g.init !== "bigint") {
        throw new CompileError(`global ${i} is i64 and needs a bigint initializer`);
      }
      init = BigInt.asIntN(64, g.init);
    } else {
      if (typeof g.init !== "number") {
        throw new CompileError(`global ${i} is ${valueTypeName(g.type)} and needs a number initializer`);
      }
      init = g.type === ValueType.I32 ? g.init | 0 : g.type === ValueType.F32 ? Math.fround(g.init) : g.init;
    }
    return Object.freeze({ type: g.type, mutable: g.mutable ?? false, init });
  });
}

function compileMemory(def: ModuleDef): CompiledModule["memory"] {
  const memory = def.memory;
  if (memory === undefined) {
    return undefined;
  }
  const maximum = memory.maximum ?? MAX_PAGES;
  if (!Number.isInteger(memory.initial) || memory.initial < 0 || memory.initial > maximum || maximum > MAX_PAGES) {
    throw new CompileError(`invalid memory limits ${memory.initial}..${maximum}`);
  }
  return Object.freeze({ initial: memory.initial, maximum });
}

function compileData(def: ModuleDef, memory: CompiledModule["memory"]): CompiledModule["data"] {
  const segments = def.data ?? [];
  if (segments.length > 0 && memory === undefined) {
    throw new CompileError("data segments require a memory");
  }
  const size = (memory?.initial ?? 0) * PAGE_SIZE;
  return segments.map((segment) => {
    const bytes =
      typeof segment.bytes === "string" ? encoder.encode(segment.bytes) : Uint8Array.from(segment.bytes);
    if (segment.offset < 0 || segment.offset + bytes.length > size) {
      throw new CompileError(`data segment at ${segment.offset} does not fit the initial memory`);
    }
    return Object.freeze({ offset: segment.offset, bytes });
  });
}

/**
 * Compile a module definition.
 */
export function compileModule(
  name: string,
  def: ModuleDef,
  hosts: HostResolver,
  config: CompilerConfig = {}
): CompiledModule {
  const types = def.types ?? [];
  checkTypes(types);
  const imports = bindImports(def, types, hosts);
  const importCount = imports.length;
  const functionCount = importCount + def.functions.length;

  const table = buildTable(def, functionCount);
  const awaits = findAwaiting(def, imports, table);
  const names = functionNames(def, importCount);

  const compiled = def.functions.map((fn, i) => {
    const index = importCount + i;
    const type = typeAt(types, fn.type, `function ${index}`);
    return new CompiledFunction(
      names.get(index) ?? `func${index}`,
      index,
      type,
      [...type.params, ...(fn.locals ?? [])],
      awaits[i]
    );
  });
  const functions: FunctionEntry[] = [...imports, ...compiled];
  const memory = compileMemory(def);
  const globals = compileGlobals(def);

  const ctx: ModuleContext = {
    types,
    functions,
    globals,
    hasMemory: memory !== undefined,
    hasTable: table !== undefined,
  };
  compiled.forEach((fn, i) => {
    fn.finish(new FunctionCompiler(ctx, fn, config).compile(def.functions[i].body));
  });

  const exports = new Map<string, number>();
  for (const [exportName, index] of Object.entries(def.exports ?? {})) {
    if (!Number.isInteger(index) || index < 0 || index >= functionCount) {
      throw new CompileError(`export "${exportName}" refers to unknown function ${index}`);
    }
    exports.set(exportName, index);
  }

  const start = def.start;
  if (start !== undefined) {
    const entry = functions[start];
    if (entry === undefined || entry.kind !== FunctionKind.Module) {
      throw new CompileError(`start function ${start} is not defined in the module`);
    }
    if (entry.type.params.length !== 0 || entry.type.results.length !== 0) {
      throw new CompileError(`start function must have type () -> (), got ${formatType(entry.type)}`);
    }
  }

  return Object.freeze({
    name,
    types: Object.freeze([...types]),
    functions: Object.freeze(functions),
    exports,
    start,
    memory,
    globals: Object.freeze(globals),
    table,
    data: Object.freeze(compileData(def, memory)),
  });
}
