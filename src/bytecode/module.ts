/**
 * Decoded module description and a builder for it.
 *
 * A `ModuleDef` is what a decoder hands to the compiler: already validated
 * function bodies plus the module's types, imports, exports, memory, globals,
 * table and data segments.
 */

import { Instruction } from "./instruction.js";
import { assemble } from "./assembler.js";
import { ValueType, valueTypeName } from "../value/value.js";

/**
 * Function signature. At most one result.
 */
export interface FunctionType {
  readonly params: readonly ValueType[];
  readonly results: readonly ValueType[];
}

export interface ImportDef {
  readonly module: string;
  readonly name: string;
  /** Index into the type section. */
  readonly type: number;
}

export interface FunctionDef {
  readonly name?: string;
  /** Index into the type section. */
  readonly type: number;
  /** Declared locals, after the parameters. */
  readonly locals?: readonly ValueType[];
  readonly body: readonly Instruction[];
}

export interface GlobalDef {
  readonly type: ValueType;
  readonly mutable?: boolean;
  readonly init: number | bigint;
}

export interface MemoryDef {
  /** Initial size in 64 KiB pages. */
  readonly initial: number;
  readonly maximum?: number;
}

export interface ElementSegment {
  readonly offset: number;
  /** Function indices placed at consecutive table slots. */
  readonly funcs: readonly number[];
}

export interface TableDef {
  readonly size: number;
  readonly elements?: readonly ElementSegment[];
}

export interface DataSegment {
  readonly offset: number;
  /** Raw bytes, or a string stored as UTF-8. */
  readonly bytes: readonly number[] | Uint8Array | string;
}

export interface ModuleDef {
  readonly types?: readonly FunctionType[];
  readonly imports?: readonly ImportDef[];
  readonly functions: readonly FunctionDef[];
  /** Export name to function index. */
  readonly exports?: Readonly<Record<string, number>>;
  readonly start?: number;
  readonly memory?: MemoryDef;
  readonly globals?: readonly GlobalDef[];
  readonly table?: TableDef;
  readonly data?: readonly DataSegment[];
}

/**
 * Create a function type.
 */
export function funcType(params: readonly ValueType[] = [], results: readonly ValueType[] = []): FunctionType {
  return { params: [...params], results: [...results] };
}

/**
 * Structural signature equality.
 */
export function sameType(a: FunctionType, b: FunctionType): boolean {
  return (
    a.params.length === b.params.length &&
    a.results.length === b.results.length &&
    a.params.every((t, i) => t === b.params[i]) &&
    a.results.every((t, i) => t === b.results[i])
  );
}

/**
 * Format a signature, e.g. `(i32, i64) -> i32`.
 */
export function formatType(type: FunctionType): string {
  const params = type.params.map(valueTypeName).join(", ");
  const results = type.results.length === 0 ? "()" : type.results.map(valueTypeName).join(", ");
  return `(${params}) -> ${results}`;
}

/**
 * Function description accepted by `ModuleBuilder.addFunction`.
 */
export interface FunctionInit {
  name?: string;
  params?: readonly ValueType[];
  results?: readonly ValueType[];
  locals?: readonly ValueType[];
  /** Instructions, or assembler text. */
  body: string | readonly Instruction[];
  /** Export the function under this name. */
  export?: string;
}

/**
 * Mutable module builder. Indices returned by the `add*` methods are final.
 */
export class ModuleBuilder {
  private types: FunctionType[] = [];
  private imports: ImportDef[] = [];
  private functions: FunctionDef[] = [];
  private exports: Record<string, number> = {};
  private globals: GlobalDef[] = [];
  private data: DataSegment[] = [];
  private elements: ElementSegment[] = [];
  private tableSize: number | undefined;
  private memory: MemoryDef | undefined;
  private start: number | undefined;

  /**
   * Add a type and return its index. Equal signatures share one index.
   */
  addType(type: FunctionType): number {
    const existing = this.types.findIndex((t) => sameType(t, type));
    if (existing !== -1) {
      return existing;
    }
    this.types.push(funcType(type.params, type.results));
    return this.types.length - 1;
  }

  /**
   * Add an imported host function and return its function index.
   */
  addImport(module: string, name: string, type: FunctionType): number {
    if (this.functions.length > 0) {
      throw new Error("imports must be added before functions");
    }
    this.imports.push({ module, name, type: this.addType(type) });
    return this.imports.length - 1;
  }

  /**
   * Add a function and return its function index.
   */
  addFunction(init: FunctionInit): number {
    const type = this.addType(funcType(init.params, init.results));
    const body = typeof init.body === "string" ? assemble(init.body) : [...init.body];
    this.functions.push({ name: init.name, type, locals: [...(init.locals ?? [])], body });
    const index = this.imports.length + this.functions.length - 1;
    if (init.export !== undefined) {
      this.exportFunction(init.export, index);
    }
    return index;
  }

  exportFunction(name: string, index: number): this {
    this.exports[name] = index;
    return this;
  }

  /**
   * Add a global and return its index.
   */
  addGlobal(type: ValueType, init: number | bigint, mutable = false): number {
    this.globals.push({ type, init, mutable });
    return this.globals.length - 1;
  }

  setMemory(initial: number, maximum?: number): this {
    this.memory = { initial, maximum };
    return this;
  }

  setTable(size: number): this {
    this.tableSize = size;
    return this;
  }

  addElements(offset: number, funcs: readonly number[]): this {
    this.elements.push({ offset, funcs: [...funcs] });
    return this;
  }

  addData(offset: number, bytes: DataSegment["bytes"]): this {
    this.data.push({ offset, bytes });
    return this;
  }

  setStart(index: number): this {
    this.start = index;
    return this;
  }

  /**
   * Convert to an immutable module description.
   */
  build(): ModuleDef {
    const table =
      this.tableSize === undefined && this.elements.length === 0
        ? undefined
        : Object.freeze({
            size: this.tableSize ?? this.elements.reduce((n, e) => Math.max(n, e.offset + e.funcs.length), 0),
            elements: Object.freeze([...this.elements]),
          });
    return Object.freeze({
      types: Object.freeze([...this.types]),
      imports: Object.freeze([...this.imports]),
      functions: Object.freeze([...this.functions]),
      exports: Object.freeze({ ...this.exports }),
      start: this.start,
      memory: this.memory,
      globals: Object.freeze([...this.globals]),
      table,
      data: Object.freeze([...this.data]),
    });
  }
}
