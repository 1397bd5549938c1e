/**
 * Shared, read-mostly program state: registered host functions and loaded
 * modules. Any number of VMs may run against one State.
 */

import type { ModuleDef } from "../bytecode/module.js";
import { CompiledModule } from "../compiler/block.js";
import { CompilerConfig } from "../compiler/compiler.js";
import { HostResolver, compileModule } from "../compiler/loader.js";
import type { HostFunction } from "../host/host.js";
import { VMError } from "./errors.js";

interface HostBinding {
  readonly module: string;
  readonly name: string;
  readonly host: HostFunction;
}

export class State implements HostResolver {
  private readonly hosts: HostBinding[] = [];
  private readonly hostIndex = new Map<string, number>();
  private readonly modules = new Map<string, CompiledModule>();

  /**
   * Register a host function under `module.name`. Returns its stable index.
   */
  registerHost(module: string, name: string, host: HostFunction): number {
    const key = `${module}.${name}`;
    if (this.hostIndex.has(key)) {
      throw new VMError(`host function "${key}" is already registered`);
    }
    this.hosts.push(Object.freeze({ module, name, host }));
    const index = this.hosts.length - 1;
    this.hostIndex.set(key, index);
    return index;
  }

  resolveHost(module: string, name: string): { index: number; host: HostFunction } | undefined {
    const index = this.hostIndex.get(`${module}.${name}`);
    return index === undefined ? undefined : { index, host: this.hosts[index].host };
  }

  /**
   * Host function by registry index.
   */
  host(index: number): HostFunction | undefined {
    return this.hosts[index]?.host;
  }

  /**
   * Compile and register a module. Nothing is registered if compilation
   * fails.
   */
  load(name: string, def: ModuleDef, config?: CompilerConfig): CompiledModule {
    if (this.modules.has(name)) {
      throw new VMError(`module "${name}" is already loaded`);
    }
    const compiled = compileModule(name, def, this, config);
    this.modules.set(name, compiled);
    return compiled;
  }

  /**
   * Look up a loaded module.
   */
  module(name: string): CompiledModule {
    const compiled = this.modules.get(name);
    if (compiled === undefined) {
      throw new VMError(`unknown module "${name}"`);
    }
    return compiled;
  }

  hasModule(name: string): boolean {
    return this.modules.has(name);
  }
}
