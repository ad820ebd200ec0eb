/**
 * @fileoverview Module Registry - process-wide table of runnable modules.
 *
 * Modules are registered at startup under their bare name and their
 * versioned name. The engine seals the registry before its first run, after
 * which the table is read-only.
 *
 * @module stepgraph/registry/module-registry
 */

import { EventEmitter } from 'eventemitter3';
import type { Timestamp } from '../types/core.types.js';
import { createTimestamp } from '../types/core.types.js';
import type {
  Module,
  ModuleDetails,
  ModuleLookup,
  ModuleLookupResult,
} from '../types/module.types.js';
import { parseModuleRef } from '../config/resolver.js';

export interface ModuleRegistryEvents {
  'module:registered': (module: Module) => void;
  'registry:sealed': (moduleCount: number) => void;
}

interface RegistryEntry {
  readonly module: Module;
  readonly registeredAt: Timestamp;
}

/**
 * @example
 * ```typescript
 * const registry = new ModuleRegistry();
 * registry.register(createCalculatorModule());
 * registry.find('stepgraph/calculator@0.1.0'); // { found: true, module }
 * ```
 */
export class ModuleRegistry extends EventEmitter<ModuleRegistryEvents> implements ModuleLookup {
  private readonly byVersion = new Map<string, RegistryEntry>();
  /** Bare name -> most recently registered version */
  private readonly byName = new Map<string, RegistryEntry>();
  private sealed = false;

  /**
   * @throws Error if the registry is sealed or the versioned name is taken
   */
  register(module: Module): void {
    if (this.sealed) {
      throw new Error(`Cannot register ${module.versionedName}: registry is sealed`);
    }
    if (this.byVersion.has(module.versionedName)) {
      throw new Error(`Module '${module.versionedName}' is already registered`);
    }

    const entry: RegistryEntry = { module, registeredAt: createTimestamp() };
    this.byVersion.set(module.versionedName, entry);
    this.byName.set(module.name, entry);
    this.emit('module:registered', module);
  }

  seal(): void {
    if (this.sealed) return;
    this.sealed = true;
    this.emit('registry:sealed', this.byVersion.size);
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Resolves `name`, `name:version` or `name@version`.
   */
  find(ref: string): ModuleLookupResult {
    const trimmed = ref.trim();
    const direct = this.byVersion.get(trimmed) ?? this.byName.get(trimmed);
    if (direct) {
      return { found: true, module: direct.module };
    }

    const parsed = parseModuleRef(trimmed);
    const entry = parsed.version === null
      ? this.byName.get(parsed.name)
      : this.byVersion.get(`${parsed.name}:${parsed.version}`);
    return entry ? { found: true, module: entry.module } : { found: false, ref };
  }

  has(ref: string): boolean {
    return this.find(ref).found;
  }

  describe(ref: string): ModuleDetails | null {
    const result = this.find(ref);
    if (!result.found) return null;

    const { module } = result;
    return {
      name: module.name,
      versionedName: module.versionedName,
      displayName: module.name,
      description: module.description,
      longDescription: module.longDescription,
      steps: [...module.steps.keys()],
      startStep: module.startStep,
    };
  }

  /**
   * Every registered module version, in registration order.
   */
  list(): ReadonlyArray<Module> {
    return [...this.byVersion.values()].map(entry => entry.module);
  }
}
