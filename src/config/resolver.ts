/**
 * @fileoverview Configuration Resolver - finds tunable and configurable
 * values for a module inside a layered configuration.
 *
 * Strict resolution only reads entries keyed by the requesting module
 * (`name`, `name@version` or `name:version`). Legacy resolution scans every
 * entry in insertion order and takes the first that defines the name, so a
 * value configured for one module can leak into another; it exists for
 * configurations written against that behavior.
 *
 * @module stepgraph/config/resolver
 */

import type { ConfigView } from '../types/module.types.js';
import type { ConfigurationLike, SettingsOverrides } from './schema.js';

export type ResolutionMode = 'strict' | 'legacy-scan';

export interface ModuleRef {
  readonly name: string;
  readonly version: string | null;
}

/**
 * Splits a module reference into name and version. The version separator
 * is the last `@` or `:` after the final `/`, so `org/tool@1.0.0`,
 * `org/tool:1.0.0` and `org/tool` all parse.
 */
export function parseModuleRef(ref: string): ModuleRef {
  const slash = ref.lastIndexOf('/');
  const tail = ref.slice(slash + 1);
  const at = Math.max(tail.lastIndexOf('@'), tail.lastIndexOf(':'));
  if (at <= 0) {
    return { name: ref, version: null };
  }
  const version = tail.slice(at + 1);
  return {
    name: ref.slice(0, slash + 1 + at),
    version: version === '' ? null : version,
  };
}

export function defaultTunable(name: string): string {
  return `Default ${name}`;
}

type Section = 'tunables' | 'configurables';

export class ConfigurationResolver {
  constructor(
    private readonly configuration: ConfigurationLike,
    private readonly mode: ResolutionMode = 'strict',
  ) {}

  getMode(): ResolutionMode {
    return this.mode;
  }

  /**
   * Returns the view a step of `module` reads through. Overrides, when
   * given, win over anything in the configuration.
   */
  forModule(module: ModuleRef, overrides: SettingsOverrides = {}): ConfigView {
    return {
      tunable: (name: string) => () => {
        const found = lookup(overrides.tunables, name) ?? this.find(module, 'tunables', name);
        return found ? found.value : defaultTunable(name);
      },
      configurable: (name: string) => {
        const found = lookup(overrides.configurables, name) ?? this.find(module, 'configurables', name);
        return found ? found.value : [];
      },
    };
  }

  private find(module: ModuleRef, section: Section, name: string): { value: unknown } | null {
    for (const settings of this.candidates(module)) {
      const found = lookup(settings[section], name);
      if (found) return found;
    }
    return null;
  }

  private candidates(module: ModuleRef): SettingsOverrides[] {
    const entries = Object.entries(this.configuration);
    if (this.mode === 'legacy-scan') {
      return entries.map(([, settings]) => settings);
    }

    const versioned: SettingsOverrides[] = [];
    const bare: SettingsOverrides[] = [];
    for (const [key, settings] of entries) {
      const ref = parseModuleRef(key);
      if (ref.name !== module.name) continue;
      if (ref.version === null) {
        bare.push(settings);
      } else if (ref.version === module.version) {
        versioned.push(settings);
      }
    }
    return [...versioned, ...bare];
  }
}

function lookup(source: Readonly<Record<string, unknown>> | undefined, name: string): { value: unknown } | null {
  if (source && Object.prototype.hasOwnProperty.call(source, name)) {
    return { value: source[name] };
  }
  return null;
}
