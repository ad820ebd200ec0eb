/**
 * @fileoverview Built-in modules.
 *
 * @module stepgraph/modules
 */

import type { Module } from '../types/module.types.js';
import type { ModuleRegistry } from '../registry/module-registry.js';
import { createCalculatorModule } from './calculator/calculator-module.js';
import { createReactModule, type ReactModuleOptions } from './react/react-module.js';

export * from './calculator/calculator-module.js';
export { evaluateExpression, ExpressionError } from './calculator/expression.js';
export * from './react/react-module.js';
export { ReasoningContext } from './react/reasoning-context.js';

export function builtinModules(options: { react?: ReactModuleOptions } = {}): Module[] {
  return [createReactModule(options.react), createCalculatorModule()];
}

export function registerBuiltinModules(
  registry: ModuleRegistry,
  options: { react?: ReactModuleOptions } = {},
): ModuleRegistry {
  for (const module of builtinModules(options)) {
    registry.register(module);
  }
  return registry;
}
