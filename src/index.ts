/**
 * @fileoverview stepgraph - a step-graph module execution engine.
 *
 * @example
 * ```typescript
 * import { ExecutionEngine, ModuleRegistry, registerBuiltinModules } from 'stepgraph';
 *
 * const registry = registerBuiltinModules(new ModuleRegistry());
 * const engine = new ExecutionEngine({
 *   registry,
 *   configuration: {
 *     'stepgraph/react': { configurables: { tool_list: ['stepgraph/calculator'] } },
 *   },
 * });
 * const result = await engine.run('stepgraph/react', 'What is 12 * 7?');
 * console.log(result.text);
 * ```
 *
 * @module stepgraph
 */

export * from './types/index.js';
export * from './observability/index.js';
export * from './config/schema.js';
export * from './config/resolver.js';
export * from './config/loader.js';
export * from './extraction/response-extractor.js';
export * from './registry/define.js';
export * from './registry/module-registry.js';
export * from './providers/index.js';
export * from './engine/execution-engine.js';
export * from './modules/index.js';
