/**
 * @fileoverview Unit tests for ConfigurationResolver
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationResolver, defaultTunable, parseModuleRef } from './resolver.js';
import type { ConfigurationLike } from './schema.js';

const REACT = { name: 'test/react', version: '0.1.0' };

const configuration: ConfigurationLike = {
  'test/react@0.1.0': { tunables: { react_prompt: 'versioned prompt' } },
  'test/react': {
    tunables: { react_prompt: 'bare prompt', other: 'bare other' },
    configurables: { tool_list: ['test/calc'] },
  },
  'test/calc': { configurables: { precision: 3, tool_list: ['leaked'] } },
};

describe('parseModuleRef', () => {
  it('should split name and version on the last @ or :', () => {
    expect(parseModuleRef('test/calc:0.1.0')).toEqual({ name: 'test/calc', version: '0.1.0' });
    expect(parseModuleRef('test/calc@0.1.0')).toEqual({ name: 'test/calc', version: '0.1.0' });
    expect(parseModuleRef('calc@1.0')).toEqual({ name: 'calc', version: '1.0' });
  });

  it('should return a null version for bare names', () => {
    expect(parseModuleRef('calc')).toEqual({ name: 'calc', version: null });
    expect(parseModuleRef('@scope/pkg')).toEqual({ name: '@scope/pkg', version: null });
    expect(parseModuleRef('test/calc@')).toEqual({ name: 'test/calc', version: null });
  });
});

describe('ConfigurationResolver', () => {
  describe('strict resolution', () => {
    const resolver = new ConfigurationResolver(configuration);

    it('should default to strict mode', () => {
      expect(resolver.getMode()).toBe('strict');
    });

    it('should prefer the versioned entry over the bare one', () => {
      expect(resolver.forModule(REACT).tunable('react_prompt')()).toBe('versioned prompt');
    });

    it('should fall back to the bare entry', () => {
      const view = resolver.forModule(REACT);
      expect(view.tunable('other')()).toBe('bare other');
      expect(view.configurable('tool_list')).toEqual(['test/calc']);
    });

    it('should skip entries for other versions of the module', () => {
      const view = resolver.forModule({ name: 'test/react', version: '0.2.0' });
      expect(view.tunable('react_prompt')()).toBe('bare prompt');
    });

    it("should not read another module's values", () => {
      // Only test/calc defines precision; strict mode keeps it there
      expect(resolver.forModule(REACT).configurable('precision')).toEqual([]);
    });

    it('should return the documented defaults', () => {
      const view = resolver.forModule({ name: 'test/unknown', version: '1.0.0' });
      expect(view.tunable('react_prompt')()).toBe('Default react_prompt');
      expect(view.configurable('tool_list')).toEqual([]);
    });

    it('should ignore inherited object properties', () => {
      expect(resolver.forModule(REACT).tunable('toString')()).toBe(defaultTunable('toString'));
    });
  });

  describe('legacy-scan resolution', () => {
    const resolver = new ConfigurationResolver(configuration, 'legacy-scan');

    it("should let one module read another module's values", () => {
      expect(resolver.forModule({ name: 'test/other', version: '1.0.0' }).configurable('precision')).toBe(3);
    });

    it('should take the first entry in insertion order that defines the name', () => {
      const view = resolver.forModule({ name: 'test/calc', version: '0.1.0' });
      expect(view.tunable('react_prompt')()).toBe('versioned prompt');
      expect(view.configurable('tool_list')).toEqual(['test/calc']);
    });
  });

  describe('overrides', () => {
    it('should win over the configuration', () => {
      const view = new ConfigurationResolver(configuration).forModule(REACT, {
        tunables: { react_prompt: 'override' },
        configurables: { tool_list: [] },
      });

      expect(view.tunable('react_prompt')()).toBe('override');
      expect(view.configurable('tool_list')).toEqual([]);
      expect(view.tunable('other')()).toBe('bare other');
    });
  });
});
