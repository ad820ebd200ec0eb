/**
 * @fileoverview Unit tests for ModuleRegistry
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { ModuleRegistry } from './module-registry.js';
import { defineModule, defineStep, respond } from './define.js';
import type { Module } from '../types/index.js';

function echoModule(version: string = '1.0.0'): Module {
  return defineModule({
    name: 'test/echo',
    version,
    description: 'Echoes its input',
    longDescription: 'Returns the input unchanged.',
    steps: [defineStep({ name: 'echo', input: z.string(), run: (text) => respond(text) })],
    startStep: 'echo',
  });
}

describe('ModuleRegistry', () => {
  let registry: ModuleRegistry;

  beforeEach(() => {
    registry = new ModuleRegistry();
  });

  describe('register', () => {
    it('should emit module:registered', () => {
      const listener = vi.fn();
      registry.on('module:registered', listener);
      const module = echoModule();

      registry.register(module);

      expect(listener).toHaveBeenCalledWith(module);
    });

    it('should reject a duplicate versioned name', () => {
      registry.register(echoModule());
      expect(() => registry.register(echoModule())).toThrow("Module 'test/echo:1.0.0' is already registered");
    });

    it('should reject registration once sealed', () => {
      const sealed = vi.fn();
      registry.on('registry:sealed', sealed);
      registry.register(echoModule());
      registry.seal();
      registry.seal();

      expect(registry.isSealed()).toBe(true);
      expect(sealed).toHaveBeenCalledTimes(1);
      expect(sealed).toHaveBeenCalledWith(1);
      expect(() => registry.register(echoModule('2.0.0'))).toThrow(
        'Cannot register test/echo:2.0.0: registry is sealed',
      );
    });
  });

  describe('find', () => {
    beforeEach(() => {
      registry.register(echoModule('1.0.0'));
      registry.register(echoModule('2.0.0'));
    });

    it('should resolve bare names to the latest registration', () => {
      const result = registry.find('test/echo');
      expect(result.found && result.module.version).toBe('2.0.0');
    });

    it('should resolve name:version and name@version', () => {
      const colon = registry.find('test/echo:1.0.0');
      const at = registry.find('test/echo@1.0.0');
      expect(colon.found && colon.module.version).toBe('1.0.0');
      expect(at.found && at.module.version).toBe('1.0.0');
    });

    it('should trim the reference', () => {
      expect(registry.has('  test/echo \n')).toBe(true);
    });

    it('should report unknown references', () => {
      expect(registry.find('test/missing')).toEqual({ found: false, ref: 'test/missing' });
      expect(registry.find('test/echo@9.9.9')).toEqual({ found: false, ref: 'test/echo@9.9.9' });
    });
  });

  describe('describe', () => {
    it('should return display details', () => {
      registry.register(echoModule());

      expect(registry.describe('test/echo')).toEqual({
        name: 'test/echo',
        versionedName: 'test/echo:1.0.0',
        displayName: 'test/echo',
        description: 'Echoes its input',
        longDescription: 'Returns the input unchanged.',
        steps: ['echo'],
        startStep: 'echo',
      });
    });

    it('should return null for unknown modules', () => {
      expect(registry.describe('nope')).toBeNull();
    });
  });

  it('should list modules in registration order', () => {
    registry.register(echoModule('1.0.0'));
    registry.register(echoModule('2.0.0'));

    expect(registry.list().map(m => m.versionedName)).toEqual(['test/echo:1.0.0', 'test/echo:2.0.0']);
  });
});
