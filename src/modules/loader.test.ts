/**
 * Tests for the Module Loader
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  type BotModule,
  ModuleExecutionError,
  ModuleLoaderImpl,
  ModuleValidationError,
  createModuleLoader,
  validateModule,
} from './loader.js';

const moduleNameArbitrary = fc.stringMatching(/^[a-z][a-z0-9-]{0,15}$/);

function createModule(name: string, enabled = true): BotModule {
  return { name, enabled, setup: async () => {} };
}

describe('Module Loader', () => {
  it('should only return enabled modules', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(fc.tuple(moduleNameArbitrary, fc.boolean()), { selector: ([name]) => name, maxLength: 10 }),
        (specs) => {
          const loader = createModuleLoader();
          specs.forEach(([name, enabled]) => loader.register(createModule(name, enabled)));

          const expected = specs.filter(([, enabled]) => enabled).map(([name]) => name);
          expect(loader.getEnabledModules().map(m => m.name)).toEqual(expected);
          expect(loader.getAllModules()).toHaveLength(specs.length);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('should toggle one module without touching the others', () => {
    const loader = createModuleLoader();
    loader.register(createModule('a'));
    loader.register(createModule('b'));

    loader.disable('a');
    expect(loader.getEnabledModules().map(m => m.name)).toEqual(['b']);

    loader.enable('a');
    expect(loader.getEnabledModules().map(m => m.name)).toEqual(['a', 'b']);
  });

  it('should describe registered modules', () => {
    const loader = createModuleLoader();
    loader.register({
      ...createModule('mw', false),
      middlewares: [{ name: 'm', priority: 1, handler: async (_ctx, next) => next() }],
    });

    expect(loader.getRegisteredModuleInfo()).toEqual([{ name: 'mw', enabled: false, middlewareCount: 1 }]);
  });

  it('should unregister modules by name', () => {
    const loader = createModuleLoader();
    loader.register(createModule('gone'));
    loader.unregister('gone');

    expect(loader.getModule('gone')).toBeUndefined();
  });

  it('should throw when registering a duplicate name', () => {
    const loader = createModuleLoader();
    loader.register(createModule('dup'));

    expect(() => loader.register(createModule('dup'))).toThrow('Module "dup" is already registered.');
  });

  describe('validateModule', () => {
    it('should accept well-formed modules', () => {
      fc.assert(
        fc.property(moduleNameArbitrary, fc.boolean(), (name, enabled) => {
          expect(validateModule(createModule(name, enabled))).toBe(true);
        })
      );
    });

    it('should reject malformed modules', () => {
      expect(validateModule(null)).toBe(false);
      expect(validateModule({ name: '', enabled: true, setup: () => {} })).toBe(false);
      expect(validateModule({ name: 'x', enabled: 'yes', setup: () => {} })).toBe(false);
      expect(validateModule({ name: 'x', enabled: true })).toBe(false);
      expect(validateModule({ name: 'x', enabled: true, setup: () => {}, middlewares: [{ name: 'm' }] })).toBe(false);
      expect(validateModule({ name: 'x', enabled: true, setup: () => {}, onShutdown: 'later' })).toBe(false);
    });

    it('should refuse to register malformed modules', () => {
      const loader = new ModuleLoaderImpl();
      const malformed = { name: 'bad', enabled: true, setup: 'nope' };

      expect(() => loader.register(malformed as unknown as BotModule)).toThrow(ModuleValidationError);
    });
  });

  describe('executeWithIsolation', () => {
    it('should return results on success', async () => {
      const loader = new ModuleLoaderImpl();
      await expect(loader.executeWithIsolation('m', async () => 42)).resolves.toEqual({ success: true, result: 42 });
    });

    it('should wrap thrown values', async () => {
      const loader = new ModuleLoaderImpl();
      const outcome = await loader.executeWithIsolation('m', async () => {
        throw 'plain';
      });

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error).toBeInstanceOf(ModuleExecutionError);
        expect(outcome.error.message).toBe('Error in module "m": plain');
        expect(outcome.error.moduleName).toBe('m');
      }
    });
  });
});
