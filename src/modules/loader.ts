/**
 * Module Loader
 * Provides module registration, validation, enable/disable, and error isolation
 */

import type { MiddlewareDefinition } from '../middleware/pipeline.js';
import type { Robot } from '../bot/robot.js';

/**
 * A feature bundle: the commands, patterns and middlewares it adds are
 * registered on the robot by setup()
 */
export interface BotModule {
  name: string;
  enabled: boolean;
  setup(robot: Robot): Promise<void>;
  middlewares?: MiddlewareDefinition[];
  onShutdown?(): Promise<void>;
}

export interface RegisteredModule {
  name: string;
  enabled: boolean;
  middlewareCount: number;
}

export interface ModuleLoader {
  register(module: BotModule): void;
  unregister(moduleName: string): void;
  enable(moduleName: string): void;
  disable(moduleName: string): void;
  getModule(name: string): BotModule | undefined;
  getAllModules(): BotModule[];
  getEnabledModules(): BotModule[];
  validateModule(module: unknown): module is BotModule;
  getRegisteredModuleInfo(): RegisteredModule[];
}

export class ModuleValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModuleValidationError';
  }
}

/**
 * Wraps a failure raised from a module's setup or shutdown
 */
export class ModuleExecutionError extends Error {
  public readonly moduleName: string;
  public readonly originalError: Error;

  constructor(moduleName: string, originalError: Error) {
    super(`Error in module "${moduleName}": ${originalError.message}`, { cause: originalError });
    this.name = 'ModuleExecutionError';
    this.moduleName = moduleName;
    this.originalError = originalError;
  }
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isFunction(value: unknown): value is (...args: never[]) => unknown {
  return typeof value === 'function';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isValidMiddlewareDefinition(mw: unknown): boolean {
  return isRecord(mw) && isNonEmptyString(mw.name) && typeof mw.priority === 'number' && isFunction(mw.handler);
}

/**
 * Validates a module structure
 */
export function validateModule(module: unknown): module is BotModule {
  if (!isRecord(module)) {
    return false;
  }

  if (!isNonEmptyString(module.name)) return false;
  if (typeof module.enabled !== 'boolean') return false;
  if (!isFunction(module.setup)) return false;

  if (module.middlewares !== undefined) {
    if (!Array.isArray(module.middlewares)) return false;
    if (!module.middlewares.every(isValidMiddlewareDefinition)) return false;
  }

  if (module.onShutdown !== undefined && !isFunction(module.onShutdown)) return false;

  return true;
}

function describeModule(module: unknown): string {
  return isRecord(module) && isNonEmptyString(module.name) ? module.name : 'unknown';
}

export class ModuleLoaderImpl implements ModuleLoader {
  private modules: Map<string, BotModule> = new Map();

  register(module: BotModule): void {
    if (!this.validateModule(module)) {
      throw new ModuleValidationError(
        `Invalid module structure for "${describeModule(module)}". ` +
        `Module must have: name (string), enabled (boolean), setup (function).`
      );
    }

    if (this.modules.has(module.name)) {
      throw new ModuleValidationError(`Module "${module.name}" is already registered.`);
    }

    this.modules.set(module.name, module);
  }

  unregister(moduleName: string): void {
    this.modules.delete(moduleName);
  }

  enable(moduleName: string): void {
    const module = this.modules.get(moduleName);
    if (module) {
      module.enabled = true;
    }
  }

  disable(moduleName: string): void {
    const module = this.modules.get(moduleName);
    if (module) {
      module.enabled = false;
    }
  }

  getModule(name: string): BotModule | undefined {
    return this.modules.get(name);
  }

  getAllModules(): BotModule[] {
    return Array.from(this.modules.values());
  }

  getEnabledModules(): BotModule[] {
    return Array.from(this.modules.values()).filter(m => m.enabled);
  }

  validateModule(module: unknown): module is BotModule {
    return validateModule(module);
  }

  getRegisteredModuleInfo(): RegisteredModule[] {
    return Array.from(this.modules.values()).map(m => ({
      name: m.name,
      enabled: m.enabled,
      middlewareCount: m.middlewares?.length ?? 0,
    }));
  }

  /**
   * Runs fn, wrapping anything it throws in a ModuleExecutionError
   */
  async executeWithIsolation<T>(
    moduleName: string,
    fn: () => Promise<T>
  ): Promise<{ success: true; result: T } | { success: false; error: ModuleExecutionError }> {
    try {
      const result = await fn();
      return { success: true, result };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      return { success: false, error: new ModuleExecutionError(moduleName, error) };
    }
  }
}

export function createModuleLoader(): ModuleLoaderImpl {
  return new ModuleLoaderImpl();
}
