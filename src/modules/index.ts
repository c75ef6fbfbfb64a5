/**
 * Bot modules exports
 */

export {
  type BotModule,
  type ModuleLoader,
  type RegisteredModule,
  ModuleLoaderImpl,
  ModuleValidationError,
  ModuleExecutionError,
  validateModule,
  createModuleLoader,
} from './loader.js';

export { type ExampleModuleOptions, UNRECOGNIZED_TEXT, createExampleModule } from './example/index.js';
