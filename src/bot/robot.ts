/**
 * Robot
 * Ties the chat adapter, store, command registry, dispatcher and
 * middleware pipeline together behind one registration and
 * message-handling surface
 */

import type { ChatAdapter, ChatAdapterFactory, ChatRobot, Message } from '../chat/types.js';
import { type CommandRegistry, createCommandRegistry } from '../commands/registry.js';
import type { Command, CommandDefinition, HandlerFunc, RobotContext } from '../commands/types.js';
import type { Logger } from '../core/logger.js';
import { type DispatchOutcome, Dispatcher } from '../dispatch/dispatcher.js';
import { ignoreSelfMiddleware } from '../middleware/ignore-self.js';
import {
  type MessageContext,
  type MiddlewareDefinition,
  type MiddlewarePipeline,
  createMiddlewarePipeline,
} from '../middleware/pipeline.js';
import { type BotModule, ModuleLoaderImpl } from '../modules/loader.js';
import { type ErrorContext, type ErrorHandler, createErrorHandler } from '../services/error-handler.js';
import type { StoreAdapter } from '../store/types.js';

export interface RobotDependencies {
  name: string;
  chat: ChatAdapterFactory;
  store: StoreAdapter;
  logger: Logger;
  errorHandler?: ErrorHandler;
}

export class Robot implements RobotContext, ChatRobot {
  readonly name: string;
  readonly chat: ChatAdapter;
  readonly store: StoreAdapter;

  private readonly logger: Logger;
  private readonly registry: CommandRegistry;
  private readonly errorHandler: ErrorHandler;
  private readonly pipeline: MiddlewarePipeline;
  private readonly dispatcher: Dispatcher;
  private readonly modules = new ModuleLoaderImpl();
  private running = false;

  constructor(deps: RobotDependencies) {
    this.name = deps.name;
    this.store = deps.store;
    this.logger = deps.logger.child('robot');
    this.errorHandler = deps.errorHandler ?? createErrorHandler(deps.logger.child('errors'));
    this.registry = createCommandRegistry({ logger: deps.logger.child('registry') });

    this.pipeline = createMiddlewarePipeline();
    this.pipeline.use(ignoreSelfMiddleware);

    this.dispatcher = new Dispatcher({
      robot: this,
      registry: this.registry,
      errorHandler: this.errorHandler,
      logger: deps.logger.child('dispatch'),
    });

    this.chat = deps.chat(this);
  }

  registerCommand(definition: CommandDefinition): Promise<void> {
    return this.registry.registerCommand(definition);
  }

  registerRegexpCommand(pattern: RegExp | string, definition: CommandDefinition): Promise<void> {
    return this.registry.registerRegexpCommand(pattern, definition);
  }

  registerAlias(originalName: string, aliasName: string): Promise<void> {
    return this.registry.registerAlias(originalName, aliasName);
  }

  registerAliasRegexp(originalName: string, aliasName: string, pattern: RegExp | string): Promise<void> {
    return this.registry.registerAliasRegexp(originalName, aliasName, pattern);
  }

  setDefaultHandler(handler: HandlerFunc): Promise<void> {
    return this.registry.setDefaultHandler(handler);
  }

  registerPattern(pattern: RegExp | string, handler: HandlerFunc): Promise<void> {
    return this.registry.registerPattern(pattern, handler);
  }

  enableHelp(): Promise<void> {
    return this.registry.enableHelp();
  }

  useMiddleware(middleware: MiddlewareDefinition): void {
    this.pipeline.use(middleware);
  }

  snapshotCommands(): Promise<Map<string, Command>> {
    return this.registry.snapshotCommands();
  }

  commandNames(): Promise<string[]> {
    return this.registry.commandNames();
  }

  /**
   * Entry point for adapters: runs the middleware pipeline, then
   * dispatches whatever it lets through
   */
  async receive(message: Message): Promise<void> {
    const ctx: MessageContext = { message, botName: this.name };
    const dispatched = await this.pipeline.execute(ctx, async ({ message: msg }) => {
      await this.dispatcher.processMessage(msg);
    });

    if (!dispatched) {
      this.logger.debug('Message dropped before dispatch', {
        middleware: ctx.droppedBy,
        userId: message.user.id,
      });
    }
  }

  /**
   * Dispatches a message directly, skipping the middleware pipeline
   */
  processMessage(message: Message): Promise<DispatchOutcome> {
    return this.dispatcher.processMessage(message);
  }

  /**
   * Registers a module and, when it is enabled, its middlewares and
   * commands. A setup failure is rethrown as a ModuleExecutionError.
   */
  async registerModule(module: BotModule): Promise<void> {
    this.modules.register(module);

    if (!module.enabled) {
      this.logger.info(`Module registered disabled: ${module.name}`);
      return;
    }

    for (const middleware of module.middlewares ?? []) {
      this.pipeline.use(middleware);
      this.logger.debug(`Registered middleware: ${middleware.name}`, { module: module.name });
    }

    const result = await this.modules.executeWithIsolation(module.name, () => module.setup(this));
    if (!result.success) {
      throw result.error;
    }

    this.logger.info(`Module registered: ${module.name}`, {
      middlewares: module.middlewares?.length ?? 0,
    });
  }

  getModules(): BotModule[] {
    return this.modules.getAllModules();
  }

  async run(): Promise<void> {
    if (this.running) {
      this.logger.warn('Robot is already running');
      return;
    }

    await this.chat.run();
    this.running = true;
    this.logger.info(`Robot "${this.name}" running on ${this.chat.name} adapter`);
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.logger.info('Stopping robot...');

    for (const module of this.modules.getAllModules()) {
      if (!module.onShutdown) {
        continue;
      }
      const shutdown = module.onShutdown.bind(module);
      const result = await this.modules.executeWithIsolation(module.name, shutdown);
      if (!result.success) {
        this.logger.warn(`Error shutting down module: ${module.name}`, {
          error: result.error.originalError.message,
        });
      }
    }

    await this.chat.stop();
    this.store.close();
    this.running = false;
    this.logger.info('Robot stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Failures raised by adapters outside any handler
   */
  reportError(error: Error, context: ErrorContext = {}): void {
    this.errorHandler.handle(error, context);
  }

  /** Subscribes to every handled failure */
  onError(callback: (error: Error, ctx: ErrorContext) => void): void {
    this.errorHandler.onError(callback);
  }
}
