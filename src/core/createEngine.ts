/**
 * createEngine - Service Wiring
 *
 * Builds the engine's services in the DI container:
 * EventBus → ConfigManager → ErrorHandler → CommandRegistry → MappingStore
 * → RcParser / KeyMapper / RcLoader → Repeater → KeyHandler
 *
 * @module core/createEngine
 */

import type { EngineHost } from '../types/host';
import type { EngineSettings } from '../types/settings';
import type { ActionDescriptor } from '../types/commands';
import type { IMappingStore } from '../types/mappings';
import { ServiceTokens } from '../types/services';
import { ServiceContainer } from './ServiceContainer';
import { EventBus } from './EventBus';
import { ConfigManager, type ISettingsPersistence } from '../infrastructure/ConfigManager';
import { ErrorHandler } from '../infrastructure/ErrorHandler';
import { CommandRegistry } from '../registry/CommandRegistry';
import { MappingStore } from '../stores/MappingStore';
import { RcParser } from '../services/RcParser';
import { RcLoader, type IFileAdapter } from '../services/RcLoader';
import { KeyMapper } from '../mapper/KeyMapper';
import { Repeater } from '../executor/Repeater';
import { KeyHandler } from '../handler/KeyHandler';
import { timerScheduler, type Scheduler } from '../state/Scheduler';
import { DEFAULT_PREFIX, Logger, getLogger } from '../services/Logger';

const log = getLogger('registry');

export interface EngineOptions {
  host: EngineHost;
  /** Applied on top of the persisted settings */
  settings?: Partial<EngineSettings>;
  persistence?: ISettingsPersistence;
  scheduler?: Scheduler;
  fileAdapter?: IFileAdapter;
  /** Register the built-in actions; defaults to true */
  loadBuiltins?: boolean;
  /** Extra actions registered after the built-ins */
  actions?: readonly ActionDescriptor[];
}

export interface Engine {
  container: ServiceContainer;
  eventBus: EventBus;
  config: ConfigManager;
  errorHandler: ErrorHandler;
  registry: CommandRegistry;
  store: IMappingStore;
  keyMapper: KeyMapper;
  rcLoader: RcLoader;
  repeater: Repeater;
  keyHandler: KeyHandler;
  dispose(): void;
}

/**
 * Create and wire an engine
 */
export async function createEngine(options: EngineOptions): Promise<Engine> {
  const container = new ServiceContainer();

  const eventBus = new EventBus();
  const config = new ConfigManager(eventBus, options.persistence);
  await config.initialize();
  if (options.settings) {
    await config.updateSettings(options.settings);
  }

  Logger.initialize({
    prefix: DEFAULT_PREFIX,
    getDebugSettings: () => config.getSettings().debug,
  });

  const errorHandler = new ErrorHandler(eventBus);

  container.registerInstance(ServiceTokens.EventBus, eventBus);
  container.registerInstance(ServiceTokens.ConfigManager, config);
  container.registerInstance(ServiceTokens.ErrorHandler, errorHandler);
  container.registerInstance(ServiceTokens.Host, options.host);
  container.registerInstance(ServiceTokens.Scheduler, options.scheduler ?? timerScheduler);

  container.registerSingleton(
    ServiceTokens.CommandRegistry,
    (c) => new CommandRegistry(c.resolve(ServiceTokens.ErrorHandler))
  );
  container.registerSingleton(
    ServiceTokens.MappingStore,
    (c) => new MappingStore(c.resolve(ServiceTokens.EventBus))
  );
  container.registerSingleton(ServiceTokens.RcParser, () => new RcParser());
  container.registerSingleton(
    ServiceTokens.KeyMapper,
    (c) =>
      new KeyMapper(
        c.resolve(ServiceTokens.MappingStore),
        c.resolve(ServiceTokens.ConfigManager),
        c.resolve(ServiceTokens.RcParser),
        c.resolve(ServiceTokens.ErrorHandler)
      )
  );
  container.registerSingleton(
    ServiceTokens.RcLoader,
    (c) =>
      new RcLoader(
        c.resolve(ServiceTokens.EventBus),
        c.resolve(ServiceTokens.KeyMapper),
        c.resolve(ServiceTokens.ErrorHandler),
        options.fileAdapter
      )
  );
  container.registerSingleton(ServiceTokens.Repeater, () => new Repeater());
  container.registerSingleton(
    ServiceTokens.KeyHandler,
    (c) =>
      new KeyHandler({
        registry: c.resolve(ServiceTokens.CommandRegistry),
        store: c.resolve(ServiceTokens.MappingStore),
        config: c.resolve(ServiceTokens.ConfigManager),
        host: c.resolve(ServiceTokens.Host),
        repeater: c.resolve(ServiceTokens.Repeater),
        eventBus: c.resolve(ServiceTokens.EventBus),
        errorHandler: c.resolve(ServiceTokens.ErrorHandler),
        scheduler: c.resolve(ServiceTokens.Scheduler),
      })
  );

  const registry = container.resolve(ServiceTokens.CommandRegistry);
  if (options.loadBuiltins !== false) {
    registry.loadBuiltins();
  }
  if (options.actions) {
    registry.registerAll(options.actions);
  }

  const store = container.resolve(ServiceTokens.MappingStore);
  const engine: Engine = {
    container,
    eventBus,
    config,
    errorHandler,
    registry,
    store,
    keyMapper: container.resolve(ServiceTokens.KeyMapper),
    rcLoader: container.resolve(ServiceTokens.RcLoader),
    repeater: container.resolve(ServiceTokens.Repeater),
    keyHandler: container.resolve(ServiceTokens.KeyHandler),
    dispose: () => {
      registry.cleanup();
      eventBus.clear();
      container.dispose();
    },
  };

  log.info(`Engine ready with ${registry.getActions().length} actions`);
  return engine;
}
