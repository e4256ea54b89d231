/**
 * Service container and dependency injection type definitions
 */

import type { EventType, EventPayload, EventHandler, Unsubscribe } from './events';
import type { IConfigManager } from './settings';
import type { IMappingStore } from './mappings';
import type { ParseResult } from './rc';
import type { EngineHost } from './host';
import type { CommandRegistry } from '../registry/CommandRegistry';
import type { KeyMapper } from '../mapper/KeyMapper';
import type { Repeater } from '../executor/Repeater';
import type { KeyHandler } from '../handler/KeyHandler';
import type { Scheduler } from '../state/Scheduler';
import type { RcLoader } from '../services/RcLoader';
import type { AggregatedError } from '../infrastructure/ErrorHandler';

/**
 * Service token type - a branded symbol for type-safe dependency injection
 */
export type ServiceToken<T> = symbol & { __type?: T };

/**
 * Service factory function type
 */
export type ServiceFactory<T> = (container: IServiceContainer) => T;

/**
 * Service container interface
 */
export interface IServiceContainer {
  /**
   * Register a transient service (new instance each time)
   */
  register<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): void;

  /**
   * Register a singleton service (same instance each time)
   */
  registerSingleton<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): void;

  /**
   * Register an existing instance as a singleton
   */
  registerInstance<T>(token: ServiceToken<T>, instance: T): void;

  /**
   * Resolve a service by its token
   */
  resolve<T>(token: ServiceToken<T>): T;

  /**
   * Check if a service is registered
   */
  has<T>(token: ServiceToken<T>): boolean;

  /**
   * Dispose all services and clear registrations
   */
  dispose(): void;
}

/**
 * EventBus interface
 */
export interface IEventBus {
  /**
   * Emit an event synchronously
   */
  emit<T extends EventType>(type: T, payload: EventPayload<T>): void;

  /**
   * Emit an event and wait for all async handlers
   */
  emitAsync<T extends EventType>(type: T, payload: EventPayload<T>): Promise<void>;

  /**
   * Subscribe to an event
   */
  on<T extends EventType>(type: T, handler: EventHandler<T>): Unsubscribe;

  /**
   * Subscribe to an event for one-time handling
   */
  once<T extends EventType>(type: T, handler: EventHandler<T>): Unsubscribe;

  /**
   * Unsubscribe a specific handler
   */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void;

  /**
   * Clear all subscriptions
   */
  clear(): void;
}

/**
 * Rc parser interface
 */
export interface IRcParser {
  /**
   * Parse rc content
   */
  parse(content: string): ParseResult;
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  FATAL = 'fatal',
}

/**
 * Error categories
 */
export enum ErrorCategory {
  BAD_COMMAND = 'bad_command',
  WRITE_REJECTED = 'write_rejected',
  MAPPING = 'mapping',
  EXECUTION = 'execution',
  CONFIG = 'config',
  PARSE = 'parse',
  FILE = 'file',
  INTERNAL = 'internal',
}

/**
 * Categorized error
 */
export interface CategorizedError {
  error: Error;
  category: ErrorCategory;
  severity: ErrorSeverity;
  context: string;
  code?: string;
  recoverable: boolean;
}

/**
 * Error handler interface
 */
export interface IErrorHandler {
  /**
   * Handle an error
   */
  handle(error: Error, context: string): void;

  /**
   * Handle an error with category
   */
  handleCategorized(error: CategorizedError): void;

  /**
   * Collect errors into one report until endAggregation
   */
  startAggregation(): void;

  /**
   * Close the batch and report it
   */
  endAggregation(): AggregatedError | null;

  /**
   * Get recent errors
   */
  getRecentErrors(): CategorizedError[];

  /**
   * Clear error history
   */
  clearHistory(): void;
}

/**
 * Service tokens for dependency injection
 */
export const ServiceTokens = {
  EventBus: Symbol('EventBus') as ServiceToken<IEventBus>,
  ConfigManager: Symbol('ConfigManager') as ServiceToken<IConfigManager>,
  ErrorHandler: Symbol('ErrorHandler') as ServiceToken<IErrorHandler>,
  Host: Symbol('Host') as ServiceToken<EngineHost>,
  Scheduler: Symbol('Scheduler') as ServiceToken<Scheduler>,
  RcParser: Symbol('RcParser') as ServiceToken<IRcParser>,
  RcLoader: Symbol('RcLoader') as ServiceToken<RcLoader>,
  MappingStore: Symbol('MappingStore') as ServiceToken<IMappingStore>,
  KeyMapper: Symbol('KeyMapper') as ServiceToken<KeyMapper>,
  CommandRegistry: Symbol('CommandRegistry') as ServiceToken<CommandRegistry>,
  Repeater: Symbol('Repeater') as ServiceToken<Repeater>,
  KeyHandler: Symbol('KeyHandler') as ServiceToken<KeyHandler>,
} as const;
