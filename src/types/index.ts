/**
 * Type definitions for the keystroke engine
 *
 * This module exports all type definitions used throughout the engine.
 */

// Re-export all types from submodules
export * from './events';
export * from './commands';
export * from './modes';
export * from './mappings';
export * from './rc';
export * from './settings';
export * from './host';

// Re-export service-related types
export type {
  ServiceToken,
  ServiceFactory,
  IServiceContainer,
  IEventBus,
  IRcParser,
  IErrorHandler,
  CategorizedError,
} from './services';
export { ServiceTokens, ErrorCategory, ErrorSeverity } from './services';
