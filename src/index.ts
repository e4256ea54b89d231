/**
 * Main exports for the keystroke engine
 */

// Types
export * from './types';

// Core
export { ServiceContainer } from './core/ServiceContainer';
export { EventBus } from './core/EventBus';
export { createEngine } from './core/createEngine';
export type { Engine, EngineOptions } from './core/createEngine';

// Infrastructure
export { ConfigManager, InMemorySettingsPersistence } from './infrastructure/ConfigManager';
export type { ISettingsPersistence } from './infrastructure/ConfigManager';
export { ErrorHandler } from './infrastructure/ErrorHandler';
export type { RecoveryResult, RecoveryStrategy, AggregatedError } from './infrastructure/ErrorHandler';
export {
  EngineError,
  BadCommandError,
  WriteRejectedError,
  ActionExecutionError,
  MappingConfigError,
  RegistryConflictError,
  InternalEngineError,
} from './errors/EngineErrors';
export type { EngineErrorCode } from './errors/EngineErrors';

// Keys
export { KeyStroke, KeyModifier } from './keys/KeyStroke';
export type { NamedKey } from './keys/KeyStroke';
export { parseKeys, formatKeys, startsWith } from './keys/KeyNotation';
export { PLUG_KEY, NOP_KEY, ESCAPE_KEY } from './keys/SpecialKeys';

// Services
export { Logger, ModuleLogger, getLogger } from './services/Logger';
export type { LogLevel, LoggerConfig } from './services/Logger';
export { RcParser } from './services/RcParser';
export { RcLoader, nodeFileAdapter, DEFAULT_RC_PATHS } from './services/RcLoader';
export type { IFileAdapter } from './services/RcLoader';

// Stores
export { MappingStore } from './stores/MappingStore';

// Mapper
export { KeyMapper, modesForCommand } from './mapper/KeyMapper';

// Registry
export { CommandRegistry, parseActionDefinition } from './registry/CommandRegistry';
export type { ActionDefinition } from './registry/CommandRegistry';
export type { TrieNode, CommandNode, CommandPartNode } from './registry/KeyTrie';

// Digraphs
export { DigraphTable } from './digraph/DigraphTable';
export { DigraphSequence } from './digraph/DigraphSequence';
export type { DigraphResult } from './digraph/DigraphSequence';

// State
export { SessionState, CommandState, MAX_COMMAND_DEPTH, MAX_COUNT } from './state/SessionState';
export { Command } from './state/Command';
export { timerScheduler } from './state/Scheduler';
export type { Scheduler, Cancellable } from './state/Scheduler';

// Execution
export { KeyHandler } from './handler/KeyHandler';
export { Repeater } from './executor/Repeater';
export { mergeMotionCount } from './executor/CommandDispatcher';
