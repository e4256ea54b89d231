/**
 * Event type definitions for the EventBus system
 */

import type { KeyMapping } from './mappings';
import type { EngineSettings } from './settings';
import type { ModeFrame } from './modes';
import type { LoadResult } from './rc';

/**
 * Event types emitted throughout the engine
 */
export enum EventType {
  // Configuration events
  SETTINGS_CHANGED = 'settings:changed',

  // Rc loading events
  RC_LOADING = 'rc:loading',
  RC_LOADED = 'rc:loaded',

  // Mapping table events
  MAPPING_ADDED = 'mapping:added',
  MAPPING_REMOVED = 'mapping:removed',
  MAPPINGS_CLEARED = 'mappings:cleared',

  // Mapping resolution events
  MAPPING_RESOLVED = 'mapping:resolved',
  MAPPING_TIMEOUT = 'mapping:timeout',

  // Dispatch events
  COMMAND_DISPATCHED = 'command:dispatched',
  COMMAND_REJECTED = 'command:rejected',

  // Session events
  MODE_CHANGED = 'mode:changed',
  RECORDING_CHANGED = 'recording:changed',

  // Error events
  ERROR_OCCURRED = 'error:occurred',
  ERROR_RECOVERED = 'error:recovered',
}

/**
 * Event payload type mapping
 * Maps each event type to its corresponding payload structure
 */
export interface EventPayloadMap {
  [EventType.SETTINGS_CHANGED]: {
    settings: EngineSettings;
    previous: EngineSettings;
  };

  [EventType.RC_LOADING]: { path: string | null };
  [EventType.RC_LOADED]: LoadResult;

  [EventType.MAPPING_ADDED]: { mapping: KeyMapping };
  [EventType.MAPPING_REMOVED]: { mapping: KeyMapping };
  [EventType.MAPPINGS_CLEARED]: { count: number };

  [EventType.MAPPING_RESOLVED]: { mapping: KeyMapping };
  [EventType.MAPPING_TIMEOUT]: { keys: string };

  [EventType.COMMAND_DISPATCHED]: { actionId: string; count: number; keys: string };
  [EventType.COMMAND_REJECTED]: { actionId: string; reason: string };

  [EventType.MODE_CHANGED]: { previous: ModeFrame; current: ModeFrame };
  [EventType.RECORDING_CHANGED]: { recording: boolean };

  [EventType.ERROR_OCCURRED]: { error: Error; context: string; severity: string };
  [EventType.ERROR_RECOVERED]: { error: Error; context: string; strategy: string };
}

/**
 * Extract payload type for a specific event type
 */
export type EventPayload<T extends EventType> = EventPayloadMap[T];

/**
 * Event handler function type
 */
export type EventHandler<T extends EventType> = (payload: EventPayload<T>) => void | Promise<void>;

/**
 * Unsubscribe function returned by event subscriptions
 */
export type Unsubscribe = () => void;
