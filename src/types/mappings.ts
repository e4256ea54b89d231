/**
 * Mapping-related type definitions
 */

import type { KeyStroke } from '../keys/KeyStroke';
import type { DataContext, EditorSurface } from './host';
import type { MappingMode } from './modes';

/**
 * Handler-style mapping target, run instead of replaying keys
 */
export interface ExtensionHandler {
  /** Name used for the host transaction */
  readonly name: string;
  /** Whether dot-repeat re-runs this handler */
  readonly isRepeatable: boolean;
  execute(editor: EditorSurface, context: DataContext): void;
}

/**
 * User key mapping with metadata
 */
export interface KeyMapping {
  /** Unique identifier for the mapping */
  id: string;
  /** Canonical notation of `fromKeys` */
  source: string;
  /** Left-hand side */
  fromKeys: readonly KeyStroke[];
  /** Canonical notation of `toKeys`, or the handler name */
  target: string;
  /** Right-hand side keys; null for a handler mapping */
  toKeys: readonly KeyStroke[] | null;
  /** Handler run on a match; null for a key mapping */
  handler: ExtensionHandler | null;
  /** Mapping modes this mapping applies to */
  modes: MappingMode[];
  /** Whether replayed keys are themselves subject to mapping */
  recursive: boolean;
  /** Line number in rc text, 0 when added programmatically */
  lineNumber: number;
  /** Timestamp when the mapping was created */
  createdAt: number;
}

/**
 * Query options for filtering mappings
 */
export interface MappingQuery {
  mode?: MappingMode;
  source?: string;
  target?: string;
  recursive?: boolean;
}

/**
 * Mapping store interface
 */
export interface IMappingStore {
  /**
   * Add a mapping, replacing any mapping with the same keys in its modes
   */
  add(mapping: KeyMapping): void;

  /**
   * Remove a mapping by ID
   */
  remove(id: string): boolean;

  /**
   * Remove the mappings of a source key sequence, optionally in one mode only
   */
  removeBySource(source: string, mode?: MappingMode): number;

  /**
   * Get a mapping by ID
   */
  get(id: string): KeyMapping | undefined;

  /**
   * Mapping whose left-hand side equals `keys` in `mode`
   */
  lookup(mode: MappingMode, keys: readonly KeyStroke[]): KeyMapping | undefined;

  /**
   * True when `keys` is a proper prefix of a mapping's left-hand side in `mode`
   */
  isPrefix(mode: MappingMode, keys: readonly KeyStroke[]): boolean;

  /**
   * Get all mappings
   */
  getAll(): KeyMapping[];

  /**
   * Get mappings by mode
   */
  getByMode(mode: MappingMode): KeyMapping[];

  /**
   * Query mappings with filters
   */
  query(query: MappingQuery): KeyMapping[];

  /**
   * Clear all mappings, or those of one mode
   */
  clear(mode?: MappingMode): void;

  /**
   * Get the count of mappings
   */
  count(): number;
}
