/**
 * MappingStore - Key Mapping Storage
 *
 * Stores user key mappings with:
 * - CRUD operations for mappings
 * - Exact and prefix lookup per mapping mode
 * - Query by mode, source, or target
 * - Event emission through EventBus
 *
 * A mapping belongs to one or more mapping modes. Adding a mapping whose
 * left-hand side is already mapped in one of its modes takes that mode
 * away from the older mapping; a mapping left without modes is removed.
 *
 * @module stores/MappingStore
 */

import type { IEventBus } from '../types/services';
import type { IMappingStore, KeyMapping, MappingQuery } from '../types/mappings';
import type { MappingMode } from '../types/modes';
import type { KeyStroke } from '../keys/KeyStroke';
import { EventType } from '../types/events';
import { formatKeys, startsWith } from '../keys/KeyNotation';
import { getLogger } from '../services/Logger';

const log = getLogger('mapping');

/**
 * MappingStore implementation
 */
export class MappingStore implements IMappingStore {
  /**
   * Internal storage for mappings, keyed by ID
   */
  private mappings = new Map<string, KeyMapping>();

  /**
   * Per-mode index by canonical left-hand side
   */
  private byMode = new Map<MappingMode, Map<string, KeyMapping>>();

  private eventBus: IEventBus;

  constructor(eventBus: IEventBus) {
    this.eventBus = eventBus;
  }

  /**
   * Add a mapping to the store
   */
  add(mapping: KeyMapping): void {
    if (this.mappings.has(mapping.id)) {
      this.remove(mapping.id);
    }
    for (const mode of mapping.modes) {
      this.withdraw(mapping.source, mode);
    }

    this.mappings.set(mapping.id, mapping);
    this.indexMapping(mapping);
    log.debug(`Mapped ${mapping.source} -> ${mapping.target} in ${mapping.modes.join(',')}`);
    this.eventBus.emit(EventType.MAPPING_ADDED, { mapping });
  }

  /**
   * Remove a mapping by ID
   *
   * @returns true if the mapping was removed, false if not found
   */
  remove(id: string): boolean {
    const mapping = this.mappings.get(id);
    if (!mapping) {
      return false;
    }

    this.mappings.delete(id);
    this.unindexMapping(mapping);
    this.eventBus.emit(EventType.MAPPING_REMOVED, { mapping });
    return true;
  }

  /**
   * Remove the mappings of a source key sequence
   *
   * @param mode - Only take this mode away from the matching mappings
   * @returns The number of mappings touched
   */
  removeBySource(source: string, mode?: MappingMode): number {
    if (mode !== undefined) {
      return this.withdraw(source, mode) ? 1 : 0;
    }

    const toRemove = this.getAll().filter((mapping) => mapping.source === source);
    for (const mapping of toRemove) {
      this.remove(mapping.id);
    }
    return toRemove.length;
  }

  get(id: string): KeyMapping | undefined {
    return this.mappings.get(id);
  }

  lookup(mode: MappingMode, keys: readonly KeyStroke[]): KeyMapping | undefined {
    if (keys.length === 0) {
      return undefined;
    }
    return this.byMode.get(mode)?.get(formatKeys(keys));
  }

  isPrefix(mode: MappingMode, keys: readonly KeyStroke[]): boolean {
    const index = this.byMode.get(mode);
    if (!index || keys.length === 0) {
      return false;
    }
    for (const mapping of index.values()) {
      if (mapping.fromKeys.length > keys.length && startsWith(mapping.fromKeys, keys)) {
        return true;
      }
    }
    return false;
  }

  getAll(): KeyMapping[] {
    return Array.from(this.mappings.values());
  }

  getByMode(mode: MappingMode): KeyMapping[] {
    return Array.from(this.byMode.get(mode)?.values() ?? []);
  }

  /**
   * Query mappings with filters
   */
  query(query: MappingQuery): KeyMapping[] {
    const result: KeyMapping[] = [];

    for (const mapping of this.mappings.values()) {
      if (this.matchesQuery(mapping, query)) {
        result.push(mapping);
      }
    }

    return result;
  }

  /**
   * Clear all mappings, or take one mode away from every mapping
   */
  clear(mode?: MappingMode): void {
    let count: number;
    if (mode === undefined) {
      count = this.mappings.size;
      this.mappings.clear();
      this.byMode.clear();
    } else {
      count = 0;
      for (const mapping of this.getByMode(mode)) {
        if (this.withdraw(mapping.source, mode)) {
          count++;
        }
      }
    }
    this.eventBus.emit(EventType.MAPPINGS_CLEARED, { count });
  }

  count(): number {
    return this.mappings.size;
  }

  /**
   * Take `mode` away from the mapping of `source` in that mode
   *
   * @returns whether a mapping was mapped there
   */
  private withdraw(source: string, mode: MappingMode): boolean {
    const existing = this.byMode.get(mode)?.get(source);
    if (!existing) {
      return false;
    }

    const remaining = existing.modes.filter((m) => m !== mode);
    if (remaining.length === 0) {
      this.remove(existing.id);
      return true;
    }

    this.unindexMapping(existing);
    const narrowed: KeyMapping = { ...existing, modes: remaining };
    this.mappings.set(narrowed.id, narrowed);
    this.indexMapping(narrowed);
    this.eventBus.emit(EventType.MAPPING_REMOVED, { mapping: { ...existing, modes: [mode] } });
    return true;
  }

  private indexMapping(mapping: KeyMapping): void {
    for (const mode of mapping.modes) {
      let index = this.byMode.get(mode);
      if (!index) {
        index = new Map();
        this.byMode.set(mode, index);
      }
      index.set(mapping.source, mapping);
    }
  }

  private unindexMapping(mapping: KeyMapping): void {
    for (const mode of mapping.modes) {
      const index = this.byMode.get(mode);
      if (index?.get(mapping.source) === mapping) {
        index.delete(mapping.source);
      }
    }
  }

  /**
   * Check if a mapping matches a query
   */
  private matchesQuery(mapping: KeyMapping, query: MappingQuery): boolean {
    if (query.mode !== undefined && !mapping.modes.includes(query.mode)) {
      return false;
    }

    if (query.source !== undefined && mapping.source !== query.source) {
      return false;
    }

    if (query.target !== undefined && mapping.target !== query.target) {
      return false;
    }

    if (query.recursive !== undefined && mapping.recursive !== query.recursive) {
      return false;
    }

    return true;
  }
}
