/**
 * Unit tests for MappingStore
 */

import { MappingStore } from '../../src/stores/MappingStore';
import { EventBus } from '../../src/core/EventBus';
import { EventType } from '../../src/types/events';
import { MappingMode } from '../../src/types/modes';
import { formatKeys, parseKeys } from '../../src/keys/KeyNotation';
import type { KeyMapping } from '../../src/types/mappings';

function createMapping(id: string, from: string, to: string, modes: MappingMode[] = [MappingMode.NORMAL]): KeyMapping {
  const fromKeys = parseKeys(from);
  const toKeys = parseKeys(to);
  return {
    id,
    source: formatKeys(fromKeys),
    fromKeys,
    target: formatKeys(toKeys),
    toKeys,
    handler: null,
    modes,
    recursive: false,
    lineNumber: 0,
    createdAt: 0,
  };
}

describe('MappingStore', () => {
  let eventBus: EventBus;
  let store: MappingStore;

  beforeEach(() => {
    eventBus = new EventBus();
    store = new MappingStore(eventBus);
  });

  afterEach(() => {
    eventBus.clear();
  });

  describe('add', () => {
    it('should store and index a mapping', () => {
      const mapping = createMapping('m1', 'jk', '<Esc>');
      store.add(mapping);

      expect(store.get('m1')).toBe(mapping);
      expect(store.lookup(MappingMode.NORMAL, parseKeys('jk'))).toBe(mapping);
      expect(store.lookup(MappingMode.INSERT, parseKeys('jk'))).toBeUndefined();
      expect(store.count()).toBe(1);
    });

    it('should emit mapping:added', () => {
      const handler = jest.fn();
      eventBus.on(EventType.MAPPING_ADDED, handler);

      const mapping = createMapping('m1', 'Y', 'y$');
      store.add(mapping);

      expect(handler).toHaveBeenCalledWith({ mapping });
    });

    it('should replace the mapping of the same keys in the same mode', () => {
      store.add(createMapping('m1', 'Y', 'y$'));
      store.add(createMapping('m2', 'Y', 'yy'));

      expect(store.count()).toBe(1);
      expect(store.lookup(MappingMode.NORMAL, parseKeys('Y'))?.id).toBe('m2');
    });

    it('should narrow an older mapping that shares only some modes', () => {
      store.add(createMapping('m1', 'Y', 'y$', [MappingMode.NORMAL, MappingMode.VISUAL]));
      store.add(createMapping('m2', 'Y', 'yy', [MappingMode.NORMAL]));

      expect(store.count()).toBe(2);
      expect(store.get('m1')?.modes).toEqual([MappingMode.VISUAL]);
      expect(store.lookup(MappingMode.VISUAL, parseKeys('Y'))?.id).toBe('m1');
      expect(store.lookup(MappingMode.NORMAL, parseKeys('Y'))?.id).toBe('m2');
    });

    it('should replace a mapping with the same id', () => {
      store.add(createMapping('m1', 'Y', 'y$'));
      store.add(createMapping('m1', 'Q', 'gq'));

      expect(store.count()).toBe(1);
      expect(store.lookup(MappingMode.NORMAL, parseKeys('Y'))).toBeUndefined();
      expect(store.lookup(MappingMode.NORMAL, parseKeys('Q'))?.target).toBe('gq');
    });
  });

  describe('remove', () => {
    it('should remove a mapping and emit mapping:removed', () => {
      const handler = jest.fn();
      eventBus.on(EventType.MAPPING_REMOVED, handler);
      const mapping = createMapping('m1', 'Y', 'y$');
      store.add(mapping);

      expect(store.remove('m1')).toBe(true);
      expect(store.lookup(MappingMode.NORMAL, parseKeys('Y'))).toBeUndefined();
      expect(handler).toHaveBeenCalledWith({ mapping });
    });

    it('should return false for an unknown id', () => {
      expect(store.remove('missing')).toBe(false);
    });
  });

  describe('removeBySource', () => {
    beforeEach(() => {
      store.add(createMapping('m1', 'Y', 'y$', [MappingMode.NORMAL, MappingMode.VISUAL]));
    });

    it('should take a single mode away', () => {
      expect(store.removeBySource('Y', MappingMode.NORMAL)).toBe(1);
      expect(store.get('m1')?.modes).toEqual([MappingMode.VISUAL]);
      expect(store.lookup(MappingMode.NORMAL, parseKeys('Y'))).toBeUndefined();
    });

    it('should report nothing removed for a mode without the mapping', () => {
      expect(store.removeBySource('Y', MappingMode.INSERT)).toBe(0);
    });

    it('should remove the mapping from every mode', () => {
      expect(store.removeBySource('Y')).toBe(1);
      expect(store.count()).toBe(0);
    });
  });

  describe('isPrefix', () => {
    beforeEach(() => {
      store.add(createMapping('m1', 'jk', '<Esc>', [MappingMode.INSERT]));
    });

    it('should accept a proper prefix', () => {
      expect(store.isPrefix(MappingMode.INSERT, parseKeys('j'))).toBe(true);
    });

    it('should reject the complete sequence and other modes', () => {
      expect(store.isPrefix(MappingMode.INSERT, parseKeys('jk'))).toBe(false);
      expect(store.isPrefix(MappingMode.NORMAL, parseKeys('j'))).toBe(false);
      expect(store.isPrefix(MappingMode.INSERT, [])).toBe(false);
    });
  });

  describe('query', () => {
    beforeEach(() => {
      store.add(createMapping('m1', 'Y', 'y$', [MappingMode.NORMAL]));
      store.add({ ...createMapping('m2', 'jk', '<Esc>', [MappingMode.INSERT]), recursive: true });
    });

    it('should filter by mode, source, target and recursion', () => {
      expect(store.query({ mode: MappingMode.INSERT }).map((m) => m.id)).toEqual(['m2']);
      expect(store.query({ source: 'Y' }).map((m) => m.id)).toEqual(['m1']);
      expect(store.query({ target: '<Esc>' }).map((m) => m.id)).toEqual(['m2']);
      expect(store.query({ recursive: false }).map((m) => m.id)).toEqual(['m1']);
      expect(store.query({})).toHaveLength(2);
    });

    it('should list mappings by mode', () => {
      expect(store.getByMode(MappingMode.NORMAL).map((m) => m.id)).toEqual(['m1']);
      expect(store.getByMode(MappingMode.CMD_LINE)).toEqual([]);
    });
  });

  describe('clear', () => {
    beforeEach(() => {
      store.add(createMapping('m1', 'Y', 'y$', [MappingMode.NORMAL, MappingMode.VISUAL]));
      store.add(createMapping('m2', 'jk', '<Esc>', [MappingMode.INSERT]));
    });

    it('should clear everything and report the count', () => {
      const handler = jest.fn();
      eventBus.on(EventType.MAPPINGS_CLEARED, handler);

      store.clear();

      expect(store.count()).toBe(0);
      expect(handler).toHaveBeenCalledWith({ count: 2 });
    });

    it('should clear one mode only', () => {
      const handler = jest.fn();
      eventBus.on(EventType.MAPPINGS_CLEARED, handler);

      store.clear(MappingMode.NORMAL);

      expect(store.count()).toBe(2);
      expect(store.getByMode(MappingMode.NORMAL)).toEqual([]);
      expect(store.get('m1')?.modes).toEqual([MappingMode.VISUAL]);
      expect(handler).toHaveBeenCalledWith({ count: 1 });
    });
  });
});
