/**
 * KeyTrie - Command Key Sequence Tree
 *
 * One tree per mapping mode. Leaves name complete commands; inner nodes are
 * prefixes of multi-key commands (`g` in `gg`, `<C-w>` in `<C-w>s`).
 * A built trie is never mutated: registering an action builds a new one.
 *
 * @module registry/KeyTrie
 */

import type { KeyStroke } from '../keys/KeyStroke';
import type { ActionDescriptor } from '../types/commands';
import type { MappingMode } from '../types/modes';
import { formatKeys } from '../keys/KeyNotation';
import { getLogger } from '../services/Logger';

const log = getLogger('trie');

export interface CommandNode {
  readonly kind: 'command';
  readonly action: ActionDescriptor;
}

export interface CommandPartNode {
  readonly kind: 'partial';
  /** True for the tree's root */
  readonly isRoot: boolean;
  readonly children: ReadonlyMap<KeyStroke, TrieNode>;
}

export type TrieNode = CommandNode | CommandPartNode;

/**
 * Child of `node` for `key`; undefined on a miss
 */
export function lookup(node: CommandPartNode, key: KeyStroke): TrieNode | undefined {
  return node.children.get(key);
}

interface MutablePartNode {
  kind: 'partial';
  isRoot: boolean;
  children: Map<KeyStroke, MutablePartNode | CommandNode>;
}

/**
 * A key sequence that could not be inserted
 */
export interface TrieConflict {
  readonly action: ActionDescriptor;
  readonly keys: readonly KeyStroke[];
  readonly reason: string;
}

/**
 * Build the trie of `mode` from the actions registered for it.
 * Sequences that collide with an earlier one are skipped and reported.
 */
export function buildKeyTrie(
  mode: MappingMode,
  actions: Iterable<ActionDescriptor>
): { root: CommandPartNode; conflicts: TrieConflict[] } {
  const root: MutablePartNode = { kind: 'partial', isRoot: true, children: new Map() };
  const conflicts: TrieConflict[] = [];
  let count = 0;

  for (const action of actions) {
    if (!action.mappingModes.includes(mode)) {
      continue;
    }
    for (const keys of action.keys) {
      const reason = insert(root, keys, action);
      if (reason === null) {
        count++;
      } else {
        conflicts.push({ action, keys, reason });
      }
    }
  }

  log.debug(`Built ${mode} trie with ${count} sequences`);
  return { root, conflicts };
}

/**
 * Insert one sequence; returns the reason it collides, or null
 */
function insert(root: MutablePartNode, keys: readonly KeyStroke[], action: ActionDescriptor): string | null {
  if (keys.length === 0) {
    return 'empty key sequence';
  }

  let node = root;
  for (let i = 0; i < keys.length - 1; i++) {
    const child = node.children.get(keys[i]);
    if (child === undefined) {
      const next: MutablePartNode = { kind: 'partial', isRoot: false, children: new Map() };
      node.children.set(keys[i], next);
      node = next;
    } else if (child.kind === 'command') {
      return `${formatKeys(keys.slice(0, i + 1))} is already ${child.action.id}`;
    } else {
      node = child;
    }
  }

  const last = keys[keys.length - 1];
  const existing = node.children.get(last);
  if (existing !== undefined) {
    return existing.kind === 'command'
      ? `${formatKeys(keys)} is already ${existing.action.id}`
      : `${formatKeys(keys)} is a prefix of longer commands`;
  }

  node.children.set(last, { kind: 'command', action });
  return null;
}
