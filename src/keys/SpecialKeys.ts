/**
 * Keys with a fixed meaning to the dispatch engine
 *
 * @module keys/SpecialKeys
 */

import { KeyModifier, KeyStroke } from './KeyStroke';

/** Marker that starts synthetic `<Plug>` mappings */
export const PLUG_KEY = KeyStroke.named('Plug');

/** Mapping target that does nothing */
export const NOP_KEY = KeyStroke.named('Nop');

/** Trie child that a repeated operator key is redirected to (`dd` → `d_`) */
export const DUPLICATE_OPERATOR_PLACEHOLDER = KeyStroke.of('_');

export const ESCAPE_KEY = KeyStroke.named('Escape');

/** Divides a pending count by ten */
export const COUNT_DELETION_KEY = KeyStroke.named('Delete');

const CLOSE_KEYS: ReadonlySet<KeyStroke> = new Set([
  ESCAPE_KEY,
  KeyStroke.of('[', KeyModifier.CTRL),
  KeyStroke.of('c', KeyModifier.CTRL),
]);

const DIGRAPH_START = KeyStroke.of('k', KeyModifier.CTRL);

const LITERAL_STARTS: ReadonlySet<KeyStroke> = new Set([
  KeyStroke.of('v', KeyModifier.CTRL),
  KeyStroke.of('q', KeyModifier.CTRL),
]);

/**
 * Escape-equivalent keys
 */
export function isCloseKeyStroke(key: KeyStroke): boolean {
  return CLOSE_KEYS.has(key);
}

export function isDigraphStart(key: KeyStroke): boolean {
  return key === DIGRAPH_START;
}

export function isLiteralStart(key: KeyStroke): boolean {
  return LITERAL_STARTS.has(key);
}
