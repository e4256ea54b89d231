/**
 * KeyNotation - Key Sequence Parsing and Formatting
 *
 * Converts between `<...>` key notation as written in mappings
 * (`<C-w>j`, `<leader>f`, `<Esc>`) and {@link KeyStroke} sequences.
 * A `<...>` group that names no key is taken literally, character by
 * character.
 *
 * @module keys/KeyNotation
 */

import { KeyModifier, KeyStroke } from './KeyStroke';
import type { NamedKey } from './KeyStroke';

const NAMED_KEYS: Record<string, NamedKey> = {
  esc: 'Escape',
  escape: 'Escape',
  cr: 'Enter',
  enter: 'Enter',
  return: 'Enter',
  tab: 'Tab',
  bs: 'Backspace',
  backspace: 'Backspace',
  del: 'Delete',
  delete: 'Delete',
  insert: 'Insert',
  ins: 'Insert',
  home: 'Home',
  end: 'End',
  pageup: 'PageUp',
  pagedown: 'PageDown',
  up: 'Up',
  down: 'Down',
  left: 'Left',
  right: 'Right',
  f1: 'F1',
  f2: 'F2',
  f3: 'F3',
  f4: 'F4',
  f5: 'F5',
  f6: 'F6',
  f7: 'F7',
  f8: 'F8',
  f9: 'F9',
  f10: 'F10',
  f11: 'F11',
  f12: 'F12',
  plug: 'Plug',
  nop: 'Nop',
};

const NAMED_CHARS: Record<string, string> = {
  space: ' ',
  lt: '<',
  bar: '|',
  bslash: '\\',
};

const MODIFIER_LETTERS: Record<string, KeyModifier> = {
  c: KeyModifier.CTRL,
  m: KeyModifier.ALT,
  a: KeyModifier.ALT,
  s: KeyModifier.SHIFT,
  d: KeyModifier.META,
};

/**
 * `Char-65`, `Char-0x41` or `Char-0101`
 */
function parseCharCode(name: string): string | null {
  const match = /^char-(0x[0-9a-f]+|0[0-7]*|[1-9][0-9]*)$/i.exec(name);
  if (!match) {
    return null;
  }
  const literal = match[1].toLowerCase();
  let code: number;
  if (literal.startsWith('0x')) {
    code = parseInt(literal.slice(2), 16);
  } else if (literal.startsWith('0') && literal.length > 1) {
    code = parseInt(literal.slice(1), 8);
  } else {
    code = parseInt(literal, 10);
  }
  if (code > 0x10ffff) {
    return null;
  }
  return String.fromCodePoint(code);
}

/**
 * Parse the inside of one `<...>` group. Returns null when it names no key.
 */
function parseGroup(inner: string, leader: string): KeyStroke[] | null {
  if (inner.toLowerCase() === 'leader') {
    return Array.from(leader).map((ch) => KeyStroke.of(ch));
  }

  let rest = inner;
  let modifiers: number = KeyModifier.NONE;
  for (;;) {
    const match = /^([cmasd])-(.+)$/i.exec(rest);
    if (!match) {
      break;
    }
    modifiers |= MODIFIER_LETTERS[match[1].toLowerCase()];
    rest = match[2];
  }

  if (Array.from(rest).length === 1) {
    return modifiers === KeyModifier.NONE ? null : [KeyStroke.of(rest, modifiers)];
  }

  const lower = rest.toLowerCase();
  const named = NAMED_KEYS[lower];
  if (named !== undefined) {
    if ((named === 'Plug' || named === 'Nop') && modifiers !== KeyModifier.NONE) {
      return null;
    }
    return [KeyStroke.named(named, modifiers)];
  }

  const ch = NAMED_CHARS[lower] ?? parseCharCode(lower);
  if (ch !== null) {
    return [KeyStroke.of(ch, modifiers)];
  }

  return null;
}

/**
 * Parse key notation into strokes
 *
 * @param text - Notation such as `"<C-w>j"` or `"dd"`
 * @param leader - Replacement for `<leader>`
 */
export function parseKeys(text: string, leader: string = '\\'): KeyStroke[] {
  const result: KeyStroke[] = [];
  const chars = Array.from(text);

  let i = 0;
  while (i < chars.length) {
    const ch = chars[i];
    if (ch === '<') {
      const close = chars.indexOf('>', i + 1);
      if (close > i + 1) {
        const group = parseGroup(chars.slice(i + 1, close).join(''), leader);
        if (group !== null) {
          result.push(...group);
          i = close + 1;
          continue;
        }
      }
    }
    result.push(KeyStroke.of(ch));
    i++;
  }

  return result;
}

/**
 * Format strokes as canonical notation
 */
export function formatKeys(keys: readonly KeyStroke[]): string {
  return keys.map((key) => key.id).join('');
}

/**
 * True when `prefix` is a prefix (not necessarily proper) of `keys`
 */
export function startsWith(keys: readonly KeyStroke[], prefix: readonly KeyStroke[]): boolean {
  if (prefix.length > keys.length) {
    return false;
  }
  return prefix.every((key, index) => key === keys[index]);
}
