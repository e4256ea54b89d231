/**
 * KeyStroke - Immutable Key Event Value
 *
 * One physical key press: a character payload or a named key, plus modifier
 * bits. Instances are interned, so two strokes describing the same key are
 * the same object and share one canonical notation (`<C-w>`, `<Esc>`, `a`).
 *
 * @module keys/KeyStroke
 */

/**
 * Modifier bits
 */
export enum KeyModifier {
  NONE = 0,
  CTRL = 1,
  ALT = 2,
  SHIFT = 4,
  META = 8,
}

/**
 * Keys without a character payload
 */
export type NamedKey =
  | 'Escape'
  | 'Enter'
  | 'Tab'
  | 'Backspace'
  | 'Delete'
  | 'Insert'
  | 'Home'
  | 'End'
  | 'PageUp'
  | 'PageDown'
  | 'Up'
  | 'Down'
  | 'Left'
  | 'Right'
  | 'F1'
  | 'F2'
  | 'F3'
  | 'F4'
  | 'F5'
  | 'F6'
  | 'F7'
  | 'F8'
  | 'F9'
  | 'F10'
  | 'F11'
  | 'F12'
  | 'Plug'
  | 'Nop';

/**
 * Notation names of named keys
 */
export const NAMED_KEY_NOTATION: Record<NamedKey, string> = {
  Escape: 'Esc',
  Enter: 'CR',
  Tab: 'Tab',
  Backspace: 'BS',
  Delete: 'Del',
  Insert: 'Insert',
  Home: 'Home',
  End: 'End',
  PageUp: 'PageUp',
  PageDown: 'PageDown',
  Up: 'Up',
  Down: 'Down',
  Left: 'Left',
  Right: 'Right',
  F1: 'F1',
  F2: 'F2',
  F3: 'F3',
  F4: 'F4',
  F5: 'F5',
  F6: 'F6',
  F7: 'F7',
  F8: 'F8',
  F9: 'F9',
  F10: 'F10',
  F11: 'F11',
  F12: 'F12',
  Plug: 'Plug',
  Nop: 'Nop',
};

/**
 * Characters that have a name inside `<...>`
 */
const CHAR_NOTATION: Record<string, string> = {
  ' ': 'Space',
  '<': 'lt',
  '|': 'Bar',
};

const MODIFIER_PREFIXES: Array<[KeyModifier, string]> = [
  [KeyModifier.CTRL, 'C-'],
  [KeyModifier.ALT, 'M-'],
  [KeyModifier.SHIFT, 'S-'],
  [KeyModifier.META, 'D-'],
];

const ALL_MODIFIERS =
  KeyModifier.CTRL | KeyModifier.ALT | KeyModifier.SHIFT | KeyModifier.META;

function isLetter(ch: string): boolean {
  return ch.toLowerCase() !== ch.toUpperCase();
}

function isControlChar(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return code < 0x20 || code === 0x7f;
}

function modifierPrefix(modifiers: number): string {
  let prefix = '';
  for (const [bit, text] of MODIFIER_PREFIXES) {
    if (modifiers & bit) {
      prefix += text;
    }
  }
  return prefix;
}

function charNotation(ch: string, modifiers: number): string {
  const name = CHAR_NOTATION[ch];
  if (isControlChar(ch)) {
    return `<${modifierPrefix(modifiers)}Char-${ch.codePointAt(0) ?? 0}>`;
  }
  if (modifiers === KeyModifier.NONE) {
    return name ? `<${name}>` : ch;
  }
  return `<${modifierPrefix(modifiers)}${name ?? ch}>`;
}

/**
 * Immutable, interned key stroke
 */
export class KeyStroke {
  private static readonly interned = new Map<string, KeyStroke>();

  /** Character payload, or null for a named key */
  readonly char: string | null;

  /** Named key, or null for a character key */
  readonly code: NamedKey | null;

  /** Bitmask of {@link KeyModifier} */
  readonly modifiers: number;

  /** Canonical notation, the stroke's identity */
  readonly id: string;

  private constructor(char: string | null, code: NamedKey | null, modifiers: number, id: string) {
    this.char = char;
    this.code = code;
    this.modifiers = modifiers;
    this.id = id;
  }

  /**
   * A character key. Shift folds into the character; Ctrl with a letter is
   * stored with the lower-case letter.
   */
  static of(char: string, modifiers: number = KeyModifier.NONE): KeyStroke {
    if (Array.from(char).length !== 1) {
      throw new RangeError(`A key stroke carries exactly one character, got "${char}"`);
    }

    let ch = char;
    let mods = modifiers & ALL_MODIFIERS;
    if (mods & KeyModifier.SHIFT) {
      ch = ch.toUpperCase();
      mods &= ~KeyModifier.SHIFT;
    }
    if (mods & KeyModifier.CTRL && isLetter(ch)) {
      ch = ch.toLowerCase();
    }

    return KeyStroke.intern(ch, null, mods, charNotation(ch, mods));
  }

  /**
   * A named key such as Escape or an arrow
   */
  static named(code: NamedKey, modifiers: number = KeyModifier.NONE): KeyStroke {
    const mods = modifiers & ALL_MODIFIERS;
    const id = `<${modifierPrefix(mods)}${NAMED_KEY_NOTATION[code]}>`;
    return KeyStroke.intern(null, code, mods, id);
  }

  private static intern(
    char: string | null,
    code: NamedKey | null,
    modifiers: number,
    id: string
  ): KeyStroke {
    const existing = KeyStroke.interned.get(id);
    if (existing) {
      return existing;
    }
    const stroke = new KeyStroke(char, code, modifiers, id);
    KeyStroke.interned.set(id, stroke);
    return stroke;
  }

  hasModifier(modifier: KeyModifier): boolean {
    return (this.modifiers & modifier) !== 0;
  }

  /**
   * The character this stroke types, or null when it types none.
   * Ctrl with `@`, a letter, or one of `[\]^_` types the matching control
   * character.
   */
  get typedChar(): string | null {
    if (this.char === null) {
      return null;
    }
    if (this.modifiers === KeyModifier.NONE) {
      return this.char;
    }
    if (this.modifiers === KeyModifier.CTRL) {
      const upper = (this.char.toUpperCase().codePointAt(0) ?? 0);
      if (upper >= 0x40 && upper <= 0x5f) {
        return String.fromCharCode(upper & 0x1f);
      }
    }
    return null;
  }

  /**
   * The digit this stroke types, or null
   */
  get digit(): number | null {
    const ch = this.modifiers === KeyModifier.NONE ? this.char : null;
    if (ch !== null && ch >= '0' && ch <= '9') {
      return ch.charCodeAt(0) - 0x30;
    }
    return null;
  }

  equals(other: KeyStroke): boolean {
    return this.id === other.id;
  }

  toString(): string {
    return this.id;
  }
}
