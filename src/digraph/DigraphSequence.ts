/**
 * DigraphSequence - Digraph and Literal Character Composition
 *
 * A small state machine nested inside argument collection:
 * - `<C-K>` + two characters looks up a digraph
 * - `<C-V>` / `<C-Q>` + digits enters a character by code: up to 3 decimal
 *   digits, `o` + 3 octal, `x` + 2 hex, `u` + 4 hex, `U` + 8 hex
 * - `<C-V>` + any other key enters that key literally
 *
 * @module digraph/DigraphSequence
 */

import { KeyModifier, KeyStroke } from '../keys/KeyStroke';
import { getLogger } from '../services/Logger';
import { DigraphTable } from './DigraphTable';

const log = getLogger('digraph');

export type DigraphResult =
  | { readonly kind: 'handled' }
  | { readonly kind: 'bad' }
  | { readonly kind: 'unhandled' }
  | {
      readonly kind: 'done';
      /** The composed character */
      readonly stroke: KeyStroke;
      /** Key that ended a digit run early, to be handled after `stroke` */
      readonly pending: KeyStroke | null;
    };

const HANDLED: DigraphResult = { kind: 'handled' };
const BAD: DigraphResult = { kind: 'bad' };
const UNHANDLED: DigraphResult = { kind: 'unhandled' };

function done(stroke: KeyStroke, pending: KeyStroke | null = null): DigraphResult {
  return { kind: 'done', stroke, pending };
}

enum DigraphState {
  PENDING = 'pending',
  DIG_ONE = 'digOne',
  DIG_TWO = 'digTwo',
  CODE_START = 'codeStart',
  CODE_CHAR = 'codeChar',
}

interface CodeFormat {
  readonly base: number;
  readonly maxDigits: number;
}

const CODE_FORMATS: Record<string, CodeFormat> = {
  o: { base: 8, maxDigits: 3 },
  O: { base: 8, maxDigits: 3 },
  x: { base: 16, maxDigits: 2 },
  X: { base: 16, maxDigits: 2 },
  u: { base: 16, maxDigits: 4 },
  U: { base: 16, maxDigits: 8 },
};

const DECIMAL: CodeFormat = { base: 10, maxDigits: 3 };

/** Characters that named keys enter literally */
const LITERAL_NAMED: Partial<Record<string, string>> = {
  Tab: '\t',
  Enter: '\r',
  Escape: '\x1b',
  Backspace: '\b',
  Delete: '\x7f',
};

function isDigitOfBase(ch: string, base: number): boolean {
  const value = parseInt(ch, base);
  return !Number.isNaN(value) && value.toString(base) === ch.toLowerCase();
}

const defaultTable = new DigraphTable();

export class DigraphSequence {
  private state = DigraphState.PENDING;
  private firstChar = '';
  private format: CodeFormat = DECIMAL;
  private prefix: string | null = null;
  private digits = '';
  private readonly table: DigraphTable;

  constructor(table: DigraphTable = defaultTable) {
    this.table = table;
  }

  /** True while composition is in progress */
  get isActive(): boolean {
    return this.state !== DigraphState.PENDING;
  }

  startDigraphSequence(): void {
    log.debug('Digraph sequence started');
    this.state = DigraphState.DIG_ONE;
  }

  startLiteralSequence(): void {
    log.debug('Literal sequence started');
    this.state = DigraphState.CODE_START;
    this.format = DECIMAL;
    this.prefix = null;
    this.digits = '';
  }

  processKey(key: KeyStroke): DigraphResult {
    switch (this.state) {
      case DigraphState.PENDING:
        return UNHANDLED;

      case DigraphState.DIG_ONE: {
        const ch = key.typedChar;
        if (ch === null) {
          this.reset();
          return BAD;
        }
        this.firstChar = ch;
        this.state = DigraphState.DIG_TWO;
        return HANDLED;
      }

      case DigraphState.DIG_TWO: {
        const ch = key.typedChar;
        this.reset();
        if (ch === null) {
          return BAD;
        }
        const result = this.table.lookup(this.firstChar, ch);
        log.debug(`Digraph ${this.firstChar}${ch} -> ${result}`);
        return done(KeyStroke.of(result));
      }

      case DigraphState.CODE_START:
        return this.processCodeStart(key);

      case DigraphState.CODE_CHAR:
        return this.processCodeChar(key);
    }
  }

  reset(): void {
    this.state = DigraphState.PENDING;
    this.prefix = null;
    this.digits = '';
  }

  private processCodeStart(key: KeyStroke): DigraphResult {
    const ch = key.modifiers === KeyModifier.NONE ? key.char : null;

    if (ch !== null) {
      const format = CODE_FORMATS[ch];
      if (format !== undefined) {
        this.format = format;
        this.prefix = ch;
        this.state = DigraphState.CODE_CHAR;
        return HANDLED;
      }
      if (ch >= '0' && ch <= '9') {
        this.format = DECIMAL;
        this.prefix = null;
        this.digits = ch;
        this.state = DigraphState.CODE_CHAR;
        return HANDLED;
      }
    }

    this.reset();
    return done(this.literalStroke(key));
  }

  private processCodeChar(key: KeyStroke): DigraphResult {
    const ch = key.modifiers === KeyModifier.NONE ? key.char : null;

    if (ch !== null && isDigitOfBase(ch, this.format.base)) {
      this.digits += ch;
      if (this.digits.length < this.format.maxDigits) {
        return HANDLED;
      }
      return this.finishCode(null);
    }

    return this.finishCode(key);
  }

  private finishCode(pending: KeyStroke | null): DigraphResult {
    const digits = this.digits;
    const prefix = this.prefix;
    this.reset();

    if (digits.length === 0) {
      // Only the format letter was typed: it is entered as itself
      return done(KeyStroke.of(prefix ?? '0'), pending);
    }

    const code = parseInt(digits, this.format.base);
    if (code > 0x10ffff) {
      return BAD;
    }
    log.debug(`Literal code ${digits} (base ${this.format.base}) -> ${code}`);
    return done(KeyStroke.of(String.fromCodePoint(code)), pending);
  }

  private literalStroke(key: KeyStroke): KeyStroke {
    if (key.code !== null) {
      const ch = LITERAL_NAMED[key.code];
      return ch !== undefined && key.modifiers === KeyModifier.NONE ? KeyStroke.of(ch) : key;
    }
    const typed = key.typedChar;
    return typed !== null ? KeyStroke.of(typed) : key;
  }
}
