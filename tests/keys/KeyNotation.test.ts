/**
 * Unit tests for key notation parsing and formatting
 */

import fc from 'fast-check';
import { KeyModifier, KeyStroke } from '../../src/keys/KeyStroke';
import { formatKeys, parseKeys, startsWith } from '../../src/keys/KeyNotation';

describe('KeyNotation', () => {
  describe('parseKeys', () => {
    it('should parse plain characters', () => {
      expect(parseKeys('dd')).toEqual([KeyStroke.of('d'), KeyStroke.of('d')]);
    });

    it('should parse modifier groups', () => {
      expect(parseKeys('<C-w>j')).toEqual([KeyStroke.of('w', KeyModifier.CTRL), KeyStroke.of('j')]);
      expect(parseKeys('<c-W>')).toEqual([KeyStroke.of('w', KeyModifier.CTRL)]);
      expect(parseKeys('<S-a>')).toEqual([KeyStroke.of('A')]);
    });

    it('should parse named keys case-insensitively', () => {
      expect(parseKeys('<Esc><cr><TAB>')).toEqual([
        KeyStroke.named('Escape'),
        KeyStroke.named('Enter'),
        KeyStroke.named('Tab'),
      ]);
    });

    it('should parse named characters', () => {
      expect(formatKeys(parseKeys('<Space><lt><Bar><Bslash>'))).toBe('<Space><lt><Bar>\\');
    });

    it('should parse character codes in decimal, hex and octal', () => {
      const a = KeyStroke.of('A');
      expect(parseKeys('<Char-65>')).toEqual([a]);
      expect(parseKeys('<Char-0x41>')).toEqual([a]);
      expect(parseKeys('<Char-0101>')).toEqual([a]);
    });

    it('should substitute the leader', () => {
      expect(formatKeys(parseKeys('<leader>f', ' '))).toBe('<Space>f');
      expect(formatKeys(parseKeys('<Leader>w'))).toBe('\\w');
    });

    it('should take unknown groups literally', () => {
      expect(parseKeys('<foo>')).toHaveLength(5);
      expect(formatKeys(parseKeys('<a>'))).toBe('<lt>a>');
      expect(formatKeys(parseKeys('<'))).toBe('<lt>');
      expect(formatKeys(parseKeys('<>'))).toBe('<lt>>');
    });

    it('should parse the empty string as no keys', () => {
      expect(parseKeys('')).toEqual([]);
    });
  });

  describe('formatKeys', () => {
    it('should format canonical notation', () => {
      expect(formatKeys([KeyStroke.named('Escape'), KeyStroke.of('x')])).toBe('<Esc>x');
    });

    it('should parse back what it formats', () => {
      const strokes = [
        KeyStroke.of('a'),
        KeyStroke.of('Z'),
        KeyStroke.of('<'),
        KeyStroke.of(' '),
        KeyStroke.of('w', KeyModifier.CTRL),
        KeyStroke.of('x', KeyModifier.ALT),
        KeyStroke.named('Escape'),
        KeyStroke.named('Plug'),
        KeyStroke.named('F5', KeyModifier.SHIFT),
      ];
      fc.assert(
        fc.property(fc.array(fc.constantFrom(...strokes), { maxLength: 8 }), (keys) => {
          expect(parseKeys(formatKeys(keys))).toEqual(keys);
        })
      );
    });
  });

  describe('startsWith', () => {
    const keys = parseKeys('abc');

    it('should accept proper and improper prefixes', () => {
      expect(startsWith(keys, parseKeys('ab'))).toBe(true);
      expect(startsWith(keys, keys)).toBe(true);
      expect(startsWith(keys, [])).toBe(true);
    });

    it('should reject longer or different sequences', () => {
      expect(startsWith(keys, parseKeys('abcd'))).toBe(false);
      expect(startsWith(keys, parseKeys('ax'))).toBe(false);
    });
  });
});
