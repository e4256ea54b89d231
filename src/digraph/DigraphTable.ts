/**
 * DigraphTable - two-character digraph lookup
 *
 * @module digraph/DigraphTable
 */

import defaultDigraphs from './digraphs.json';

export class DigraphTable {
  private readonly pairs = new Map<string, string>();

  constructor(entries: Readonly<Record<string, string>> = defaultDigraphs) {
    for (const [pair, result] of Object.entries(entries)) {
      this.define(pair, result);
    }
  }

  /**
   * Define or replace a digraph
   */
  define(pair: string, result: string): void {
    const chars = Array.from(pair);
    if (chars.length !== 2 || Array.from(result).length !== 1) {
      throw new RangeError(`Invalid digraph ${pair} -> ${result}`);
    }
    this.pairs.set(pair, result);
  }

  /**
   * Character for a pair; tries the pair reversed, then falls back to the
   * second character
   */
  lookup(first: string, second: string): string {
    return this.pairs.get(first + second) ?? this.pairs.get(second + first) ?? second;
  }

  get size(): number {
    return this.pairs.size;
  }
}
