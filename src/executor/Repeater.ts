/**
 * Repeater - dot-repeat state for extension handlers
 *
 * @module executor/Repeater
 */

import type { ExtensionHandler } from '../types/mappings';
import type { Argument } from '../types/commands';

export class Repeater {
  /** Last repeatable extension that ran */
  lastExtensionHandler: ExtensionHandler | null = null;

  /**
   * Motion argument an extension synthesized for a pending operator;
   * reused instead of waiting for a motion while repeating
   */
  argumentCaptured: Argument | null = null;

  /** True when the last repeatable change came from an extension */
  repeatHandler = false;

  clean(): void {
    this.lastExtensionHandler = null;
    this.argumentCaptured = null;
    this.repeatHandler = false;
  }
}
