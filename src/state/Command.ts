/**
 * Command - one entry of the session's command stack
 *
 * @module state/Command
 */

import type { KeyStroke } from '../keys/KeyStroke';
import type {
  ActionDescriptor,
  Argument,
  CommandFlag,
  CommandType,
} from '../types/commands';

export class Command {
  readonly action: ActionDescriptor;
  readonly type: CommandType;
  readonly flags: ReadonlySet<CommandFlag>;
  readonly keys: readonly KeyStroke[];

  /** Count as typed; 0 means none was given */
  rawCount: number;

  argument: Argument | null = null;

  constructor(action: ActionDescriptor, rawCount: number, keys: readonly KeyStroke[]) {
    this.action = action;
    this.type = action.type;
    this.flags = action.flags;
    this.rawCount = rawCount;
    this.keys = [...keys];
  }

  /** Effective count, at least 1 */
  get count(): number {
    return this.rawCount === 0 ? 1 : this.rawCount;
  }

  hasFlag(flag: CommandFlag): boolean {
    return this.flags.has(flag);
  }
}
