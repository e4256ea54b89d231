/**
 * Command-related type definitions
 */

import type { KeyStroke } from '../keys/KeyStroke';
import type { MappingMode } from './modes';
import type { Command } from '../state/Command';

/**
 * Declared type of an editor action
 */
export enum CommandType {
  MOTION = 'motion',
  INSERT = 'insert',
  DELETE = 'delete',
  CHANGE = 'change',
  COPY = 'copy',
  PASTE = 'paste',
  SELECT_REGISTER = 'selectRegister',
  OTHER_READONLY = 'otherReadonly',
  OTHER_WRITABLE = 'otherWritable',
  OTHER_SELF_SYNCHRONIZED = 'otherSelfSynchronized',
}

/**
 * Execution class, which selects the host transaction kind
 */
export enum ExecutionClass {
  WRITE = 'write',
  READ = 'read',
  NEUTRAL = 'neutral',
}

/**
 * Classify a command type as write, read or neutral
 */
export function classify(type: CommandType): ExecutionClass {
  switch (type) {
    case CommandType.INSERT:
    case CommandType.DELETE:
    case CommandType.CHANGE:
    case CommandType.PASTE:
    case CommandType.OTHER_WRITABLE:
      return ExecutionClass.WRITE;
    case CommandType.MOTION:
    case CommandType.COPY:
    case CommandType.SELECT_REGISTER:
    case CommandType.OTHER_READONLY:
      return ExecutionClass.READ;
    case CommandType.OTHER_SELF_SYNCHRONIZED:
      return ExecutionClass.NEUTRAL;
  }
}

/**
 * Kind of argument an action still needs
 */
export enum ArgumentType {
  CHARACTER = 'character',
  DIGRAPH = 'digraph',
  MOTION = 'motion',
  EX_STRING = 'exString',
}

export enum CommandFlag {
  /** Keeps a single-command submode alive after execution */
  EXPECT_MORE = 'expectMore',
  /** Confirms a pending search entered on the command line */
  COMPLETE_EX = 'completeEx',
  /** Starts or stops macro recording */
  TOGGLE_RECORDING = 'toggleRecording',
  /** Repeating the operator key applies it to the current line */
  DUPLICABLE_OPERATOR = 'duplicableOperator',
  /** Forward search confirmation */
  SEARCH_FWD = 'searchFwd',
  /** Backward search confirmation */
  SEARCH_REV = 'searchRev',
}

/**
 * Static description of a registered action
 */
export interface ActionDescriptor {
  /** Unique action id, e.g. `motion.wordForward` */
  readonly id: string;
  /** Key sequences that trigger the action */
  readonly keys: ReadonlyArray<readonly KeyStroke[]>;
  /** Mapping modes whose trie contains the action */
  readonly mappingModes: readonly MappingMode[];
  readonly type: CommandType;
  /** Argument the action waits for, or null */
  readonly argumentType: ArgumentType | null;
  readonly flags: ReadonlySet<CommandFlag>;
  /** Key that repeats a duplicable operator (`d` for `dd`) */
  readonly duplicateWith?: string;
}

export type SelectionType = 'characterwise' | 'linewise' | 'blockwise';

/**
 * Offset range of one caret, inclusive of both ends
 */
export interface CaretRange {
  readonly start: number;
  readonly end: number;
  readonly type: SelectionType;
}

/**
 * Argument attached to a command
 */
export type Argument =
  | { readonly kind: 'character'; readonly character: string }
  | { readonly kind: 'motion'; readonly motion: Command }
  | { readonly kind: 'exString'; readonly text: string }
  | { readonly kind: 'offsets'; readonly offsets: ReadonlyMap<number, CaretRange> };

export const Arguments = {
  character: (character: string): Argument => ({ kind: 'character', character }),
  motion: (motion: Command): Argument => ({ kind: 'motion', motion }),
  exString: (text: string): Argument => ({ kind: 'exString', text }),
  offsets: (offsets: ReadonlyMap<number, CaretRange>): Argument => ({ kind: 'offsets', offsets }),
} as const;
