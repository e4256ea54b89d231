/**
 * SessionState - per-editing-session dispatch state
 *
 * One instance per editing surface, created by the key handler and passed
 * explicitly to every call. Holds the mode stack, the pending count, the
 * trie position, the command stack and the nested mapping and digraph
 * states.
 *
 * @module state/SessionState
 */

import type { KeyStroke } from '../keys/KeyStroke';
import type { CommandPartNode } from '../registry/KeyTrie';
import type { IEventBus } from '../types/services';
import type { EditorSurface } from '../types/host';
import type { ActionDescriptor, Argument, ArgumentType } from '../types/commands';
import { CommandFlag, Arguments } from '../types/commands';
import {
  DEFAULT_MODE_FRAME,
  MappingMode,
  Mode,
  SubMode,
  mappingModeFor,
  type ModeFrame,
} from '../types/modes';
import { EventType } from '../types/events';
import { DigraphSequence } from '../digraph/DigraphSequence';
import { getLogger } from '../services/Logger';
import { Command } from './Command';
import { MappingState } from './MappingState';
import type { Scheduler } from './Scheduler';

const log = getLogger('state');

/**
 * Where the command being typed stands after a key
 */
export enum CommandState {
  NEW_COMMAND = 'newCommand',
  READY = 'ready',
  BAD_COMMAND = 'badCommand',
  CHAR_OR_DIGRAPH = 'charOrDigraph',
}

/** Operator plus motion */
export const MAX_COMMAND_DEPTH = 2;

/** Counts saturate here */
export const MAX_COUNT = 999999999;

export interface SessionStateOptions {
  editor: EditorSurface;
  /** Trie root of the default mapping mode */
  root: CommandPartNode;
  scheduler: Scheduler;
  eventBus?: IEventBus;
  digraphSequence?: DigraphSequence;
}

export class SessionState {
  readonly editor: EditorSurface;
  readonly mappingState: MappingState;
  readonly digraphSequence: DigraphSequence;

  /** Pending count; 0 when none was typed */
  count = 0;
  /** Keys of the command being typed */
  keys: KeyStroke[] = [];
  currentNode: CommandPartNode;
  currentArgumentType: ArgumentType | null = null;
  commandState: CommandState = CommandState.NEW_COMMAND;
  /** Last dispatched command, for dot-repeat */
  lastCommand: Command | null = null;
  dotRepeatInProgress = false;

  private modeStack: ModeFrame[] = [DEFAULT_MODE_FRAME];
  private commandStack: Command[] = [];
  private isRecording = false;
  private eventBus: IEventBus | null;

  constructor(options: SessionStateOptions) {
    this.editor = options.editor;
    this.currentNode = options.root;
    this.mappingState = new MappingState(options.scheduler);
    this.digraphSequence = options.digraphSequence ?? new DigraphSequence();
    this.eventBus = options.eventBus ?? null;
  }

  // ============================================
  // Modes
  // ============================================

  get modeFrame(): ModeFrame {
    return this.modeStack[this.modeStack.length - 1];
  }

  get mode(): Mode {
    return this.modeFrame.mode;
  }

  get subMode(): SubMode {
    return this.modeFrame.subMode;
  }

  get mappingMode(): MappingMode {
    return this.modeFrame.mappingMode;
  }

  get modeDepth(): number {
    return this.modeStack.length;
  }

  pushModes(mode: Mode, subMode: SubMode, mappingMode: MappingMode = mappingModeFor(mode)): void {
    const previous = this.modeFrame;
    this.modeStack.push({ mode, subMode, mappingMode });
    this.modeChanged(previous);
  }

  /**
   * Drop the top frame; the bottom frame is never popped
   */
  popModes(): void {
    if (this.modeStack.length <= 1) {
      return;
    }
    const previous = this.modeFrame;
    this.modeStack.pop();
    this.modeChanged(previous);
  }

  resetModes(): void {
    const previous = this.modeFrame;
    this.modeStack = [DEFAULT_MODE_FRAME];
    if (previous !== DEFAULT_MODE_FRAME) {
      this.modeChanged(previous);
    }
  }

  isOperatorPending(): boolean {
    return this.mappingMode === MappingMode.OP_PENDING;
  }

  /**
   * Normal mode with no transient submode
   */
  isDefaultState(): boolean {
    return this.mode === Mode.NORMAL && this.subMode === SubMode.NONE;
  }

  /**
   * True when `key` repeats the pending operator (the second `d` of `dd`)
   */
  isDuplicateOperatorKeyStroke(key: KeyStroke): boolean {
    if (!this.isOperatorPending()) {
      return false;
    }
    const top = this.peekCommand();
    if (!top || !top.hasFlag(CommandFlag.DUPLICABLE_OPERATOR)) {
      return false;
    }
    return top.action.duplicateWith !== undefined && key.typedChar === top.action.duplicateWith;
  }

  private modeChanged(previous: ModeFrame): void {
    const current = this.modeFrame;
    log.debug(`Mode ${previous.mode}/${previous.mappingMode} -> ${current.mode}/${current.mappingMode}`);
    this.eventBus?.emit(EventType.MODE_CHANGED, { previous, current });
  }

  // ============================================
  // Recording
  // ============================================

  get recording(): boolean {
    return this.isRecording;
  }

  set recording(value: boolean) {
    if (this.isRecording === value) {
      return;
    }
    this.isRecording = value;
    this.eventBus?.emit(EventType.RECORDING_CHANGED, { recording: value });
  }

  // ============================================
  // Command stack
  // ============================================

  get commandDepth(): number {
    return this.commandStack.length;
  }

  /**
   * Push a command for `action` built from the pending count and keys
   */
  pushNewCommand(action: ActionDescriptor): Command {
    if (this.commandStack.length >= MAX_COMMAND_DEPTH) {
      throw new RangeError(`Command stack is full, cannot push ${action.id}`);
    }
    const command = new Command(action, this.count, this.keys);
    this.commandStack.push(command);
    return command;
  }

  popCommand(): Command | undefined {
    return this.commandStack.pop();
  }

  peekCommand(): Command | undefined {
    return this.commandStack[this.commandStack.length - 1];
  }

  clearCommands(): void {
    this.commandStack = [];
  }

  /**
   * Attach an argument to the top command
   */
  setCommandArgument(argument: Argument): void {
    const top = this.peekCommand();
    if (top) {
      top.argument = argument;
    }
  }

  hasCommandArgument(): boolean {
    const top = this.peekCommand();
    return top !== undefined && top.argument !== null;
  }

  peekCommandArgument(): Argument | null {
    return this.peekCommand()?.argument ?? null;
  }

  /**
   * Fold the stack into one command: the top entry becomes the motion
   * argument of the entry below it
   */
  buildCommand(): Command {
    let command = this.commandStack.pop();
    if (!command) {
      throw new RangeError('No command to build');
    }
    while (this.commandStack.length > 0) {
      const below = this.commandStack.pop();
      if (!below) {
        break;
      }
      below.argument = Arguments.motion(command);
      command = below;
    }
    return command;
  }

  // ============================================
  // Digraphs
  // ============================================

  startDigraphSequence(): void {
    this.digraphSequence.startDigraphSequence();
  }

  startLiteralSequence(): void {
    this.digraphSequence.startLiteralSequence();
  }
}
