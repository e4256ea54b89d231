/**
 * Host collaborator contracts
 *
 * The engine decides what runs and when; everything that touches text,
 * carets, registers or the command-line UI goes through these interfaces.
 */

import type { KeyStroke } from '../keys/KeyStroke';
import type { Command } from '../state/Command';
import type { SessionState } from '../state/SessionState';
import type { ExecutionClass } from './commands';

/**
 * Opaque host context forwarded to collaborators unchanged
 */
export type DataContext = unknown;

/** Host action run when Escape is pressed with nothing to cancel */
export const EDITOR_ESCAPE_ACTION = 'EditorEscape';

/**
 * Snapshot of one caret
 */
export interface CaretInfo {
  readonly id: number;
  readonly offset: number;
  readonly hasSelection: boolean;
  /** Offset where the visual selection was started */
  readonly selectionStart: number;
}

/**
 * The text-editing surface a session belongs to
 */
export interface EditorSurface {
  isWritable(): boolean;
  isDisposed(): boolean;
  getCarets(): readonly CaretInfo[];
  moveCaretToOffset(caretId: number, offset: number): void;
  removeSelection(): void;
  /** Restore the caret shape and position after a reset */
  resetCaret(): void;
  /** Re-derive caret presentation from the current mode */
  updateCaretState(): void;
}

/**
 * Runs built commands inside host transactions
 */
export interface ActionExecutor {
  /**
   * Execute a built command
   * @returns false when the action could not be carried out
   */
  execute(command: Command, session: SessionState, context: DataContext): boolean;

  /**
   * Wrap `run` in a write transaction, a read transaction or a plain
   * undo group, according to `kind`
   */
  runTransaction(kind: ExecutionClass, name: string, run: () => void): void;

  /**
   * Run a host-level action by name
   */
  runHostAction(name: string, context: DataContext): boolean;
}

/**
 * Receives keys that have no command in insert, replace and select modes
 */
export interface TextInput {
  /** @returns whether the key was consumed */
  processKey(editor: EditorSurface, context: DataContext, key: KeyStroke): boolean;
  /** @returns whether the key was consumed */
  processKeyInSelectMode(editor: EditorSurface, context: DataContext, key: KeyStroke): boolean;
  /** Called after a command leaves the session in insert or replace mode */
  processCommand(editor: EditorSurface, command: Command): void;
}

/**
 * The command-line UI used for search and ex entry
 */
export interface CommandLine {
  startSearchCommand(
    editor: EditorSurface,
    context: DataContext,
    count: number,
    leader: KeyStroke
  ): void;
  /** @returns whether the key was consumed */
  processExKey(editor: EditorSurface, key: KeyStroke): boolean;
  /** Close the search line and return what was typed */
  endSearchCommand(editor: EditorSurface): string;
  isForwardSearch(): boolean;
}

export interface RegisterStore {
  getCurrentRegister(): string;
  getDefaultRegister(): string;
  /** Release the selected register back to the default one */
  resetRegister(): void;
  /** Append a key to the macro being recorded */
  recordKeyStroke(key: KeyStroke): void;
}

export interface Feedback {
  indicateError(): void;
  clearError(): void;
}

/**
 * Everything the host provides to the engine
 */
export interface EngineHost {
  executor: ActionExecutor;
  textInput: TextInput;
  commandLine: CommandLine;
  registers: RegisterStore;
  feedback: Feedback;
}
