/**
 * KeyHandler - Key Event Dispatch
 *
 * The sole entry point for key input. Each key goes through, in order:
 * 1. user mapping resolution
 * 2. count digits and count deletion
 * 3. editor reset on an escape-equivalent key in normal mode
 * 4. a pending character argument
 * 5. digraph composition, then the key trie of the current mapping mode,
 *    falling back to text input, select mode or the command line
 *
 * A completed command is handed to the {@link CommandDispatcher}; a bad one
 * signals an error and fully resets the session. `handleKey` never throws.
 *
 * @module handler/KeyHandler
 */

import type { IErrorHandler, IEventBus } from '../types/services';
import type { IConfigManager } from '../types/settings';
import type { IMappingStore } from '../types/mappings';
import type { DataContext, EditorSurface, EngineHost } from '../types/host';
import type { KeyStroke } from '../keys/KeyStroke';
import type { CommandRegistry } from '../registry/CommandRegistry';
import type { Repeater } from '../executor/Repeater';
import type { Scheduler } from '../state/Scheduler';
import { lookup, type CommandNode } from '../registry/KeyTrie';
import { CommandDispatcher } from '../executor/CommandDispatcher';
import { MappingResolver } from '../mapper/MappingResolver';
import { CommandState, MAX_COMMAND_DEPTH, MAX_COUNT, SessionState } from '../state/SessionState';
import {
  ArgumentType,
  Arguments,
  CommandFlag,
  CommandType,
  ExecutionClass,
  type ActionDescriptor,
} from '../types/commands';
import { EDITOR_ESCAPE_ACTION } from '../types/host';
import { MappingMode, Mode, SubMode } from '../types/modes';
import { KeyModifier } from '../keys/KeyStroke';
import { formatKeys } from '../keys/KeyNotation';
import {
  COUNT_DELETION_KEY,
  DUPLICATE_OPERATOR_PLACEHOLDER,
  ESCAPE_KEY,
  isCloseKeyStroke,
  isDigraphStart,
  isLiteralStart,
} from '../keys/SpecialKeys';
import { BadCommandError, InternalEngineError } from '../errors/EngineErrors';
import { getLogger } from '../services/Logger';

const log = getLogger('keyHandler');

export interface KeyHandlerDeps {
  registry: CommandRegistry;
  store: IMappingStore;
  config: IConfigManager;
  host: EngineHost;
  repeater: Repeater;
  eventBus: IEventBus;
  errorHandler: IErrorHandler;
  scheduler: Scheduler;
}

export class KeyHandler {
  private deps: KeyHandlerDeps;
  private dispatcher: CommandDispatcher;
  private resolver: MappingResolver;
  private sessions = new Set<SessionState>();

  constructor(deps: KeyHandlerDeps) {
    this.deps = deps;
    this.dispatcher = new CommandDispatcher(deps.host, this, deps.eventBus, deps.errorHandler);
    this.resolver = new MappingResolver({
      store: deps.store,
      config: deps.config,
      executor: deps.host.executor,
      repeater: deps.repeater,
      eventBus: deps.eventBus,
      replayer: this,
    });
  }

  /**
   * New session for an editing surface, in normal mode
   */
  createSession(editor: EditorSurface): SessionState {
    const session = new SessionState({
      editor,
      root: this.deps.registry.getKeyRoot(MappingMode.NORMAL),
      scheduler: this.deps.scheduler,
      eventBus: this.deps.eventBus,
    });
    this.sessions.add(session);
    return session;
  }

  /**
   * Forget a session and cancel its pending mapping timer
   */
  closeSession(session: SessionState): void {
    session.mappingState.reset();
    this.sessions.delete(session);
  }

  /**
   * Close every open session; called by the container on dispose
   */
  dispose(): void {
    for (const session of this.sessions) {
      session.mappingState.reset();
    }
    this.sessions.clear();
    log.debug('Closed all sessions');
  }

  /**
   * Feed one key to a session
   *
   * @param allowMappings - false when replaying keys that must not be mapped
   */
  handleKey(session: SessionState, key: KeyStroke, context: DataContext, allowMappings = true): void {
    try {
      this.processKey(session, key, context, allowMappings);
    } catch (error) {
      log.error(`Failed to handle ${key.id}`, error);
      this.deps.errorHandler.handle(
        new InternalEngineError(`Failed to handle ${key.id}`, error),
        'KeyHandler.handleKey'
      );
      this.deps.host.feedback.indicateError();
      this.fullReset(session);
    }
  }

  startDigraphSequence(session: SessionState): void {
    session.startDigraphSequence();
  }

  startLiteralSequence(session: SessionState): void {
    session.startLiteralSequence();
  }

  /**
   * Reset count, key log, mapping buffer and trie position
   */
  partialReset(session: SessionState): void {
    session.count = 0;
    session.mappingState.reset();
    session.keys = [];
    session.currentNode = this.deps.registry.getKeyRoot(session.mappingMode);
  }

  /**
   * Partial reset plus the command stack and the expected argument
   */
  reset(session: SessionState): void {
    this.partialReset(session);
    session.clearCommands();
    session.commandState = CommandState.NEW_COMMAND;
    session.currentArgumentType = null;
  }

  /**
   * Back to plain normal mode with the default register
   */
  fullReset(session: SessionState): void {
    const { feedback, registers } = this.deps.host;
    feedback.clearError();
    session.resetModes();
    this.reset(session);
    session.digraphSequence.reset();
    registers.resetRegister();
    session.editor.updateCaretState();
    session.editor.removeSelection();
  }

  private processKey(session: SessionState, key: KeyStroke, context: DataContext, allowMappings: boolean): void {
    const { host } = this.deps;
    host.feedback.clearError();

    const isRecording = session.recording;
    let shouldRecord = true;

    if (allowMappings && this.resolver.handleKeyMapping(session, key, context)) {
      // An extension may have supplied the motion of a pending operator
      if (session.commandState !== CommandState.READY || session.peekCommandArgument()?.kind !== 'offsets') {
        return;
      }
    } else if (this.isCommandCount(session, key)) {
      session.count = Math.min(session.count * 10 + (key.digit ?? 0), MAX_COUNT);
    } else if (this.isDeleteCommandCount(session, key)) {
      session.count = Math.floor(session.count / 10);
    } else if (this.isEditorReset(session, key)) {
      this.handleEditorReset(session, key, context);
    } else if (session.currentArgumentType === ArgumentType.CHARACTER) {
      this.handleCharArgument(session, key);
    } else {
      session.keys.push(key);

      if (this.handleDigraph(session, key, context)) {
        return;
      }

      const node = session.isDuplicateOperatorKeyStroke(key)
        ? lookup(session.currentNode, DUPLICATE_OPERATOR_PLACEHOLDER)
        : lookup(session.currentNode, key);

      if (node?.kind === 'command') {
        this.handleCommandNode(session, key, node, context);
      } else if (node?.kind === 'partial') {
        session.currentNode = node;
      } else {
        shouldRecord = this.handleUnmatchedKey(session, key, context);
        this.partialReset(session);
      }
    }

    if (session.commandState === CommandState.READY) {
      this.dispatcher.execute(session, key, context);
    } else if (session.commandState === CommandState.BAD_COMMAND) {
      this.handleBadCommand(session, key);
    } else if (isRecording && shouldRecord) {
      host.registers.recordKeyStroke(key);
    }
  }

  /**
   * Keys with no command: typed text in insert, replace and select modes,
   * line editing on the command line, an error anywhere else
   *
   * @returns whether the key should be recorded into a macro
   */
  private handleUnmatchedKey(session: SessionState, key: KeyStroke, context: DataContext): boolean {
    const { textInput, commandLine } = this.deps.host;

    if (session.mode === Mode.INSERT || session.mode === Mode.REPLACE) {
      return textInput.processKey(session.editor, context, key);
    }
    if (session.mode === Mode.SELECT) {
      return textInput.processKeyInSelectMode(session.editor, context, key);
    }
    if (session.mappingMode === MappingMode.CMD_LINE) {
      return commandLine.processExKey(session.editor, key);
    }

    session.commandState = CommandState.BAD_COMMAND;
    return true;
  }

  private handleBadCommand(session: SessionState, key: KeyStroke): void {
    const keys = session.keys.length > 0 ? formatKeys(session.keys) : key.id;
    const reason = session.isOperatorPending() ? 'expected a motion' : 'no such command';
    log.debug(`Bad command ${keys}: ${reason}`);

    if (session.isOperatorPending()) {
      session.popModes();
    }
    this.deps.host.feedback.indicateError();
    this.deps.errorHandler.handle(new BadCommandError(keys, reason), 'KeyHandler.handleKey');
    this.fullReset(session);
  }

  private isCommandCount(session: SessionState, key: KeyStroke): boolean {
    const digit = key.digit;
    return (
      this.acceptsCount(session) &&
      digit !== null &&
      (session.count !== 0 || digit !== 0)
    );
  }

  private isDeleteCommandCount(session: SessionState, key: KeyStroke): boolean {
    return this.acceptsCount(session) && key === COUNT_DELETION_KEY && session.count !== 0;
  }

  private acceptsCount(session: SessionState): boolean {
    return (
      (session.mode === Mode.NORMAL || session.mode === Mode.VISUAL) &&
      session.commandState === CommandState.NEW_COMMAND &&
      session.currentArgumentType !== ArgumentType.CHARACTER &&
      session.currentArgumentType !== ArgumentType.DIGRAPH
    );
  }

  private isEditorReset(session: SessionState, key: KeyStroke): boolean {
    return session.mode === Mode.NORMAL && isCloseKeyStroke(key);
  }

  private handleEditorReset(session: SessionState, key: KeyStroke, context: DataContext): void {
    const { executor, registers, feedback } = this.deps.host;

    if (session.isDefaultState() && registers.getCurrentRegister() === registers.getDefaultRegister()) {
      if (key === ESCAPE_KEY) {
        executor.runTransaction(ExecutionClass.NEUTRAL, EDITOR_ESCAPE_ACTION, () => {
          executor.runHostAction(EDITOR_ESCAPE_ACTION, context);
        });
      }
      feedback.indicateError();
    }

    this.fullReset(session);
    session.editor.resetCaret();
  }

  private handleCharArgument(session: SessionState, key: KeyStroke): void {
    let ch = key.typedChar;
    if (ch === null && key.modifiers === KeyModifier.NONE) {
      if (key.code === 'Tab') {
        ch = '\t';
      } else if (key.code === 'Enter') {
        ch = '\n';
      }
    }

    if (ch !== null) {
      session.setCommandArgument(Arguments.character(ch));
      session.commandState = CommandState.READY;
    } else {
      session.commandState = CommandState.BAD_COMMAND;
    }
  }

  /**
   * @returns true when the digraph composer consumed the key
   */
  private handleDigraph(session: SessionState, key: KeyStroke, context: DataContext): boolean {
    // Operators taking a digraph argument (`r`, `f`) start composition
    // themselves; these triggers cannot be remapped
    if (session.currentArgumentType === ArgumentType.DIGRAPH) {
      if (isDigraphStart(key)) {
        session.startDigraphSequence();
        return true;
      }
      if (isLiteralStart(key)) {
        session.startLiteralSequence();
        return true;
      }
    }

    const result = session.digraphSequence.processKey(key);
    switch (result.kind) {
      case 'handled':
      case 'bad':
        return true;

      case 'done':
        if (session.currentArgumentType === ArgumentType.DIGRAPH) {
          session.currentArgumentType = ArgumentType.CHARACTER;
        }
        this.handleKey(session, result.stroke, context);
        if (result.pending !== null) {
          this.handleKey(session, result.pending, context);
        }
        return true;

      case 'unhandled':
        if (session.currentArgumentType === ArgumentType.DIGRAPH) {
          session.currentArgumentType = ArgumentType.CHARACTER;
          this.handleKey(session, key, context);
          return true;
        }
        return false;
    }
  }

  private handleCommandNode(session: SessionState, key: KeyStroke, node: CommandNode, context: DataContext): void {
    const action = node.action;

    if (session.commandDepth >= MAX_COMMAND_DEPTH) {
      session.commandState = CommandState.BAD_COMMAND;
      return;
    }
    session.pushNewCommand(action);

    if (session.currentArgumentType !== null && !this.checkArgumentCompatibility(session, action)) {
      return;
    }

    if (action.argumentType === null || this.stopsMacroRecording(session, action)) {
      session.commandState = CommandState.READY;
    } else {
      session.currentArgumentType = action.argumentType;
      this.startWaitingForArgument(session, key, action.argumentType, context);
      this.partialReset(session);
    }

    if (session.currentArgumentType === ArgumentType.EX_STRING && action.flags.has(CommandFlag.COMPLETE_EX)) {
      this.completeSearchEntry(session);
    }
  }

  private stopsMacroRecording(session: SessionState, action: ActionDescriptor): boolean {
    return session.recording && action.flags.has(CommandFlag.TOGGLE_RECORDING);
  }

  /**
   * Only motions can fill a pending motion argument
   */
  private checkArgumentCompatibility(session: SessionState, action: ActionDescriptor): boolean {
    if (session.currentArgumentType === ArgumentType.MOTION && action.type !== CommandType.MOTION) {
      session.commandState = CommandState.BAD_COMMAND;
      return false;
    }
    return true;
  }

  private startWaitingForArgument(
    session: SessionState,
    key: KeyStroke,
    argument: ArgumentType,
    context: DataContext
  ): void {
    switch (argument) {
      case ArgumentType.CHARACTER:
      case ArgumentType.DIGRAPH:
        session.commandState = CommandState.CHAR_OR_DIGRAPH;
        break;

      case ArgumentType.MOTION: {
        const captured = this.deps.repeater.argumentCaptured;
        if (session.dotRepeatInProgress && captured !== null) {
          session.setCommandArgument(captured);
          session.commandState = CommandState.READY;
        }
        session.pushModes(session.mode, session.subMode, MappingMode.OP_PENDING);
        break;
      }

      case ArgumentType.EX_STRING:
        this.deps.host.commandLine.startSearchCommand(session.editor, context, session.count, key);
        session.commandState = CommandState.NEW_COMMAND;
        session.pushModes(Mode.CMD_LINE, SubMode.NONE, MappingMode.CMD_LINE);
        session.popCommand();
        break;
    }
  }

  /**
   * Swap the line-entry command for the search it confirms, carrying the
   * typed pattern
   */
  private completeSearchEntry(session: SessionState): void {
    const { commandLine } = this.deps.host;
    const flag = commandLine.isForwardSearch() ? CommandFlag.SEARCH_FWD : CommandFlag.SEARCH_REV;
    const search = this.deps.registry.findByFlag(flag);
    if (!search) {
      session.commandState = CommandState.BAD_COMMAND;
      return;
    }

    const text = commandLine.endSearchCommand(session.editor);
    session.popCommand();
    session.pushNewCommand(search);
    session.setCommandArgument(Arguments.exString(text));
    session.popModes();
  }
}
