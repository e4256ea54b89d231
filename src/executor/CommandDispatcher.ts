/**
 * CommandDispatcher - Command Build and Execution
 *
 * Folds the session's command stack into one command, applies the
 * operator/motion count arithmetic, picks the host transaction kind from
 * the command's type and runs it through the host executor.
 *
 * Count arithmetic (`3d2w`): the motion gets 3 × 2 = 6 and the operator's
 * count is cleared; with no count on either side both stay unspecified.
 *
 * @module executor/CommandDispatcher
 */

import type { IErrorHandler, IEventBus } from '../types/services';
import type { DataContext, EngineHost } from '../types/host';
import type { KeyStroke } from '../keys/KeyStroke';
import type { Command } from '../state/Command';
import { CommandState, MAX_COUNT, type SessionState } from '../state/SessionState';
import { CommandFlag, CommandType, ExecutionClass, classify } from '../types/commands';
import { Mode, SubMode } from '../types/modes';
import { EventType } from '../types/events';
import { formatKeys } from '../keys/KeyNotation';
import { ActionExecutionError, WriteRejectedError } from '../errors/EngineErrors';
import { getLogger } from '../services/Logger';

const log = getLogger('dispatch');

/**
 * Session resets the dispatcher needs from the key handler
 */
export interface SessionResetter {
  reset(session: SessionState): void;
  fullReset(session: SessionState): void;
}

/**
 * Merge operator and motion counts in place
 */
export function mergeMotionCount(command: Command): void {
  const argument = command.argument;
  if (argument === null || argument.kind !== 'motion') {
    return;
  }
  const motion = argument.motion;
  if (command.rawCount === 0 && motion.rawCount === 0) {
    return;
  }
  motion.rawCount = Math.min(command.count * motion.count, MAX_COUNT);
  command.rawCount = 0;
}

export class CommandDispatcher {
  private host: EngineHost;
  private resetter: SessionResetter;
  private eventBus: IEventBus;
  private errorHandler: IErrorHandler;

  constructor(host: EngineHost, resetter: SessionResetter, eventBus: IEventBus, errorHandler: IErrorHandler) {
    this.host = host;
    this.resetter = resetter;
    this.eventBus = eventBus;
    this.errorHandler = errorHandler;
  }

  /**
   * Build the pending command and run it
   *
   * @param key - Key that completed the command, recorded into a macro
   */
  execute(session: SessionState, key: KeyStroke, context: DataContext): void {
    const command = session.buildCommand();
    mergeMotionCount(command);

    if (session.isOperatorPending()) {
      session.popModes();
    }
    session.lastCommand = command;

    const kind = classify(command.type);
    const actionId = command.action.id;

    if (kind === ExecutionClass.WRITE && !session.editor.isWritable()) {
      log.debug(`Rejected ${actionId}: editor is not writable`);
      this.host.feedback.indicateError();
      this.errorHandler.handle(new WriteRejectedError(actionId), 'CommandDispatcher.execute');
      this.eventBus.emit(EventType.COMMAND_REJECTED, { actionId, reason: 'not writable' });
      this.resetter.fullReset(session);
      return;
    }

    try {
      this.host.executor.runTransaction(kind, actionId, () => this.run(session, command, key, context));
    } catch (error) {
      this.errorHandler.handle(new ActionExecutionError(actionId, error), 'CommandDispatcher.execute');
      this.host.feedback.indicateError();
      this.resetter.fullReset(session);
      return;
    }

    const argument = command.argument;
    const count = argument !== null && argument.kind === 'motion' ? argument.motion.rawCount : command.rawCount;
    log.debug(`Dispatched ${actionId} (${kind}, count ${count})`);
    this.eventBus.emit(EventType.COMMAND_DISPATCHED, { actionId, count, keys: formatKeys(command.keys) });
  }

  private run(session: SessionState, command: Command, key: KeyStroke, context: DataContext): void {
    const { executor, textInput, registers, feedback } = this.host;
    const wasRecording = session.recording;

    // Re-entrant key handling from inside the action starts clean
    session.commandState = CommandState.NEW_COMMAND;

    if (!executor.execute(command, session, context)) {
      feedback.indicateError();
    }

    if (session.mode === Mode.INSERT || session.mode === Mode.REPLACE) {
      textInput.processCommand(session.editor, command);
    }

    if (command.type !== CommandType.SELECT_REGISTER) {
      registers.resetRegister();
    }

    if (session.subMode === SubMode.SINGLE_COMMAND && !command.hasFlag(CommandFlag.EXPECT_MORE)) {
      session.popModes();
    }

    this.resetter.reset(session);

    if (wasRecording && session.recording) {
      registers.recordKeyStroke(key);
    }
  }
}
