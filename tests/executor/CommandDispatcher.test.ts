/**
 * Unit tests for command dispatch
 */

import { mergeMotionCount } from '../../src/executor/CommandDispatcher';
import { Command } from '../../src/state/Command';
import { Arguments, CommandFlag, CommandType, ExecutionClass, type ActionDescriptor } from '../../src/types/commands';
import { MappingMode, Mode, SubMode } from '../../src/types/modes';
import { EventType } from '../../src/types/events';
import { ErrorCategory } from '../../src/types/services';
import { createTestEngine, type TestEngine } from '../helpers/FakeHost';

function action(id: string, type: CommandType): ActionDescriptor {
  return {
    id,
    keys: [],
    mappingModes: [MappingMode.NORMAL],
    type,
    argumentType: null,
    flags: new Set<CommandFlag>(),
  };
}

describe('mergeMotionCount', () => {
  const operator = action('change.deleteOperator', CommandType.DELETE);
  const motion = action('motion.wordForward', CommandType.MOTION);

  function withMotion(operatorCount: number, motionCount: number): { command: Command; motion: Command } {
    const motionCommand = new Command(motion, motionCount, []);
    const command = new Command(operator, operatorCount, []);
    command.argument = Arguments.motion(motionCommand);
    return { command, motion: motionCommand };
  }

  it.each([
    [3, 2, 6],
    [3, 0, 3],
    [0, 4, 4],
    [99999, 99999, 999999999],
  ])('should give the motion %i × %i', (operatorCount, motionCount, expected) => {
    const merged = withMotion(operatorCount, motionCount);

    mergeMotionCount(merged.command);

    expect(merged.motion.rawCount).toBe(expected);
    expect(merged.command.rawCount).toBe(0);
  });

  it('should leave both counts unspecified when neither was typed', () => {
    const merged = withMotion(0, 0);

    mergeMotionCount(merged.command);

    expect(merged.motion.rawCount).toBe(0);
    expect(merged.motion.count).toBe(1);
  });

  it('should ignore commands without a motion', () => {
    const command = new Command(operator, 5, []);
    command.argument = Arguments.character('x');

    mergeMotionCount(command);

    expect(command.rawCount).toBe(5);
  });
});

describe('CommandDispatcher', () => {
  let t: TestEngine;

  beforeEach(async () => {
    t = await createTestEngine();
  });

  afterEach(() => {
    t.engine.dispose();
  });

  it('should run commands in a transaction of their execution class', () => {
    t.type('x');
    t.type('w');
    t.type('u');

    expect(t.host.executor.transactions).toEqual([
      { kind: ExecutionClass.WRITE, name: 'change.deleteChar' },
      { kind: ExecutionClass.READ, name: 'motion.wordForward' },
      { kind: ExecutionClass.NEUTRAL, name: 'change.undo' },
    ]);
  });

  it('should report dispatched commands with their merged count', () => {
    const dispatched = jest.fn();
    t.engine.eventBus.on(EventType.COMMAND_DISPATCHED, dispatched);

    t.type('3d2w');
    t.type('2x');

    expect(dispatched.mock.calls).toEqual([
      [{ actionId: 'change.deleteOperator', count: 6, keys: 'd' }],
      [{ actionId: 'change.deleteChar', count: 2, keys: 'x' }],
    ]);
  });

  describe('read-only editors', () => {
    beforeEach(() => {
      t.editor.writable = false;
    });

    it('should reject write commands without running them', () => {
      const rejected = jest.fn();
      t.engine.eventBus.on(EventType.COMMAND_REJECTED, rejected);

      t.type('x');

      expect(t.host.executor.executed).toEqual([]);
      expect(t.host.executor.transactions).toEqual([]);
      expect(t.host.feedback.errors).toBe(1);
      expect(rejected).toHaveBeenCalledWith({ actionId: 'change.deleteChar', reason: 'not writable' });

      const [reported] = t.engine.errorHandler.getErrorsByCategory(ErrorCategory.WRITE_REJECTED);
      expect(reported.error.message).toBe('Cannot run change.deleteChar: the editor is not writable');
    });

    it('should abandon a pending operator', () => {
      t.type('dw');

      expect(t.session.modeDepth).toBe(1);
      expect(t.session.commandDepth).toBe(0);
      expect(t.host.executor.executed).toEqual([]);
    });

    it('should still run motions', () => {
      t.type('w');

      expect(t.host.executor.executedIds).toEqual(['motion.wordForward']);
    });
  });

  describe('failing actions', () => {
    it('should signal an error when an action reports failure', () => {
      t.host.executor.failing.add('motion.left');

      t.type('h');

      expect(t.host.executor.executedIds).toEqual(['motion.left']);
      expect(t.host.feedback.errors).toBe(1);
    });

    it('should keep the mode after a reported failure', () => {
      t.host.executor.failing.add('motion.left');

      t.type('vh');

      expect(t.host.feedback.errors).toBe(1);
      expect(t.session.mode).toBe(Mode.VISUAL);
      expect(t.editor.removeSelectionCalls).toBe(0);
      expect(t.engine.errorHandler.getRecentErrors()).toEqual([]);
    });

    it('should contain an action that throws', () => {
      const consoleError = jest.spyOn(console, 'error').mockImplementation();
      t.host.executor.throwing.add('change.deleteChar');

      t.type('3x');
      t.type('w');

      const [reported] = t.engine.errorHandler.getErrorsByCategory(ErrorCategory.EXECUTION);
      expect(reported.error.message).toBe('Action change.deleteChar failed: change.deleteChar exploded');
      expect(t.host.feedback.errors).toBe(1);
      expect(t.session.count).toBe(0);
      expect(t.host.executor.executedIds).toEqual(['motion.wordForward']);

      consoleError.mockRestore();
    });
  });

  describe('registers', () => {
    it('should keep a selected register for the next command only', () => {
      t.type('"a');
      expect(t.host.registers.resets).toBe(0);

      t.type('x');
      expect(t.host.registers.resets).toBe(1);

      const [select, deleteChar] = t.host.executor.executed;
      expect(select.action.id).toBe('register.select');
      expect(select.argument).toEqual({ kind: 'character', character: 'a' });
      expect(deleteChar.action.id).toBe('change.deleteChar');
    });
  });

  describe('single-command submode', () => {
    it('should return to insert mode after one command', () => {
      t.type('i<C-o>');
      expect(t.session.mode).toBe(Mode.NORMAL);
      expect(t.session.subMode).toBe(SubMode.SINGLE_COMMAND);

      t.type('x');

      expect(t.session.mode).toBe(Mode.INSERT);
      expect(t.host.executor.executedIds).toEqual(['insert.before', 'insert.singleCommand', 'change.deleteChar']);
      expect(t.host.textInput.processedCommands).toEqual(['insert.before']);
    });
  });

  describe('macro recording', () => {
    it('should record the keys typed between start and stop', () => {
      const recording: boolean[] = [];
      t.engine.eventBus.on(EventType.RECORDING_CHANGED, (payload) => {
        recording.push(payload.recording);
      });

      t.type('qa2xq');

      expect(t.host.registers.recorded).toEqual(['2', 'x']);
      expect(recording).toEqual([true, false]);
      expect(t.session.recording).toBe(false);
    });

    it('should record the keys of multi-key commands', () => {
      t.type('qadwq');

      expect(t.host.registers.recorded).toEqual(['d', 'w']);
    });
  });
});
