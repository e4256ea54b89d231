/**
 * In-process host for engine tests
 *
 * Records everything the engine asks of the host and performs the mode
 * changes the built-in insert, visual and macro actions imply.
 */

import type {
  ActionExecutor,
  CaretInfo,
  CommandLine,
  DataContext,
  EditorSurface,
  EngineHost,
  Feedback,
  RegisterStore,
  TextInput,
} from '../../src/types/host';
import type { ExecutionClass } from '../../src/types/commands';
import type { Cancellable, Scheduler } from '../../src/state/Scheduler';
import type { Command } from '../../src/state/Command';
import type { SessionState } from '../../src/state/SessionState';
import type { KeyStroke } from '../../src/keys/KeyStroke';
import { Mode, SubMode } from '../../src/types/modes';
import { parseKeys } from '../../src/keys/KeyNotation';
import { createEngine, type Engine, type EngineOptions } from '../../src/core/createEngine';

export class FakeEditor implements EditorSurface {
  writable = true;
  disposed = false;
  carets: CaretInfo[] = [{ id: 0, offset: 0, hasSelection: false, selectionStart: 0 }];
  resetCaretCalls = 0;
  removeSelectionCalls = 0;
  updateCaretStateCalls = 0;

  isWritable(): boolean {
    return this.writable;
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  getCarets(): readonly CaretInfo[] {
    return this.carets;
  }

  moveCaretToOffset(caretId: number, offset: number): void {
    this.carets = this.carets.map((caret) =>
      caret.id === caretId ? { ...caret, offset, hasSelection: false } : caret
    );
  }

  removeSelection(): void {
    this.removeSelectionCalls++;
  }

  resetCaret(): void {
    this.resetCaretCalls++;
  }

  updateCaretState(): void {
    this.updateCaretStateCalls++;
  }
}

type Behaviour = (command: Command, session: SessionState) => void;

/**
 * Mode changes of the built-in actions
 */
const DEFAULT_BEHAVIOURS: Record<string, Behaviour> = {
  'insert.before': (_, session) => session.pushModes(Mode.INSERT, SubMode.NONE),
  'insert.after': (_, session) => session.pushModes(Mode.INSERT, SubMode.NONE),
  'insert.lineBelow': (_, session) => session.pushModes(Mode.INSERT, SubMode.NONE),
  'insert.replaceMode': (_, session) => session.pushModes(Mode.REPLACE, SubMode.NONE),
  'insert.exit': (_, session) => session.popModes(),
  'insert.singleCommand': (_, session) => session.pushModes(Mode.NORMAL, SubMode.SINGLE_COMMAND),
  'visual.toggleCharacter': (_, session) => session.pushModes(Mode.VISUAL, SubMode.VISUAL_CHARACTER),
  'visual.toggleLine': (_, session) => session.pushModes(Mode.VISUAL, SubMode.VISUAL_LINE),
  'visual.exit': (_, session) => session.popModes(),
  'macro.toggleRecording': (_, session) => {
    session.recording = !session.recording;
  },
};

export class FakeExecutor implements ActionExecutor {
  executed: Command[] = [];
  transactions: Array<{ kind: ExecutionClass; name: string }> = [];
  hostActions: string[] = [];
  /** Actions whose execute reports failure */
  failing = new Set<string>();
  /** Actions whose execute throws */
  throwing = new Set<string>();

  get executedIds(): string[] {
    return this.executed.map((command) => command.action.id);
  }

  execute(command: Command, session: SessionState, _context: DataContext): boolean {
    const id = command.action.id;
    if (this.throwing.has(id)) {
      throw new Error(`${id} exploded`);
    }
    this.executed.push(command);
    DEFAULT_BEHAVIOURS[id]?.(command, session);
    return !this.failing.has(id);
  }

  runTransaction(kind: ExecutionClass, name: string, run: () => void): void {
    this.transactions.push({ kind, name });
    run();
  }

  runHostAction(name: string, _context: DataContext): boolean {
    this.hostActions.push(name);
    return true;
  }
}

export class FakeTextInput implements TextInput {
  typed: string[] = [];
  selectTyped: string[] = [];
  processedCommands: string[] = [];

  processKey(_editor: EditorSurface, _context: DataContext, key: KeyStroke): boolean {
    this.typed.push(key.id);
    return true;
  }

  processKeyInSelectMode(_editor: EditorSurface, _context: DataContext, key: KeyStroke): boolean {
    this.selectTyped.push(key.id);
    return true;
  }

  processCommand(_editor: EditorSurface, command: Command): void {
    this.processedCommands.push(command.action.id);
  }
}

export class FakeCommandLine implements CommandLine {
  active = false;
  text = '';
  forward = true;
  startCount = -1;

  startSearchCommand(_editor: EditorSurface, _context: DataContext, count: number, leader: KeyStroke): void {
    this.active = true;
    this.text = '';
    this.forward = leader.char !== '?';
    this.startCount = count;
  }

  processExKey(_editor: EditorSurface, key: KeyStroke): boolean {
    const ch = key.typedChar;
    if (ch === null) {
      return false;
    }
    this.text += ch;
    return true;
  }

  endSearchCommand(_editor: EditorSurface): string {
    this.active = false;
    return this.text;
  }

  isForwardSearch(): boolean {
    return this.forward;
  }
}

export class FakeRegisters implements RegisterStore {
  current = '"';
  recorded: string[] = [];
  resets = 0;

  getCurrentRegister(): string {
    return this.current;
  }

  getDefaultRegister(): string {
    return '"';
  }

  resetRegister(): void {
    this.resets++;
    this.current = '"';
  }

  recordKeyStroke(key: KeyStroke): void {
    this.recorded.push(key.id);
  }
}

export class FakeFeedback implements Feedback {
  errors = 0;
  clears = 0;

  indicateError(): void {
    this.errors++;
  }

  clearError(): void {
    this.clears++;
  }
}

export interface FakeHost extends EngineHost {
  executor: FakeExecutor;
  textInput: FakeTextInput;
  commandLine: FakeCommandLine;
  registers: FakeRegisters;
  feedback: FakeFeedback;
}

export function createFakeHost(): FakeHost {
  return {
    executor: new FakeExecutor(),
    textInput: new FakeTextInput(),
    commandLine: new FakeCommandLine(),
    registers: new FakeRegisters(),
    feedback: new FakeFeedback(),
  };
}

/**
 * Scheduler whose callbacks run only when the test fires them
 */
export class ManualScheduler implements Scheduler {
  private pending: Array<{ delayMs: number; callback: () => void; cancelled: boolean }> = [];

  schedule(delayMs: number, callback: () => void): Cancellable {
    const entry = { delayMs, callback, cancelled: false };
    this.pending.push(entry);
    return {
      cancel: () => {
        entry.cancelled = true;
      },
    };
  }

  get armed(): number {
    return this.pending.filter((entry) => !entry.cancelled).length;
  }

  get lastDelay(): number | undefined {
    return this.pending[this.pending.length - 1]?.delayMs;
  }

  /** Run every callback still armed */
  fire(): void {
    const due = this.pending.filter((entry) => !entry.cancelled);
    this.pending = [];
    for (const entry of due) {
      entry.callback();
    }
  }
}

export interface TestEngine {
  engine: Engine;
  host: FakeHost;
  editor: FakeEditor;
  session: SessionState;
  /** Feed keys written in key notation */
  type(notation: string): void;
}

/**
 * Engine on a fake host, with the mapping timer off unless settings say
 * otherwise
 */
export async function createTestEngine(options: Omit<EngineOptions, 'host'> = {}): Promise<TestEngine> {
  const host = createFakeHost();
  const engine = await createEngine({
    ...options,
    host,
    settings: { testMode: true, ...options.settings },
  });
  const editor = new FakeEditor();
  const session = engine.keyHandler.createSession(editor);

  return {
    engine,
    host,
    editor,
    session,
    type: (notation) => {
      for (const key of parseKeys(notation)) {
        engine.keyHandler.handleKey(session, key, null);
      }
    },
  };
}
