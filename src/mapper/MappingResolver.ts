/**
 * MappingResolver - User Mapping Resolution
 *
 * Buffers keys while they may still form a user mapping and decides, per
 * key, between three outcomes:
 * - unfinished: the buffer is a proper prefix of a mapping; wait, and arm
 *   the timeout that replays the buffer unmapped
 * - complete: the buffer (or the buffer minus its newest key) is a mapping;
 *   replay its right-hand side or run its extension handler
 * - abandoned: nothing matches; replay the buffered keys
 *
 * Replays re-enter the key handler through {@link KeyReplayer}.
 *
 * @module mapper/MappingResolver
 */

import type { IEventBus } from '../types/services';
import type { IConfigManager } from '../types/settings';
import type { IMappingStore, ExtensionHandler, KeyMapping } from '../types/mappings';
import type { ActionExecutor, DataContext } from '../types/host';
import type { KeyStroke } from '../keys/KeyStroke';
import type { Repeater } from '../executor/Repeater';
import { CommandState, type SessionState } from '../state/SessionState';
import { Arguments, ExecutionClass, type CaretRange, type SelectionType } from '../types/commands';
import { SubMode } from '../types/modes';
import { EventType } from '../types/events';
import { formatKeys, startsWith } from '../keys/KeyNotation';
import { NOP_KEY, PLUG_KEY } from '../keys/SpecialKeys';
import { getLogger } from '../services/Logger';

const log = getLogger('mapping');

/**
 * Re-entry point for replayed keys
 */
export interface KeyReplayer {
  handleKey(session: SessionState, key: KeyStroke, context: DataContext, allowMappings?: boolean): void;
}

export interface MappingResolverDeps {
  store: IMappingStore;
  config: IConfigManager;
  executor: ActionExecutor;
  repeater: Repeater;
  eventBus: IEventBus;
  replayer: KeyReplayer;
}

function selectionTypeFor(subMode: SubMode): SelectionType {
  switch (subMode) {
    case SubMode.VISUAL_LINE:
      return 'linewise';
    case SubMode.VISUAL_BLOCK:
      return 'blockwise';
    default:
      return 'characterwise';
  }
}

export class MappingResolver {
  private deps: MappingResolverDeps;

  constructor(deps: MappingResolverDeps) {
    this.deps = deps;
  }

  /**
   * Offer `key` to mapping resolution
   *
   * @returns true when resolution consumed the key
   */
  handleKeyMapping(session: SessionState, key: KeyStroke, context: DataContext): boolean {
    if (this.isMappingDisabled(session, key)) {
      return false;
    }

    const mappingState = session.mappingState;
    mappingState.stopMappingTimer();
    mappingState.addKey(key);

    return (
      this.handleUnfinishedMappingSequence(session, context) ||
      this.handleCompleteMappingSequence(session, key, context) ||
      this.handleAbandonedMappingSequence(session, context)
    );
  }

  /**
   * Mapping is skipped while a character argument or a digraph is being
   * typed, inside a multi-key command (no mapping turns `<C-w>s` into
   * `<C-w>v`), and for a `0` that continues a count
   */
  private isMappingDisabled(session: SessionState, key: KeyStroke): boolean {
    return (
      session.commandState === CommandState.CHAR_OR_DIGRAPH ||
      session.digraphSequence.isActive ||
      !session.currentNode.isRoot ||
      (key.digit === 0 && session.count > 0)
    );
  }

  private handleUnfinishedMappingSequence(session: SessionState, context: DataContext): boolean {
    const { store, config } = this.deps;
    const mappingState = session.mappingState;

    if (!store.isPrefix(session.mappingMode, mappingState.keys)) {
      return false;
    }

    const settings = config.getSettings();
    if (settings.timeout && !settings.testMode) {
      mappingState.startMappingTimer(settings.timeoutLength, () => this.onMappingTimeout(session, context));
    }
    log.debug(`Waiting after ${formatKeys(mappingState.keys)}`);
    return true;
  }

  private onMappingTimeout(session: SessionState, context: DataContext): void {
    const keys = session.mappingState.detachKeys();

    if (session.editor.isDisposed() || keys.length === 0 || keys[0] === PLUG_KEY) {
      return;
    }

    log.debug(`Timed out on ${formatKeys(keys)}`);
    this.deps.eventBus.emit(EventType.MAPPING_TIMEOUT, { keys: formatKeys(keys) });
    for (const key of keys) {
      this.deps.replayer.handleKey(session, key, context, false);
    }
  }

  private handleCompleteMappingSequence(session: SessionState, key: KeyStroke, context: DataContext): boolean {
    const { store, eventBus, replayer } = this.deps;
    const mappingState = session.mappingState;
    const keys = mappingState.keys;

    let mapping = store.lookup(session.mappingMode, keys);
    let completedEarlier = false;
    if (mapping === undefined && keys.length > 1) {
      // Only catches a mapping completed by the previous key, not earlier ones
      mapping = store.lookup(session.mappingMode, keys.slice(0, -1));
      completedEarlier = mapping !== undefined;
    }
    if (mapping === undefined) {
      return false;
    }

    mappingState.clearKeys();
    log.debug(`Resolved ${mapping.source} -> ${mapping.target}`);
    eventBus.emit(EventType.MAPPING_RESOLVED, { mapping });

    if (mapping.toKeys !== null) {
      this.replayMapping(session, mapping, mapping.toKeys, context);
    } else if (mapping.handler !== null) {
      this.executeExtension(session, mapping.handler, context);
    }

    if (completedEarlier) {
      replayer.handleKey(session, key, context, true);
    }
    return true;
  }

  private replayMapping(
    session: SessionState,
    mapping: KeyMapping,
    toKeys: readonly KeyStroke[],
    context: DataContext
  ): void {
    // Guards `x` -> `xy` against expanding itself forever
    const fromIsPrefix = startsWith(toKeys, mapping.fromKeys);

    toKeys.forEach((toKey, index) => {
      if (toKey === NOP_KEY) {
        return;
      }
      const recursive = mapping.recursive && !(index === 0 && fromIsPrefix);
      this.deps.replayer.handleKey(session, toKey, context, recursive);
    });
  }

  private executeExtension(session: SessionState, handler: ExtensionHandler, context: DataContext): void {
    const { executor, repeater } = this.deps;
    const editor = session.editor;

    // Read before the handler runs: it may change the mode
    const operatorPending = session.isOperatorPending();
    const startOffsets = new Map<number, number>();
    for (const caret of editor.getCarets()) {
      startOffsets.set(caret.id, caret.offset);
    }

    if (handler.isRepeatable) {
      repeater.clean();
    }

    log.debug(`Running extension ${handler.name}`);
    executor.runTransaction(ExecutionClass.NEUTRAL, handler.name, () => handler.execute(editor, context));

    if (handler.isRepeatable) {
      repeater.lastExtensionHandler = handler;
      repeater.argumentCaptured = null;
      repeater.repeatHandler = true;
    }

    if (!operatorPending || session.hasCommandArgument()) {
      return;
    }

    const offsets = this.collectOffsets(session, startOffsets);
    if (offsets.size > 0) {
      const argument = Arguments.offsets(offsets);
      session.setCommandArgument(argument);
      session.commandState = CommandState.READY;
      if (handler.isRepeatable) {
        repeater.argumentCaptured = argument;
      }
    }
  }

  /**
   * Motion ranges left behind by an extension: a selection it made, or
   * how far it moved each caret
   */
  private collectOffsets(session: SessionState, startOffsets: ReadonlyMap<number, number>): Map<number, CaretRange> {
    const editor = session.editor;
    const offsets = new Map<number, CaretRange>();
    const type = selectionTypeFor(session.subMode);
    let leftVisual = false;

    for (const caret of editor.getCarets()) {
      if (caret.hasSelection) {
        offsets.set(caret.id, {
          start: Math.min(caret.selectionStart, caret.offset),
          end: Math.max(caret.selectionStart, caret.offset),
          type,
        });
        if (!leftVisual) {
          session.popModes();
          leftVisual = true;
        }
        continue;
      }

      let start = startOffsets.get(caret.id);
      if (start === undefined || start === caret.offset) {
        continue;
      }

      // Characterwise exclusive: drop the far end's character
      let end = caret.offset;
      if (start < end) {
        end -= 1;
      } else {
        start -= 1;
      }
      offsets.set(caret.id, {
        start: Math.min(start, end),
        end: Math.max(start, end),
        type: 'characterwise',
      });
      editor.moveCaretToOffset(caret.id, start);
    }

    return offsets;
  }

  private handleAbandonedMappingSequence(session: SessionState, context: DataContext): boolean {
    const replayer = this.deps.replayer;
    const keys = session.mappingState.detachKeys();

    if (keys.length <= 1) {
      return false;
    }

    log.debug(`Abandoned ${formatKeys(keys)}`);

    // A failed <Plug> sequence is dropped; only the newest key goes on
    if (keys[0] === PLUG_KEY) {
      replayer.handleKey(session, keys[keys.length - 1], context, true);
      return true;
    }

    // The first key was held back as a prefix and must not start the same
    // mapping again; the rest may start new ones
    replayer.handleKey(session, keys[0], context, false);
    for (const key of keys.slice(1)) {
      replayer.handleKey(session, key, context, true);
    }
    return true;
  }
}
