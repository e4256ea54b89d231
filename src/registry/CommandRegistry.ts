/**
 * CommandRegistry - Action Registration and Key Trie Cache
 *
 * Holds the action descriptors the engine recognizes and serves one key trie
 * per mapping mode:
 * - Built-in actions are data (`builtin-actions.json`)
 * - Hosts register their own actions at run time
 * - A key sequence that collides with a registered one is rejected and
 *   reported, never silently shadowed
 *
 * @module registry/CommandRegistry
 */

import type { IErrorHandler } from '../types/services';
import {
  ArgumentType,
  CommandFlag,
  CommandType,
  type ActionDescriptor,
} from '../types/commands';
import { MappingMode, parseMappingModes } from '../types/modes';
import { parseKeys } from '../keys/KeyNotation';
import { RegistryConflictError } from '../errors/EngineErrors';
import { getLogger } from '../services/Logger';
import { buildKeyTrie, type CommandPartNode } from './KeyTrie';
import builtinActions from './builtin-actions.json';

const log = getLogger('registry');

/**
 * Serialized form of an action, as stored in JSON
 */
export interface ActionDefinition {
  id: string;
  keys: string[];
  /** Mapping mode letters, e.g. `nxo` */
  modes: string;
  type: string;
  argument?: string | null;
  flags?: string[];
  duplicateWith?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function enumValue<E extends string>(values: readonly E[], raw: unknown): E | undefined {
  return values.find((value) => value === raw);
}

/**
 * Turn a serialized definition into a descriptor
 *
 * @throws TypeError when a field is missing or names an unknown value
 */
export function parseActionDefinition(definition: unknown): ActionDescriptor {
  if (!isRecord(definition) || typeof definition.id !== 'string') {
    throw new TypeError('Action definition needs a string id');
  }
  const id = definition.id;

  if (!isStringArray(definition.keys) || definition.keys.length === 0) {
    throw new TypeError(`Action ${id}: keys must be a non-empty string array`);
  }

  const modes = typeof definition.modes === 'string' ? parseMappingModes(definition.modes) : null;
  if (modes === null || modes.length === 0) {
    throw new TypeError(`Action ${id}: invalid modes ${String(definition.modes)}`);
  }

  const type = enumValue(Object.values(CommandType), definition.type);
  if (type === undefined) {
    throw new TypeError(`Action ${id}: unknown type ${String(definition.type)}`);
  }

  let argumentType: ArgumentType | null = null;
  if (definition.argument !== undefined && definition.argument !== null) {
    const parsed = enumValue(Object.values(ArgumentType), definition.argument);
    if (parsed === undefined) {
      throw new TypeError(`Action ${id}: unknown argument ${String(definition.argument)}`);
    }
    argumentType = parsed;
  }

  const flags = new Set<CommandFlag>();
  const rawFlags = definition.flags ?? [];
  if (!isStringArray(rawFlags)) {
    throw new TypeError(`Action ${id}: flags must be a string array`);
  }
  for (const raw of rawFlags) {
    const flag = enumValue(Object.values(CommandFlag), raw);
    if (flag === undefined) {
      throw new TypeError(`Action ${id}: unknown flag ${raw}`);
    }
    flags.add(flag);
  }

  const descriptor: ActionDescriptor = {
    id,
    keys: definition.keys.map((text) => parseKeys(text)),
    mappingModes: modes,
    type,
    argumentType,
    flags,
  };

  if (typeof definition.duplicateWith === 'string') {
    return { ...descriptor, duplicateWith: definition.duplicateWith };
  }
  return descriptor;
}

/**
 * Registry of actions and their key tries
 */
export class CommandRegistry {
  /**
   * Registered actions by id, in registration order
   */
  private actions: Map<string, ActionDescriptor> = new Map();

  /**
   * Trie roots built so far; dropped whenever the actions of a mode change
   */
  private roots: Map<MappingMode, CommandPartNode> = new Map();

  private errorHandler: IErrorHandler | null;

  constructor(errorHandler?: IErrorHandler) {
    this.errorHandler = errorHandler ?? null;
  }

  /**
   * Register an action
   *
   * @returns false when the id is taken or one of its key sequences
   * collides with a registered one
   */
  register(action: ActionDescriptor): boolean {
    if (this.actions.has(action.id)) {
      this.reportConflict(new RegistryConflictError(action.id, `${action.id} is already registered`));
      return false;
    }

    const candidates = [...this.actions.values(), action];
    const built = new Map<MappingMode, CommandPartNode>();
    for (const mode of action.mappingModes) {
      const { root, conflicts } = buildKeyTrie(mode, candidates);
      const own = conflicts.find((conflict) => conflict.action === action);
      if (own) {
        this.reportConflict(new RegistryConflictError(action.id, own.reason));
        return false;
      }
      built.set(mode, root);
    }

    this.actions.set(action.id, action);
    for (const [mode, root] of built) {
      this.roots.set(mode, root);
    }
    log.debug(`Registered ${action.id}`);
    return true;
  }

  /**
   * Register several actions; returns how many were accepted
   */
  registerAll(actions: Iterable<ActionDescriptor>): number {
    let count = 0;
    for (const action of actions) {
      if (this.register(action)) {
        count++;
      }
    }
    return count;
  }

  /**
   * Register the built-in action set
   */
  loadBuiltins(): number {
    const definitions: unknown = builtinActions;
    if (!Array.isArray(definitions)) {
      throw new TypeError('Built-in actions must be an array');
    }
    const count = this.registerAll(definitions.map((definition) => parseActionDefinition(definition)));
    log.info(`Loaded ${count} built-in actions`);
    return count;
  }

  unregister(id: string): boolean {
    const action = this.actions.get(id);
    if (!action) {
      return false;
    }
    this.actions.delete(id);
    for (const mode of action.mappingModes) {
      this.roots.delete(mode);
    }
    return true;
  }

  getAction(id: string): ActionDescriptor | undefined {
    return this.actions.get(id);
  }

  /**
   * First registered action carrying `flag`
   */
  findByFlag(flag: CommandFlag): ActionDescriptor | undefined {
    for (const action of this.actions.values()) {
      if (action.flags.has(flag)) {
        return action;
      }
    }
    return undefined;
  }

  getActions(): ActionDescriptor[] {
    return Array.from(this.actions.values());
  }

  /**
   * Root of the key trie for a mapping mode
   */
  getKeyRoot(mode: MappingMode): CommandPartNode {
    const cached = this.roots.get(mode);
    if (cached) {
      return cached;
    }
    const { root, conflicts } = buildKeyTrie(mode, this.actions.values());
    for (const conflict of conflicts) {
      log.warn(`Skipped ${conflict.action.id} in ${mode}: ${conflict.reason}`);
    }
    this.roots.set(mode, root);
    return root;
  }

  /**
   * Drop all actions and cached tries
   */
  cleanup(): void {
    this.actions.clear();
    this.roots.clear();
  }

  private reportConflict(error: RegistryConflictError): void {
    if (this.errorHandler) {
      this.errorHandler.handle(error, 'CommandRegistry.register');
    } else {
      log.warn(error.message);
    }
  }
}
