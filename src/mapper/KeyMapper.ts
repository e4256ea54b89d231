/**
 * KeyMapper - Mapping Definition
 *
 * Turns mapping definitions into MappingStore entries:
 * - rc commands (`nnoremap jk <Esc>`, `nunmap x`, `imapclear`)
 * - programmatic calls (`map`, `noremap`, `mapHandler`)
 * - whole rc texts through `load`
 *
 * `<leader>` resolves against the `leader` setting at definition time.
 *
 * @module mapper/KeyMapper
 */

import type { IErrorHandler, IRcParser } from '../types/services';
import type { IConfigManager } from '../types/settings';
import type { ExtensionHandler, IMappingStore, KeyMapping } from '../types/mappings';
import {
  MAPCLEAR_COMMAND_TYPES,
  MAP_COMMAND_TYPES,
  NON_RECURSIVE_COMMAND_TYPES,
  RcCommandType,
  UNMAP_COMMAND_TYPES,
  type LoadResult,
  type ParseError,
  type ParsedCommand,
} from '../types/rc';
import { NVO_MODES, parseMappingModes, type MappingMode } from '../types/modes';
import type { KeyStroke } from '../keys/KeyStroke';
import { formatKeys, parseKeys } from '../keys/KeyNotation';
import { MappingConfigError } from '../errors/EngineErrors';
import { getLogger } from '../services/Logger';

const log = getLogger('mapping');

/** `:map` arguments that change nothing for this engine */
const IGNORED_MAP_ARGUMENTS = /^<(silent|buffer|nowait|unique|special|script)>$/i;

/** Command suffixes, longest first so `noremap` wins over `map` */
const COMMAND_SUFFIXES = ['mapclear', 'noremap', 'unmap', 'map'];

/**
 * Mapping modes named by a command's prefix letter; no prefix means
 * normal, visual, select and operator-pending
 */
export function modesForCommand(type: RcCommandType): MappingMode[] {
  const suffix = COMMAND_SUFFIXES.find((s) => type.endsWith(s));
  const prefix = suffix === undefined ? '' : type.slice(0, type.length - suffix.length);
  if (prefix === '') {
    return [...NVO_MODES];
  }
  return parseMappingModes(prefix) ?? [...NVO_MODES];
}

/**
 * Applies mapping definitions to the mapping store
 */
export class KeyMapper {
  private store: IMappingStore;
  private config: IConfigManager;
  private parser: IRcParser;
  private errorHandler: IErrorHandler | null;
  private mappingIdCounter = 0;

  constructor(
    store: IMappingStore,
    config: IConfigManager,
    parser: IRcParser,
    errorHandler?: IErrorHandler
  ) {
    this.store = store;
    this.config = config;
    this.parser = parser;
    this.errorHandler = errorHandler ?? null;
  }

  /**
   * Add a recursive key mapping
   */
  map(from: string, to: string, modes: readonly MappingMode[] = NVO_MODES, lineNumber = 0): KeyMapping {
    return this.addKeyMapping(from, to, modes, true, lineNumber);
  }

  /**
   * Add a non-recursive key mapping
   */
  noremap(from: string, to: string, modes: readonly MappingMode[] = NVO_MODES, lineNumber = 0): KeyMapping {
    return this.addKeyMapping(from, to, modes, false, lineNumber);
  }

  /**
   * Map keys to an extension handler
   */
  mapHandler(from: string, handler: ExtensionHandler, modes: readonly MappingMode[] = NVO_MODES): KeyMapping {
    const fromKeys = this.parseSide(from, 'left-hand side', 0);
    const mapping: KeyMapping = {
      id: this.generateMappingId(),
      source: formatKeys(fromKeys),
      fromKeys,
      target: handler.name,
      toKeys: null,
      handler,
      modes: [...modes],
      recursive: false,
      lineNumber: 0,
      createdAt: Date.now(),
    };
    this.store.add(mapping);
    return mapping;
  }

  /**
   * Remove the mapping of `from` in `modes`
   *
   * @returns how many modes lost a mapping
   */
  unmap(from: string, modes: readonly MappingMode[] = NVO_MODES): number {
    const source = formatKeys(this.parseSide(from, 'key', 0));
    let removed = 0;
    for (const mode of modes) {
      removed += this.store.removeBySource(source, mode);
    }
    log.debug(`Unmapped ${source} in ${modes.join(',')}: ${removed}`);
    return removed;
  }

  /**
   * Remove every mapping of `modes`
   */
  mapClear(modes: readonly MappingMode[] = NVO_MODES): void {
    for (const mode of modes) {
      this.store.clear(mode);
    }
  }

  /**
   * Apply one parsed rc command
   *
   * @returns the mapping it added, or null for commands that add none
   * @throws MappingConfigError when the command is malformed
   */
  apply(command: ParsedCommand): KeyMapping | null {
    const modes = modesForCommand(command.type);

    if (MAP_COMMAND_TYPES.includes(command.type) || NON_RECURSIVE_COMMAND_TYPES.includes(command.type)) {
      const args = this.stripMapArguments(command);
      const [from, ...rest] = args;
      const to = rest.join(' ');
      if (!from || !to) {
        throw new MappingConfigError(
          `Invalid mapping: expected at least 2 arguments, got ${args.length}`,
          command.lineNumber
        );
      }
      const recursive = MAP_COMMAND_TYPES.includes(command.type);
      return this.addKeyMapping(from, to, modes, recursive, command.lineNumber);
    }

    if (UNMAP_COMMAND_TYPES.includes(command.type)) {
      const [key] = this.stripMapArguments(command);
      if (!key) {
        throw new MappingConfigError(`${command.type} requires a key`, command.lineNumber);
      }
      if (this.unmap(key, modes) === 0) {
        throw new MappingConfigError(`No such mapping: ${key}`, command.lineNumber);
      }
      return null;
    }

    if (MAPCLEAR_COMMAND_TYPES.includes(command.type)) {
      this.mapClear(modes);
      return null;
    }

    return null;
  }

  /**
   * Parse and apply rc text
   */
  load(content: string, path: string | null = null): LoadResult {
    const parsed = this.parser.parse(content);
    const errors: ParseError[] = [...parsed.errors];
    let mappingCount = 0;

    this.errorHandler?.startAggregation();
    for (const command of parsed.commands) {
      if (command.type === RcCommandType.UNKNOWN || command.type === RcCommandType.LET) {
        continue;
      }
      try {
        if (this.apply(command) !== null) {
          mappingCount++;
        }
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        errors.push({ lineNumber: command.lineNumber, message: err.message, raw: command.raw });
        this.errorHandler?.handle(err, `KeyMapper.load:${command.lineNumber}`);
      }
    }
    this.errorHandler?.endAggregation();

    log.info(`Loaded ${mappingCount} mapping(s) from ${path ?? 'text'}`);
    return {
      success: errors.length === 0,
      path,
      mappingCount,
      errors,
      warnings: parsed.warnings,
    };
  }

  private addKeyMapping(
    from: string,
    to: string,
    modes: readonly MappingMode[],
    recursive: boolean,
    lineNumber: number
  ): KeyMapping {
    const fromKeys = this.parseSide(from, 'left-hand side', lineNumber);
    const toKeys = this.parseSide(to, 'right-hand side', lineNumber);
    const mapping: KeyMapping = {
      id: this.generateMappingId(),
      source: formatKeys(fromKeys),
      fromKeys,
      target: formatKeys(toKeys),
      toKeys,
      handler: null,
      modes: [...modes],
      recursive,
      lineNumber,
      createdAt: Date.now(),
    };
    this.store.add(mapping);
    return mapping;
  }

  private parseSide(text: string, side: string, lineNumber: number): KeyStroke[] {
    const keys = parseKeys(text, this.config.getSettings().leader);
    if (keys.length === 0) {
      throw new MappingConfigError(`Empty ${side}`, lineNumber);
    }
    return keys;
  }

  private stripMapArguments(command: ParsedCommand): string[] {
    const args = [...command.args];
    while (args.length > 0) {
      const first = args[0];
      if (/^<expr>$/i.test(first)) {
        throw new MappingConfigError('<expr> mappings are not supported', command.lineNumber);
      }
      if (!IGNORED_MAP_ARGUMENTS.test(first)) {
        break;
      }
      args.shift();
    }
    return args;
  }

  private generateMappingId(): string {
    return `mapping-${++this.mappingIdCounter}`;
  }
}
