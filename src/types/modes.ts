/**
 * Editing mode definitions
 */

/**
 * Editing modes
 */
export enum Mode {
  NORMAL = 'normal',
  INSERT = 'insert',
  REPLACE = 'replace',
  VISUAL = 'visual',
  SELECT = 'select',
  CMD_LINE = 'cmdLine',
}

/**
 * Refinement of a mode
 */
export enum SubMode {
  NONE = 'none',
  /** One normal-mode command issued from insert mode, then back */
  SINGLE_COMMAND = 'singleCommand',
  VISUAL_CHARACTER = 'visualCharacter',
  VISUAL_LINE = 'visualLine',
  VISUAL_BLOCK = 'visualBlock',
}

/**
 * Selects which command trie and which mapping table apply to a key
 */
export enum MappingMode {
  NORMAL = 'normal',
  VISUAL = 'visual',
  SELECT = 'select',
  OP_PENDING = 'opPending',
  INSERT = 'insert',
  CMD_LINE = 'cmdLine',
}

/**
 * One entry of the session's mode stack
 */
export interface ModeFrame {
  readonly mode: Mode;
  readonly subMode: SubMode;
  readonly mappingMode: MappingMode;
}

export const DEFAULT_MODE_FRAME: ModeFrame = {
  mode: Mode.NORMAL,
  subMode: SubMode.NONE,
  mappingMode: MappingMode.NORMAL,
};

/**
 * Mapping mode implied by an editing mode
 */
export function mappingModeFor(mode: Mode): MappingMode {
  switch (mode) {
    case Mode.NORMAL:
      return MappingMode.NORMAL;
    case Mode.VISUAL:
      return MappingMode.VISUAL;
    case Mode.SELECT:
      return MappingMode.SELECT;
    case Mode.INSERT:
    case Mode.REPLACE:
      return MappingMode.INSERT;
    case Mode.CMD_LINE:
      return MappingMode.CMD_LINE;
  }
}

/**
 * Mapping-mode sets by their single-letter rc names.
 * `n` normal, `x` visual, `s` select, `v` visual+select, `o` op-pending,
 * `i` insert, `c` command line.
 */
const MODE_LETTERS: Record<string, MappingMode[]> = {
  n: [MappingMode.NORMAL],
  x: [MappingMode.VISUAL],
  s: [MappingMode.SELECT],
  v: [MappingMode.VISUAL, MappingMode.SELECT],
  o: [MappingMode.OP_PENDING],
  i: [MappingMode.INSERT],
  c: [MappingMode.CMD_LINE],
};

/**
 * Parse a letter set such as `"nxo"` into mapping modes.
 * Returns null when a letter is not recognized.
 */
export function parseMappingModes(letters: string): MappingMode[] | null {
  const result: MappingMode[] = [];
  for (const letter of letters.toLowerCase()) {
    const modes = MODE_LETTERS[letter];
    if (!modes) {
      return null;
    }
    for (const mode of modes) {
      if (!result.includes(mode)) {
        result.push(mode);
      }
    }
  }
  return result;
}

/** Modes covered by `map` / `noremap` */
export const NVO_MODES: readonly MappingMode[] = [
  MappingMode.NORMAL,
  MappingMode.VISUAL,
  MappingMode.SELECT,
  MappingMode.OP_PENDING,
];

export const ALL_MAPPING_MODES: readonly MappingMode[] = [
  MappingMode.NORMAL,
  MappingMode.VISUAL,
  MappingMode.SELECT,
  MappingMode.OP_PENDING,
  MappingMode.INSERT,
  MappingMode.CMD_LINE,
];
