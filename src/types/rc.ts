/**
 * Rc configuration type definitions
 */

/**
 * Supported commands in rc-style configuration text
 */
export enum RcCommandType {
  // Recursive mapping commands
  MAP = 'map',
  NMAP = 'nmap',
  VMAP = 'vmap',
  XMAP = 'xmap',
  SMAP = 'smap',
  OMAP = 'omap',
  IMAP = 'imap',
  CMAP = 'cmap',

  // Non-recursive mapping commands
  NOREMAP = 'noremap',
  NNOREMAP = 'nnoremap',
  VNOREMAP = 'vnoremap',
  XNOREMAP = 'xnoremap',
  SNOREMAP = 'snoremap',
  ONOREMAP = 'onoremap',
  INOREMAP = 'inoremap',
  CNOREMAP = 'cnoremap',

  // Unmap commands
  UNMAP = 'unmap',
  NUNMAP = 'nunmap',
  VUNMAP = 'vunmap',
  XUNMAP = 'xunmap',
  SUNMAP = 'sunmap',
  OUNMAP = 'ounmap',
  IUNMAP = 'iunmap',
  CUNMAP = 'cunmap',

  // Clear commands
  MAPCLEAR = 'mapclear',
  NMAPCLEAR = 'nmapclear',
  VMAPCLEAR = 'vmapclear',
  XMAPCLEAR = 'xmapclear',
  SMAPCLEAR = 'smapclear',
  OMAPCLEAR = 'omapclear',
  IMAPCLEAR = 'imapclear',
  CMAPCLEAR = 'cmapclear',

  // Variable assignment
  LET = 'let',

  // Comments and unknown
  COMMENT = 'comment',
  UNKNOWN = 'unknown',
}

/**
 * Parsed command from rc text
 */
export interface ParsedCommand {
  type: RcCommandType;
  args: string[];
  lineNumber: number;
  raw: string;
}

/**
 * Result of parsing rc text
 */
export interface ParseResult {
  commands: ParsedCommand[];
  errors: ParseError[];
  warnings: ParseWarning[];
}

/**
 * Parse error information
 */
export interface ParseError {
  lineNumber: number;
  message: string;
  raw: string;
}

/**
 * Parse warning information
 */
export interface ParseWarning {
  lineNumber: number;
  message: string;
  raw: string;
}

/**
 * Outcome of applying rc text to the mapping store
 */
export interface LoadResult {
  success: boolean;
  path: string | null;
  mappingCount: number;
  errors: ParseError[];
  warnings: ParseWarning[];
}

// ============================================
// Command Type Constants
// ============================================

/** Recursive mapping commands */
export const MAP_COMMAND_TYPES: RcCommandType[] = [
  RcCommandType.MAP,
  RcCommandType.NMAP,
  RcCommandType.VMAP,
  RcCommandType.XMAP,
  RcCommandType.SMAP,
  RcCommandType.OMAP,
  RcCommandType.IMAP,
  RcCommandType.CMAP,
];

/** Non-recursive mapping command types */
export const NON_RECURSIVE_COMMAND_TYPES: RcCommandType[] = [
  RcCommandType.NOREMAP,
  RcCommandType.NNOREMAP,
  RcCommandType.VNOREMAP,
  RcCommandType.XNOREMAP,
  RcCommandType.SNOREMAP,
  RcCommandType.ONOREMAP,
  RcCommandType.INOREMAP,
  RcCommandType.CNOREMAP,
];

/** Unmap command types */
export const UNMAP_COMMAND_TYPES: RcCommandType[] = [
  RcCommandType.UNMAP,
  RcCommandType.NUNMAP,
  RcCommandType.VUNMAP,
  RcCommandType.XUNMAP,
  RcCommandType.SUNMAP,
  RcCommandType.OUNMAP,
  RcCommandType.IUNMAP,
  RcCommandType.CUNMAP,
];

/** Mapclear command types */
export const MAPCLEAR_COMMAND_TYPES: RcCommandType[] = [
  RcCommandType.MAPCLEAR,
  RcCommandType.NMAPCLEAR,
  RcCommandType.VMAPCLEAR,
  RcCommandType.XMAPCLEAR,
  RcCommandType.SMAPCLEAR,
  RcCommandType.OMAPCLEAR,
  RcCommandType.IMAPCLEAR,
  RcCommandType.CMAPCLEAR,
];

/** All mapping command types (map, nmap, noremap, unmap, mapclear, ...) */
export const MAPPING_COMMAND_TYPES: RcCommandType[] = [
  ...MAP_COMMAND_TYPES,
  ...NON_RECURSIVE_COMMAND_TYPES,
  ...UNMAP_COMMAND_TYPES,
  ...MAPCLEAR_COMMAND_TYPES,
];
