/**
 * Settings-related type definitions
 */

/**
 * Debug module identifiers
 */
export type DebugModule =
  | 'keyHandler'  // KeyHandler - per-key orchestration
  | 'mapping'     // MappingResolver / MappingStore - user mappings
  | 'trie'        // KeyTrie - command trie construction
  | 'digraph'     // DigraphSequence - digraph and literal composition
  | 'dispatch'    // CommandDispatcher - command build and execution
  | 'registry'    // CommandRegistry - action registration
  | 'config'      // ConfigManager - settings management
  | 'eventBus'    // EventBus - event system
  | 'state'       // SessionState - mode stack and command stack
  | 'parser'      // RcParser / KeyMapper - rc configuration
  | 'loader';     // RcLoader - rc file loading

/**
 * Debug settings for individual modules
 */
export interface DebugSettings {
  /** Master debug switch */
  enabled: boolean;
  /** Individual module debug switches */
  modules: Record<DebugModule, boolean>;
}

/**
 * Default debug module states
 */
export const DEFAULT_DEBUG_MODULES: Record<DebugModule, boolean> = {
  keyHandler: true,
  mapping: true,
  trie: false,
  digraph: true,
  dispatch: true,
  registry: true,
  config: false,
  eventBus: false,
  state: false,
  parser: true,
  loader: true,
};

/**
 * Engine settings
 */
export interface EngineSettings {
  /** Whether an unfinished mapping prefix is replayed after `timeoutLength` */
  timeout: boolean;
  /** Milliseconds to wait for the next key of an ambiguous mapping */
  timeoutLength: number;
  /** Non-interactive mode: the mapping timer is never armed */
  testMode: boolean;
  /** Key substituted for `<leader>` in mapping definitions */
  leader: string;
  /** Debug settings for individual modules */
  debug: DebugSettings;
}

/**
 * Default debug settings
 */
export const DEFAULT_DEBUG_SETTINGS: DebugSettings = {
  enabled: false,
  modules: { ...DEFAULT_DEBUG_MODULES },
};

/**
 * Default engine settings
 */
export const DEFAULT_SETTINGS: EngineSettings = {
  timeout: true,
  timeoutLength: 1000,
  testMode: false,
  leader: '\\',
  debug: { ...DEFAULT_DEBUG_SETTINGS },
};

/**
 * Config manager interface
 */
export interface IConfigManager {
  /**
   * Get current settings synchronously
   */
  getSettings(): EngineSettings;

  /**
   * Update settings with partial values
   */
  updateSettings(partial: Partial<EngineSettings>): Promise<void>;

  /**
   * Reset settings to defaults
   */
  resetToDefaults(): Promise<void>;

  /**
   * Subscribe to settings changes
   */
  onSettingsChange(handler: (settings: EngineSettings) => void): () => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isDebugModule(key: string): key is DebugModule {
  return Object.prototype.hasOwnProperty.call(DEFAULT_DEBUG_MODULES, key);
}

/**
 * Normalize debug settings
 */
function normalizeDebugSettings(debug: unknown): DebugSettings {
  if (!isRecord(debug)) {
    return { enabled: DEFAULT_DEBUG_SETTINGS.enabled, modules: { ...DEFAULT_DEBUG_MODULES } };
  }

  const modules = { ...DEFAULT_DEBUG_MODULES };
  const given = debug.modules;
  if (isRecord(given)) {
    for (const [key, value] of Object.entries(given)) {
      if (isDebugModule(key) && typeof value === 'boolean') {
        modules[key] = value;
      }
    }
  }

  return {
    enabled: typeof debug.enabled === 'boolean' ? debug.enabled : DEFAULT_DEBUG_SETTINGS.enabled,
    modules,
  };
}

/**
 * Validate and normalize settings
 * @param settings Partial or complete settings object
 * @returns Complete, validated settings object
 */
export function normalizeSettings(settings: unknown): EngineSettings {
  const s = isRecord(settings) ? settings : {};
  const timeoutLength = s.timeoutLength;

  return {
    timeout: typeof s.timeout === 'boolean' ? s.timeout : DEFAULT_SETTINGS.timeout,
    timeoutLength:
      typeof timeoutLength === 'number' && Number.isFinite(timeoutLength) && timeoutLength >= 0
        ? Math.floor(timeoutLength)
        : DEFAULT_SETTINGS.timeoutLength,
    testMode: typeof s.testMode === 'boolean' ? s.testMode : DEFAULT_SETTINGS.testMode,
    leader:
      typeof s.leader === 'string' && s.leader.length > 0 ? s.leader : DEFAULT_SETTINGS.leader,
    debug: normalizeDebugSettings(s.debug),
  };
}

/**
 * Validate settings against schema
 * @param settings Settings to validate
 * @returns Array of validation errors (empty if valid)
 */
export function validateSettings(settings: unknown): string[] {
  const errors: string[] = [];

  if (!isRecord(settings)) {
    errors.push('Settings must be an object');
    return errors;
  }

  const s = settings;

  if (s.timeout !== undefined && typeof s.timeout !== 'boolean') {
    errors.push('timeout must be a boolean');
  }

  if (s.timeoutLength !== undefined) {
    if (typeof s.timeoutLength !== 'number' || !Number.isFinite(s.timeoutLength)) {
      errors.push('timeoutLength must be a number');
    } else if (s.timeoutLength < 0) {
      errors.push('timeoutLength cannot be negative');
    }
  }

  if (s.testMode !== undefined && typeof s.testMode !== 'boolean') {
    errors.push('testMode must be a boolean');
  }

  if (s.leader !== undefined) {
    if (typeof s.leader !== 'string') {
      errors.push('leader must be a string');
    } else if (s.leader.length === 0) {
      errors.push('leader cannot be empty');
    }
  }

  if (s.debug !== undefined) {
    if (!isRecord(s.debug)) {
      errors.push('debug must be an object');
    } else {
      const debug = s.debug;
      if (debug.enabled !== undefined && typeof debug.enabled !== 'boolean') {
        errors.push('debug.enabled must be a boolean');
      }
      if (debug.modules !== undefined && !isRecord(debug.modules)) {
        errors.push('debug.modules must be an object');
      }
    }
  }

  return errors;
}
