/**
 * ConfigManager - Centralized Configuration Management
 *
 * Provides reactive configuration management with:
 * - Synchronous settings access for the key-handling hot path
 * - Settings change events
 * - Settings validation against schema
 * - Default values for missing settings
 *
 * @module infrastructure/ConfigManager
 */

import type { IEventBus } from '../types/services';
import type { IConfigManager, EngineSettings } from '../types/settings';
import { DEFAULT_SETTINGS, normalizeSettings, validateSettings } from '../types/settings';
import { EventType } from '../types/events';
import { getLogger } from '../services/Logger';

const log = getLogger('config');

/**
 * Storage for settings between runs
 */
export interface ISettingsPersistence {
  loadData(): Promise<unknown>;
  saveData(data: unknown): Promise<void>;
}

/**
 * Persistence that keeps settings in memory only
 */
export class InMemorySettingsPersistence implements ISettingsPersistence {
  private data: unknown;

  constructor(initial: unknown = null) {
    this.data = initial;
  }

  async loadData(): Promise<unknown> {
    return this.data;
  }

  async saveData(data: unknown): Promise<void> {
    this.data = data;
  }
}

function cloneSettings(settings: EngineSettings): EngineSettings {
  return {
    ...settings,
    debug: { enabled: settings.debug.enabled, modules: { ...settings.debug.modules } },
  };
}

/**
 * ConfigManager implementation
 *
 * Manages engine settings with validation, defaults, and change notifications.
 * Settings are loaded once at initialization and cached for synchronous access.
 */
export class ConfigManager implements IConfigManager {
  /**
   * Current settings (cached for synchronous access)
   */
  private settings: EngineSettings;

  /**
   * EventBus for emitting settings change events
   */
  private eventBus: IEventBus;

  /**
   * Backing storage
   */
  private persistence: ISettingsPersistence;

  /**
   * Manual change listeners (for components that don't use EventBus)
   */
  private changeListeners: Set<(settings: EngineSettings) => void>;

  /**
   * Whether settings have been initialized
   */
  private initialized: boolean;

  /**
   * Create a new ConfigManager
   *
   * @param eventBus - EventBus for emitting change events
   * @param persistence - Storage for loading/saving settings
   */
  constructor(eventBus: IEventBus, persistence: ISettingsPersistence = new InMemorySettingsPersistence()) {
    this.eventBus = eventBus;
    this.persistence = persistence;
    this.settings = cloneSettings(DEFAULT_SETTINGS);
    this.changeListeners = new Set();
    this.initialized = false;
  }

  /**
   * Initialize the ConfigManager by loading settings from persistence
   *
   * @returns Promise that resolves when settings are loaded
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    try {
      const data = await this.persistence.loadData();

      if (data && typeof data === 'object') {
        const errors = validateSettings(data);
        if (errors.length > 0) {
          log.warn('Settings validation warnings:', errors);
        }
        this.settings = normalizeSettings(data);
      } else {
        this.settings = cloneSettings(DEFAULT_SETTINGS);
      }
    } catch (error) {
      log.error('Failed to load settings:', error);
      this.settings = cloneSettings(DEFAULT_SETTINGS);
    }

    this.initialized = true;
    log.debug('Settings loaded', this.settings);
  }

  /**
   * Get current settings synchronously
   *
   * @returns Current settings object (copy to prevent mutation)
   */
  getSettings(): EngineSettings {
    return cloneSettings(this.settings);
  }

  /**
   * Update settings with partial values
   *
   * @param partial - Partial settings to merge with current settings
   * @returns Promise that resolves when settings are saved
   */
  async updateSettings(partial: Partial<EngineSettings>): Promise<void> {
    const previous = cloneSettings(this.settings);

    const merged = { ...this.settings, ...partial };
    const errors = validateSettings(merged);
    if (errors.length > 0) {
      log.warn('Settings validation warnings:', errors);
    }

    this.settings = normalizeSettings(merged);

    await this.persistence.saveData(cloneSettings(this.settings));

    this.eventBus.emit(EventType.SETTINGS_CHANGED, {
      settings: cloneSettings(this.settings),
      previous,
    });

    this.notifyListeners();
  }

  /**
   * Reset settings to defaults
   *
   * @returns Promise that resolves when settings are saved
   */
  async resetToDefaults(): Promise<void> {
    const previous = cloneSettings(this.settings);

    this.settings = cloneSettings(DEFAULT_SETTINGS);

    await this.persistence.saveData(cloneSettings(this.settings));

    this.eventBus.emit(EventType.SETTINGS_CHANGED, {
      settings: cloneSettings(this.settings),
      previous,
    });

    this.notifyListeners();
  }

  /**
   * Subscribe to settings changes
   * This is an alternative to using EventBus for components that prefer callbacks
   *
   * @param handler - Function to call when settings change
   * @returns Unsubscribe function
   */
  onSettingsChange(handler: (settings: EngineSettings) => void): () => void {
    this.changeListeners.add(handler);

    return () => {
      this.changeListeners.delete(handler);
    };
  }

  /**
   * Notify all manual change listeners
   */
  private notifyListeners(): void {
    for (const listener of this.changeListeners) {
      try {
        listener(cloneSettings(this.settings));
      } catch (error) {
        log.error('Error in settings change listener:', error);
      }
    }
  }

  /**
   * Check if settings have been initialized
   */
  isInitialized(): boolean {
    return this.initialized;
  }
}
