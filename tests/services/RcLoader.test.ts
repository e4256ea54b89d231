/**
 * Unit tests for RcLoader
 */

import { RcLoader, type IFileAdapter } from '../../src/services/RcLoader';
import { KeyMapper } from '../../src/mapper/KeyMapper';
import { MappingStore } from '../../src/stores/MappingStore';
import { RcParser } from '../../src/services/RcParser';
import { ConfigManager } from '../../src/infrastructure/ConfigManager';
import { ErrorHandler } from '../../src/infrastructure/ErrorHandler';
import { EventBus } from '../../src/core/EventBus';
import { EventType } from '../../src/types/events';
import { ErrorCategory } from '../../src/types/services';
import { MappingMode } from '../../src/types/modes';
import { parseKeys } from '../../src/keys/KeyNotation';

class MemoryFileAdapter implements IFileAdapter {
  readonly files = new Map<string, string>();
  readError: Error | null = null;

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  async read(path: string): Promise<string> {
    if (this.readError) {
      throw this.readError;
    }
    return this.files.get(path) ?? '';
  }
}

describe('RcLoader', () => {
  let eventBus: EventBus;
  let store: MappingStore;
  let errorHandler: ErrorHandler;
  let files: MemoryFileAdapter;
  let loader: RcLoader;

  beforeEach(async () => {
    eventBus = new EventBus();
    store = new MappingStore(eventBus);
    const config = new ConfigManager(eventBus);
    await config.initialize();
    errorHandler = new ErrorHandler(eventBus);
    files = new MemoryFileAdapter();
    const keyMapper = new KeyMapper(store, config, new RcParser(), errorHandler);
    loader = new RcLoader(eventBus, keyMapper, errorHandler, files);
  });

  it('should succeed quietly when no rc file exists', async () => {
    const loaded = jest.fn();
    eventBus.on(EventType.RC_LOADED, loaded);

    const result = await loader.load();

    expect(result).toEqual({ success: true, path: null, mappingCount: 0, errors: [], warnings: [] });
    expect(loaded).not.toHaveBeenCalled();
    expect(loader.getLastResult()).toBe(result);
  });

  it('should load the first candidate that exists', async () => {
    files.files.set('_keystrokerc', 'inoremap jk <Esc>\nnnoremap Y y$');
    files.files.set('other.rc', 'nnoremap Q x');
    const loading = jest.fn();
    const loaded = jest.fn();
    eventBus.on(EventType.RC_LOADING, loading);
    eventBus.on(EventType.RC_LOADED, loaded);

    const result = await loader.load();

    expect(result.success).toBe(true);
    expect(result.path).toBe('_keystrokerc');
    expect(result.mappingCount).toBe(2);
    expect(loading).toHaveBeenCalledWith({ path: '_keystrokerc' });
    expect(loaded).toHaveBeenCalledWith(result);
    expect(store.lookup(MappingMode.INSERT, parseKeys('jk'))?.target).toBe('<Esc>');
    expect(store.lookup(MappingMode.NORMAL, parseKeys('Q'))).toBeUndefined();
  });

  it('should take candidates from the caller', async () => {
    files.files.set('.keystrokerc', 'nnoremap Y y$');
    files.files.set('other.rc', 'nnoremap Q x');

    const result = await loader.load(['missing.rc', 'other.rc']);

    expect(result.path).toBe('other.rc');
    expect(store.lookup(MappingMode.NORMAL, parseKeys('Q'))?.target).toBe('x');
  });

  it('should report line errors and keep the good lines', async () => {
    const consoleWarn = jest.spyOn(console, 'warn').mockImplementation();
    files.files.set('.keystrokerc', 'nnoremap Y y$\nnmap <expr> x y');

    const result = await loader.load();

    expect(result.success).toBe(false);
    expect(result.mappingCount).toBe(1);
    expect(result.errors).toEqual([
      { lineNumber: 2, message: 'Line 2: <expr> mappings are not supported', raw: 'nmap <expr> x y' },
    ]);
    expect(consoleWarn).toHaveBeenCalledWith('[keystroke:loader]', '.keystrokerc: 1 error(s)');

    consoleWarn.mockRestore();
  });

  it('should report a file that cannot be read', async () => {
    const consoleError = jest.spyOn(console, 'error').mockImplementation();
    files.files.set('.keystrokerc', '');
    files.readError = new Error('cannot read file .keystrokerc');
    const loaded = jest.fn();
    eventBus.on(EventType.RC_LOADED, loaded);

    const result = await loader.load();

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([{ lineNumber: 0, message: 'cannot read file .keystrokerc', raw: '' }]);
    expect(loaded).toHaveBeenCalledWith(result);
    expect(errorHandler.getErrorsByCategory(ErrorCategory.FILE)).toHaveLength(1);

    consoleError.mockRestore();
  });
});
