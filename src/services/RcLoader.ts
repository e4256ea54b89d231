/**
 * RcLoader - rc File Loading
 *
 * Finds the first existing rc file among candidate paths, reads it and
 * applies it through the KeyMapper. A missing file is not an error.
 *
 * @module services/RcLoader
 */

import { access, readFile } from 'node:fs/promises';
import type { IErrorHandler, IEventBus } from '../types/services';
import type { LoadResult } from '../types/rc';
import type { KeyMapper } from '../mapper/KeyMapper';
import { EventType } from '../types/events';
import { getLogger } from './Logger';

const log = getLogger('loader');

/**
 * File access used by the loader
 */
export interface IFileAdapter {
  exists(path: string): Promise<boolean>;
  read(path: string): Promise<string>;
}

/**
 * File adapter on the local file system
 */
export const nodeFileAdapter: IFileAdapter = {
  async exists(path) {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  },
  read: (path) => readFile(path, 'utf8'),
};

export const DEFAULT_RC_PATHS: readonly string[] = ['.keystrokerc', '_keystrokerc'];

export class RcLoader {
  private eventBus: IEventBus;
  private keyMapper: KeyMapper;
  private errorHandler: IErrorHandler;
  private fileAdapter: IFileAdapter;

  /**
   * Last load result
   */
  private lastResult: LoadResult | null = null;

  constructor(
    eventBus: IEventBus,
    keyMapper: KeyMapper,
    errorHandler: IErrorHandler,
    fileAdapter: IFileAdapter = nodeFileAdapter
  ) {
    this.eventBus = eventBus;
    this.keyMapper = keyMapper;
    this.errorHandler = errorHandler;
    this.fileAdapter = fileAdapter;
  }

  /**
   * Load the first rc file found among `candidates`
   */
  async load(candidates: readonly string[] = DEFAULT_RC_PATHS): Promise<LoadResult> {
    const endTimer = log.time('load');
    let result: LoadResult = {
      success: false,
      path: null,
      mappingCount: 0,
      errors: [],
      warnings: [],
    };

    try {
      const path = await this.detectRcFile(candidates);

      if (path === null) {
        log.debug('No rc file found');
        result.success = true;
        return this.finish(result, endTimer);
      }

      log.info(`Loading rc from: ${path}`);
      this.eventBus.emit(EventType.RC_LOADING, { path });

      const content = await this.fileAdapter.read(path);
      log.debug(`File content length: ${content.length} chars`);

      result = this.keyMapper.load(content, path);
      if (result.errors.length > 0) {
        log.warn(`${path}: ${result.errors.length} error(s)`);
      }
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      result.errors.push({ lineNumber: 0, message: err.message, raw: '' });
      this.errorHandler.handle(err, 'RcLoader.load');
    }

    this.eventBus.emit(EventType.RC_LOADED, result);
    return this.finish(result, endTimer);
  }

  getLastResult(): LoadResult | null {
    return this.lastResult;
  }

  private async detectRcFile(candidates: readonly string[]): Promise<string | null> {
    for (const path of candidates) {
      if (await this.fileAdapter.exists(path)) {
        return path;
      }
    }
    return null;
  }

  private finish(result: LoadResult, endTimer: () => void): LoadResult {
    this.lastResult = result;
    endTimer();
    return result;
  }
}
