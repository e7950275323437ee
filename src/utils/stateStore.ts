// Per-directory resume state, persisted as one JSON file

import path from 'node:path';
import fs from 'fs-extra';
import { validateStateMapping } from './configValidation.js';
import { errorMessageOf, recordEvent } from './eventLog.js';
import { formatStorageError, isNotFoundError } from './storageErrors.js';
import type { StorageErrorCallbacks } from './ignoreList.js';
import type { DirectoryState, StateMapping } from '../types/state.js';

/**
 * Resolves a directory to the key it is stored under: absolute, with
 * symlinks resolved. Falls back to the plain absolute path when the
 * directory cannot be resolved (e.g. it was removed since the scan).
 */
export const normalizeDirectory = async (dir: string): Promise<string> => {
  const absolute = path.resolve(dir);
  try {
    return await fs.realpath(absolute);
  } catch {
    return absolute;
  }
};

export class StateStore {
  readonly filePath: string;
  private readonly callbacks?: StorageErrorCallbacks;

  constructor(filePath: string, callbacks?: StorageErrorCallbacks) {
    this.filePath = filePath;
    this.callbacks = callbacks;
  }

  /**
   * Reads the whole mapping. Missing or malformed files yield an empty
   * mapping; invalid entries are dropped individually.
   */
  async load(): Promise<StateMapping> {
    let raw: unknown;
    try {
      raw = await fs.readJson(this.filePath);
    } catch (error) {
      if (isNotFoundError(error)) {
        return {};
      }
      recordEvent('state_load_failed', {
        filePath: this.filePath,
        error: formatStorageError(error),
        errorMessage: errorMessageOf(error),
      }, 'warn');
      this.callbacks?.showWarning?.('Saved slideshow positions could not be read. Starting from the beginning.');
      return {};
    }

    try {
      const { states, rejectedKeys } = validateStateMapping(raw);
      if (rejectedKeys.length > 0) {
        recordEvent('state_entries_rejected', { filePath: this.filePath, rejectedKeys }, 'warn');
      }
      return states;
    } catch (error) {
      recordEvent('state_load_failed', {
        filePath: this.filePath,
        error: 'invalid_schema',
        errorMessage: errorMessageOf(error),
      }, 'warn');
      this.callbacks?.showWarning?.('Saved slideshow positions could not be read. Starting from the beginning.');
      return {};
    }
  }

  async get(dir: string): Promise<DirectoryState | undefined> {
    const key = await normalizeDirectory(dir);
    const states = await this.load();
    return Object.prototype.hasOwnProperty.call(states, key) ? states[key] : undefined;
  }

  /**
   * Read-modify-write upsert, so positions saved for other directories survive.
   * Write failures are reported, not thrown: exit must still proceed.
   *
   * @returns whether the file was written
   */
  async save(dir: string, record: DirectoryState): Promise<boolean> {
    const key = await normalizeDirectory(dir);
    const states = await this.load();
    states[key] = record;
    return this.write(states, key);
  }

  private async write(states: StateMapping, dir: string): Promise<boolean> {
    try {
      await fs.ensureDir(path.dirname(this.filePath));
      await fs.writeJson(this.filePath, states, { spaces: 2 });
      recordEvent('state_saved', { filePath: this.filePath, dir }, 'debug');
      return true;
    } catch (error) {
      recordEvent('state_save_failed', {
        filePath: this.filePath,
        error: formatStorageError(error),
        errorMessage: errorMessageOf(error),
      }, 'error');
      this.callbacks?.showError?.('Unable to save slideshow position. It will not be restored next time.');
      return false;
    }
  }
}
