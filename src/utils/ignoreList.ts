// Ignore-list persistence: a small JSON file naming folders whose images are skipped

import path from 'node:path';
import fs from 'fs-extra';
import { validateIgnoreConfig } from './configValidation.js';
import { errorMessageOf, recordEvent } from './eventLog.js';
import { formatStorageError } from './storageErrors.js';
import type { IgnoreConfig } from '../types/state.js';

// Optional callbacks for surfacing problems in the view without coupling to it
export interface StorageErrorCallbacks {
  showError?: (message: string) => void;
  showWarning?: (message: string) => void;
}

export const DEFAULT_IGNORE_FOLDERS: readonly string[] = ['PREVIEW', 'THUMBNAIL'];

const writeDefaultIgnoreList = async (filePath: string): Promise<void> => {
  const config: IgnoreConfig = { ignore_folders: [...DEFAULT_IGNORE_FOLDERS] };
  try {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeJson(filePath, config, { spaces: 2 });
    recordEvent('ignore_list_created', { filePath });
  } catch (writeError) {
    // The defaults still apply for this run
    recordEvent('ignore_list_create_failed', {
      filePath,
      error: formatStorageError(writeError),
      errorMessage: errorMessageOf(writeError),
    }, 'warn');
  }
};

/**
 * Loads the set of folder names to exclude.
 *
 * A missing file is created with the defaults. Any other failure fails open
 * to an empty set, so a broken config never blocks the slideshow.
 */
export const loadIgnoreList = async (
  filePath: string,
  callbacks?: StorageErrorCallbacks
): Promise<Set<string>> => {
  try {
    if (!(await fs.pathExists(filePath))) {
      await writeDefaultIgnoreList(filePath);
      return new Set(DEFAULT_IGNORE_FOLDERS);
    }

    const parsed: unknown = await fs.readJson(filePath);
    const config = validateIgnoreConfig(parsed);
    recordEvent('ignore_list_loaded', { filePath, folders: config.ignore_folders }, 'debug');
    return new Set(config.ignore_folders);
  } catch (error) {
    recordEvent('ignore_list_load_failed', {
      filePath,
      error: formatStorageError(error),
      errorMessage: errorMessageOf(error),
    }, 'error');

    callbacks?.showWarning?.(`Ignore list at ${filePath} could not be read. No folders are excluded.`);
    return new Set();
  }
};
