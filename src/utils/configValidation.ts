// Schema validation for the ignore-list and resume-state JSON files.
// Both files are hand-editable, so every field is checked before use.

import type { DirectoryState, IgnoreConfig, StateMapping } from '../types/state.js';

export interface StateMappingValidation {
  states: StateMapping;
  rejectedKeys: string[];
}

const isPlainObject = (data: unknown): data is Record<string, unknown> =>
  typeof data === 'object' && data !== null && !Array.isArray(data);

const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0;

/**
 * Validates the ignore-list file.
 * Unknown top-level keys are tolerated so the file can carry comments-as-fields.
 *
 * @param data - The parsed JSON data to validate
 * @returns Validated config or throws descriptive error
 */
export function validateIgnoreConfig(data: unknown): IgnoreConfig {
  if (!isPlainObject(data)) {
    throw new Error('Ignore list must be a JSON object');
  }

  const folders = data.ignore_folders;
  if (!Array.isArray(folders)) {
    throw new Error('ignore_folders must be an array of folder names');
  }

  const names: string[] = [];
  folders.forEach((folder, index) => {
    if (typeof folder !== 'string' || folder.length === 0) {
      throw new Error(`ignore_folders[${index}] must be a non-empty string`);
    }
    names.push(folder);
  });

  return { ignore_folders: names };
}

/**
 * Validates a single saved resume position.
 *
 * @throws Error naming the first invalid field
 */
export function validateDirectoryState(data: unknown): DirectoryState {
  if (!isPlainObject(data)) {
    throw new Error('Directory state must be a JSON object');
  }

  if (typeof data.last_image_path !== 'string' || data.last_image_path.length === 0) {
    throw new Error('last_image_path must be a non-empty string');
  }

  if (!isNonNegativeInteger(data.last_index)) {
    throw new Error('last_index must be a non-negative integer');
  }

  const state: DirectoryState = {
    last_image_path: data.last_image_path,
    last_index: data.last_index,
  };

  if (data.image_count !== undefined) {
    if (!isNonNegativeInteger(data.image_count)) {
      throw new Error('image_count must be a non-negative integer');
    }
    state.image_count = data.image_count;
  }

  return state;
}

/**
 * Validates the whole state file. Invalid entries are dropped one by one
 * rather than discarding every directory's saved position.
 *
 * @throws Error only when the top level is not an object
 */
export function validateStateMapping(data: unknown): StateMappingValidation {
  if (!isPlainObject(data)) {
    throw new Error('State file must be a JSON object keyed by directory');
  }

  const states: StateMapping = {};
  const rejectedKeys: string[] = [];

  for (const [key, value] of Object.entries(data)) {
    try {
      states[key] = validateDirectoryState(value);
    } catch {
      rejectedKeys.push(key);
    }
  }

  return { states, rejectedKeys };
}
