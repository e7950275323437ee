export interface IgnoreConfig {
  ignore_folders: string[];
}

/** Saved resume position for one root directory. */
export interface DirectoryState {
  last_image_path: string;
  last_index: number;
  image_count?: number; // List length at save time; absent in older state files
}

/** Keyed by the normalized (absolute, symlink-resolved) directory path. */
export type StateMapping = Record<string, DirectoryState>;

export type QuitTrigger = 'q' | 'escape' | 'close';

export type QuitAction = 'save' | 'discard';

export type QuitPolicy = Record<QuitTrigger, QuitAction>;

export const DEFAULT_QUIT_POLICY: Readonly<QuitPolicy> = {
  q: 'save',
  escape: 'save',
  close: 'save',
};
