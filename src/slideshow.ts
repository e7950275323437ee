/**
 * Slideshow session lifecycle
 *
 * Startup runs one way: validate the root, load the ignore list, scan,
 * pick the start position, build the navigation controller. On exit the
 * position is written back when resume is active and the quit policy for
 * the trigger says so.
 */

import fs from 'fs-extra';
import type { SlideshowConfig } from './config.js';
import { SlideshowStartupError } from './utils/errors.js';
import { recordEvent } from './utils/eventLog.js';
import { loadIgnoreList, type StorageErrorCallbacks } from './utils/ignoreList.js';
import { scanImages } from './utils/imageLocator.js';
import { logger } from './utils/logger.js';
import { NavigationController } from './utils/navigationController.js';
import { resolveStartPosition, type StartPosition } from './utils/startPosition.js';
import { normalizeDirectory, StateStore } from './utils/stateStore.js';
import type { ImageList } from './types/media.js';
import type { QuitTrigger } from './types/state.js';

export interface SessionCallbacks extends StorageErrorCallbacks {
  showInfo?: (message: string) => void;
}

export async function validateRootDirectory(rootDir: string): Promise<void> {
  let isDirectory = false;
  try {
    const stats = await fs.stat(rootDir);
    isDirectory = stats.isDirectory();
    if (isDirectory) {
      await fs.access(rootDir, fs.constants.R_OK);
    }
  } catch (error) {
    logger.debug('root_directory_check_failed', {
      rootDir,
      errorMessage: error instanceof Error ? error.message : String(error),
    });
    throw new SlideshowStartupError(`'${rootDir}' is not a valid directory`);
  }

  if (!isDirectory) {
    throw new SlideshowStartupError(`'${rootDir}' is not a valid directory`);
  }
}

export class SlideshowSession {
  readonly config: SlideshowConfig;
  readonly images: ImageList;
  readonly start: StartPosition;
  readonly controller: NavigationController;
  private readonly stateStore: StateStore;
  private finishing: Promise<boolean> | null = null;

  constructor(
    config: SlideshowConfig,
    images: ImageList,
    start: StartPosition,
    stateStore: StateStore
  ) {
    this.config = config;
    this.images = images;
    this.start = start;
    this.stateStore = stateStore;
    this.controller = new NavigationController(images, {
      startIndex: start.index,
      delaySeconds: config.delaySeconds,
    });
  }

  get isFinished(): boolean {
    return this.finishing !== null;
  }

  /**
   * Stops playback and, if resume is active and the policy allows it for
   * this trigger, saves the current position. Only the first call acts.
   *
   * @returns whether the position was saved
   */
  finish(trigger: QuitTrigger): Promise<boolean> {
    if (!this.finishing) {
      this.finishing = this.persistOnExit(trigger);
    }
    return this.finishing;
  }

  private async persistOnExit(trigger: QuitTrigger): Promise<boolean> {
    const snapshot = this.controller.getSnapshot();
    this.controller.dispose();

    if (!this.config.resume) {
      return false;
    }

    if (this.config.quitPolicy[trigger] === 'discard') {
      recordEvent('state_save_skipped', { trigger, rootDir: this.config.rootDir });
      return false;
    }

    const saved = await this.stateStore.save(this.config.rootDir, {
      last_image_path: snapshot.currentPath,
      last_index: snapshot.currentIndex,
      image_count: snapshot.total,
    });
    if (saved) {
      logger.info('slideshow_position_saved', {
        rootDir: this.config.rootDir,
        index: snapshot.currentIndex,
        trigger,
      });
    }
    return saved;
  }
}

export async function prepareSession(
  options: SlideshowConfig,
  callbacks?: SessionCallbacks
): Promise<SlideshowSession> {
  await validateRootDirectory(options.rootDir);

  // Scan, state key and saved image paths all share the real root
  const config: SlideshowConfig = { ...options, rootDir: await normalizeDirectory(options.rootDir) };

  logger.info('image_scan_started', { rootDir: config.rootDir });
  const ignoreSet = config.ignoreEnabled
    ? await loadIgnoreList(config.ignoreListPath, callbacks)
    : new Set<string>();

  const images = await scanImages(config.rootDir, ignoreSet, config.ignoreEnabled);
  logger.info('image_scan_found', { count: images.length });

  if (images.length === 0) {
    throw new SlideshowStartupError(`No images found in '${config.rootDir}'`);
  }

  const stateStore = new StateStore(config.statePath, callbacks);
  const savedState = config.resume && config.startIndex === undefined
    ? await stateStore.get(config.rootDir)
    : undefined;

  const start = resolveStartPosition({
    images,
    startIndex: config.startIndex,
    resume: config.resume,
    savedState,
  });

  recordEvent('slideshow_start_resolved', { index: start.index, reason: start.reason });
  if (start.notice) {
    if (start.notice.level === 'warning') {
      logger.warn('slideshow_start_adjusted', { reason: start.reason, message: start.notice.message });
      callbacks?.showWarning?.(start.notice.message);
    } else {
      logger.info('slideshow_start_adjusted', { reason: start.reason, message: start.notice.message });
      callbacks?.showInfo?.(start.notice.message);
    }
  }

  return new SlideshowSession(config, images, start, stateStore);
}
