/**
 * Navigation Controller
 *
 * Owns the viewing state over an image list: current index (circular),
 * auto-play flag, delay and per-image rotation. The auto-play timer is a
 * single fire-once task re-armed after every index change, so exactly one
 * timer can be pending at any time.
 */

import { DeferredTask } from './deferredTask.js';
import { logger } from './logger.js';
import {
  DEFAULT_DELAY_SECONDS,
  getTimerDelayMs,
  isValidDelay,
  nextIndex,
  previousIndex,
  rotate,
  shouldArmTimer,
  type Rotation,
  type RotationDirection,
} from './playbackController.js';
import type { ImageList } from '../types/media.js';

export interface NavigationSnapshot {
  currentIndex: number;
  currentPath: string;
  total: number;
  autoPlay: boolean;
  delaySeconds: number;
  rotation: Rotation;
}

export interface NavigationOptions {
  startIndex?: number;
  delaySeconds?: number;
  /** Defaults to on whenever the delay is non-zero. */
  autoPlay?: boolean;
}

export type NavigationListener = (snapshot: NavigationSnapshot) => void;

export class NavigationController {
  private readonly images: ImageList;
  private readonly timer: DeferredTask;
  private readonly listeners = new Set<NavigationListener>();
  private index: number;
  private delaySeconds: number;
  private autoPlay: boolean;
  private rotation: Rotation = 0;
  private disposed = false;
  private snapshot: NavigationSnapshot;

  constructor(images: ImageList, options: NavigationOptions = {}) {
    if (images.length === 0) {
      throw new RangeError('NavigationController needs at least one image');
    }

    const delaySeconds = options.delaySeconds ?? DEFAULT_DELAY_SECONDS;
    if (!isValidDelay(delaySeconds)) {
      throw new RangeError(`Delay must be an integer from 0 to 9, got ${delaySeconds}`);
    }

    const startIndex = options.startIndex ?? 0;
    if (!Number.isInteger(startIndex) || startIndex < 0 || startIndex >= images.length) {
      throw new RangeError(`Start index ${startIndex} is outside 0-${images.length - 1}`);
    }

    this.images = images;
    this.index = startIndex;
    this.delaySeconds = delaySeconds;
    this.autoPlay = options.autoPlay ?? delaySeconds > 0;
    this.timer = new DeferredTask(() => this.onTimerFired());
    this.snapshot = this.buildSnapshot();
  }

  /**
   * Arms the first timer. Kept out of the constructor so the view can
   * subscribe before anything fires.
   */
  start(): void {
    this.rearm();
  }

  getSnapshot(): NavigationSnapshot {
    return this.snapshot;
  }

  get isTimerPending(): boolean {
    return this.timer.isPending;
  }

  subscribe(listener: NavigationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  next(): void {
    this.moveTo(nextIndex(this.index, this.images.length));
  }

  previous(): void {
    this.moveTo(previousIndex(this.index, this.images.length));
  }

  goTo(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.images.length) {
      throw new RangeError(`Index ${index} is outside 0-${this.images.length - 1}`);
    }
    this.moveTo(index);
  }

  /**
   * 0 means manual-only. A non-zero delay applies immediately: the pending
   * timer is replaced by one at the new interval.
   */
  setDelay(delaySeconds: number): void {
    if (!isValidDelay(delaySeconds)) {
      throw new RangeError(`Delay must be an integer from 0 to 9, got ${delaySeconds}`);
    }
    this.delaySeconds = delaySeconds;
    logger.debug('slideshow_delay_changed', { delaySeconds });
    this.rearm();
    this.emit();
  }

  toggleAutoplay(): void {
    this.autoPlay = !this.autoPlay;
    logger.debug('slideshow_autoplay_toggled', { autoPlay: this.autoPlay });
    this.rearm();
    this.emit();
  }

  rotate(direction: RotationDirection): void {
    this.rotation = rotate(this.rotation, direction);
    this.emit();
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.timer.cancel();
    this.listeners.clear();
  }

  private moveTo(index: number): void {
    if (this.disposed) {
      return;
    }
    this.index = index;
    this.rotation = 0;
    this.rearm();
    this.emit();
  }

  private onTimerFired(): void {
    logger.debug('slideshow_auto_advance', { fromIndex: this.index });
    this.next();
  }

  private rearm(): void {
    this.timer.cancel();
    if (this.disposed) {
      return;
    }
    const decision = shouldArmTimer({
      autoPlay: this.autoPlay,
      delaySeconds: this.delaySeconds,
      total: this.images.length,
    });
    if (decision.shouldArm) {
      this.timer.schedule(getTimerDelayMs(this.delaySeconds));
    }
  }

  private buildSnapshot(): NavigationSnapshot {
    return {
      currentIndex: this.index,
      currentPath: this.images[this.index],
      total: this.images.length,
      autoPlay: this.autoPlay,
      delaySeconds: this.delaySeconds,
      rotation: this.rotation,
    };
  }

  private emit(): void {
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }
}
