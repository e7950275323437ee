/**
 * Start position resolution
 *
 * Decides which image the slideshow opens on, from (in priority order) an
 * explicit start index, the saved resume record, or the first image.
 * Never throws: every bad input degrades to index 0 with a notice.
 */

import type { ImageList } from '../types/media.js';
import type { DirectoryState } from '../types/state.js';

export type StartReason =
  | 'start_index_override'
  | 'start_index_out_of_range'
  | 'resume_path_match'
  | 'resume_index_match'
  | 'resume_count_changed'
  | 'no_saved_state'
  | 'default';

export interface StartNotice {
  level: 'info' | 'warning';
  message: string;
}

export interface StartPosition {
  index: number;
  reason: StartReason;
  notice?: StartNotice;
}

export interface StartPositionInput {
  images: ImageList;
  startIndex?: number;
  /** Set when resume was requested; `savedState` may still be absent. */
  resume?: boolean;
  savedState?: DirectoryState;
}

const isIndexInBounds = (index: number, length: number): boolean =>
  Number.isInteger(index) && index >= 0 && index < length;

export function resolveStartPosition({
  images,
  startIndex,
  resume = false,
  savedState,
}: StartPositionInput): StartPosition {
  const total = images.length;

  if (startIndex !== undefined) {
    if (isIndexInBounds(startIndex, total)) {
      return { index: startIndex, reason: 'start_index_override' };
    }
    return {
      index: 0,
      reason: 'start_index_out_of_range',
      notice: {
        level: 'warning',
        message: `Start index ${startIndex} is out of range (0-${total - 1}). Starting at the first image.`,
      },
    };
  }

  if (!resume) {
    return { index: 0, reason: 'default' };
  }

  if (!savedState) {
    return { index: 0, reason: 'no_saved_state' };
  }

  const pathIndex = images.indexOf(savedState.last_image_path);
  if (pathIndex !== -1) {
    return { index: pathIndex, reason: 'resume_path_match' };
  }

  // The saved image is gone; the saved index is only trusted if the list looks unchanged
  const countMatches = savedState.image_count === undefined || savedState.image_count === total;
  if (countMatches && isIndexInBounds(savedState.last_index, total)) {
    return { index: savedState.last_index, reason: 'resume_index_match' };
  }

  const previousCount = savedState.image_count ?? 'an unknown number of';
  return {
    index: 0,
    reason: 'resume_count_changed',
    notice: {
      level: 'info',
      message: `Image count changed (${previousCount} saved, ${total} now). Starting at the first image.`,
    },
  };
}
