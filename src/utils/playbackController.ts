/**
 * Playback rules
 *
 * Deterministic rules for when the auto-advance timer may run and how
 * index/rotation/delay values move. The navigation controller owns the
 * state; these functions only decide.
 */

export const MIN_DELAY_SECONDS = 0;
export const MAX_DELAY_SECONDS = 9;
export const DEFAULT_DELAY_SECONDS = 3;

export type RotationDirection = 'clockwise' | 'counterclockwise';

export type Rotation = 0 | 90 | 180 | 270;

export interface PlaybackState {
  autoPlay: boolean;
  delaySeconds: number;
  total: number;
}

export interface PlaybackDecision {
  shouldArm: boolean;
  reason: string;
}

/**
 * Determines whether the auto-advance timer should be armed.
 * Rule: armed only while auto-play is on, the delay is non-zero and there
 * is somewhere to advance to.
 */
export function shouldArmTimer(state: PlaybackState): PlaybackDecision {
  if (!state.autoPlay) {
    return { shouldArm: false, reason: 'autoplay_off' };
  }

  if (state.delaySeconds <= 0) {
    return { shouldArm: false, reason: 'manual_only_delay' };
  }

  if (state.total === 0) {
    return { shouldArm: false, reason: 'empty_playlist' };
  }

  return { shouldArm: true, reason: `armed: ${state.delaySeconds}s` };
}

export function getTimerDelayMs(delaySeconds: number): number {
  return delaySeconds * 1000;
}

export function isValidDelay(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_DELAY_SECONDS && value <= MAX_DELAY_SECONDS;
}

export function nextIndex(index: number, total: number): number {
  return (index + 1) % total;
}

export function previousIndex(index: number, total: number): number {
  return (index - 1 + total) % total;
}

export function rotate(rotation: Rotation, direction: RotationDirection): Rotation {
  const step = direction === 'clockwise' ? 90 : -90;
  const normalized = (((rotation + step) % 360) + 360) % 360;
  switch (normalized) {
    case 90:
      return 90;
    case 180:
      return 180;
    case 270:
      return 270;
    default:
      return 0;
  }
}
