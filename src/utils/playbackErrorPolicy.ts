/**
 * Playback Error Policy
 *
 * Decides whether an image that failed to load should be skipped. Skipping
 * stops once every image in a row has failed, so a directory of unreadable
 * files cannot spin forever.
 */

export type SkipReason =
  | 'skip_unreadable'
  // The streak just reached the limit
  | 'max_consecutive_failures'
  // Already past the limit; the failure was reported before
  | 'skipping_stopped';

export interface SkipDecision {
  shouldSkip: boolean;
  consecutiveFailures: number;
  reason: SkipReason;
}

export class PlaybackErrorPolicy {
  private readonly maxConsecutiveFailures: number;
  private consecutiveFailures = 0;

  constructor(maxConsecutiveFailures: number) {
    this.maxConsecutiveFailures = Math.max(1, maxConsecutiveFailures);
  }

  recordFailure(): SkipDecision {
    this.consecutiveFailures++;
    const consecutiveFailures = this.consecutiveFailures;

    if (consecutiveFailures > this.maxConsecutiveFailures) {
      return { shouldSkip: false, consecutiveFailures, reason: 'skipping_stopped' };
    }
    if (consecutiveFailures === this.maxConsecutiveFailures) {
      return { shouldSkip: false, consecutiveFailures, reason: 'max_consecutive_failures' };
    }
    return { shouldSkip: true, consecutiveFailures, reason: 'skip_unreadable' };
  }

  /**
   * Reset the failure streak on a successful load
   */
  resetOnSuccess(): void {
    this.consecutiveFailures = 0;
  }
}
