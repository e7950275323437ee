/**
 * Fire-once cancellable deferred callback.
 *
 * Holds at most one pending timer: scheduling again replaces the pending
 * one, so callers never track raw timer ids or stack timers.
 */
export class DeferredTask {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly callback: () => void;

  constructor(callback: () => void) {
    this.callback = callback;
  }

  get isPending(): boolean {
    return this.timer !== null;
  }

  /**
   * Cancel any pending run and schedule a new one after `delayMs`.
   */
  schedule(delayMs: number): void {
    this.cancel();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.callback();
    }, delayMs);
  }

  cancel(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
