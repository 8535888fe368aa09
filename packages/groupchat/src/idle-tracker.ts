/**
 * Debounces a raw idle signal: the agent counts as stably idle only after it
 * has reported idle continuously for `thresholdMs`. Any busy sample restarts the clock.
 */
export class StableIdleTracker {
  private idleSince: number | null = null;

  constructor(private readonly thresholdMs: number) {}

  sample(isIdle: boolean, now: number): void {
    if (!isIdle) {
      this.idleSince = null;
    } else if (this.idleSince === null) {
      this.idleSince = now;
    }
  }

  /** Forget the current idle period, e.g. right after injecting input. */
  markBusy(): void {
    this.idleSince = null;
  }

  isStable(now: number): boolean {
    return this.idleSince !== null && now - this.idleSince >= this.thresholdMs;
  }

  get idleSinceMs(): number | null {
    return this.idleSince;
  }
}
