import { describe, it, expect } from 'vitest';
import { StableIdleTracker } from './idle-tracker.js';

describe('StableIdleTracker', () => {
  it('is stable only after the threshold of continuous idle', () => {
    const tracker = new StableIdleTracker(1000);
    tracker.sample(true, 0);
    expect(tracker.isStable(999)).toBe(false);
    expect(tracker.isStable(1000)).toBe(true);
  });

  it('keeps the start of the idle period across samples', () => {
    const tracker = new StableIdleTracker(1000);
    tracker.sample(true, 100);
    tracker.sample(true, 600);
    expect(tracker.idleSinceMs).toBe(100);
    expect(tracker.isStable(1100)).toBe(true);
  });

  it('restarts the clock on a busy sample', () => {
    const tracker = new StableIdleTracker(1000);
    tracker.sample(true, 0);
    tracker.sample(false, 500);
    tracker.sample(true, 800);
    expect(tracker.isStable(1500)).toBe(false);
    expect(tracker.isStable(1800)).toBe(true);
  });

  it('markBusy forgets the idle period', () => {
    const tracker = new StableIdleTracker(1000);
    tracker.sample(true, 0);
    tracker.markBusy();
    expect(tracker.idleSinceMs).toBeNull();
    expect(tracker.isStable(5000)).toBe(false);
  });

  it('is never stable before any idle sample', () => {
    expect(new StableIdleTracker(0).isStable(0)).toBe(false);
  });
});
