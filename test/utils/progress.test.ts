import { describe, it, expect } from 'vitest';
import { ProgressTracker } from '../../src/utils/progress.js';

describe('ProgressTracker', () => {
  it('should report counters, percent and rate', () => {
    let now = 0;
    const tracker = new ProgressTracker({ direction: 'download', now: () => now });
    tracker.setTotal(100);
    tracker.add(50);
    now = 1000;

    expect(tracker.snapshot()).toEqual({
      loaded: 50,
      total: 100,
      percent: 50,
      rate: 50,
      estimated: 1000,
      direction: 'download',
    });
    expect(tracker.fractionCompleted).toBe(0.5);
  });

  it('should stay indeterminate until the total is known', () => {
    const tracker = new ProgressTracker({ direction: 'upload' });
    tracker.add(10);
    tracker.setTotal(-1);

    expect(tracker.fractionCompleted).toBeUndefined();
    expect(tracker.current().percent).toBeUndefined();

    tracker.complete();

    expect(tracker.expected).toBe(10);
    expect(tracker.fractionCompleted).toBe(1);
    expect(tracker.current().percent).toBe(100);
  });

  it('should treat an empty transfer as complete', () => {
    const tracker = new ProgressTracker({ direction: 'download' });
    tracker.set(0, 0);

    expect(tracker.fractionCompleted).toBe(1);
    expect(tracker.current().percent).toBe(100);
  });

  it('should throttle intermediate snapshots but not the final one', () => {
    let now = 0;
    const tracker = new ProgressTracker({ direction: 'download', throttleMs: 100, now: () => now });

    expect(tracker.snapshot()).toBeDefined();
    now = 50;
    expect(tracker.snapshot()).toBeUndefined();
    expect(tracker.snapshot(true)).toBeDefined();
    now = 160;
    expect(tracker.snapshot()).toBeDefined();
  });
});
