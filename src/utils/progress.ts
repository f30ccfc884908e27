import type { ProgressEvent, TransferDirection } from '../types/index.js';

export interface ProgressTrackerOptions {
  direction: TransferDirection;
  /** Minimum interval between emitted updates in ms; 0 emits every update */
  throttleMs?: number;
  now?: () => number;
}

/**
 * Byte counter for one transfer. Total stays undefined (indeterminate)
 * until the size is known; `complete()` pins it to the bytes transferred.
 */
export class ProgressTracker {
  readonly direction: TransferDirection;
  private readonly throttleMs: number;
  private readonly now: () => number;

  private loaded = 0;
  private total?: number;
  private lastEmit = Number.NEGATIVE_INFINITY;
  private lastLoaded = 0;
  private lastRateUpdate: number;
  private smoothedRate = 0;
  private static readonly rateSmoothingFactor = 0.3;

  constructor(options: ProgressTrackerOptions) {
    this.direction = options.direction;
    this.throttleMs = options.throttleMs ?? 0;
    this.now = options.now ?? Date.now;
    this.lastRateUpdate = this.now();
  }

  get completed(): number {
    return this.loaded;
  }

  get expected(): number | undefined {
    return this.total;
  }

  /**
   * Completed fraction in [0, 1], or undefined while indeterminate.
   */
  get fractionCompleted(): number | undefined {
    if (this.total === undefined) return undefined;
    if (this.total === 0) return 1;
    return Math.min(this.loaded / this.total, 1);
  }

  setTotal(total: number | undefined): void {
    this.total = total !== undefined && total >= 0 ? total : undefined;
  }

  add(bytes: number): void {
    this.loaded += bytes;
  }

  set(loaded: number, total?: number): void {
    this.loaded = loaded;
    if (total !== undefined) this.setTotal(total);
  }

  complete(): void {
    this.total = this.loaded;
  }

  /**
   * Snapshot of the counters, or undefined when throttled. Final snapshots
   * are never throttled.
   */
  snapshot(isFinal = false): ProgressEvent | undefined {
    const now = this.now();
    if (!isFinal && now - this.lastEmit < this.throttleMs) return undefined;

    const intervalMs = now - this.lastRateUpdate;
    if (intervalMs > 0) {
      const instantRate = ((this.loaded - this.lastLoaded) / intervalMs) * 1000;
      this.smoothedRate = this.smoothedRate === 0
        ? instantRate
        : this.smoothedRate * (1 - ProgressTracker.rateSmoothingFactor) + instantRate * ProgressTracker.rateSmoothingFactor;
    }
    this.lastLoaded = this.loaded;
    this.lastRateUpdate = now;
    this.lastEmit = now;

    return this.current();
  }

  /**
   * Counters as they stand, without advancing the rate estimate.
   */
  current(): ProgressEvent {
    const total = this.total;
    let percent: number | undefined;
    if (total !== undefined) {
      percent = total === 0 || this.loaded >= total ? 100 : (this.loaded / total) * 100;
    }

    return {
      loaded: this.loaded,
      total,
      percent,
      rate: this.smoothedRate,
      estimated: total !== undefined && this.smoothedRate > 0
        ? (Math.max(total - this.loaded, 0) / this.smoothedRate) * 1000
        : undefined,
      direction: this.direction,
    };
  }
}
