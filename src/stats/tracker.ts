export type StatsReport = {
  received: number;
  dropped: number;
  elapsed: number;
  inFps: number;
  averageDelay: number;
};

export type StatsTrackerOptions = {
  intervalSeconds: number;
  startedAt: number;
};

/**
 * Rolling delivery counters for the network loop. All times are seconds since
 * epoch; the tracker never performs I/O, callers log the returned report.
 */
export class StatsTracker {
  private readonly intervalSeconds: number;
  private received = 0;
  private dropped = 0;
  private delay = 0;
  private windowStart: number;

  constructor(options: StatsTrackerOptions) {
    if (!Number.isFinite(options.intervalSeconds) || options.intervalSeconds < 0) {
      throw new Error('Stats interval must be a non-negative number of seconds');
    }
    this.intervalSeconds = options.intervalSeconds;
    this.windowStart = options.startedAt;
  }

  get enabled() {
    return this.intervalSeconds > 0;
  }

  recordReceived(now: number, frameTime?: number) {
    this.received += 1;
    if (typeof frameTime === 'number' && Number.isFinite(frameTime)) {
      this.delay += now - frameTime;
    }
  }

  recordDropped() {
    this.dropped += 1;
  }

  snapshot(now: number): StatsReport {
    const elapsed = now - this.windowStart;
    return {
      received: this.received,
      dropped: this.dropped,
      elapsed,
      inFps: elapsed > 0 ? (this.received - this.dropped) / elapsed : 0,
      averageDelay: this.received > 0 ? this.delay / this.received : 0
    };
  }

  /** Returns a report and starts a new window once the interval has elapsed. */
  tick(now: number): StatsReport | null {
    if (!this.enabled || now - this.windowStart < this.intervalSeconds) {
      return null;
    }

    const report = this.snapshot(now);
    this.reset(now);
    return report;
  }

  reset(now: number) {
    this.received = 0;
    this.dropped = 0;
    this.delay = 0;
    this.windowStart = now;
  }
}
