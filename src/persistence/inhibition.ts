/**
 * Minimum spacing between two persisted frames. A frame is eligible when
 * `now >= lastPersistedAt + periodSeconds`; eligibility consumes the slot even
 * if the following write fails.
 */
export class InhibitionGate {
  private readonly periodSeconds: number;
  private last: number | null = null;

  constructor(periodSeconds: number) {
    if (!Number.isFinite(periodSeconds) || periodSeconds < 0) {
      throw new Error('Inhibition period must be a non-negative number of seconds');
    }
    this.periodSeconds = periodSeconds;
  }

  get period() {
    return this.periodSeconds;
  }

  get lastPersistedAt(): number | null {
    return this.last;
  }

  isEligible(now: number): boolean {
    return this.last === null || now >= this.last + this.periodSeconds;
  }

  tryAcquire(now: number): boolean {
    if (!this.isEligible(now)) {
      return false;
    }
    this.last = now;
    return true;
  }

  reset() {
    this.last = null;
  }
}
