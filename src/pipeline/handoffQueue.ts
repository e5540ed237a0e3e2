import metrics, { type MetricsRegistry } from '../metrics/index.js';

export type EnqueueResult = {
  accepted: boolean;
  depth: number;
  dropped: number;
};

export type HandoffQueueOptions = {
  capacity: number;
  metrics?: MetricsRegistry;
};

/**
 * Bounded single-producer/single-consumer queue between the network loop and
 * the render loop. When full the incoming item is dropped; neither side ever
 * waits on the other.
 */
export class HandoffQueue<T> {
  private readonly items: T[] = [];
  private readonly capacity: number;
  private readonly metrics: MetricsRegistry;
  private droppedCount = 0;

  constructor(options: HandoffQueueOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new Error('Handoff queue capacity must be a positive integer');
    }
    this.capacity = options.capacity;
    this.metrics = options.metrics ?? metrics;
  }

  get size() {
    return this.items.length;
  }

  get dropped() {
    return this.droppedCount;
  }

  get maxSize() {
    return this.capacity;
  }

  enqueue(item: T): EnqueueResult {
    if (this.items.length >= this.capacity) {
      this.droppedCount += 1;
      this.metrics.incrementCounter('queue.full');
      return { accepted: false, depth: this.items.length, dropped: this.droppedCount };
    }

    this.items.push(item);
    return { accepted: true, depth: this.items.length, dropped: this.droppedCount };
  }

  /** Takes every queued item in arrival order. */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  clear() {
    this.items.length = 0;
  }
}
