import { describe, expect, it } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';
import { HandoffQueue } from '../src/pipeline/handoffQueue.js';

describe('HandoffQueue', () => {
  it('drops new items once full and counts them', () => {
    const registry = new MetricsRegistry();
    const queue = new HandoffQueue<string>({ capacity: 2, metrics: registry });

    expect(queue.enqueue('a')).toEqual({ accepted: true, depth: 1, dropped: 0 });
    expect(queue.enqueue('b')).toEqual({ accepted: true, depth: 2, dropped: 0 });
    expect(queue.enqueue('c')).toEqual({ accepted: false, depth: 2, dropped: 1 });

    expect(queue.drain()).toEqual(['a', 'b']);
    expect(queue.size).toBe(0);
    expect(queue.dropped).toBe(1);
    expect(registry.snapshot().counters['queue.full']).toBe(1);
  });

  it('never holds more than its capacity', () => {
    const capacity = 3;
    const queue = new HandoffQueue<number>({ capacity, metrics: new MetricsRegistry() });
    const results = Array.from({ length: capacity + 1 }, (_, index) => queue.enqueue(index));

    expect(results.some(result => !result.accepted)).toBe(true);
    expect(queue.drain().length).toBeLessThanOrEqual(capacity);
  });

  it('accepts items again after a drain', () => {
    const queue = new HandoffQueue<number>({ capacity: 1, metrics: new MetricsRegistry() });
    queue.enqueue(1);
    expect(queue.enqueue(2).accepted).toBe(false);
    queue.drain();
    expect(queue.enqueue(3).accepted).toBe(true);
    expect(queue.drain()).toEqual([3]);
  });

  it('requires a positive integer capacity', () => {
    expect(() => new HandoffQueue({ capacity: 0 })).toThrow(
      'Handoff queue capacity must be a positive integer'
    );
    expect(() => new HandoffQueue({ capacity: 1.5 })).toThrow(
      'Handoff queue capacity must be a positive integer'
    );
  });
});
