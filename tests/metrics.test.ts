import { afterEach, describe, expect, it, vi } from 'vitest';
import metrics, { MetricsRegistry } from '../src/metrics/index.js';
import logger, { getLogLevel, onLogLevelChange, setLogLevel } from '../src/logger.js';

describe('MetricsRegistry', () => {
  it('counts messages, drops and persistence by kind', () => {
    const registry = new MetricsRegistry();
    registry.recordMessage('video');
    registry.recordMessage('video');
    registry.recordMessage('log');
    registry.recordDrop('BadEncoding');
    registry.recordPersisted('image');
    registry.recordPersisted('log');
    registry.recordInhibited('image');
    registry.recordPersistenceFailure('RenameFailed', 'log');
    registry.recordWindowPublished();

    const snapshot = registry.snapshot();
    expect(snapshot.messages).toEqual({
      received: 3,
      byTopic: { log: 1, video: 2 },
      dropped: 1,
      dropsByReason: { BadEncoding: 1 }
    });
    expect(snapshot.persistence).toEqual({
      images: 1,
      logRecords: 1,
      windowsPublished: 1,
      inhibited: { image: 1, log: 0 },
      failures: { WriteFailed: 0, RenameFailed: 1 },
      failuresByTarget: { image: 0, log: 1 }
    });
  });

  it('aggregates latency observations', () => {
    const registry = new MetricsRegistry();
    registry.observeLatency('persistence.image.write', 4);
    registry.observeLatency('persistence.image.write', 8);
    registry.observeLatency('persistence.image.write', -1);

    expect(registry.snapshot().latencies['persistence.image.write']).toEqual({
      count: 2,
      totalMs: 12,
      minMs: 4,
      maxMs: 8,
      avgMs: 6
    });
  });

  it('clears everything on reset and notifies listeners', () => {
    const registry = new MetricsRegistry();
    const listener = vi.fn();
    const unsubscribe = registry.onReset(listener);
    registry.incrementCounter('queue.full', 3);
    registry.recordRender('cam');

    registry.reset();
    unsubscribe();
    registry.reset();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(registry.snapshot().counters).toEqual({});
    expect(registry.snapshot().render.frames).toBe(0);
  });
});

describe('Logger', () => {
  afterEach(() => {
    setLogLevel('warn');
  });

  it('counts emitted log lines per level', () => {
    metrics.reset();
    logger.warn('first warning');
    logger.error({ err: new Error('boom') }, 'first error');

    const snapshot = metrics.snapshot();
    expect(snapshot.logs.byLevel.warn).toBe(1);
    expect(snapshot.logs.byLevel.error).toBe(1);
    expect(snapshot.logs.lastErrorMessage).toBe('first error');
  });

  it('validates and announces level changes', () => {
    const listener = vi.fn();
    const unsubscribe = onLogLevelChange(listener);

    expect(setLogLevel(' ERROR ')).toBe('error');
    expect(getLogLevel()).toBe('error');
    expect(listener).toHaveBeenCalledWith('error', 'warn');
    expect(() => setLogLevel('loud')).toThrow(/Unknown log level "loud"/);

    unsubscribe();
  });
});
