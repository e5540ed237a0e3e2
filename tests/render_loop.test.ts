import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PNG } from 'pngjs';
import { MetricsRegistry } from '../src/metrics/index.js';
import { HandoffQueue } from '../src/pipeline/handoffQueue.js';
import { coalesceBySource, RenderLoop, type FrameSink } from '../src/pipeline/renderLoop.js';
import { LoggingFrameSink, SnapshotFrameSink } from '../src/pipeline/sinks.js';
import type { DisplayItem, RawImage } from '../src/types.js';
import { listFiles, makeTempDir, removeDir } from './helpers/fs.js';

function item(sourceId: string, frameTime: number, value = 0): DisplayItem {
  return { sourceId, frameTime, image: { dtype: 'uint8', shape: [1, 1], data: Buffer.from([value]) } };
}

class RecordingSink implements FrameSink {
  readonly frames: Array<{ sourceId: string; frameTime: number }> = [];
  closed = false;

  constructor(private readonly onRender?: (sourceId: string) => void) {}

  render(sourceId: string, _image: RawImage, frameTime: number) {
    this.frames.push({ sourceId, frameTime });
    this.onRender?.(sourceId);
  }

  close() {
    this.closed = true;
  }
}

describe('RenderLoop', () => {
  let registry: MetricsRegistry;
  let queue: HandoffQueue<DisplayItem>;

  beforeEach(() => {
    registry = new MetricsRegistry();
    queue = new HandoffQueue<DisplayItem>({ capacity: 8, metrics: registry });
  });

  it('keeps only the latest frame of each source', () => {
    const frames = coalesceBySource([item('a', 1), item('b', 1), item('a', 2)]);
    expect(frames.map(frame => [frame.sourceId, frame.frameTime])).toEqual([
      ['a', 2],
      ['b', 1]
    ]);
  });

  it('hands every source to the sink once per pass', async () => {
    const sink = new RecordingSink();
    const loop = new RenderLoop({ queue, sink, refreshIntervalMs: 0, metrics: registry });
    queue.enqueue(item('a', 1));
    queue.enqueue(item('b', 1));
    queue.enqueue(item('a', 2));

    expect(await loop.renderOnce()).toBe(2);
    expect(sink.frames).toEqual([
      { sourceId: 'a', frameTime: 2 },
      { sourceId: 'b', frameTime: 1 }
    ]);
    expect(queue.size).toBe(0);
    expect(registry.snapshot().render.bySource).toEqual({ a: 1, b: 1 });
  });

  it('survives a failing sink', async () => {
    const sink: FrameSink = {
      render: vi.fn((sourceId: string) => {
        if (sourceId === 'bad') {
          throw new Error('cannot draw');
        }
      })
    };
    const loop = new RenderLoop({ queue, sink, refreshIntervalMs: 0, metrics: registry });
    queue.enqueue(item('bad', 1));
    queue.enqueue(item('good', 1));

    expect(await loop.renderOnce()).toBe(1);
    expect(registry.snapshot().render).toEqual({ frames: 1, bySource: { good: 1 }, errors: 1 });
  });

  it('stops waiting as soon as it is aborted and closes the sink', async () => {
    const controller = new AbortController();
    const sink = new RecordingSink(() => controller.abort());
    const loop = new RenderLoop({ queue, sink, refreshIntervalMs: 60_000, metrics: registry });
    queue.enqueue(item('a', 1));

    await loop.run(controller.signal);

    expect(sink.frames).toHaveLength(1);
    expect(sink.closed).toBe(true);
  });
});

describe('FrameSinks', () => {
  let directory: string;

  beforeEach(() => {
    directory = makeTempDir('preview');
  });

  afterEach(() => {
    removeDir(directory);
  });

  it('keeps one snapshot per source', async () => {
    const sink = new SnapshotFrameSink(directory);
    const image: RawImage = { dtype: 'uint8', shape: [1, 2, 3], data: Buffer.from([1, 2, 3, 4, 5, 6]) };

    await sink.render('front door', image);
    await sink.render('front door', image);

    expect(listFiles(directory)).toEqual(['frontdoor.png']);
    expect(sink.pathFor('front door')).toBe(path.join(directory, 'frontdoor.png'));
    const decoded = PNG.sync.read(fs.readFileSync(sink.pathFor('front door')));
    expect([...decoded.data]).toEqual([1, 2, 3, 255, 4, 5, 6, 255]);
  });

  it('rejects frames it cannot convert', async () => {
    const sink = new SnapshotFrameSink(directory);
    await expect(sink.render('cam', { dtype: 'int16', shape: [1, 1], data: Buffer.alloc(2) })).rejects.toThrow(
      'Cannot convert int16 pixels to RGBA (uint8 required)'
    );
    expect(listFiles(directory)).toEqual([]);
  });

  it('logs frame dimensions', () => {
    const sink = new LoggingFrameSink();
    expect(() => sink.render('cam', { dtype: 'uint8', shape: [4, 3], data: Buffer.alloc(12) }, 1)).not.toThrow();
  });
});
