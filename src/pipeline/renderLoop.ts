import { setTimeout as delay } from 'node:timers/promises';
import defaultLogger, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { DisplayItem, RawImage } from '../types.js';
import type { HandoffQueue } from './handoffQueue.js';

export interface FrameSink {
  render(sourceId: string, image: RawImage, frameTime: number): void | Promise<void>;
  close?(): void | Promise<void>;
}

export type RenderLoopOptions = {
  queue: HandoffQueue<DisplayItem>;
  sink: FrameSink;
  refreshIntervalMs: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

/** Keeps only the most recent frame of every source, in first-seen order. */
export function coalesceBySource(items: readonly DisplayItem[]): DisplayItem[] {
  const latest = new Map<string, DisplayItem>();
  for (const item of items) {
    latest.set(item.sourceId, item);
  }
  return Array.from(latest.values());
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Consumer side of the handoff queue. It never touches the transport or the
 * persistence files; the queue is simply abandoned when the loop stops.
 */
export class RenderLoop {
  private readonly queue: HandoffQueue<DisplayItem>;
  private readonly sink: FrameSink;
  private readonly refreshIntervalMs: number;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: RenderLoopOptions) {
    this.queue = options.queue;
    this.sink = options.sink;
    this.refreshIntervalMs = Math.max(0, options.refreshIntervalMs);
    this.log = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? metricsModule;
  }

  /** Drains the queue once and returns the number of frames handed to the sink. */
  async renderOnce(): Promise<number> {
    const frames = coalesceBySource(this.queue.drain());
    let rendered = 0;
    for (const frame of frames) {
      try {
        await this.sink.render(frame.sourceId, frame.image, frame.frameTime);
        this.metrics.recordRender(frame.sourceId);
        rendered += 1;
      } catch (error) {
        this.metrics.recordRenderError();
        this.log.warn({ err: error, source: frame.sourceId }, 'Frame sink failed');
      }
    }
    return rendered;
  }

  async run(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        await this.renderOnce();
        try {
          await delay(this.refreshIntervalMs, undefined, { signal });
        } catch (error) {
          if (isAbortError(error)) {
            break;
          }
          throw error;
        }
      }
    } finally {
      await this.sink.close?.();
    }
  }
}
