import { EventEmitter } from 'node:events';
import {
  DecodeError,
  PersistenceError,
  TransportError,
  type DecodeErrorKind,
  type PersistenceErrorKind
} from './errors.js';
import defaultLogger, { type Logger } from './logger.js';
import metricsModule, { type MetricsRegistry } from './metrics/index.js';
import type { PersistResult } from './persistence/atomic.js';
import { prepareRecord, serializeJsonLine } from './persistence/annotationWriter.js';
import type { ImageWriter } from './persistence/imageWriter.js';
import { InhibitionGate } from './persistence/inhibition.js';
import type { LogRotationWindow } from './persistence/logWindow.js';
import type { EnqueueResult, HandoffQueue } from './pipeline/handoffQueue.js';
import { StatsTracker, type StatsReport } from './stats/tracker.js';
import type { SubscriberTransport } from './transport/index.js';
import { systemClock, type Clock, type DisplayItem, type RoutedFrame } from './types.js';
import { decodeFrame } from './wire/codec.js';
import { routeEnvelope } from './wire/topics.js';

export type SubscriberState =
  | 'idle'
  | 'polling'
  | 'decoding'
  | 'routing'
  | 'counting'
  | 'inhibiting'
  | 'persisting'
  | 'enqueuing'
  | 'stopped';

export type DropReason = DecodeErrorKind | PersistenceErrorKind | 'Unexpected';

export type PersistenceOptions = {
  imageWriter: ImageWriter;
  logWindow: LogRotationWindow;
  inhibitionSeconds: number;
};

export type SubscriberOptions = {
  transport: SubscriberTransport;
  persistence?: PersistenceOptions | null;
  display?: HandoffQueue<DisplayItem> | null;
  statsIntervalSeconds: number;
  /** Log records are echoed here as JSON lines; leave unset for quiet mode. */
  echo?: NodeJS.WritableStream | null;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export type DroppedEvent = {
  reason: DropReason;
  error: Error;
};

export type PersistedEvent = {
  kind: RoutedFrame['kind'];
  sourceId: string | null;
  path: string;
};

/** `image` is null for log frames; every persisted frame adds a log record. */
export type PersistOutcome = {
  image: PersistResult | null;
  log: PersistResult;
};

export type MessageOutcome =
  | { status: 'dropped'; reason: DropReason; error: Error }
  | {
      status: 'accepted';
      frame: RoutedFrame;
      inhibited: boolean;
      persisted: PersistOutcome | null;
      enqueued: EnqueueResult | null;
    };

/**
 * Network side of the pipeline: poll → decode → route → count → inhibit →
 * persist / enqueue. A malformed frame or failed write costs that one frame;
 * only transport failures end the loop.
 */
export class Subscriber extends EventEmitter {
  private readonly transport: SubscriberTransport;
  private readonly persistence: PersistenceOptions | null;
  private readonly display: HandoffQueue<DisplayItem> | null;
  private readonly echo: NodeJS.WritableStream | null;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly stats: StatsTracker;
  private readonly gate: InhibitionGate;
  private currentState: SubscriberState = 'idle';
  private running = false;

  constructor(options: SubscriberOptions) {
    super();
    this.transport = options.transport;
    this.persistence = options.persistence ?? null;
    this.display = options.display ?? null;
    this.echo = options.echo ?? null;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? metricsModule;
    this.stats = new StatsTracker({
      intervalSeconds: options.statsIntervalSeconds,
      startedAt: this.clock()
    });
    this.gate = new InhibitionGate(this.persistence?.inhibitionSeconds ?? 0);
  }

  get state(): SubscriberState {
    return this.currentState;
  }

  async run(signal: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error('Subscriber is already running');
    }
    this.running = true;
    this.stats.reset(this.clock());
    this.log.info(
      {
        persistence: this.persistence !== null,
        display: this.display !== null,
        inhibitionSeconds: this.gate.period
      },
      'Subscriber started'
    );

    try {
      while (!signal.aborted) {
        this.currentState = 'polling';
        const parts = await this.poll();
        const now = this.clock();
        if (parts) {
          this.handleMessage(parts, now);
        }
        this.tick(now);
      }
    } finally {
      this.stop();
      this.running = false;
    }
  }

  handleMessage(parts: readonly Buffer[], now: number): MessageOutcome {
    try {
      return this.processMessage(parts, now);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      return this.drop('Unexpected', err);
    } finally {
      if (this.currentState !== 'stopped') {
        this.currentState = 'polling';
      }
    }
  }

  /** Per-cycle housekeeping: window rotation and stats reporting. */
  tick(now: number): StatsReport | null {
    if (this.persistence) {
      this.reportWindowClose(this.persistence.logWindow.rotateIfDue(now));
    }

    const report = this.stats.tick(now);
    if (report) {
      this.metrics.recordStatsReport(report);
      this.log.info(report, 'Subscriber stats');
      this.emit('stats', report);
    }
    return report;
  }

  /** Force-closes the open log window; the subscriber cannot be restarted afterwards. */
  stop() {
    if (this.currentState === 'stopped') {
      return;
    }
    if (this.persistence) {
      this.reportWindowClose(this.persistence.logWindow.close());
    }
    this.currentState = 'stopped';
    this.log.info('Subscriber stopped');
  }

  private async poll(): Promise<Buffer[] | null> {
    try {
      return await this.transport.receive();
    } catch (error) {
      const transportError =
        error instanceof TransportError
          ? error
          : new TransportError('Transport receive failed', { cause: error });
      this.log.error({ err: transportError }, 'Transport failure, stopping subscriber');
      throw transportError;
    }
  }

  private processMessage(parts: readonly Buffer[], now: number): MessageOutcome {
    this.currentState = 'decoding';
    const decoded = decodeFrame(parts);
    if (!decoded.ok) {
      this.stats.recordReceived(now);
      return this.drop(decoded.error.kind, decoded.error);
    }

    const { envelope } = decoded;
    this.metrics.recordMessage(envelope.topic);
    this.stats.recordReceived(now, envelope.frameTime);

    this.currentState = 'routing';
    const routed = routeEnvelope(envelope);
    if (!routed.ok) {
      return this.drop(routed.error.kind, routed.error);
    }
    const { frame } = routed;

    this.currentState = 'counting';
    if (frame.kind === 'log' && this.echo) {
      this.echo.write(serializeJsonLine(prepareRecord(frame.annotation, frame.sourceId, frame.frameTime)));
    }

    let inhibited = false;
    let persisted: PersistOutcome | null = null;
    if (this.persistence) {
      this.currentState = 'inhibiting';
      if (this.gate.tryAcquire(now)) {
        this.currentState = 'persisting';
        persisted = this.persist(frame, this.persistence);
      } else {
        inhibited = true;
        this.metrics.recordInhibited(frame.kind);
      }
    }

    let enqueued: EnqueueResult | null = null;
    if (this.display && frame.kind === 'image') {
      this.currentState = 'enqueuing';
      enqueued = this.display.enqueue({
        sourceId: frame.sourceId,
        frameTime: frame.frameTime,
        image: frame.image
      });
      if (!enqueued.accepted) {
        this.log.debug({ source: frame.sourceId, depth: enqueued.depth }, 'Display queue full, frame skipped');
      }
    }

    return { status: 'accepted', frame, inhibited, persisted, enqueued };
  }

  private persist(frame: RoutedFrame, persistence: PersistenceOptions): PersistOutcome {
    let image: PersistResult | null = null;
    if (frame.kind === 'image') {
      image = persistence.imageWriter.write(frame.image, {
        annotation: frame.annotation,
        sourceId: frame.sourceId,
        frameTime: frame.frameTime
      });
      if (image.ok) {
        this.emit('persisted', {
          kind: frame.kind,
          sourceId: frame.sourceId,
          path: image.path
        } satisfies PersistedEvent);
      }
    }

    const log = persistence.logWindow.append(frame.annotation, frame.sourceId, frame.frameTime);

    // One frame counts as at most one drop.
    const failure = image && !image.ok ? image.error : log.ok ? null : log.error;
    if (failure) {
      this.drop(failure.kind, failure);
    }
    return { image, log };
  }

  private reportWindowClose(result: PersistResult | null) {
    if (!result) {
      return;
    }
    if (result.ok) {
      this.log.info({ path: result.path }, 'Log window published');
      this.emit('persisted', { kind: 'log', sourceId: null, path: result.path } satisfies PersistedEvent);
      return;
    }
    this.log.warn({ err: result.error }, 'Log window could not be published');
  }

  private drop(reason: DropReason, error: Error): MessageOutcome {
    this.stats.recordDropped();
    this.metrics.recordDrop(reason);
    if (error instanceof DecodeError || error instanceof PersistenceError) {
      this.log.debug({ reason, err: error }, 'Frame dropped');
    } else {
      this.log.warn({ reason, err: error }, 'Frame dropped after unexpected failure');
    }
    this.emit('dropped', { reason, error } satisfies DroppedEvent);
    return { status: 'dropped', reason, error };
  }
}
