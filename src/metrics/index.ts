import { EventEmitter } from 'node:events';
import type { PersistenceErrorKind } from '../errors.js';
import type { StatsReport } from '../stats/tracker.js';
import type { TopicKind } from '../types.js';

export type PersistenceTarget = 'image' | 'log';

type LatencyState = { count: number; totalMs: number; minMs: number; maxMs: number };

export type LatencySnapshot = LatencyState & { avgMs: number };

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: Record<string, number>;
    currentLevel: string;
    lastLevelChangeAt: string | null;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  messages: {
    received: number;
    byTopic: Record<string, number>;
    dropped: number;
    dropsByReason: Record<string, number>;
  };
  persistence: {
    images: number;
    logRecords: number;
    windowsPublished: number;
    inhibited: Record<PersistenceTarget, number>;
    failures: Record<PersistenceErrorKind, number>;
    failuresByTarget: Record<PersistenceTarget, number>;
  };
  render: {
    frames: number;
    bySource: Record<string, number>;
    errors: number;
  };
  counters: Record<string, number>;
  latencies: Record<string, LatencySnapshot>;
  stats: {
    reports: number;
    last: StatsReport | null;
  };
};

function toIso(value: number | null): string | null {
  return typeof value === 'number' ? new Date(value).toISOString() : null;
}

function mapFromCounters(map: Map<string, number>): Record<string, number> {
  return Object.fromEntries(Array.from(map.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function increment(map: Map<string, number>, key: string, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private messagesReceived = 0;
  private readonly messagesByTopic = new Map<string, number>();
  private messagesDropped = 0;
  private readonly dropsByReason = new Map<string, number>();
  private imagesPersisted = 0;
  private logRecordsPersisted = 0;
  private windowsPublished = 0;
  private inhibited: Record<PersistenceTarget, number> = { image: 0, log: 0 };
  private persistenceFailures: Record<PersistenceErrorKind, number> = {
    WriteFailed: 0,
    RenameFailed: 0
  };
  private failuresByTarget: Record<PersistenceTarget, number> = { image: 0, log: 0 };
  private renderedFrames = 0;
  private readonly renderedBySource = new Map<string, number>();
  private renderErrors = 0;
  private readonly counters = new Map<string, number>();
  private readonly latencyStats = new Map<string, LatencyState>();
  private statsReports = 0;
  private lastStatsReport: StatsReport | null = null;

  reset() {
    this.logLevelCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.messagesReceived = 0;
    this.messagesByTopic.clear();
    this.messagesDropped = 0;
    this.dropsByReason.clear();
    this.imagesPersisted = 0;
    this.logRecordsPersisted = 0;
    this.windowsPublished = 0;
    this.inhibited = { image: 0, log: 0 };
    this.persistenceFailures = { WriteFailed: 0, RenameFailed: 0 };
    this.failuresByTarget = { image: 0, log: 0 };
    this.renderedFrames = 0;
    this.renderedBySource.clear();
    this.renderErrors = 0;
    this.counters.clear();
    this.latencyStats.clear();
    this.statsReports = 0;
    this.lastStatsReport = null;
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    increment(this.logLevelCounters, normalized);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (previousNormalized && previousNormalized !== normalized) {
      this.lastLogLevelChangeAt = Date.now();
    }
  }

  recordMessage(topic: TopicKind) {
    this.messagesReceived += 1;
    increment(this.messagesByTopic, topic);
  }

  recordDrop(reason: string) {
    this.messagesDropped += 1;
    increment(this.dropsByReason, reason);
  }

  recordPersisted(target: PersistenceTarget) {
    if (target === 'image') {
      this.imagesPersisted += 1;
    } else {
      this.logRecordsPersisted += 1;
    }
  }

  recordInhibited(target: PersistenceTarget) {
    this.inhibited[target] += 1;
  }

  recordPersistenceFailure(kind: PersistenceErrorKind, target: PersistenceTarget) {
    this.persistenceFailures[kind] += 1;
    this.failuresByTarget[target] += 1;
  }

  recordWindowPublished() {
    this.windowsPublished += 1;
  }

  recordRender(sourceId: string) {
    this.renderedFrames += 1;
    increment(this.renderedBySource, sourceId);
  }

  recordRenderError() {
    this.renderErrors += 1;
  }

  recordStatsReport(report: StatsReport) {
    this.statsReports += 1;
    this.lastStatsReport = { ...report };
  }

  incrementCounter(name: string, amount = 1) {
    increment(this.counters, name, amount);
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      return;
    }
    const existing = this.latencyStats.get(metric);
    if (!existing) {
      this.latencyStats.set(metric, {
        count: 1,
        totalMs: durationMs,
        minMs: durationMs,
        maxMs: durationMs
      });
      return;
    }
    existing.count += 1;
    existing.totalMs += durationMs;
    existing.minMs = Math.min(existing.minMs, durationMs);
    existing.maxMs = Math.max(existing.maxMs, durationMs);
  }

  snapshot(): MetricsSnapshot {
    const latencies: Record<string, LatencySnapshot> = {};
    for (const [metric, state] of this.latencyStats) {
      latencies[metric] = { ...state, avgMs: state.count > 0 ? state.totalMs / state.count : 0 };
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: mapFromCounters(this.logLevelCounters),
        currentLevel: this.currentLogLevel,
        lastLevelChangeAt: toIso(this.lastLogLevelChangeAt),
        lastErrorAt: toIso(this.lastErrorAt),
        lastErrorMessage: this.lastErrorMessage
      },
      messages: {
        received: this.messagesReceived,
        byTopic: mapFromCounters(this.messagesByTopic),
        dropped: this.messagesDropped,
        dropsByReason: mapFromCounters(this.dropsByReason)
      },
      persistence: {
        images: this.imagesPersisted,
        logRecords: this.logRecordsPersisted,
        windowsPublished: this.windowsPublished,
        inhibited: { ...this.inhibited },
        failures: { ...this.persistenceFailures },
        failuresByTarget: { ...this.failuresByTarget }
      },
      render: {
        frames: this.renderedFrames,
        bySource: mapFromCounters(this.renderedBySource),
        errors: this.renderErrors
      },
      counters: mapFromCounters(this.counters),
      latencies,
      stats: {
        reports: this.statsReports,
        last: this.lastStatsReport ? { ...this.lastStatsReport } : null
      }
    };
  }
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
