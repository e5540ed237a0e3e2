import fs from 'node:fs';
import path from 'node:path';
import { PersistenceError } from '../errors.js';
import logger from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { AnnotationRecord } from '../types.js';
import { formatFileTimestamp } from '../utils/time.js';
import type { AnnotationWriter } from './annotationWriter.js';
import { publishStaged, removeStaged, stagingPath, type PersistResult } from './atomic.js';

export type LogRotationWindowOptions = {
  directory: string;
  intervalSeconds: number;
  writer: AnnotationWriter;
  timezone?: string;
  metrics?: MetricsRegistry;
};

export type LogWindowInfo = {
  startTime: number;
  tempPath: string;
  finalPath: string;
  records: number;
};

type OpenWindow = LogWindowInfo & { fd: number };

const UNUSABLE_DESCRIPTOR_CODES = new Set(['EBADF', 'EIO']);

function isUnusableDescriptor(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    UNUSABLE_DESCRIPTOR_CODES.has(error.code)
  );
}

/**
 * Groups consecutive log records into one file per time window. The file is
 * written under a `transferring.` name and only renamed to its final name once
 * the window is over, so a published log file is always complete.
 */
export class LogRotationWindow {
  private readonly directory: string;
  private readonly intervalSeconds: number;
  private readonly writer: AnnotationWriter;
  private readonly timezone: string;
  private readonly metrics: MetricsRegistry;
  private window: OpenWindow | null = null;

  constructor(options: LogRotationWindowOptions) {
    if (!Number.isFinite(options.intervalSeconds) || options.intervalSeconds < 1) {
      throw new Error('Log window duration must be at least one second');
    }
    this.directory = options.directory;
    this.intervalSeconds = options.intervalSeconds;
    this.writer = options.writer;
    this.timezone = options.timezone ?? 'UTC';
    this.metrics = options.metrics ?? metrics;
  }

  get current(): LogWindowInfo | null {
    if (!this.window) {
      return null;
    }
    const { startTime, tempPath, finalPath, records } = this.window;
    return { startTime, tempPath, finalPath, records };
  }

  get isOpen() {
    return this.window !== null;
  }

  fileNameFor(startTime: number): string {
    return `${formatFileTimestamp(startTime, this.timezone)}${this.writer.extension}`;
  }

  append(annotation: AnnotationRecord, sourceId: string, frameTime: number): PersistResult {
    let window = this.window;
    if (!window) {
      const opened = this.open(frameTime);
      if (!opened.ok) {
        return opened;
      }
      window = opened.window;
    }

    let line: string;
    try {
      line = this.writer.serialize(this.writer.prepare(annotation, sourceId, frameTime));
    } catch (error) {
      return this.fail('Failed to serialize log record', error, window.tempPath);
    }

    try {
      fs.writeSync(window.fd, line);
    } catch (error) {
      // Records already on disk stay in the window; only this one is lost.
      if (isUnusableDescriptor(error)) {
        const closed = this.close();
        if (closed && !closed.ok) {
          logger.warn({ err: closed.error }, 'Log window could not be published after a failed append');
        }
      }
      return this.fail('Failed to append log record', error, window.tempPath);
    }

    window.records += 1;
    this.metrics.recordPersisted('log');
    return { ok: true, path: window.tempPath };
  }

  isDue(now: number): boolean {
    return this.window !== null && now > this.window.startTime + this.intervalSeconds;
  }

  /** Checked on every poll cycle, not only when records arrive. */
  rotateIfDue(now: number): PersistResult | null {
    if (!this.isDue(now)) {
      return null;
    }
    return this.close();
  }

  /** Closes and publishes the open window, if any. */
  close(): PersistResult | null {
    const window = this.window;
    if (!window) {
      return null;
    }
    this.window = null;

    try {
      fs.closeSync(window.fd);
    } catch (error) {
      this.metrics.incrementCounter('persistence.log.closeFailed');
      logger.warn({ err: error, path: window.tempPath }, 'Log file did not close cleanly, publishing anyway');
    }

    const result = publishStaged(window.tempPath, window.finalPath);
    if (result.ok) {
      this.metrics.recordWindowPublished();
    } else {
      this.metrics.recordPersistenceFailure(result.error.kind, 'log');
    }
    return result;
  }

  private open(startTime: number): { ok: true; window: OpenWindow } | { ok: false; error: PersistenceError } {
    const name = this.fileNameFor(startTime);
    const tempPath = stagingPath(this.directory, name);
    const finalPath = path.join(this.directory, name);

    let fd: number;
    try {
      fd = fs.openSync(tempPath, 'w');
    } catch (error) {
      return this.fail('Failed to open log file', error, tempPath);
    }

    const window: OpenWindow = { startTime, tempPath, finalPath, records: 0, fd };
    this.window = window;

    const header = this.writer.header();
    if (header.length > 0) {
      try {
        fs.writeSync(fd, header);
      } catch (error) {
        this.abandon(window);
        return this.fail('Failed to write log header', error, tempPath);
      }
    }

    return { ok: true, window };
  }

  private fail(message: string, cause: unknown, filePath: string): { ok: false; error: PersistenceError } {
    const failure = new PersistenceError('WriteFailed', message, { cause, path: filePath });
    this.metrics.recordPersistenceFailure(failure.kind, 'log');
    return { ok: false, error: failure };
  }

  /** Drops a window that never received a record. */
  private abandon(window: OpenWindow) {
    if (this.window === window) {
      this.window = null;
    }
    try {
      fs.closeSync(window.fd);
    } catch {
      this.metrics.incrementCounter('persistence.log.closeFailed');
    }
    removeStaged(window.tempPath);
  }
}
