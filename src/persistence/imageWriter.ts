import { performance } from 'node:perf_hooks';
import { PersistenceError } from '../errors.js';
import { encodeJpeg, encodePng } from '../image/codec.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { AnnotationRecord, AnnotationValue, RawImage, StoredImageEncoding } from '../types.js';
import { formatFileTimestamp } from '../utils/time.js';
import { writeAtomically, type PersistResult } from './atomic.js';

const EXTENSIONS: Record<StoredImageEncoding, string> = {
  jpeg: '.jpg',
  png: '.png'
};

export type ImageWriterOptions = {
  directory: string;
  encoding: StoredImageEncoding;
  jpegQuality?: number;
  fileIdKey?: string;
  timezone?: string;
  metrics?: MetricsRegistry;
};

export type ImageWriteContext = {
  annotation: AnnotationRecord;
  sourceId: string;
  frameTime: number;
};

function isRecord(value: AnnotationValue | undefined): value is AnnotationRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Set);
}

/**
 * Walks `keyPath` (`camera.name`) into the annotation. Anything other than a
 * string at the end of the path falls back to the source id.
 */
export function resolveFileId(
  annotation: AnnotationRecord,
  keyPath: string | undefined,
  sourceId: string
): string {
  if (!keyPath) {
    return sourceId;
  }

  let current: AnnotationValue | undefined = annotation;
  for (const segment of keyPath.split('.')) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return sourceId;
    }
    current = current[segment];
  }

  return typeof current === 'string' ? current : sourceId;
}

export function sanitizeFileId(fileId: string): string {
  return fileId.replace(/[\s/\\]+/g, '');
}

export function buildImageFileName(
  frameTime: number,
  fileId: string,
  encoding: StoredImageEncoding,
  timezone = 'UTC'
): string {
  return `${formatFileTimestamp(frameTime, timezone)}_${sanitizeFileId(fileId)}${EXTENSIONS[encoding]}`;
}

export class ImageWriter {
  private readonly options: Required<Omit<ImageWriterOptions, 'metrics'>>;
  private readonly metrics: MetricsRegistry;

  constructor(options: ImageWriterOptions) {
    this.options = {
      directory: options.directory,
      encoding: options.encoding,
      jpegQuality: options.jpegQuality ?? 90,
      fileIdKey: options.fileIdKey ?? '',
      timezone: options.timezone ?? 'UTC'
    };
    this.metrics = options.metrics ?? metrics;
  }

  fileNameFor(context: ImageWriteContext): string {
    const fileId = resolveFileId(context.annotation, this.options.fileIdKey, context.sourceId);
    return buildImageFileName(context.frameTime, fileId, this.options.encoding, this.options.timezone);
  }

  encode(image: RawImage): Buffer {
    return this.options.encoding === 'jpeg'
      ? encodeJpeg(image, this.options.jpegQuality)
      : encodePng(image);
  }

  /** Never throws; failures come back as a `PersistenceError`. */
  write(image: RawImage, context: ImageWriteContext): PersistResult {
    const startedAt = performance.now();
    let name: string;
    let encoded: Buffer;
    try {
      name = this.fileNameFor(context);
      encoded = this.encode(image);
    } catch (error) {
      const failure = new PersistenceError('WriteFailed', 'Failed to encode image', { cause: error });
      this.metrics.recordPersistenceFailure(failure.kind, 'image');
      return { ok: false, error: failure };
    }

    // Same frame time and id: the later frame wins.
    const result = writeAtomically(this.options.directory, name, encoded, { replace: true });
    if (result.ok) {
      this.metrics.recordPersisted('image');
      this.metrics.observeLatency('persistence.image.write', performance.now() - startedAt);
    } else {
      this.metrics.recordPersistenceFailure(result.error.kind, 'image');
    }
    return result;
  }
}
