import { DecodeError, type DecodeErrorKind } from '../errors.js';
import { expectedByteLength, isPixelDType } from '../image/codec.js';
import type {
  AnnotationRecord,
  AnnotationValue,
  Envelope,
  FrameTopic,
  PixelDType
} from '../types.js';
import { classifyTopic } from './topics.js';

export const IMAGE_FRAME_PARTS = 6;
export const LOG_FRAME_PARTS = 4;

export type DecodeResult = { ok: true; envelope: Envelope } | { ok: false; error: DecodeError };

export type FrameMeta = {
  dtype: PixelDType;
  shape: number[];
};

export type ImageFrameInput = {
  topic: Extract<FrameTopic, 'VideoFrame' | 'JpegFrame'>;
  sourceId: string | Buffer;
  frameTime: number;
  meta: FrameMeta;
  buffer: Buffer;
  annotation?: AnnotationRecord;
  appendSourceToTopic?: boolean;
};

export type LogFrameInput = {
  sourceId: string | Buffer;
  frameTime: number;
  annotation: AnnotationRecord;
  appendSourceToTopic?: boolean;
};

export function isAnnotationValue(value: unknown): value is AnnotationValue {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isAnnotationValue);
      }
      if (value instanceof Set) {
        return Array.from(value).every(isAnnotationValue);
      }
      return isAnnotationRecord(value);
    default:
      return false;
  }
}

export function isAnnotationRecord(value: unknown): value is AnnotationRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || value instanceof Set) {
    return false;
  }
  return Object.values(value).every(isAnnotationValue);
}

function replaceSets(_key: string, value: unknown): unknown {
  return value instanceof Set ? Array.from(value) : value;
}

/** JSON text of an annotation value; sets are written as arrays. */
export function stringifyAnnotationValue(value: AnnotationValue): string {
  return JSON.stringify(value, replaceSets);
}

export function serializeAnnotation(annotation: AnnotationRecord): string {
  return stringifyAnnotationValue(annotation);
}

function encodeTopic(topic: FrameTopic, sourceId: Buffer, appendSourceToTopic?: boolean): Buffer {
  return Buffer.from(appendSourceToTopic ? `${topic}/${sourceId.toString('utf8')}` : topic, 'utf8');
}

function encodeFrameTime(frameTime: number): Buffer {
  if (!Number.isFinite(frameTime)) {
    throw new Error(`Frame time must be a finite number (received ${frameTime})`);
  }
  return Buffer.from(JSON.stringify(frameTime), 'utf8');
}

function toBuffer(value: string | Buffer): Buffer {
  return typeof value === 'string' ? Buffer.from(value, 'utf8') : value;
}

export function encodeImageFrame(input: ImageFrameInput): Buffer[] {
  const sourceId = toBuffer(input.sourceId);
  return [
    encodeTopic(input.topic, sourceId, input.appendSourceToTopic),
    sourceId,
    encodeFrameTime(input.frameTime),
    Buffer.from(JSON.stringify({ dtype: input.meta.dtype, shape: input.meta.shape }), 'utf8'),
    input.buffer,
    Buffer.from(serializeAnnotation(input.annotation ?? {}), 'utf8')
  ];
}

export function encodeLogFrame(input: LogFrameInput): Buffer[] {
  const sourceId = toBuffer(input.sourceId);
  return [
    encodeTopic('LogFrame', sourceId, input.appendSourceToTopic),
    sourceId,
    encodeFrameTime(input.frameTime),
    Buffer.from(serializeAnnotation(input.annotation), 'utf8')
  ];
}

function failure(kind: DecodeErrorKind, message: string, cause?: unknown): DecodeError {
  return new DecodeError(kind, message, cause === undefined ? undefined : { cause });
}

function parseJsonPart(part: Buffer, stage: string): unknown {
  try {
    return JSON.parse(part.toString('utf8'));
  } catch (error) {
    throw failure('BadEncoding', `${stage} is not valid JSON`, error);
  }
}

function decodeFrameTime(part: Buffer): number {
  const value = parseJsonPart(part, 'frame time');
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw failure('BadEncoding', 'frame time must be a finite number');
  }
  return value;
}

function decodeMeta(part: Buffer): FrameMeta {
  const value = parseJsonPart(part, 'frame meta');
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw failure('BadEncoding', 'frame meta must be an object');
  }

  const dtype: unknown = Reflect.get(value, 'dtype');
  const shape: unknown = Reflect.get(value, 'shape');
  if (!isPixelDType(dtype)) {
    throw failure('BadEncoding', `frame meta has unsupported dtype ${String(dtype)}`);
  }
  if (
    !Array.isArray(shape) ||
    shape.length === 0 ||
    !shape.every(dim => Number.isInteger(dim) && dim > 0)
  ) {
    throw failure('BadEncoding', 'frame meta shape must be a list of positive integers');
  }

  return { dtype, shape: shape.map(Number) };
}

function decodeAnnotation(part: Buffer): AnnotationRecord {
  if (part.length === 0) {
    return {};
  }
  const value = parseJsonPart(part, 'annotation');
  if (value === null) {
    return {};
  }
  if (!isAnnotationRecord(value)) {
    throw failure('BadEncoding', 'annotation must be a JSON object');
  }
  return value;
}

function decodeParts(parts: readonly Buffer[]): Envelope {
  if (parts.length < 2) {
    throw failure('ShortMessage', `expected at least 2 parts, received ${parts.length}`);
  }

  const rawTopic = parts[0].toString('utf8');
  const sourceId = parts[1];
  const topic = classifyTopic(rawTopic, sourceId.toString('utf8'));
  if (topic === 'unknown') {
    throw failure('UnknownTopic', `unknown topic "${rawTopic}"`);
  }

  const expected = topic === 'log' ? LOG_FRAME_PARTS : IMAGE_FRAME_PARTS;
  if (parts.length !== expected) {
    throw failure(
      'ShortMessage',
      `${rawTopic} expects ${expected} parts, received ${parts.length}`
    );
  }

  const frameTime = decodeFrameTime(parts[2]);

  if (topic === 'log') {
    return {
      topic,
      rawTopic,
      sourceId,
      frameTime,
      payload: { kind: 'log', annotation: decodeAnnotation(parts[3]) }
    };
  }

  const meta = decodeMeta(parts[3]);
  const buffer = parts[4];
  if (topic === 'video') {
    const expectedBytes = expectedByteLength(meta.dtype, meta.shape);
    if (buffer.length !== expectedBytes) {
      throw failure(
        'BadEncoding',
        `pixel buffer holds ${buffer.length} bytes, meta describes ${expectedBytes}`
      );
    }
  }

  return {
    topic,
    rawTopic,
    sourceId,
    frameTime,
    payload: {
      kind: 'image',
      encoding: topic === 'jpeg' ? 'jpeg' : 'raw',
      dtype: meta.dtype,
      shape: meta.shape,
      data: buffer,
      annotation: decodeAnnotation(parts[5])
    }
  };
}

/** Never throws: every failure comes back classified. */
export function decodeFrame(parts: readonly Buffer[]): DecodeResult {
  try {
    return { ok: true, envelope: decodeParts(parts) };
  } catch (error) {
    if (error instanceof DecodeError) {
      return { ok: false, error };
    }
    return { ok: false, error: failure('BadEncoding', 'frame could not be decoded', error) };
  }
}
