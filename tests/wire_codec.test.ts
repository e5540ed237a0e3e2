import { describe, expect, it } from 'vitest';
import {
  decodeFrame,
  encodeImageFrame,
  encodeLogFrame,
  IMAGE_FRAME_PARTS,
  LOG_FRAME_PARTS
} from '../src/wire/codec.js';

function parts(...values: string[]) {
  return values.map(value => Buffer.from(value, 'utf8'));
}

function expectDecodeError(input: Buffer[], kind: string) {
  const result = decodeFrame(input);
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.kind).toBe(kind);
  }
}

describe('WireCodec', () => {
  it('round trips a raw video frame', () => {
    const pixels = Buffer.from([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    const encoded = encodeImageFrame({
      topic: 'VideoFrame',
      sourceId: 'cam-1',
      frameTime: 1700000000.5,
      meta: { dtype: 'uint8', shape: [2, 2, 3] },
      buffer: pixels,
      annotation: { camera: 'front', tags: ['a'] }
    });

    expect(encoded).toHaveLength(IMAGE_FRAME_PARTS);
    const result = decodeFrame(encoded);
    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    const { envelope } = result;
    expect(envelope.topic).toBe('video');
    expect(envelope.rawTopic).toBe('VideoFrame');
    expect(envelope.sourceId.toString()).toBe('cam-1');
    expect(envelope.frameTime).toBe(1700000000.5);
    expect(envelope.payload).toEqual({
      kind: 'image',
      encoding: 'raw',
      dtype: 'uint8',
      shape: [2, 2, 3],
      data: pixels,
      annotation: { camera: 'front', tags: ['a'] }
    });
  });

  it('writes log frames as four JSON parts and sets as arrays', () => {
    const encoded = encodeLogFrame({
      sourceId: 'cam',
      frameTime: 1700000000.25,
      annotation: { ids: new Set([1, 2]) }
    });

    expect(encoded).toHaveLength(LOG_FRAME_PARTS);
    expect(encoded.map(part => part.toString())).toEqual([
      'LogFrame',
      'cam',
      '1700000000.25',
      '{"ids":[1,2]}'
    ]);
  });

  it('appends the source id to the topic on request', () => {
    const encoded = encodeLogFrame({
      sourceId: 'cam',
      frameTime: 3,
      annotation: {},
      appendSourceToTopic: true
    });
    expect(encoded[0].toString()).toBe('LogFrame/cam');

    const result = decodeFrame(encoded);
    expect(result.ok && result.envelope.topic).toBe('log');
    expect(result.ok && result.envelope.rawTopic).toBe('LogFrame/cam');
  });

  it('rejects frames with missing parts', () => {
    expectDecodeError(parts('VideoFrame'), 'ShortMessage');
    expectDecodeError(parts('VideoFrame', 'cam'), 'ShortMessage');
    expectDecodeError(parts('LogFrame', 'cam', '1'), 'ShortMessage');
  });

  it('rejects unknown topics and foreign suffixes', () => {
    expectDecodeError(parts('Other', 'cam', '1', '{}'), 'UnknownTopic');
    expectDecodeError(parts('LogFrame/other', 'cam', '1', '{}'), 'UnknownTopic');
  });

  it('rejects malformed frame times and annotations', () => {
    expectDecodeError(parts('LogFrame', 'cam', 'abc', '{}'), 'BadEncoding');
    expectDecodeError(parts('LogFrame', 'cam', '"1"', '{}'), 'BadEncoding');
    expectDecodeError(parts('LogFrame', 'cam', '1', '[1]'), 'BadEncoding');
    expectDecodeError(parts('LogFrame', 'cam', '1', '{"a":'), 'BadEncoding');
  });

  it('treats an empty or null annotation as an empty record', () => {
    for (const annotation of ['', 'null']) {
      const result = decodeFrame(parts('LogFrame', 'cam', '2', annotation));
      expect(result.ok && result.envelope.payload).toEqual({ kind: 'log', annotation: {} });
    }
  });

  it('rejects unsupported meta', () => {
    const frame = (meta: string, buffer = Buffer.alloc(4)) => [
      ...parts('VideoFrame', 'cam', '1', meta),
      buffer,
      Buffer.from('{}')
    ];

    expectDecodeError(frame('{"dtype":"uint64","shape":[2,2]}'), 'BadEncoding');
    expectDecodeError(frame('{"dtype":"uint8","shape":[0,2]}'), 'BadEncoding');
    expectDecodeError(frame('[]'), 'BadEncoding');
    expectDecodeError(frame('{"dtype":"uint8","shape":[2,2]}', Buffer.alloc(3)), 'BadEncoding');
    expect(decodeFrame(frame('{"dtype":"uint8","shape":[2,2]}')).ok).toBe(true);
  });

  it('does not check the byte length of JPEG payloads', () => {
    const result = decodeFrame([
      ...parts('JpegFrame', 'cam', '1', '{"dtype":"uint8","shape":[2,2,3]}'),
      Buffer.alloc(5),
      Buffer.from('{}')
    ]);
    expect(result.ok).toBe(true);
    if (result.ok && result.envelope.payload.kind === 'image') {
      expect(result.envelope.payload.encoding).toBe('jpeg');
      expect(result.envelope.payload.data).toHaveLength(5);
    }
  });

  it('refuses to encode a non-finite frame time', () => {
    expect(() =>
      encodeLogFrame({ sourceId: 'cam', frameTime: Number.NaN, annotation: {} })
    ).toThrow(/finite/);
  });
});
