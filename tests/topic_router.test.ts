import { describe, expect, it } from 'vitest';
import { encodeJpeg } from '../src/image/codec.js';
import type { Envelope } from '../src/types.js';
import { classifyTopic, routeEnvelope, stripSourceSuffix, topicFor } from '../src/wire/topics.js';

function jpegEnvelope(data: Buffer, shape: number[]): Envelope {
  return {
    topic: 'jpeg',
    rawTopic: 'JpegFrame',
    sourceId: Buffer.from('cam'),
    frameTime: 12,
    payload: { kind: 'image', encoding: 'jpeg', dtype: 'uint8', shape, data, annotation: { n: 1 } }
  };
}

describe('TopicRouter', () => {
  it('strips a trailing source id from the topic', () => {
    expect(stripSourceSuffix('VideoFrame/cam1', 'cam1')).toBe('VideoFrame');
    expect(stripSourceSuffix('VideoFrame', 'cam1')).toBe('VideoFrame');
    expect(stripSourceSuffix('VideoFrame/cam1', '')).toBe('VideoFrame/cam1');
    expect(stripSourceSuffix('VideoFrame/cam1/cam1', 'cam1')).toBe('VideoFrame/cam1');
  });

  it('classifies both wire forms of a topic the same way', () => {
    expect(classifyTopic('JpegFrame', 'x')).toBe('jpeg');
    expect(classifyTopic('JpegFrame/x', 'x')).toBe('jpeg');
    expect(classifyTopic('LogFrame', '')).toBe('log');
    expect(classifyTopic('Video', 'x')).toBe('unknown');
    expect(topicFor('video')).toBe('VideoFrame');
  });

  it('passes log records through untouched', () => {
    const result = routeEnvelope({
      topic: 'log',
      rawTopic: 'LogFrame/cam',
      sourceId: Buffer.from('cam'),
      frameTime: 4,
      payload: { kind: 'log', annotation: { level: 'info' } }
    });

    expect(result).toEqual({
      ok: true,
      frame: { kind: 'log', sourceId: 'cam', frameTime: 4, annotation: { level: 'info' } }
    });
  });

  it('decodes JPEG payloads into raw colour images', () => {
    const source = { dtype: 'uint8' as const, shape: [8, 8, 3], data: Buffer.alloc(192, 128) };
    const result = routeEnvelope(jpegEnvelope(encodeJpeg(source, 100), [8, 8, 3]));

    expect(result.ok).toBe(true);
    if (!result.ok || result.frame.kind !== 'image') {
      return;
    }
    expect(result.frame.image.shape).toEqual([8, 8, 3]);
    expect(result.frame.image.data).toHaveLength(192);
    expect(result.frame.annotation).toEqual({ n: 1 });
    for (const value of result.frame.image.data) {
      expect(Math.abs(value - 128)).toBeLessThanOrEqual(2);
    }
  });

  it('decodes grayscale JPEG payloads to a single channel', () => {
    const source = { dtype: 'uint8' as const, shape: [8, 8], data: Buffer.alloc(64, 200) };
    const result = routeEnvelope(jpegEnvelope(encodeJpeg(source, 100), [8, 8]));

    expect(result.ok && result.frame.kind === 'image' && result.frame.image.shape).toEqual([8, 8]);
  });

  it('reports undecodable JPEG bytes as a bad encoding', () => {
    const result = routeEnvelope(jpegEnvelope(Buffer.from('not a jpeg'), [2, 2, 3]));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('BadEncoding');
    }
  });
});
