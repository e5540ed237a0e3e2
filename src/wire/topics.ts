import { DecodeError } from '../errors.js';
import { decodeJpeg } from '../image/codec.js';
import type { Envelope, FrameTopic, RoutedFrame, TopicKind } from '../types.js';

const TOPIC_KINDS: Record<FrameTopic, Exclude<TopicKind, 'unknown'>> = {
  VideoFrame: 'video',
  JpegFrame: 'jpeg',
  LogFrame: 'log'
};

export const FRAME_TOPICS: readonly FrameTopic[] = ['VideoFrame', 'JpegFrame', 'LogFrame'];

export function isFrameTopic(value: string): value is FrameTopic {
  return FRAME_TOPICS.some(topic => topic === value);
}

export type RouteResult = { ok: true; frame: RoutedFrame } | { ok: false; error: DecodeError };

/**
 * Publishers may append `/<source id>` to the topic so subscribers can filter
 * per source; both wire forms resolve to the same logical topic.
 */
export function stripSourceSuffix(rawTopic: string, sourceId: string): string {
  const suffix = `/${sourceId}`;
  if (sourceId.length > 0 && rawTopic.endsWith(suffix)) {
    return rawTopic.slice(0, -suffix.length);
  }
  return rawTopic;
}

export function topicFor(kind: Exclude<TopicKind, 'unknown'>): FrameTopic {
  const match = FRAME_TOPICS.find(topic => TOPIC_KINDS[topic] === kind);
  if (!match) {
    throw new Error(`No topic registered for ${kind}`);
  }
  return match;
}

export function classifyTopic(rawTopic: string, sourceId: string): TopicKind {
  const logical = stripSourceSuffix(rawTopic, sourceId);
  if (isFrameTopic(logical)) {
    return TOPIC_KINDS[logical];
  }
  return 'unknown';
}

export function routeEnvelope(envelope: Envelope): RouteResult {
  const sourceId = envelope.sourceId.toString('utf8');
  const { payload } = envelope;

  if (payload.kind === 'log') {
    return {
      ok: true,
      frame: {
        kind: 'log',
        sourceId,
        frameTime: envelope.frameTime,
        annotation: payload.annotation
      }
    };
  }

  if (payload.encoding === 'raw') {
    return {
      ok: true,
      frame: {
        kind: 'image',
        sourceId,
        frameTime: envelope.frameTime,
        image: { dtype: payload.dtype, shape: payload.shape, data: payload.data },
        annotation: payload.annotation
      }
    };
  }

  const channels = payload.shape.length === 2 || payload.shape[2] === 1 ? 1 : 3;
  try {
    const image = decodeJpeg(payload.data, channels);
    return {
      ok: true,
      frame: {
        kind: 'image',
        sourceId,
        frameTime: envelope.frameTime,
        image,
        annotation: payload.annotation
      }
    };
  } catch (error) {
    return {
      ok: false,
      error: new DecodeError('BadEncoding', 'JPEG payload could not be decoded', { cause: error })
    };
  }
}
