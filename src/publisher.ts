import { encodeJpeg } from './image/codec.js';
import defaultLogger, { type Logger } from './logger.js';
import type { PublisherTransport } from './transport/index.js';
import { systemClock, type AnnotationRecord, type Clock, type ImageEncoding, type RawImage } from './types.js';
import { encodeImageFrame, encodeLogFrame } from './wire/codec.js';

export type FramePublisherOptions = {
  transport: PublisherTransport;
  sourceId: string;
  appendSourceToTopic?: boolean;
  /** 0 disables the cap. */
  maxFps?: number;
  jpegQuality?: number;
  clock?: Clock;
  logger?: Logger;
};

export type PublishImageOptions = {
  encoding?: ImageEncoding;
  frameTime?: number;
};

/** Producer side of the wire protocol. */
export class FramePublisher {
  private readonly transport: PublisherTransport;
  private readonly sourceId: string;
  private readonly appendSourceToTopic: boolean;
  private readonly minIntervalSeconds: number;
  private readonly jpegQuality: number;
  private readonly clock: Clock;
  private readonly log: Logger;
  private lastImageAt: number | null = null;

  constructor(options: FramePublisherOptions) {
    const maxFps = options.maxFps ?? 0;
    if (!Number.isFinite(maxFps) || maxFps < 0) {
      throw new Error('maxFps must be a non-negative number');
    }
    this.transport = options.transport;
    this.sourceId = options.sourceId;
    this.appendSourceToTopic = options.appendSourceToTopic ?? false;
    this.minIntervalSeconds = maxFps > 0 ? 1 / maxFps : 0;
    this.jpegQuality = options.jpegQuality ?? 90;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? defaultLogger;
  }

  /** Resolves `false` when the frame-rate cap skipped the frame. */
  async publishImage(
    image: RawImage,
    annotation: AnnotationRecord = {},
    options: PublishImageOptions = {}
  ): Promise<boolean> {
    const now = this.clock();
    if (
      this.minIntervalSeconds > 0 &&
      this.lastImageAt !== null &&
      now - this.lastImageAt < this.minIntervalSeconds
    ) {
      this.log.debug({ source: this.sourceId }, 'Frame skipped by rate cap');
      return false;
    }

    const encoding = options.encoding ?? 'raw';
    const buffer = encoding === 'jpeg' ? encodeJpeg(image, this.jpegQuality) : image.data;
    const parts = encodeImageFrame({
      topic: encoding === 'jpeg' ? 'JpegFrame' : 'VideoFrame',
      sourceId: this.sourceId,
      frameTime: options.frameTime ?? now,
      meta: { dtype: image.dtype, shape: image.shape },
      buffer,
      annotation,
      appendSourceToTopic: this.appendSourceToTopic
    });

    await this.transport.send(parts);
    this.lastImageAt = now;
    return true;
  }

  async publishLog(annotation: AnnotationRecord, frameTime?: number): Promise<void> {
    const parts = encodeLogFrame({
      sourceId: this.sourceId,
      frameTime: frameTime ?? this.clock(),
      annotation,
      appendSourceToTopic: this.appendSourceToTopic
    });
    await this.transport.send(parts);
  }

  close() {
    this.transport.close();
  }
}
