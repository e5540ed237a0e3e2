import fs from 'node:fs';
import path from 'node:path';
import { encodePngAsync, imageDimensions } from '../image/codec.js';
import defaultLogger, { type Logger } from '../logger.js';
import { writeAtomicallyAsync } from '../persistence/atomic.js';
import { sanitizeFileId } from '../persistence/imageWriter.js';
import type { RawImage } from '../types.js';
import type { FrameSink } from './renderLoop.js';

function fileNameFor(sourceId: string) {
  return `${sanitizeFileId(sourceId) || 'unnamed'}.png`;
}

export class LoggingFrameSink implements FrameSink {
  constructor(private readonly log: Logger = defaultLogger) {}

  render(sourceId: string, image: RawImage, frameTime: number) {
    const { width, height, channels } = imageDimensions(image);
    this.log.debug({ source: sourceId, frameTime, width, height, channels }, 'Frame rendered');
  }
}

/** Keeps `<directory>/<source>.png` pointing at the latest frame of every source. */
export class SnapshotFrameSink implements FrameSink {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
    fs.mkdirSync(directory, { recursive: true });
  }

  pathFor(sourceId: string) {
    return path.join(this.directory, fileNameFor(sourceId));
  }

  async render(sourceId: string, image: RawImage): Promise<void> {
    const encoded = await encodePngAsync(image);
    const result = await writeAtomicallyAsync(this.directory, fileNameFor(sourceId), encoded, {
      replace: true
    });
    if (!result.ok) {
      throw result.error;
    }
  }
}
