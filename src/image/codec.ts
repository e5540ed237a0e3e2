import jpeg from 'jpeg-js';
import { PNG } from 'pngjs';
import type { PixelDType, RawImage } from '../types.js';

const BYTES_PER_ELEMENT: Record<PixelDType, number> = {
  uint8: 1,
  int8: 1,
  uint16: 2,
  int16: 2,
  uint32: 4,
  int32: 4,
  float32: 4,
  float64: 8
};

export type RgbaFrame = {
  width: number;
  height: number;
  data: Buffer;
};

export function isPixelDType(value: unknown): value is PixelDType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(BYTES_PER_ELEMENT, value);
}

export function expectedByteLength(dtype: PixelDType, shape: readonly number[]): number {
  return shape.reduce((total, dim) => total * dim, BYTES_PER_ELEMENT[dtype]);
}

export function imageDimensions(image: RawImage) {
  const [height, width, channels] = image.shape;
  return {
    height: height ?? 0,
    width: width ?? 0,
    channels: channels ?? 1
  };
}

export function toRgba(image: RawImage): RgbaFrame {
  if (image.dtype !== 'uint8') {
    throw new Error(`Cannot convert ${image.dtype} pixels to RGBA (uint8 required)`);
  }
  if (image.shape.length !== 2 && image.shape.length !== 3) {
    throw new Error(`Cannot convert image of rank ${image.shape.length} to RGBA`);
  }

  const { width, height, channels } = imageDimensions(image);
  if (channels !== 1 && channels !== 3 && channels !== 4) {
    throw new Error(`Unsupported channel count ${channels}`);
  }

  const pixels = width * height;
  if (image.data.length < pixels * channels) {
    throw new Error('Pixel buffer is shorter than its shape');
  }

  const rgba = Buffer.alloc(pixels * 4);
  for (let i = 0; i < pixels; i += 1) {
    const source = i * channels;
    const target = i * 4;
    if (channels === 1) {
      const value = image.data[source];
      rgba[target] = value;
      rgba[target + 1] = value;
      rgba[target + 2] = value;
      rgba[target + 3] = 255;
    } else {
      rgba[target] = image.data[source];
      rgba[target + 1] = image.data[source + 1];
      rgba[target + 2] = image.data[source + 2];
      rgba[target + 3] = channels === 4 ? image.data[source + 3] : 255;
    }
  }

  return { width, height, data: rgba };
}

export function fromRgba(frame: RgbaFrame, channels: 1 | 3): RawImage {
  const pixels = frame.width * frame.height;
  const data = Buffer.alloc(pixels * channels);

  for (let i = 0; i < pixels; i += 1) {
    const source = i * 4;
    const target = i * channels;
    if (channels === 1) {
      data[target] = frame.data[source];
    } else {
      data[target] = frame.data[source];
      data[target + 1] = frame.data[source + 1];
      data[target + 2] = frame.data[source + 2];
    }
  }

  const shape = channels === 1 ? [frame.height, frame.width] : [frame.height, frame.width, 3];
  return { dtype: 'uint8', shape, data };
}

export function encodePng(image: RawImage): Buffer {
  const rgba = toRgba(image);
  const png = new PNG({ width: rgba.width, height: rgba.height });
  rgba.data.copy(png.data);
  return PNG.sync.write(png);
}

/** Deflates through the pngjs stream so the event loop keeps running. */
export async function encodePngAsync(image: RawImage): Promise<Buffer> {
  const rgba = toRgba(image);
  const png = new PNG({ width: rgba.width, height: rgba.height });
  rgba.data.copy(png.data);

  const chunks: Buffer[] = [];
  return new Promise((resolve, reject) => {
    png
      .pack()
      .on('data', (chunk: Buffer) => chunks.push(chunk))
      .on('end', () => resolve(Buffer.concat(chunks)))
      .on('error', reject);
  });
}

export function encodeJpeg(image: RawImage, quality: number): Buffer {
  const rgba = toRgba(image);
  const encoded = jpeg.encode({ width: rgba.width, height: rgba.height, data: rgba.data }, quality);
  return encoded.data;
}

export function decodeJpeg(buffer: Buffer, channels: 1 | 3 = 3): RawImage {
  const decoded = jpeg.decode(buffer, { useTArray: true, formatAsRGBA: true });
  return fromRgba(
    { width: decoded.width, height: decoded.height, data: Buffer.from(decoded.data) },
    channels
  );
}
