import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PNG } from 'pngjs';
import { MetricsRegistry } from '../src/metrics/index.js';
import {
  buildImageFileName,
  ImageWriter,
  resolveFileId,
  sanitizeFileId
} from '../src/persistence/imageWriter.js';
import { writeAtomically } from '../src/persistence/atomic.js';
import { listFiles, makeTempDir, removeDir } from './helpers/fs.js';

const IMAGE = { dtype: 'uint8' as const, shape: [1, 2, 3], data: Buffer.from([1, 2, 3, 4, 5, 6]) };

describe('ImageWriter', () => {
  let directory: string;

  beforeEach(() => {
    directory = makeTempDir('images');
  });

  afterEach(() => {
    removeDir(directory);
  });

  it('names files after the frame time and file id', () => {
    expect(buildImageFileName(1700000000.123, 'front door', 'jpeg')).toBe(
      '2023-11-14_22:13:20.123+0000_frontdoor.jpg'
    );
    expect(buildImageFileName(1700000000, 'cam', 'png', 'Europe/Berlin')).toBe(
      '2023-11-14_23:13:20.000+0100_cam.png'
    );
  });

  it('resolves the file id from an annotation key path', () => {
    const annotation = { camera: { name: 'porch' }, count: 3 };
    expect(resolveFileId(annotation, 'camera.name', 'src')).toBe('porch');
    expect(resolveFileId(annotation, 'camera.missing', 'src')).toBe('src');
    expect(resolveFileId(annotation, 'count', 'src')).toBe('src');
    expect(resolveFileId(annotation, '', 'src')).toBe('src');
    expect(sanitizeFileId('a b/c\\d')).toBe('abcd');
  });

  it('writes the encoded image under its final name only', () => {
    const registry = new MetricsRegistry();
    const writer = new ImageWriter({ directory, encoding: 'png', metrics: registry });

    const result = writer.write(IMAGE, { annotation: {}, sourceId: 'cam/1', frameTime: 0 });

    expect(result).toEqual({
      ok: true,
      path: path.join(directory, '1970-01-01_00:00:00.000+0000_cam1.png')
    });
    expect(listFiles(directory)).toEqual(['1970-01-01_00:00:00.000+0000_cam1.png']);
    const decoded = PNG.sync.read(fs.readFileSync(path.join(directory, listFiles(directory)[0])));
    expect([decoded.width, decoded.height]).toEqual([2, 1]);
    expect(registry.snapshot().persistence.images).toBe(1);
    expect(registry.snapshot().latencies['persistence.image.write'].count).toBe(1);
  });

  it('reports images it cannot encode without leaving files behind', () => {
    const registry = new MetricsRegistry();
    const writer = new ImageWriter({ directory, encoding: 'jpeg', metrics: registry });

    const result = writer.write(
      { dtype: 'float32', shape: [1, 1], data: Buffer.alloc(4) },
      { annotation: {}, sourceId: 'cam', frameTime: 1 }
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('WriteFailed');
    }
    expect(listFiles(directory)).toEqual([]);
    expect(registry.snapshot().persistence.failures.WriteFailed).toBe(1);
  });

  it('reports a missing directory as a write failure', () => {
    const result = writeAtomically(path.join(directory, 'missing'), 'x.png', 'data');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('WriteFailed');
      expect(result.error.path).toBe(path.join(directory, 'missing', 'transferring.x.png'));
    }
  });

  it('cleans up the staging file when the rename fails', () => {
    fs.mkdirSync(path.join(directory, 'taken.png'));
    fs.writeFileSync(path.join(directory, 'taken.png', 'keep'), 'x');

    const result = writeAtomically(directory, 'taken.png', 'data');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('RenameFailed');
    }
    expect(listFiles(directory)).toEqual(['taken.png']);
  });

  it('keeps an existing file unless asked to replace it', () => {
    expect(writeAtomically(directory, 'frame.png', 'first').ok).toBe(true);

    const collided = writeAtomically(directory, 'frame.png', 'second');
    expect(collided.ok).toBe(false);
    if (!collided.ok) {
      expect(collided.error.kind).toBe('RenameFailed');
    }
    expect(fs.readFileSync(path.join(directory, 'frame.png'), 'utf8')).toBe('first');

    expect(writeAtomically(directory, 'frame.png', 'third', { replace: true }).ok).toBe(true);
    expect(listFiles(directory)).toEqual(['frame.png']);
    expect(fs.readFileSync(path.join(directory, 'frame.png'), 'utf8')).toBe('third');
  });
});
