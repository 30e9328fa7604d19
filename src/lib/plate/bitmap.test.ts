import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import UTIF from 'utif';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isPlateError } from '../errors';
import { errorKind } from '@/test/helpers';
import { grayBitmap, loadBitmap, rgbaBitmap } from './bitmap';

describe('grayBitmap', () => {
  it('reads pixels row by row', () => {
    const bitmap = grayBitmap(3, 2, [1, 2, 3, 4, 5, 6]);
    expect(bitmap.pixelAt(0, 0)).toBe(1);
    expect(bitmap.pixelAt(2, 1)).toBe(6);
    expect(bitmap.maxValue).toBe(255);
  });

  it('rejects mismatched buffers and out-of-bounds reads', () => {
    expect(errorKind(() => grayBitmap(3, 2, [1, 2, 3]))).toBe('OutOfRange');
    expect(errorKind(() => grayBitmap(0, 2, []))).toBe('OutOfRange');
    expect(errorKind(() => grayBitmap(1, 1, [0]).pixelAt(1, 0))).toBe('OutOfRange');
  });
});

describe('rgbaBitmap', () => {
  it('averages the colour channels and ignores alpha', () => {
    const bitmap = rgbaBitmap(2, 1, [30, 60, 90, 255, 0, 0, 255, 0]);
    expect(bitmap.pixelAt(0, 0)).toBe(60);
    expect(bitmap.pixelAt(1, 0)).toBe(85);
  });
});

describe('loadBitmap', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'plate-bitmap-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('decodes a TIFF scan into grey levels', async () => {
    const width = 4;
    const height = 2;
    const grey = [0, 40, 80, 120, 160, 200, 240, 255];
    const rgba = new Uint8Array(width * height * 4);
    grey.forEach((g, i) => rgba.set([g, g, g, 255], i * 4));
    const file = path.join(dir, 'plate.tif');
    await writeFile(file, new Uint8Array(UTIF.encodeImage(rgba, width, height)));

    const bitmap = await loadBitmap(file);
    expect(bitmap.width).toBe(4);
    expect(bitmap.height).toBe(2);
    expect(bitmap.pixelAt(1, 0)).toBe(40);
    expect(bitmap.pixelAt(3, 1)).toBe(255);
  });

  it('reports a missing file as UnreadableImage', async () => {
    const error = await loadBitmap(path.join(dir, 'missing.tif')).catch((e: unknown) => e);
    expect(isPlateError(error, 'UnreadableImage')).toBe(true);
  });

  it('reports a non-TIFF file as UnreadableImage', async () => {
    const file = path.join(dir, 'plate.bmp');
    await writeFile(file, 'BM not really a bitmap');
    const error = await loadBitmap(file).catch((e: unknown) => e);
    expect(isPlateError(error, 'UnreadableImage')).toBe(true);
  });
});
