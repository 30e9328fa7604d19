/**
 * Plate Bitmaps
 *
 * Grey-level pixel access over decoded scans. Plates are read from TIFF
 * through UTIF; colour scans are reduced to the mean of R, G and B.
 */

import { readFile } from 'fs/promises';
import UTIF from 'utif';
import { PlateError } from '../errors';
import type { Bitmap } from '../types';

export const EIGHT_BIT_MAX = 255;

export function grayBitmap(width: number, height: number, data: ArrayLike<number>): Bitmap {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new PlateError('OutOfRange', `Bitmap size must be positive integers, got ${width}x${height}`);
  }
  if (data.length !== width * height) {
    throw new PlateError('OutOfRange', `Expected ${width * height} pixels, got ${data.length}`);
  }
  const pixels = Float32Array.from(data);
  return {
    width,
    height,
    maxValue: EIGHT_BIT_MAX,
    pixelAt(x: number, y: number): number {
      if (x < 0 || x >= width || y < 0 || y >= height) {
        throw new PlateError('OutOfRange', `Pixel (${x}, ${y}) is outside ${width}x${height}`);
      }
      return pixels[y * width + x];
    },
  };
}

export function rgbaBitmap(width: number, height: number, rgba: ArrayLike<number>): Bitmap {
  if (rgba.length !== width * height * 4) {
    throw new PlateError('OutOfRange', `Expected ${width * height * 4} RGBA bytes, got ${rgba.length}`);
  }
  const gray = new Float32Array(width * height);
  for (let i = 0; i < gray.length; i++) {
    const idx = i * 4;
    gray[i] = (rgba[idx] + rgba[idx + 1] + rgba[idx + 2]) / 3;
  }
  return grayBitmap(width, height, gray);
}

function hasTiffMagic(bytes: Uint8Array): boolean {
  const le = bytes[0] === 0x49 && bytes[1] === 0x49 && bytes[2] === 42 && bytes[3] === 0;
  const be = bytes[0] === 0x4d && bytes[1] === 0x4d && bytes[2] === 0 && bytes[3] === 42;
  return le || be;
}

export function decodeTiff(bytes: Buffer): Bitmap {
  if (!hasTiffMagic(bytes)) {
    throw new Error('Not a TIFF file');
  }
  const ifds = UTIF.decode(bytes);
  const page = ifds[0];
  if (page === undefined) {
    throw new Error('No image directory found');
  }
  UTIF.decodeImage(bytes, page);
  if (!(page.width > 0) || !(page.height > 0)) {
    throw new Error(`Empty image (${page.width}x${page.height})`);
  }
  return rgbaBitmap(page.width, page.height, UTIF.toRGBA8(page));
}

export async function loadBitmap(path: string): Promise<Bitmap> {
  try {
    const bytes = await readFile(path);
    const bitmap = decodeTiff(bytes);
    console.log(`[PLATE] Decoded ${path}: ${bitmap.width}x${bitmap.height}`);
    return bitmap;
  } catch (e) {
    throw new PlateError('UnreadableImage', `Unable to read plate image ${path}`, { cause: e });
  }
}
