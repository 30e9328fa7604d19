import { PlateError, type PlateErrorKind } from '@/lib/errors';
import { grayBitmap } from '@/lib/plate/bitmap';
import type { Bitmap } from '@/lib/types';

/** Runs `fn` and returns what it threw; fails the test if it returned normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('Expected the call to throw');
}

export function errorKind(fn: () => unknown): PlateErrorKind | 'not a PlateError' {
  const e = thrownBy(fn);
  return e instanceof PlateError ? e.kind : 'not a PlateError';
}

/** Plate whose every row repeats `column(x)`. */
export function stripedPlate(width: number, height: number, column: (x: number) => number): Bitmap {
  const data: number[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) data.push(column(x));
  }
  return grayBitmap(width, height, data);
}
