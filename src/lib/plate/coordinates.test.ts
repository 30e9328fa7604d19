import { describe, expect, it } from 'vitest';
import { errorKind } from '@/test/helpers';
import {
  dotsPerInchToPerMillimetre,
  indexToPixel,
  physicalToPixel,
  pixelToIndex,
  pixelToPhysical,
} from './coordinates';

describe('pixelToPhysical', () => {
  it('scales by resolution and adds the offset', () => {
    expect(pixelToPhysical(50.2, 1000, 0)).toBeCloseTo(0.0502, 12);
    expect(pixelToPhysical(200, 100, -1.5)).toBe(0.5);
  });

  it('rejects non-positive resolutions', () => {
    expect(errorKind(() => pixelToPhysical(1, 0, 0))).toBe('InvalidDPI');
    expect(errorKind(() => pixelToPhysical(1, -2400, 0))).toBe('InvalidDPI');
    expect(errorKind(() => physicalToPixel(1, Number.NaN, 0))).toBe('InvalidDPI');
  });

  it('rejects non-finite positions', () => {
    expect(errorKind(() => pixelToPhysical(Number.POSITIVE_INFINITY, 10, 0))).toBe('OutOfRange');
    expect(errorKind(() => physicalToPixel(1, 10, Number.NaN))).toBe('OutOfRange');
  });
});

describe('physicalToPixel', () => {
  it('inverts pixelToPhysical', () => {
    const resolutions = [0.5, 1, 94.48818897637796, 1000, 12345.678];
    const offsets = [-250.75, -1, 0, 0.3, 42];
    const pixels = [0, 0.01, 1, 50.2, 999.999, 4095.5];

    for (const dpi of resolutions) {
      for (const offset of offsets) {
        for (const pixel of pixels) {
          const back = physicalToPixel(pixelToPhysical(pixel, dpi, offset), dpi, offset);
          expect(Math.abs(back - pixel)).toBeLessThanOrEqual(1e-9 * Math.max(1, Math.abs(pixel)) * Math.max(1, dpi));
        }
      }
    }
  });
});

describe('dotsPerInchToPerMillimetre', () => {
  it('divides by millimetres per inch', () => {
    expect(dotsPerInchToPerMillimetre(2540)).toBeCloseTo(100, 10);
    expect(dotsPerInchToPerMillimetre(2400)).toBeCloseTo(94.488189, 6);
  });

  it('rejects zero', () => {
    expect(errorKind(() => dotsPerInchToPerMillimetre(0))).toBe('InvalidDPI');
  });
});

describe('sample grid mapping', () => {
  it('is the identity for one sample per pixel', () => {
    expect(pixelToIndex(37.25)).toBe(37.25);
    expect(indexToPixel(37.25)).toBe(37.25);
  });

  it('places binned samples at bin centres', () => {
    const grid = { origin: 10, step: 4 };
    expect(indexToPixel(0, grid)).toBe(11.5);
    expect(indexToPixel(1, grid)).toBe(15.5);
    expect(pixelToIndex(11.5, grid)).toBe(0);
    expect(pixelToIndex(13.5, grid)).toBe(0.5);
  });
});
