import { describe, expect, it } from 'vitest';
import { errorKind } from '@/test/helpers';
import { grayBitmap } from './bitmap';
import { sampleColumns } from './sampler';

// 3 columns x 2 rows
const plate = grayBitmap(3, 2, [
  10, 20, 30,
  30, 40, 50,
]);

describe('sampleColumns', () => {
  it('averages each column over all rows by default', () => {
    const profile = sampleColumns(plate);
    expect(Array.from(profile.values)).toEqual([20, 30, 40]);
    expect(profile.values.length).toBe(plate.width);
    expect(profile.grid).toEqual({ origin: 0, step: 1 });
    expect(profile.rows).toEqual({ start: 0, end: 2 });
  });

  it('returns raw column intensities for a single row', () => {
    expect(Array.from(sampleColumns(plate, { rows: { start: 0, end: 1 } }).values)).toEqual([10, 20, 30]);
    expect(Array.from(sampleColumns(plate, { rows: { start: 1, end: 2 } }).values)).toEqual([30, 40, 50]);
  });

  it('inverts against the bitmap maximum', () => {
    const profile = sampleColumns(plate, { polarity: 'inverted' });
    expect(Array.from(profile.values)).toEqual([235, 225, 215]);
  });

  it('samples a column window and records its origin', () => {
    const profile = sampleColumns(plate, { columns: { start: 1, end: 3 } });
    expect(Array.from(profile.values)).toEqual([30, 40]);
    expect(profile.grid).toEqual({ origin: 1, step: 1 });
  });

  it('bins columns, leaving a narrower last bin', () => {
    const profile = sampleColumns(plate, { binWidth: 2 });
    expect(Array.from(profile.values)).toEqual([25, 40]);
    expect(profile.grid).toEqual({ origin: 0, step: 2 });
  });

  it('rejects row ranges outside the plate', () => {
    expect(errorKind(() => sampleColumns(plate, { rows: { start: 0, end: 3 } }))).toBe('OutOfRange');
    expect(errorKind(() => sampleColumns(plate, { rows: { start: -1, end: 1 } }))).toBe('OutOfRange');
    expect(errorKind(() => sampleColumns(plate, { rows: { start: 1, end: 1 } }))).toBe('OutOfRange');
    expect(errorKind(() => sampleColumns(plate, { rows: { start: 0.5, end: 2 } }))).toBe('OutOfRange');
  });

  it('rejects bad column windows and bin widths', () => {
    expect(errorKind(() => sampleColumns(plate, { columns: { start: 2, end: 4 } }))).toBe('OutOfRange');
    expect(errorKind(() => sampleColumns(plate, { binWidth: 0 }))).toBe('OutOfRange');
    expect(errorKind(() => sampleColumns(plate, { binWidth: 1.5 }))).toBe('OutOfRange');
  });
});
