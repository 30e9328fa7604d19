/**
 * Column Intensity Sampler
 *
 * Reduces a band of plate rows to one intensity per column, the digital
 * counterpart of a densitometer trace across the spectrum.
 */

import { PlateError } from '../errors';
import type { Bitmap, ColumnRange, DiscreteProfile, PixelSpan, Polarity, RowRange } from '../types';

export interface SampleOptions {
  rows?: RowRange;        // Default: full height
  columns?: ColumnRange;  // Default: full width
  binWidth?: number;      // Columns averaged per sample (default: 1)
  polarity?: Polarity;    // 'inverted' turns dark emulsion lines into peaks (default: 'direct')
}

function checkSpan(span: PixelSpan, limit: number, what: string): void {
  const { start, end } = span;
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > limit || start >= end) {
    throw new PlateError('OutOfRange', `${what} [${start}, ${end}) is outside [0, ${limit})`);
  }
}

export function fullRows(bitmap: Bitmap): RowRange {
  return { start: 0, end: bitmap.height };
}

export function sampleColumns(bitmap: Bitmap, options: SampleOptions = {}): DiscreteProfile {
  const {
    rows = fullRows(bitmap),
    columns = { start: 0, end: bitmap.width },
    binWidth = 1,
    polarity = 'direct',
  } = options;

  checkSpan(rows, bitmap.height, 'Row range');
  checkSpan(columns, bitmap.width, 'Column range');
  if (!Number.isInteger(binWidth) || binWidth < 1) {
    throw new PlateError('OutOfRange', `Bin width must be a positive integer, got ${binWidth}`);
  }

  const columnCount = columns.end - columns.start;
  const values = new Float64Array(Math.ceil(columnCount / binWidth));

  for (let i = 0; i < values.length; i++) {
    const x0 = columns.start + i * binWidth;
    const x1 = Math.min(x0 + binWidth, columns.end);
    let sum = 0;
    for (let x = x0; x < x1; x++) {
      for (let y = rows.start; y < rows.end; y++) {
        sum += bitmap.pixelAt(x, y);
      }
    }
    const mean = sum / ((x1 - x0) * (rows.end - rows.start));
    values[i] = polarity === 'inverted' ? bitmap.maxValue - mean : mean;
  }

  return {
    values,
    grid: { origin: columns.start, step: binWidth },
    rows: { ...rows },
    maxValue: bitmap.maxValue,
  };
}
