/**
 * Coordinate Mapping
 *
 * Three spaces are in play on a scanned plate:
 *   - pixel:    column position on the bitmap (real-valued for sub-pixel work)
 *   - index:    position in a sampled profile (differs from pixel when the
 *               profile was taken over a column window or binned columns)
 *   - physical: distance along the plate, pixel / dpi + offset
 *
 * Here `dpi` always means pixels per physical unit. Scanner settings in dots
 * per inch go through dotsPerInchToPerMillimetre() first.
 */

import { PlateError } from '../errors';
import type { PlateFrame, SampleGrid } from '../types';

export const MM_PER_INCH = 25.4;

export const UNIT_GRID: SampleGrid = { origin: 0, step: 1 };

export function assertDpi(dpi: number): void {
  if (!Number.isFinite(dpi) || dpi <= 0) {
    throw new PlateError('InvalidDPI', `Resolution must be a positive number, got ${dpi}`);
  }
}

function assertFinite(value: number, name: string): void {
  if (!Number.isFinite(value)) {
    throw new PlateError('OutOfRange', `${name} must be a finite number, got ${value}`);
  }
}

export function assertFrame(frame: PlateFrame): void {
  assertDpi(frame.dpi);
  assertFinite(frame.offset, 'Offset');
}

export function dotsPerInchToPerMillimetre(dotsPerInch: number): number {
  assertDpi(dotsPerInch);
  return dotsPerInch / MM_PER_INCH;
}

export function pixelToPhysical(pixel: number, dpi: number, offset: number): number {
  assertDpi(dpi);
  assertFinite(pixel, 'Pixel');
  assertFinite(offset, 'Offset');
  return pixel / dpi + offset;
}

export function physicalToPixel(physical: number, dpi: number, offset: number): number {
  assertDpi(dpi);
  assertFinite(physical, 'Position');
  assertFinite(offset, 'Offset');
  return (physical - offset) * dpi;
}

// Bin i spans [origin + i*step, origin + (i+1)*step); its sample sits at the bin centre.
export function pixelToIndex(pixel: number, grid: SampleGrid = UNIT_GRID): number {
  return (pixel - grid.origin - (grid.step - 1) / 2) / grid.step;
}

export function indexToPixel(index: number, grid: SampleGrid = UNIT_GRID): number {
  return grid.origin + index * grid.step + (grid.step - 1) / 2;
}

// Frame-bound shorthands used by the catalog and session.
export const toPhysical = (pixel: number, frame: PlateFrame) =>
  pixelToPhysical(pixel, frame.dpi, frame.offset);

export const toPixel = (physical: number, frame: PlateFrame) =>
  physicalToPixel(physical, frame.dpi, frame.offset);
