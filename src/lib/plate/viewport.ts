/**
 * Viewport Geometry
 *
 * The plate is viewed through a horizontal scroll window. The operator
 * clicks inside it to place the scan line, then trims the position with a
 * small nudge while comparing the profile against its mirror image in a
 * magnified window: a symmetric peak lines up with its reflection only
 * when the scan line sits on the peak centre.
 */

import { PlateError } from '../errors';
import type { Point } from '../types';

export type PixelRange = [number, number];

const clamp01 = (v: number) => Math.min(Math.max(v, 0), 1);

/** Scroll fractions (as reported by a scrollbar) to a pixel range. */
export function visibleRange(scroll: [number, number], width: number): PixelRange {
  const [a, b] = scroll.map(f => clamp01(f) * width);
  return a <= b ? [a, b] : [b, a];
}

/** Scan-line pixel for a pointer at `pointer` (0..1 across the view) plus a nudge. */
export function scanPixel(range: PixelRange, pointer: number, nudge = 0): number {
  const [L, R] = range;
  return (L + R) / 2 + (clamp01(pointer) - 0.5) * (R - L) + nudge;
}

/** Zoomed window around the scan line, clipped to the visible range. */
export function magnifierWindow(range: PixelRange, scan: number, zoom: number): PixelRange {
  if (!(zoom > 0)) {
    throw new PlateError('OutOfRange', `Zoom must be positive, got ${zoom}`);
  }
  const [L, R] = range;
  const halfWidth = (R - L) / zoom;
  return [Math.max(scan - halfWidth, L), Math.min(scan + halfWidth, R)];
}

/** Reflects a trace about the scan line, keeping intensities. */
export function mirrorTrace(points: Point[], scan: number): Point[] {
  return points.map(p => ({ x: 2 * scan - p.x, y: p.y }));
}

export function formatPosition(position: number, unit = 'mm'): string {
  return `${position.toFixed(4)} ${unit}`;
}
