export interface Point {
  x: number; // Pixel position on the plate
  y: number; // Profile intensity
}

// --- Plate & Profile ---

/** Grey-level image as handed over by the decoding collaborator. */
export interface Bitmap {
  width: number;
  height: number;
  maxValue: number; // 255 for 8-bit scans
  pixelAt(x: number, y: number): number;
}

/** Half-open span [start, end) of integer pixel rows or columns. */
export interface PixelSpan {
  start: number;
  end: number;
}

export type RowRange = PixelSpan;
export type ColumnRange = PixelSpan;

export type Polarity = 'direct' | 'inverted';

/**
 * Relates profile indices to plate pixels: index i covers the bin starting
 * at column origin + i * step, and sits at the bin centre.
 */
export interface SampleGrid {
  origin: number;
  step: number;
}

export interface DiscreteProfile {
  values: Float64Array;
  grid: SampleGrid;
  rows: RowRange;
  maxValue: number;
}

export type InterpolationOrder = 'cubic' | 'linear';

export interface ProfileFunction {
  evaluate(x: number): number;
  domain: [number, number];
  order: InterpolationOrder;
  length: number;
  grid: SampleGrid;
}

// --- Lines ---

export interface PlateFrame {
  dpi: number;    // Pixels per physical unit (px/mm)
  offset: number; // mm, added after scaling
}

export interface LineRecord {
  pixel: number; // Sub-pixel plate position the line was measured at
  intensity: number;
  comment: string;
}

export interface MeasuredLine extends LineRecord {
  position: number; // Physical position under the frame it was read with
}

export interface Plate {
  path: string;
  bitmap: Bitmap;
}
