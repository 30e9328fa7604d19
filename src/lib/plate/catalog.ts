import { PlateError } from '../errors';
import type { LineRecord, MeasuredLine, PlateFrame, ProfileFunction } from '../types';
import { assertFrame, toPhysical, toPixel } from './coordinates';
import { intensityAtPixel } from './interpolator';
import { formatLineFile, parseLineFile } from './lineFile';

export interface NearestMatch {
  index: number;
  line: MeasuredLine;
  distance: number; // physical units
}

/**
 * Ordered list of recorded lines.
 *
 * Records keep the plate pixel they were measured at; physical positions
 * are derived from the frame passed to each call, so a changed offset or
 * resolution shows up on the next read or save. Every mutator validates
 * before it writes, so a throwing call leaves the catalog as it was.
 */
export class LineCatalog {
  private records: LineRecord[];

  constructor(records: LineRecord[] = []) {
    this.records = records.map(r => ({ ...r }));
  }

  get size(): number {
    return this.records.length;
  }

  get isEmpty(): boolean {
    return this.records.length === 0;
  }

  snapshot(): LineRecord[] {
    return this.records.map(r => ({ ...r }));
  }

  private measure(record: LineRecord, frame: PlateFrame): MeasuredLine {
    return { ...record, position: toPhysical(record.pixel, frame) };
  }

  /** All lines in insertion order. */
  lines(frame: PlateFrame): MeasuredLine[] {
    assertFrame(frame);
    return this.records.map(r => this.measure(r, frame));
  }

  /** Lines strictly between two pixel positions, for drawing markers. */
  linesBetween(fromPixel: number, toPixel: number, frame: PlateFrame): MeasuredLine[] {
    return this.lines(frame).filter(l => l.pixel > fromPixel && l.pixel < toPixel);
  }

  addLine(cursorPixel: number, profile: ProfileFunction, frame: PlateFrame): MeasuredLine {
    assertFrame(frame);
    const intensity = intensityAtPixel(profile, cursorPixel);
    const position = toPhysical(cursorPixel, frame);

    const record: LineRecord = { pixel: cursorPixel, intensity, comment: '' };
    this.records.push(record);
    return { ...record, position };
  }

  /**
   * Closest line to the cursor by physical distance, or undefined when the
   * closest one is farther than `tolerance`. Ties go to the earlier record.
   */
  findNearest(cursorPixel: number, frame: PlateFrame, tolerance: number): NearestMatch | undefined {
    assertFrame(frame);
    if (!(tolerance >= 0)) {
      throw new PlateError('OutOfRange', `Tolerance must be non-negative, got ${tolerance}`);
    }
    const cursor = toPhysical(cursorPixel, frame);

    let best: NearestMatch | undefined;
    for (let index = 0; index < this.records.length; index++) {
      const line = this.measure(this.records[index], frame);
      const distance = Math.abs(line.position - cursor);
      // Strict comparison keeps the earlier record on ties.
      if (best === undefined || distance < best.distance) {
        best = { index, line, distance };
      }
    }

    return best !== undefined && best.distance <= tolerance ? best : undefined;
  }

  private requireNearest(cursorPixel: number, frame: PlateFrame, tolerance: number): NearestMatch {
    const match = this.findNearest(cursorPixel, frame, tolerance);
    if (match === undefined) {
      const cursor = toPhysical(cursorPixel, frame);
      throw new PlateError('NotFound', `No line within ${tolerance} of position ${cursor}`);
    }
    return match;
  }

  deleteNearest(cursorPixel: number, frame: PlateFrame, tolerance: number): MeasuredLine {
    const { index, line } = this.requireNearest(cursorPixel, frame, tolerance);
    this.records.splice(index, 1);
    return line;
  }

  commentNearest(cursorPixel: number, frame: PlateFrame, tolerance: number, text: string): MeasuredLine {
    const { index, line } = this.requireNearest(cursorPixel, frame, tolerance);
    this.records[index] = { ...this.records[index], comment: text };
    return { ...line, comment: text };
  }

  serialize(frame: PlateFrame): string {
    return formatLineFile({
      frame,
      rows: this.lines(frame).map(({ position, intensity, comment }) => ({ position, intensity, comment })),
    });
  }

  /**
   * Parses a line file into a new catalog and the frame it was written with.
   * Nothing is constructed unless the whole file parses.
   */
  static deserialize(text: string): { catalog: LineCatalog; frame: PlateFrame } {
    const { frame, rows } = parseLineFile(text);
    const records = rows.map(row => ({
      pixel: toPixel(row.position, frame),
      intensity: row.intensity,
      comment: row.comment,
    }));
    return { catalog: new LineCatalog(records), frame };
  }
}
