/**
 * Plate Session
 *
 * Everything the comparator holds between operator actions: the open plate
 * and its profile, the viewing state that positions the scan line, the
 * coordinate frame, and the line catalog. Each action runs to completion
 * and builds new state fully before swapping it in, so a failing action
 * leaves the session as it was.
 */

import { readFile, writeFile } from 'fs/promises';
import { type ComparatorConfig, resolveConfig } from '../config';
import { PlateError } from '../errors';
import type {
  Bitmap,
  DiscreteProfile,
  MeasuredLine,
  Plate,
  PlateFrame,
  Point,
  ProfileFunction,
  RowRange,
} from '../types';
import { loadBitmap } from './bitmap';
import { LineCatalog } from './catalog';
import { dotsPerInchToPerMillimetre, toPhysical } from './coordinates';
import { buildProfileFunction, intensityAtPixel, sampleTrace } from './interpolator';
import { fullRows, sampleColumns } from './sampler';
import { type PixelRange, formatPosition, magnifierWindow, mirrorTrace, scanPixel, visibleRange } from './viewport';

interface OpenPlate extends Plate {
  rows: RowRange;
  profile: DiscreteProfile;
  fn: ProfileFunction;
}

interface ViewState {
  scroll: [number, number];
  pointer: number;
  nudge: number;
  zoom: number;
}

export interface ViewSnapshot {
  range: PixelRange;
  scan: number;
  label: string;
  trace: Point[];
  lines: MeasuredLine[];
  magnifier: {
    range: PixelRange;
    trace: Point[];
    mirrored: Point[];
    lines: MeasuredLine[];
  };
}

const INITIAL_VIEW = (zoom: number): ViewState => ({ scroll: [0, 1], pointer: 0.5, nudge: 0, zoom });

function requireFinite(value: number, name: string): void {
  if (!Number.isFinite(value)) {
    throw new PlateError('OutOfRange', `${name} must be a finite number, got ${value}`);
  }
}

export function defaultLinesPath(platePath: string): string {
  const dot = platePath.lastIndexOf('.');
  const slash = Math.max(platePath.lastIndexOf('/'), platePath.lastIndexOf('\\'));
  const stem = dot > slash ? platePath.slice(0, dot) : platePath;
  return `${stem}_lines.dat`;
}

export class PlateSession {
  readonly config: ComparatorConfig;
  private frame: PlateFrame;
  private plate: OpenPlate | null = null;
  private viewState: ViewState;
  private cursorPixel: number | null = null;
  private catalog = new LineCatalog();

  constructor(config: ComparatorConfig = resolveConfig()) {
    this.config = config;
    this.frame = { dpi: dotsPerInchToPerMillimetre(config.dpi), offset: config.offset };
    this.viewState = INITIAL_VIEW(config.defaultZoom);
  }

  // --- Plate ---

  async openPlate(path: string): Promise<void> {
    const bitmap = await loadBitmap(path);
    this.usePlate(bitmap, path);
  }

  usePlate(bitmap: Bitmap, path: string): void {
    const next = this.buildPlate(bitmap, path, fullRows(bitmap));
    this.plate = next;
    this.viewState = INITIAL_VIEW(this.config.defaultZoom);
    this.cursorPixel = null;
    this.updateCursor();
    console.log(`[PLATE] Opened ${path} (${bitmap.width}x${bitmap.height}, ${next.fn.order} profile)`);
  }

  setRowRange(rows: RowRange): void {
    const plate = this.requirePlate();
    this.plate = this.buildPlate(plate.bitmap, plate.path, rows);
    console.log(`[PROFILE] Rows ${rows.start}-${rows.end} of ${plate.bitmap.height}`);
  }

  private buildPlate(bitmap: Bitmap, path: string, rows: RowRange): OpenPlate {
    const profile = sampleColumns(bitmap, { rows, polarity: this.config.polarity });
    return { path, bitmap, rows: { ...rows }, profile, fn: buildProfileFunction(profile) };
  }

  private requirePlate(): OpenPlate {
    if (this.plate === null) {
      throw new PlateError('OutOfRange', 'No photoplate is open');
    }
    return this.plate;
  }

  get profile(): DiscreteProfile {
    return this.requirePlate().profile;
  }

  get profileFunction(): ProfileFunction {
    return this.requirePlate().fn;
  }

  // --- Frame ---

  get plateFrame(): PlateFrame {
    return { ...this.frame };
  }

  setDpi(dotsPerInch: number): void {
    this.frame = { ...this.frame, dpi: dotsPerInchToPerMillimetre(dotsPerInch) };
    console.log(`[LINES] Resolution set to ${this.frame.dpi.toFixed(3)} px/mm`);
  }

  setOffset(offset: number): void {
    if (!Number.isFinite(offset)) {
      throw new PlateError('OutOfRange', `Offset must be a finite number, got ${offset}`);
    }
    this.frame = { ...this.frame, offset };
    console.log(`[LINES] Offset set to ${offset} mm`);
  }

  // --- Cursor ---

  scrollTo(start: number, end: number): void {
    requireFinite(start, 'Scroll start');
    requireFinite(end, 'Scroll end');
    this.viewState = { ...this.viewState, scroll: [start, end] };
    this.updateCursor();
  }

  /** Pointer click at a fraction across the view; clears any nudge. */
  pointAt(fraction: number): void {
    requireFinite(fraction, 'Pointer');
    this.viewState = { ...this.viewState, pointer: fraction, nudge: 0 };
    this.updateCursor();
  }

  nudge(delta: number): void {
    requireFinite(delta, 'Nudge');
    const range = this.config.nudgeRange;
    this.viewState = { ...this.viewState, nudge: Math.min(Math.max(delta, -range), range) };
    this.updateCursor();
  }

  setZoom(level: number): void {
    if (!this.config.zoomLevels.includes(level)) {
      throw new PlateError('OutOfRange', `Zoom ${level} is not one of ${this.config.zoomLevels.join(', ')}`);
    }
    this.viewState = { ...this.viewState, zoom: level };
  }

  moveCursor(pixel: number): void {
    if (!Number.isFinite(pixel)) {
      throw new PlateError('OutOfRange', `Cursor must be a finite pixel, got ${pixel}`);
    }
    this.requirePlate();
    this.cursorPixel = pixel;
  }

  private updateCursor(): void {
    if (this.plate === null) return;
    const range = visibleRange(this.viewState.scroll, this.plate.bitmap.width);
    this.cursorPixel = scanPixel(range, this.viewState.pointer, this.viewState.nudge);
  }

  get cursor(): number {
    this.requirePlate();
    if (this.cursorPixel === null) {
      throw new PlateError('OutOfRange', 'Cursor is not placed');
    }
    return this.cursorPixel;
  }

  get cursorPosition(): number {
    return toPhysical(this.cursor, this.frame);
  }

  get cursorIntensity(): number {
    return intensityAtPixel(this.profileFunction, this.cursor);
  }

  // --- Lines ---

  get lines(): MeasuredLine[] {
    return this.catalog.lines(this.frame);
  }

  private get tolerance(): number {
    return this.config.tolerancePx / this.frame.dpi;
  }

  addLine(): MeasuredLine {
    const cursor = this.cursor;
    const duplicate = this.catalog.findNearest(cursor, this.frame, this.tolerance);
    const line = this.catalog.addLine(cursor, this.profileFunction, this.frame);
    if (duplicate !== undefined) {
      console.warn(`[LINES] Line at ${formatPosition(line.position)} duplicates one at ${formatPosition(duplicate.line.position)}`);
    }
    console.log(`[LINES] Line added at ${formatPosition(line.position)} (intensity ${line.intensity.toFixed(3)})`);
    return line;
  }

  deleteLine(): MeasuredLine {
    const line = this.catalog.deleteNearest(this.cursor, this.frame, this.tolerance);
    console.log(`[LINES] Line deleted at ${formatPosition(line.position)}`);
    return line;
  }

  commentLine(text: string): MeasuredLine {
    const line = this.catalog.commentNearest(this.cursor, this.frame, this.tolerance, text);
    console.log(`[LINES] Comment set on ${formatPosition(line.position)}: "${text}"`);
    return line;
  }

  async saveLines(path?: string): Promise<string> {
    const target = path ?? defaultLinesPath(this.requirePlate().path);
    await writeFile(target, this.catalog.serialize(this.frame), 'utf-8');
    console.log(`[LINES] Saved ${this.catalog.size} lines to ${target}`);
    return target;
  }

  /** Replaces the catalog and frame with a file's contents; on failure neither changes. */
  async loadLines(path: string): Promise<void> {
    const text = await readFile(path, 'utf-8');
    const { catalog, frame } = LineCatalog.deserialize(text);
    this.catalog = catalog;
    this.frame = frame;
    console.log(`[LINES] Loaded ${catalog.size} lines from ${path}`);
  }

  // --- Rendering ---

  view(): ViewSnapshot {
    const plate = this.requirePlate();
    const range = visibleRange(this.viewState.scroll, plate.bitmap.width);
    const scan = this.cursor;
    const step = this.config.traceStep;
    const zoomRange = magnifierWindow(range, scan, this.viewState.zoom);
    const zoomed = sampleTrace(plate.fn, zoomRange[0], zoomRange[1], step);

    return {
      range,
      scan,
      label: formatPosition(toPhysical(scan, this.frame)),
      trace: sampleTrace(plate.fn, range[0], range[1], step),
      lines: this.catalog.linesBetween(range[0], range[1], this.frame),
      magnifier: {
        range: zoomRange,
        trace: zoomed,
        mirrored: mirrorTrace(zoomed, scan),
        lines: this.catalog.linesBetween(zoomRange[0], zoomRange[1], this.frame),
      },
    };
  }
}
