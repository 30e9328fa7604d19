/**
 * Line File Format (photoplate-lines v1)
 *
 *   #photoplate-lines v1
 *   resolution<TAB>94.48818897637796
 *   offset<TAB>0
 *   position<TAB>intensity<TAB>comment
 *   12.345600<TAB>187.250<TAB>Fe I
 *
 * Header numbers are written in shortest round-trip form so the frame comes
 * back exactly. Positions carry 6 decimals, intensities 3. Every row has
 * exactly three fields; the comment may be empty and escapes \ TAB LF CR.
 * A row is rejected unless its position maps back to a finite plate pixel.
 */

import { ParseError } from '../errors';
import type { PlateFrame } from '../types';

export const FORMAT_TAG = '#photoplate-lines v1';
export const COLUMN_HEADER = 'position\tintensity\tcomment';
export const POSITION_DECIMALS = 6;
export const INTENSITY_DECIMALS = 3;

export interface LineFileRow {
  position: number;
  intensity: number;
  comment: string;
}

export interface LineFile {
  frame: PlateFrame;
  rows: LineFileRow[];
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const ESCAPES: Record<string, string> = { '\\': '\\', t: '\t', n: '\n', r: '\r' };

export function escapeComment(comment: string): string {
  return comment
    .replace(/\\/g, '\\\\')
    .replace(/\t/g, '\\t')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
}

function unescapeComment(field: string, lineNumber: number): string {
  let out = '';
  for (let i = 0; i < field.length; i++) {
    const ch = field[i];
    if (ch !== '\\') {
      out += ch;
      continue;
    }
    const next = field[i + 1];
    const replacement = next === undefined ? undefined : ESCAPES[next];
    if (replacement === undefined) {
      throw new ParseError(lineNumber, `Invalid escape sequence in comment: "\\${next ?? ''}"`);
    }
    out += replacement;
    i++;
  }
  return out;
}

function parseNumber(field: string, name: string, lineNumber: number): number {
  const value = NUMBER_PATTERN.test(field) ? Number(field) : NaN;
  if (!Number.isFinite(value)) {
    throw new ParseError(lineNumber, `${name} is not a number: "${field}"`);
  }
  return value;
}

function parseHeaderValue(line: string, key: string, lineNumber: number): number {
  const fields = line.split('\t');
  if (fields.length !== 2 || fields[0] !== key) {
    throw new ParseError(lineNumber, `Expected "${key}<TAB>value", got "${line}"`);
  }
  return parseNumber(fields[1], key, lineNumber);
}

export function formatLineFile(file: LineFile): string {
  const out = [
    FORMAT_TAG,
    `resolution\t${String(file.frame.dpi)}`,
    `offset\t${String(file.frame.offset)}`,
    COLUMN_HEADER,
  ];
  for (const row of file.rows) {
    out.push(
      `${row.position.toFixed(POSITION_DECIMALS)}\t${row.intensity.toFixed(INTENSITY_DECIMALS)}\t${escapeComment(row.comment)}`
    );
  }
  return out.join('\n') + '\n';
}

export function parseLineFile(text: string): LineFile {
  const lines = text.split('\n').map(l => (l.endsWith('\r') ? l.slice(0, -1) : l));
  // A single trailing newline leaves one empty element behind.
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();

  if (lines[0] !== FORMAT_TAG) {
    throw new ParseError(1, `Not a line file: expected "${FORMAT_TAG}"`);
  }
  if (lines.length < 4) {
    throw new ParseError(lines.length + 1, 'Truncated header');
  }

  const dpi = parseHeaderValue(lines[1], 'resolution', 2);
  if (dpi <= 0) {
    throw new ParseError(2, `Resolution must be positive, got ${dpi}`);
  }
  const offset = parseHeaderValue(lines[2], 'offset', 3);
  if (lines[3] !== COLUMN_HEADER) {
    throw new ParseError(4, `Expected column header "${COLUMN_HEADER.replace(/\t/g, '<TAB>')}"`);
  }

  const rows: LineFileRow[] = [];
  for (let i = 4; i < lines.length; i++) {
    const lineNumber = i + 1;
    const fields = lines[i].split('\t');
    if (fields.length !== 3) {
      throw new ParseError(lineNumber, `Expected 3 tab-separated fields, got ${fields.length}`);
    }
    const position = parseNumber(fields[0], 'position', lineNumber);
    if (!Number.isFinite((position - offset) * dpi)) {
      throw new ParseError(lineNumber, `Position ${position} has no plate pixel at resolution ${dpi}`);
    }
    rows.push({
      position,
      intensity: parseNumber(fields[1], 'intensity', lineNumber),
      comment: unescapeComment(fields[2], lineNumber),
    });
  }

  return { frame: { dpi, offset }, rows };
}
