export type PlateErrorKind =
  | 'OutOfRange'
  | 'OutOfDomain'
  | 'InvalidDPI'
  | 'NotFound'
  | 'UnreadableImage'
  | 'ParseError'
  | 'EmptyProfile'
  | 'InvalidConfig';

export class PlateError extends Error {
  readonly kind: PlateErrorKind;

  constructor(kind: PlateErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlateError';
    this.kind = kind;
  }
}

/** Malformed line file. `lineNumber` is 1-based. */
export class ParseError extends PlateError {
  readonly lineNumber: number;

  constructor(lineNumber: number, message: string) {
    super('ParseError', `Line ${lineNumber}: ${message}`);
    this.name = 'ParseError';
    this.lineNumber = lineNumber;
  }
}

export function isPlateError(e: unknown, kind?: PlateErrorKind): e is PlateError {
  return e instanceof PlateError && (kind === undefined || e.kind === kind);
}
