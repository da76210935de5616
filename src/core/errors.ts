/**
 * Error taxonomy for sector processing.
 *
 * Decode and encode errors are per-sector soft failures that batch code
 * records and moves past. Directory errors abort an import.
 */

export type DecodeErrorKind = 'truncated';
export type EncodeErrorKind = 'too-small' | 'grid-mismatch';
export type DirectoryErrorKind = 'no-matches' | 'unreadable' | 'no-valid-sectors';
export type SessionErrorKind = 'image-mismatch';

export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;
  /** Row being decoded when the data ran out */
  readonly row: number;
  readonly col: number;

  constructor(kind: DecodeErrorKind, message: string, row: number, col: number) {
    super(message);
    this.name = 'DecodeError';
    this.kind = kind;
    this.row = row;
    this.col = col;
  }
}

export class EncodeError extends Error {
  readonly kind: EncodeErrorKind;

  constructor(kind: EncodeErrorKind, message: string) {
    super(message);
    this.name = 'EncodeError';
    this.kind = kind;
  }
}

export class DirectoryError extends Error {
  readonly kind: DirectoryErrorKind;
  readonly directory: string;

  constructor(kind: DirectoryErrorKind, directory: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DirectoryError';
    this.kind = kind;
    this.directory = directory;
  }
}

export class SessionError extends Error {
  readonly kind: SessionErrorKind;

  constructor(kind: SessionErrorKind, message: string) {
    super(message);
    this.name = 'SessionError';
    this.kind = kind;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
