/**
 * Error kinds raised by alignment parsing, validation and queries.
 *
 * Not-found results (`wordAtTime`, `phonemeAtTime`, `find`) are not errors:
 * those return `null` or `-1`.
 */

export type AlignmentErrorCode =
  | 'FORMAT_ERROR'
  | 'UNSUPPORTED_FORMAT'
  | 'VALIDATION_ERROR'
  | 'RANGE_ERROR'
  | 'LOOKUP_ERROR'
  | 'EMPTY_ALIGNMENT';

export class AlignmentError extends Error {
  constructor(message: string, public readonly code: AlignmentErrorCode) {
    super(message);
    this.name = 'AlignmentError';
  }
}

/** Malformed file content. `source` and `line` locate the problem when known. */
export class FormatError extends AlignmentError {
  constructor(
    public readonly detail: string,
    public readonly source?: string,
    public readonly line?: number,
    code: AlignmentErrorCode = 'FORMAT_ERROR'
  ) {
    super(`${formatLocation(source, line)}${detail}`, code);
    this.name = 'FormatError';
  }
}

export class UnsupportedFormatError extends FormatError {
  constructor(public readonly extension: string, available: string[]) {
    super(
      `No alignment codec for extension "${extension || '(none)'}". Available: ${available.join(', ')}`,
      undefined,
      undefined,
      'UNSUPPORTED_FORMAT'
    );
    this.name = 'UnsupportedFormatError';
  }
}

/** Content that parsed but breaks contiguity, ordering or non-empty rules. */
export class ValidationError extends AlignmentError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class IndexRangeError extends AlignmentError {
  constructor(message: string) {
    super(message, 'RANGE_ERROR');
    this.name = 'IndexRangeError';
  }
}

export class LookupError extends AlignmentError {
  constructor(public readonly key: string) {
    super(`Phoneme "${key}" is not in the phoneme map`, 'LOOKUP_ERROR');
    this.name = 'LookupError';
  }
}

export class EmptyAlignmentError extends AlignmentError {
  constructor(operation: string) {
    super(`Cannot compute ${operation} of an empty alignment`, 'EMPTY_ALIGNMENT');
    this.name = 'EmptyAlignmentError';
  }
}

function formatLocation(source?: string, line?: number): string {
  if (source && line !== undefined) return `${source}:${line}: `;
  if (source) return `${source}: `;
  if (line !== undefined) return `line ${line}: `;
  return '';
}
