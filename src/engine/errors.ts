export class MatrixError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class IndexOutOfRangeError extends MatrixError {
  constructor(
    public readonly axis: 'row' | 'column',
    public readonly index: number,
    public readonly size: number,
  ) {
    super(`${axis === 'row' ? 'Row' : 'Column'} index ${index} is out of range [0, ${size})`);
  }
}

export class DimensionMismatchError extends MatrixError {}

export type ValidationReason = 'empty' | 'column-count' | 'invalid-token';

export interface ValidationDetails {
  row?: number;
  column?: number;
  token?: string;
  expected?: number;
  actual?: number;
}

/** Malformed input text. Row and column numbers are 1-based. */
export class MatrixValidationError extends MatrixError {
  readonly row?: number;
  readonly column?: number;
  readonly token?: string;
  readonly expected?: number;
  readonly actual?: number;

  constructor(
    public readonly reason: ValidationReason,
    message: string,
    details: ValidationDetails = {},
  ) {
    super(message);
    this.row = details.row;
    this.column = details.column;
    this.token = details.token;
    this.expected = details.expected;
    this.actual = details.actual;
  }
}
