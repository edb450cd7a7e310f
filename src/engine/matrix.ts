import { DimensionMismatchError, IndexOutOfRangeError } from './errors';

export type Grid = number[][];

export const zeros = (rows: number, cols: number): Grid =>
  Array.from({ length: rows }, () => Array.from({ length: cols }, () => 0));

/**
 * Dense row-major matrix with the three elementary row operations.
 * Knows nothing about elimination order; callers own the strategy.
 */
export class Matrix {
  readonly rows: number;
  readonly cols: number;
  private data: Grid;

  private constructor(rows: number, cols: number, data: Grid) {
    this.rows = rows;
    this.cols = cols;
    this.data = data;
  }

  /** Builds a matrix from `rows * cols` values in row-major order. */
  static create(rows: number, cols: number, values: readonly number[]): Matrix {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
      throw new DimensionMismatchError(`Matrix must be at least 1 x 1, got ${rows} x ${cols}`);
    }
    if (values.length !== rows * cols) {
      throw new DimensionMismatchError(
        `Expected ${rows * cols} values for a ${rows} x ${cols} matrix, got ${values.length}`,
      );
    }
    const data = zeros(rows, cols);
    for (let r = 0; r < rows; r++) {
      for (let c = 0; c < cols; c++) {
        data[r][c] = values[r * cols + c];
      }
    }
    return new Matrix(rows, cols, data);
  }

  static fromRows(grid: readonly (readonly number[])[]): Matrix {
    const rows = grid.length;
    const cols = grid[0]?.length ?? 0;
    grid.forEach((row, r) => {
      if (row.length !== cols) {
        throw new DimensionMismatchError(`Row ${r} has ${row.length} entries, expected ${cols}`);
      }
    });
    return Matrix.create(rows, cols, grid.flat());
  }

  get(r: number, c: number): number {
    this.checkRow(r);
    this.checkCol(c);
    return this.data[r][c];
  }

  set(r: number, c: number, v: number): void {
    this.checkRow(r);
    this.checkCol(c);
    this.data[r][c] = v;
  }

  swapRows(r1: number, r2: number): void {
    this.checkRow(r1);
    this.checkRow(r2);
    if (r1 === r2) return;
    [this.data[r1], this.data[r2]] = [this.data[r2], this.data[r1]];
  }

  /** Zero is accepted; rejecting it is the caller's job. */
  scaleRow(r: number, factor: number): void {
    this.checkRow(r);
    const row = this.data[r];
    for (let c = 0; c < this.cols; c++) row[c] *= factor;
  }

  /** target += factor * source */
  addScaledRow(target: number, source: number, factor: number): void {
    this.checkRow(target);
    this.checkRow(source);
    const t = this.data[target];
    const s = this.data[source];
    for (let c = 0; c < this.cols; c++) t[c] += factor * s[c];
  }

  toArray(): Grid {
    return this.data.map((row) => [...row]);
  }

  clone(): Matrix {
    return new Matrix(this.rows, this.cols, this.toArray());
  }

  private checkRow(r: number) {
    if (!Number.isInteger(r) || r < 0 || r >= this.rows) throw new IndexOutOfRangeError('row', r, this.rows);
  }

  private checkCol(c: number) {
    if (!Number.isInteger(c) || c < 0 || c >= this.cols) throw new IndexOutOfRangeError('column', c, this.cols);
  }
}
