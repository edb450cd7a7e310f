import { cleanZero, fmt, isOne } from './numeric';
import type { CellHighlight, PivotCursor } from '../types';

export interface HighlightContext {
  active: boolean;
  cursor: PivotCursor | null;
  cols: number;
}

export const formatCell = (v: number, decimals = 2): string => fmt(v, decimals);

/**
 * While a run is active the cursor's row and column are marked; once it has
 * finished, the constants column and the leading ones are marked instead.
 */
export const cellHighlight = (ctx: HighlightContext, r: number, c: number, value: number): CellHighlight => {
  const { active, cursor, cols } = ctx;
  if (active) {
    if (!cursor) return 'none';
    if (r === cursor.row && c === cursor.col) return 'pivot';
    if (r === cursor.row) return 'pivot-row';
    if (c === cursor.col) return 'pivot-col';
    return 'none';
  }
  if (cols > 1 && c < cols - 1 && isOne(cleanZero(value))) return 'leading-one';
  if (cols > 1 && c === cols - 1) return 'constant';
  return 'none';
};

export const formatGrid = (grid: number[][], decimals = 2): string[][] =>
  grid.map((row) => row.map((v) => formatCell(v, decimals)));
