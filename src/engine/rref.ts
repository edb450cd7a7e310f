import { Matrix, type Grid } from './matrix';
import { fmt, isOne, isZero } from './numeric';
import type { PivotCursor, RunState, SolutionSummary, Step } from '../types';

/**
 * Where the next advance() picks up. Each tag is the code that runs right
 * after the previous emission, so a mutation always lands in the same call
 * that reports it.
 */
type Resume =
  | 'loop'
  | 'scan'
  | 'next-column'
  | 'swap'
  | 'normalize'
  | 'scale'
  | 'eliminate-start'
  | 'eliminate-scan'
  | 'eliminate-apply'
  | 'advance-pivot'
  | 'analyze'
  | 'no-solution'
  | 'verdict'
  | 'analysis-complete'
  | 'done';

export interface RunResult {
  steps: Step[];
  matrix: Grid;
  solution: SolutionSummary | null;
}

const rowLabel = (r: number) => `R${r + 1}`;

/**
 * Gauss-Jordan elimination to RREF, one emission per advance() call,
 * followed by classification of the augmented system.
 */
export class StepEngine {
  private m: Matrix;
  private resume: Resume = 'loop';
  private runState: RunState = 'NotStarted';
  private pivotRow = 0;
  private pivotCol = 0;
  private foundRow = -1;
  private elimRow = 0;
  private elimFactor = 0;
  private scaleFactor = 1;
  private pending: SolutionSummary | null = null; // decided in analyze(), published with its verdict step
  private result: SolutionSummary | null = null;

  constructor(matrix: Matrix) {
    this.m = matrix.clone();
  }

  get state(): RunState {
    return this.runState;
  }

  get isActive(): boolean {
    return this.runState !== 'Finished';
  }

  /** Next unprocessed pivot position; null once the run has finished. */
  get cursor(): PivotCursor | null {
    if (this.runState === 'Finished') return null;
    return { row: this.pivotRow, col: this.pivotCol };
  }

  get rows(): number {
    return this.m.rows;
  }

  get cols(): number {
    return this.m.cols;
  }

  get matrix(): Grid {
    return this.m.toArray();
  }

  /** Verdict of the finished analysis; a copy, set once the verdict step is emitted. */
  get solution(): SolutionSummary | null {
    return this.result ? { ...this.result } : null;
  }

  /** Drops the current run and starts over on a new matrix. */
  reset(matrix: Matrix): void {
    this.m = matrix.clone();
    this.resume = 'loop';
    this.runState = 'NotStarted';
    this.pivotRow = 0;
    this.pivotCol = 0;
    this.foundRow = -1;
    this.elimRow = 0;
    this.elimFactor = 0;
    this.scaleFactor = 1;
    this.pending = null;
    this.result = null;
  }

  /** Performs the next micro-step; returns null when nothing is left. */
  advance(): Step | null {
    if (this.runState === 'Finished') return null;
    this.runState = 'InProgress';
    const step = this.dispatch();
    if (this.resume === 'done') this.runState = 'Finished';
    return step;
  }

  private dispatch(): Step {
    const m = this.m;
    const row = this.pivotRow;
    const col = this.pivotCol;

    switch (this.resume) {
      case 'next-column':
        this.pivotCol += 1;
        return this.loopHead();

      case 'advance-pivot':
        this.pivotRow += 1;
        this.pivotCol += 1;
        return this.loopHead();

      case 'loop':
        return this.loopHead();

      case 'scan': {
        this.foundRow = -1;
        for (let r = row; r < m.rows; r++) {
          if (!isZero(m.get(r, col))) {
            this.foundRow = r;
            break;
          }
        }
        if (this.foundRow === -1) {
          this.resume = 'next-column';
          return {
            kind: 'NoPivotInColumn',
            col,
            description: `Column ${col + 1} has no pivot. Moving to next column.`,
          };
        }
        if (this.foundRow !== row) {
          this.resume = 'swap';
          return {
            kind: 'PivotFound',
            row,
            col,
            swapWith: this.foundRow,
            description: `Pivot found at (${this.foundRow + 1}, ${col + 1}). Swapping ${rowLabel(row)} and ${rowLabel(this.foundRow)}.`,
          };
        }
        this.resume = 'normalize';
        return {
          kind: 'PivotFound',
          row,
          col,
          swapWith: null,
          description: `Pivot found at (${row + 1}, ${col + 1}). No swap needed.`,
        };
      }

      case 'swap':
        m.swapRows(row, this.foundRow);
        this.resume = 'normalize';
        return {
          kind: 'SwapPerformed',
          rowA: row,
          rowB: this.foundRow,
          description: `${rowLabel(row)} and ${rowLabel(this.foundRow)} swapped.`,
        };

      case 'normalize': {
        const pivot = m.get(row, col);
        if (isOne(pivot)) {
          this.resume = 'eliminate-start';
          return { kind: 'PivotAlreadyOne', row, description: 'Pivot is already 1. No scaling needed.' };
        }
        this.scaleFactor = 1 / pivot;
        this.resume = 'scale';
        return {
          kind: 'ScaleNeeded',
          row,
          pivot,
          factor: this.scaleFactor,
          description: `Scaling ${rowLabel(row)} by 1 / ${fmt(pivot)} to make pivot = 1.`,
        };
      }

      case 'scale':
        m.scaleRow(row, this.scaleFactor);
        this.resume = 'eliminate-start';
        return { kind: 'ScalePerformed', row, factor: this.scaleFactor, description: `${rowLabel(row)} scaled.` };

      case 'eliminate-start':
        this.elimRow = 0;
        this.resume = 'eliminate-scan';
        return { kind: 'EliminationStart', col, description: `Eliminating other entries in Column ${col + 1}.` };

      case 'eliminate-scan':
        for (let r = this.elimRow; r < m.rows; r++) {
          if (r === row) continue;
          const factor = m.get(r, col);
          if (isZero(factor)) continue;
          this.elimRow = r;
          this.elimFactor = factor;
          this.resume = 'eliminate-apply';
          return {
            kind: 'EliminationRow',
            row: r,
            pivotRow: row,
            factor,
            description: `Eliminating in ${rowLabel(r)}: ${rowLabel(r)} = ${rowLabel(r)} - (${fmt(factor)}) * ${rowLabel(row)}.`,
          };
        }
        this.resume = 'advance-pivot';
        return { kind: 'ColumnComplete', col, description: `Column ${col + 1} is complete.` };

      case 'eliminate-apply': {
        const target = this.elimRow;
        m.addScaledRow(target, row, -this.elimFactor);
        this.elimRow = target + 1;
        this.resume = 'eliminate-scan';
        return { kind: 'EliminationRowDone', row: target, description: `${rowLabel(target)} updated.` };
      }

      case 'analyze':
        return this.analyze();

      case 'no-solution':
        this.resume = 'done';
        this.result = this.pending;
        return {
          kind: 'NoSolution',
          description: 'This means 0 equals a non-zero number. The system has NO SOLUTION.',
        };

      case 'verdict': {
        this.resume = 'analysis-complete';
        const summary = this.pending;
        this.result = summary;
        if (summary?.kind === 'infinite') {
          return {
            kind: 'InfiniteSolutions',
            freeVariables: summary.freeVariables,
            description: `There are ${summary.freeVariables} free variable(s). The system has an INFINITE number of solutions.`,
          };
        }
        return {
          kind: 'UniqueSolution',
          variables: m.cols - 1,
          description: 'There are no free variables. The system has a UNIQUE SOLUTION.',
        };
      }

      case 'analysis-complete':
        this.resume = 'done';
        return { kind: 'AnalysisComplete', description: 'Analysis complete.' };

      case 'done':
        throw new Error('advance() called on a finished run');
    }
  }

  private loopHead(): Step {
    if (this.pivotRow < this.m.rows && this.pivotCol < this.m.cols) {
      this.resume = 'scan';
      return {
        kind: 'PivotSearch',
        row: this.pivotRow,
        col: this.pivotCol,
        description: `Finding pivot in Column ${this.pivotCol + 1}, at or below Row ${this.pivotRow + 1}.`,
      };
    }
    this.resume = 'analyze';
    return { kind: 'Complete', description: 'RREF calculation complete. Analyzing system solution...' };
  }

  // Treats the last column as the constants of an augmented system.
  private analyze(): Step {
    const m = this.m;
    const variables = m.cols - 1;
    const pivots = this.pivotRow;

    if (m.cols <= 1) {
      this.result = { kind: 'not-applicable', pivots, variables: 0, freeVariables: 0 };
      this.resume = 'done';
      return {
        kind: 'NotApplicable',
        description: 'Matrix has only one column. Solution analysis is not applicable.',
      };
    }

    for (let r = 0; r < m.rows; r++) {
      let coefficientsZero = true;
      for (let c = 0; c < variables; c++) {
        if (!isZero(m.get(r, c))) {
          coefficientsZero = false;
          break;
        }
      }
      const constant = m.get(r, variables);
      if (coefficientsZero && !isZero(constant)) {
        this.pending = { kind: 'none', pivots, variables, freeVariables: 0, contradictionRow: r };
        this.resume = 'no-solution';
        return {
          kind: 'ContradictionFound',
          row: r,
          constant,
          description: `Inconsistency found in ${rowLabel(r)}: [ 0 ... 0 | ${fmt(constant)} ].`,
        };
      }
    }

    const freeVariables = Math.max(0, variables - pivots);
    this.pending = { kind: freeVariables > 0 ? 'infinite' : 'unique', pivots, variables, freeVariables };
    this.resume = 'verdict';
    return {
      kind: 'PivotSummary',
      pivots,
      variables,
      description: `Analysis found ${pivots} pivot(s) for ${variables} variable(s).`,
    };
  }
}

/** Drives a fresh engine over `matrix` until it reports nothing more. */
export const runToCompletion = (matrix: Matrix): RunResult => {
  const engine = new StepEngine(matrix);
  const steps: Step[] = [];
  for (let step = engine.advance(); step; step = engine.advance()) {
    steps.push(step);
  }
  return { steps, matrix: engine.matrix, solution: engine.solution };
};
