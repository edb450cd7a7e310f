import { MatrixValidationError } from './errors';
import { Matrix } from './matrix';
import { parseMatrix } from './parse';
import { StepEngine } from './rref';
import type { ParseOptions, SessionStatus, SessionView, Step } from '../types';

export const IDLE_DESCRIPTION = "Enter an augmented matrix and press 'Start'.";
export const LOADED_DESCRIPTION = "Matrix loaded. Click 'Next Step' to find the first pivot.";

export const DEFAULT_INPUT = '1 1 2 9\n2 4 -3 1\n3 6 -5 0';

export interface SessionOptions {
  decimals: number;
  parse: Partial<ParseOptions>;
}

export const defaultSessionOptions: SessionOptions = {
  decimals: 2,
  parse: {},
};

export type StartResult = { ok: true } | { ok: false; error: MatrixValidationError };

/**
 * Start / next step / reset controller around one StepEngine. Keeps the
 * description history the engine itself does not retain.
 */
export class StepSession {
  readonly options: SessionOptions;
  logs: string[] = [];
  description = IDLE_DESCRIPTION;
  private engine: StepEngine | null = null;

  constructor(opts: Partial<SessionOptions> = {}) {
    this.options = { ...defaultSessionOptions, ...opts };
  }

  private log(msg: string) {
    this.logs.push(msg);
  }

  get status(): SessionStatus {
    if (!this.engine) return 'idle';
    return this.engine.isActive ? 'running' : 'finished';
  }

  start(input: string): StartResult {
    let matrix: Matrix;
    let parseLogs: string[];
    try {
      const parsed = parseMatrix(input, this.options.parse);
      matrix = Matrix.fromRows(parsed.values);
      parseLogs = parsed.logs;
    } catch (e) {
      if (!(e instanceof MatrixValidationError)) throw e;
      this.engine = null;
      this.description = `Error parsing matrix: ${e.message}`;
      this.logs = [this.description];
      return { ok: false, error: e };
    }

    this.engine = new StepEngine(matrix);
    this.logs = [...parseLogs];
    this.description = LOADED_DESCRIPTION;
    return { ok: true };
  }

  advance(): Step | null {
    if (!this.engine) return null;
    const step = this.engine.advance();
    if (step) {
      this.description = step.description;
      this.log(step.description);
    }
    return step;
  }

  /** Advances until the engine reports nothing more; returns the steps taken. */
  runAll(): Step[] {
    const steps: Step[] = [];
    for (let step = this.advance(); step; step = this.advance()) {
      steps.push(step);
    }
    return steps;
  }

  reset(): void {
    this.engine = null;
    this.logs = [];
    this.description = IDLE_DESCRIPTION;
  }

  view(): SessionView {
    const engine = this.engine;
    return {
      status: this.status,
      matrix: engine ? engine.matrix : null,
      cursor: engine ? engine.cursor : null,
      description: this.description,
      logs: [...this.logs],
      active: engine ? engine.isActive : false,
      solution: engine ? engine.solution : null,
    };
  }
}
