export interface PivotCursor {
  row: number;
  col: number;
}

export type RunState = 'NotStarted' | 'InProgress' | 'Finished';

interface StepBase {
  kind: StepKind;
  description: string;
}

export interface PivotSearchStep extends StepBase {
  kind: 'PivotSearch';
  row: number;
  col: number;
}

export interface NoPivotInColumnStep extends StepBase {
  kind: 'NoPivotInColumn';
  col: number;
}

export interface PivotFoundStep extends StepBase {
  kind: 'PivotFound';
  row: number;
  col: number;
  swapWith: number | null; // row the pivot currently sits in, when a swap follows
}

export interface SwapPerformedStep extends StepBase {
  kind: 'SwapPerformed';
  rowA: number;
  rowB: number;
}

export interface ScaleNeededStep extends StepBase {
  kind: 'ScaleNeeded';
  row: number;
  pivot: number;
  factor: number;
}

export interface ScalePerformedStep extends StepBase {
  kind: 'ScalePerformed';
  row: number;
  factor: number;
}

export interface PivotAlreadyOneStep extends StepBase {
  kind: 'PivotAlreadyOne';
  row: number;
}

export interface EliminationStartStep extends StepBase {
  kind: 'EliminationStart';
  col: number;
}

export interface EliminationRowStep extends StepBase {
  kind: 'EliminationRow';
  row: number;
  pivotRow: number;
  factor: number;
}

export interface EliminationRowDoneStep extends StepBase {
  kind: 'EliminationRowDone';
  row: number;
}

export interface ColumnCompleteStep extends StepBase {
  kind: 'ColumnComplete';
  col: number;
}

export interface CompleteStep extends StepBase {
  kind: 'Complete';
}

export interface NotApplicableStep extends StepBase {
  kind: 'NotApplicable';
}

export interface ContradictionFoundStep extends StepBase {
  kind: 'ContradictionFound';
  row: number;
  constant: number;
}

export interface NoSolutionStep extends StepBase {
  kind: 'NoSolution';
}

export interface PivotSummaryStep extends StepBase {
  kind: 'PivotSummary';
  pivots: number;
  variables: number;
}

export interface UniqueSolutionStep extends StepBase {
  kind: 'UniqueSolution';
  variables: number;
}

export interface InfiniteSolutionsStep extends StepBase {
  kind: 'InfiniteSolutions';
  freeVariables: number;
}

export interface AnalysisCompleteStep extends StepBase {
  kind: 'AnalysisComplete';
}

export type Step =
  | PivotSearchStep
  | NoPivotInColumnStep
  | PivotFoundStep
  | SwapPerformedStep
  | ScaleNeededStep
  | ScalePerformedStep
  | PivotAlreadyOneStep
  | EliminationStartStep
  | EliminationRowStep
  | EliminationRowDoneStep
  | ColumnCompleteStep
  | CompleteStep
  | NotApplicableStep
  | ContradictionFoundStep
  | NoSolutionStep
  | PivotSummaryStep
  | UniqueSolutionStep
  | InfiniteSolutionsStep
  | AnalysisCompleteStep;

export type StepKind =
  | 'PivotSearch'
  | 'NoPivotInColumn'
  | 'PivotFound'
  | 'SwapPerformed'
  | 'ScaleNeeded'
  | 'ScalePerformed'
  | 'PivotAlreadyOne'
  | 'EliminationStart'
  | 'EliminationRow'
  | 'EliminationRowDone'
  | 'ColumnComplete'
  | 'Complete'
  | 'NotApplicable'
  | 'ContradictionFound'
  | 'NoSolution'
  | 'PivotSummary'
  | 'UniqueSolution'
  | 'InfiniteSolutions'
  | 'AnalysisComplete';

export type SolutionKind = 'none' | 'unique' | 'infinite' | 'not-applicable';

export interface SolutionSummary {
  kind: SolutionKind;
  pivots: number;
  variables: number;
  freeVariables: number;
  contradictionRow?: number; // zero-based
}

export interface ParseOptions {
  commentPrefix: string;
}

export interface ParseResult {
  rows: number;
  cols: number;
  values: number[][];
  logs: string[];
}

export type CellHighlight = 'pivot' | 'pivot-row' | 'pivot-col' | 'constant' | 'leading-one' | 'none';

export type SessionStatus = 'idle' | 'running' | 'finished';

export interface SessionView {
  status: SessionStatus;
  matrix: number[][] | null;
  cursor: PivotCursor | null;
  description: string;
  logs: string[];
  active: boolean;
  solution: SolutionSummary | null;
}
