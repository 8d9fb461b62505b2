/**
 * Core type definitions for the puzzle feasibility engine
 */

// ===== Definition Types (loader input) =====

export type ConstraintOp = '=' | '<' | '>' | '≠';

/**
 * Rule vocabulary shared by every puzzle format. `Ref` is a variable id in a
 * definition and a variable index once the puzzle is loaded.
 */
export type ConstraintShape<Ref> =
  | { kind: 'all_different'; id: string; scope: readonly Ref[] }
  | { kind: 'all_equal'; id: string; scope: readonly Ref[] }
  /** Sum of the scope compared against `value` */
  | { kind: 'sum'; id: string; scope: readonly Ref[]; op: ConstraintOp; value: number }
  /** scope[0] op scope[1] */
  | { kind: 'compare'; id: string; scope: readonly [Ref, Ref]; op: ConstraintOp }
  /** |scope[0] - scope[1]| op value */
  | { kind: 'difference'; id: string; scope: readonly [Ref, Ref]; op: ConstraintOp; value: number }
  /** Fixed-cell clue */
  | { kind: 'given'; id: string; scope: readonly [Ref]; value: number };

export type ConstraintKind = ConstraintShape<unknown>['kind'];

export interface VariableDefinition {
  id: string;
  domain: readonly number[];
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Constraint as handed over by a loader; ids are optional */
export type ConstraintDefinition = DistributiveOmit<ConstraintShape<string>, 'id'> & { id?: string };

export interface PuzzleDefinition {
  id?: string;
  name?: string;
  variables: readonly VariableDefinition[];
  constraints: readonly ConstraintDefinition[];
}

// ===== Loaded Puzzle Types =====

export interface Variable {
  id: string;
  index: number;
  /** Starting domain, sorted ascending, never empty */
  domain: readonly number[];
}

export type Constraint = ConstraintShape<number> & { index: number };

export interface PuzzleModel {
  readonly id?: string;
  readonly name?: string;
  readonly variables: readonly Variable[];
  readonly constraints: readonly Constraint[];
  readonly variableIndex: ReadonlyMap<string, number>;
  readonly constraintIndex: ReadonlyMap<string, number>;
  /** variable index -> indices of constraints whose scope contains it */
  readonly constraintsByVariable: readonly (readonly number[])[];
  /** variable index -> variables sharing at least one constraint */
  readonly neighbors: readonly (readonly number[])[];
  /** variable index -> position of its id in sorted id order (tie-breaks) */
  readonly idRank: readonly number[];
}

// ===== Propagation Types =====

export type Verdict = 'satisfied' | 'violated' | 'undetermined';

/** Committed value per variable index; null = not committed */
export type Commitments = readonly (number | null)[];

export type PropagationResult =
  | { kind: 'fixpoint'; revisions: number }
  | {
      kind: 'contradiction';
      /** constraint indices whose propagate step failed */
      constraints: number[];
      /** variable indices emptied or caught in the violation */
      variables: number[];
      revisions: number;
    };

// ===== Search Types =====

export interface SearchStats {
  nodes: number;
  backtracks: number;
  prunes: number;
  timeMs: number;
}

export type FeasibilityResult =
  | { kind: 'feasible'; stats: SearchStats }
  | { kind: 'infeasible'; conflicts: number[]; stats: SearchStats }
  | { kind: 'inconclusive'; stats: SearchStats }
  | { kind: 'cancelled'; stats: SearchStats };

export interface SearchProgress {
  nodes: number;
  backtracks: number;
  prunes: number;
  depth: number;
  elapsedMs: number;
}

// ===== Session Types =====

export type SessionState = 'InProgress' | 'Violated' | 'Infeasible' | 'Solved';

export interface Implicated {
  variables: string[];
  constraints: string[];
}

export interface SessionStatus {
  state: SessionState;
  implicated: Implicated;
  /** Feasibility was not established (search ceiling or failure) */
  caveat: boolean;
  /** A background feasibility search has not reported yet */
  pending: boolean;
}

/** Serializable progress, for an external persistence layer */
export interface AssignmentSnapshot {
  puzzleId?: string;
  committed: Record<string, number>;
}

// ===== Validation Types =====

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  constraintChecks?: ConstraintCheckResult[];
}

export interface ConstraintCheckResult {
  constraintId: string;
  verdict: Verdict;
  actualValues: (number | null)[];
  message: string;
}

// ===== Utility Types =====

export interface Cell {
  row: number;
  col: number;
}

export const cellKey = (cell: Cell): string => `${cell.row},${cell.col}`;
