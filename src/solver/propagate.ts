import { DomainTable } from '../model/domain';
import type { Commitments, PropagationResult, PuzzleModel } from '../model/types';
import { propagateConstraint, PropagationView } from './constraints';

export function initialDomains(puzzle: PuzzleModel): DomainTable {
  return DomainTable.from(puzzle.variables.map((v) => v.domain));
}

export function emptyCommitments(puzzle: PuzzleModel): (number | null)[] {
  return puzzle.variables.map(() => null);
}

/**
 * Run propagators to a fixed point, starting from the dirty variables.
 * Narrows `view.domains` in place and stops at the first contradiction.
 */
export function propagate(
  puzzle: PuzzleModel,
  view: PropagationView,
  dirty: Iterable<number>,
  debugLevel = 0
): PropagationResult {
  const queue: number[] = [];
  const queued = new Uint8Array(puzzle.variables.length);
  const enqueue = (v: number) => {
    if (queued[v]) return;
    queued[v] = 1;
    queue.push(v);
  };

  for (const v of dirty) enqueue(v);

  let revisions = 0;
  let head = 0;
  while (head < queue.length) {
    const variable = queue[head++];
    queued[variable] = 0;

    for (const ci of puzzle.constraintsByVariable[variable]) {
      const constraint = puzzle.constraints[ci];
      revisions++;
      const outcome = propagateConstraint(constraint, view);

      if (outcome.kind === 'contradiction') {
        if (debugLevel > 0) {
          console.log(`[PROPAGATE] Contradiction in ${constraint.id} after ${revisions} revisions`);
        }
        return { kind: 'contradiction', constraints: [ci], variables: outcome.variables, revisions };
      }

      for (const changed of outcome.changed) {
        enqueue(changed);
        for (const neighbor of puzzle.neighbors[changed]) enqueue(neighbor);
      }
    }

    // Keep the worklist array from growing without bound on long runs
    if (head > 1024 && head * 2 > queue.length) {
      queue.splice(0, head);
      head = 0;
    }
  }

  if (debugLevel > 1) {
    console.log(`[PROPAGATE] Fixed point after ${revisions} revisions`);
  }
  return { kind: 'fixpoint', revisions };
}

export interface RootState {
  domains: DomainTable;
  result: PropagationResult;
}

/**
 * Fixed point of the puzzle with nothing committed
 */
export function rootFixpoint(puzzle: PuzzleModel, debugLevel = 0): RootState {
  const domains = initialDomains(puzzle);
  const committed = emptyCommitments(puzzle);
  const result = propagate(
    puzzle,
    { domains, committed },
    puzzle.variables.map((v) => v.index),
    debugLevel
  );
  return { domains, result };
}

/**
 * Fix every committed variable to its value on a fork of `base` and settle.
 */
export function settleCommitments(
  puzzle: PuzzleModel,
  base: DomainTable,
  committed: Commitments,
  debugLevel = 0
): RootState {
  const domains = base.fork();
  const dirty: number[] = [];
  committed.forEach((value, v) => {
    if (value === null) return;
    domains.set(v, [value]);
    dirty.push(v);
  });
  const result = propagate(puzzle, { domains, committed }, dirty, debugLevel);
  return { domains, result };
}
