import { DomainTable, domainMax, domainMin } from '../model/domain';
import type { Commitments, Constraint, PuzzleModel } from '../model/types';

/**
 * Counting checks run before and during search. Returns the indices of the
 * constraints that can no longer be met:
 * - all_different: the open cells need at least as many distinct candidates
 *   as there are open cells
 * - sum: the target must lie within the reachable total
 */
export function checkPlausibility(puzzle: PuzzleModel, domains: DomainTable, committed: Commitments): number[] {
  const failing: number[] = [];

  for (const constraint of puzzle.constraints) {
    if (constraint.kind === 'all_different') {
      if (!distinctCandidatesSuffice(constraint.scope, domains, committed)) {
        failing.push(constraint.index);
      }
    } else if (constraint.kind === 'sum') {
      if (!sumReachable(constraint, domains)) {
        failing.push(constraint.index);
      }
    }
  }

  return failing;
}

function distinctCandidatesSuffice(scope: readonly number[], domains: DomainTable, committed: Commitments): boolean {
  const taken = new Set<number>();
  const open: number[] = [];
  for (const v of scope) {
    const value = committed[v];
    if (value === null) open.push(v);
    else taken.add(value);
  }
  if (open.length === 0) return true;

  const available = new Set<number>();
  for (const v of open) {
    for (const value of domains.get(v)) {
      if (!taken.has(value)) available.add(value);
    }
  }
  return available.size >= open.length;
}

function sumReachable(constraint: Extract<Constraint, { kind: 'sum' }>, domains: DomainTable): boolean {
  let low = 0;
  let high = 0;
  for (const v of constraint.scope) {
    const domain = domains.get(v);
    if (domain.length === 0) return false;
    low += domainMin(domain);
    high += domainMax(domain);
  }

  switch (constraint.op) {
    case '=':
      return low <= constraint.value && constraint.value <= high;
    case '<':
      return low < constraint.value;
    case '>':
      return high > constraint.value;
    case '≠':
      return low !== high || low !== constraint.value;
  }
}
