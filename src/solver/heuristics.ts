import { DomainTable } from '../model/domain';
import type { Commitments, PuzzleModel } from '../model/types';

/**
 * Minimum remaining values; ties go to the variable whose id sorts first.
 * Returns -1 once every variable is committed.
 */
export function selectNextVariable(puzzle: PuzzleModel, domains: DomainTable, committed: Commitments): number {
  let best = -1;
  let bestSize = Infinity;
  for (let v = 0; v < committed.length; v++) {
    if (committed[v] !== null) continue;
    const size = domains.get(v).length;
    if (size < bestSize || (size === bestSize && puzzle.idRank[v] < puzzle.idRank[best])) {
      bestSize = size;
      best = v;
    }
  }
  return best;
}
