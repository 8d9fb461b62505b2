/**
 * Tests for the feasibility checker, cross-checked against exhaustive enumeration.
 */

import { loadPuzzleOrThrow } from '../../model/load';
import type { Commitments, PuzzleModel, SearchProgress } from '../../model/types';
import { loadSample, SampleId } from '../../samples';
import { checkConstraint } from '../constraints';
import { checkFeasibility, checkFeasibilityAsync, SearchSnapshot } from '../feasibility';
import { emptyCommitments, rootFixpoint, settleCommitments } from '../propagate';

/**
 * Enumerate assignments over the starting domains, dropping a branch only once
 * a constraint is violated by values already placed.
 */
function bruteForce(puzzle: PuzzleModel, committed: Commitments): boolean {
  const values: (number | null)[] = committed.slice();
  const broken = () => puzzle.constraints.some((c) => checkConstraint(c, values) === 'violated');
  const visit = (v: number): boolean => {
    if (v === values.length) {
      return puzzle.constraints.every((c) => checkConstraint(c, values) === 'satisfied');
    }
    if (committed[v] !== null) return visit(v + 1);
    for (const value of puzzle.variables[v].domain) {
      values[v] = value;
      if (!broken() && visit(v + 1)) return true;
    }
    values[v] = null;
    return false;
  };
  return visit(0);
}

function snapshotOf(puzzle: PuzzleModel, committed: Commitments): SearchSnapshot | null {
  const { domains, result } = settleCommitments(puzzle, rootFixpoint(puzzle).domains, committed);
  return result.kind === 'contradiction' ? null : { domains, committed };
}

function rootSnapshot(puzzle: PuzzleModel): SearchSnapshot {
  return { domains: rootFixpoint(puzzle).domains, committed: emptyCommitments(puzzle) };
}

describe('checkFeasibility', () => {
  const samples: SampleId[] = ['futoshiki', 'region-sums', 'pigeonhole'];

  it.each(samples)('should agree with exhaustive enumeration on single commitments in %s', (id) => {
    const puzzle = loadSample(id);
    for (const variable of puzzle.variables) {
      for (const value of variable.domain) {
        const committed = emptyCommitments(puzzle);
        committed[variable.index] = value;

        const snapshot = snapshotOf(puzzle, committed);
        const expected = bruteForce(puzzle, committed);
        if (snapshot === null) {
          expect(expected).toBe(false);
          continue;
        }

        const result = checkFeasibility(puzzle, snapshot, { maxNodes: 100_000 });
        expect(result.kind).toBe(expected ? 'feasible' : 'infeasible');
      }
    }
  });

  it('should agree with exhaustive enumeration on pairs of commitments', () => {
    const puzzle = loadSample('futoshiki');
    const [first, second] = [puzzle.variables[0], puzzle.variables[4]];
    for (const a of first.domain) {
      for (const b of second.domain) {
        const committed = emptyCommitments(puzzle);
        committed[first.index] = a;
        committed[second.index] = b;

        const snapshot = snapshotOf(puzzle, committed);
        const expected = bruteForce(puzzle, committed);
        if (snapshot === null) {
          expect(expected).toBe(false);
          continue;
        }
        expect(checkFeasibility(puzzle, snapshot, { maxNodes: 100_000 }).kind).toBe(
          expected ? 'feasible' : 'infeasible'
        );
      }
    }
  });

  it('should refute a pigeonhole before searching', () => {
    const puzzle = loadSample('pigeonhole');
    const result = checkFeasibility(puzzle, rootSnapshot(puzzle), { maxNodes: 100 });
    expect(result).toMatchObject({ kind: 'infeasible', conflicts: [0] });
    expect(result.stats.nodes).toBe(0);
  });

  it('should report inconclusive past the node ceiling', () => {
    const puzzle = loadSample('mini-sudoku');
    const result = checkFeasibility(puzzle, rootSnapshot(puzzle), { maxNodes: 1 });
    expect(result.kind).toBe('inconclusive');
  });

  it('should find a completion of the mini sudoku', () => {
    const puzzle = loadSample('mini-sudoku');
    const result = checkFeasibility(puzzle, rootSnapshot(puzzle), { maxNodes: 10_000 });
    expect(result.kind).toBe('feasible');
    expect(result.stats.nodes).toBeGreaterThanOrEqual(puzzle.variables.length);
  });

  it('should leave the snapshot untouched', () => {
    const puzzle = loadSample('futoshiki');
    const snapshot = rootSnapshot(puzzle);
    const domainsBefore = snapshot.domains.toArray();
    const committedBefore = snapshot.committed.slice();

    checkFeasibility(puzzle, snapshot, { maxNodes: 10_000 });

    expect(snapshot.domains.toArray()).toEqual(domainsBefore);
    expect(snapshot.committed).toEqual(committedBefore);
  });

  it('should accept a complete assignment that satisfies every constraint', () => {
    const puzzle = loadPuzzleOrThrow({
      variables: [
        { id: 'x', domain: [1, 2] },
        { id: 'y', domain: [1, 2] },
      ],
      constraints: [{ kind: 'compare', id: 'x<y', scope: ['x', 'y'], op: '<' }],
    });
    const snapshot = snapshotOf(puzzle, [1, 2]);
    expect(snapshot).not.toBeNull();
    if (snapshot) {
      expect(checkFeasibility(puzzle, snapshot, { maxNodes: 10 })).toMatchObject({
        kind: 'feasible',
        stats: { nodes: 0 },
      });
    }
  });
});

describe('checkFeasibilityAsync', () => {
  it('should yield progress while searching', async () => {
    const puzzle = loadSample('mini-sudoku');
    const progress: SearchProgress[] = [];

    const result = await checkFeasibilityAsync(puzzle, rootSnapshot(puzzle), {
      maxNodes: 10_000,
      yieldEvery: 1,
      onProgress: (p) => progress.push(p),
    });

    expect(result.kind).toBe('feasible');
    expect(progress.length).toBeGreaterThan(0);
    expect(progress[0].nodes).toBe(1);
    expect(progress[0].depth).toBe(0);
  });

  it('should return cancelled when aborted before starting', async () => {
    const puzzle = loadSample('mini-sudoku');
    const controller = new AbortController();
    controller.abort();

    const result = await checkFeasibilityAsync(puzzle, rootSnapshot(puzzle), {
      maxNodes: 10_000,
      yieldEvery: 1,
      signal: controller.signal,
    });

    expect(result).toMatchObject({ kind: 'cancelled', stats: { nodes: 0 } });
  });

  it('should stop at the next yield once aborted', async () => {
    const puzzle = loadSample('mini-sudoku');
    const controller = new AbortController();

    const result = await checkFeasibilityAsync(puzzle, rootSnapshot(puzzle), {
      maxNodes: 10_000,
      yieldEvery: 1,
      signal: controller.signal,
      onProgress: () => controller.abort(),
    });

    expect(result).toMatchObject({ kind: 'cancelled', stats: { nodes: 1 } });
  });

  it('should report inconclusive past the node ceiling', async () => {
    const puzzle = loadSample('mini-sudoku');
    const result = await checkFeasibilityAsync(puzzle, rootSnapshot(puzzle), { maxNodes: 3, yieldEvery: 2 });
    expect(result.kind).toBe('inconclusive');
  });
});
