import { ValidationSession } from '../../session/session';
import { loadSample, SAMPLE_IDS, sampleDefinition } from '../index';

const MINI_SUDOKU_SOLUTION = [
  [1, 2, 3, 4],
  [3, 4, 1, 2],
  [2, 1, 4, 3],
  [4, 3, 2, 1],
];

describe('samples', () => {
  it.each(SAMPLE_IDS)('should load %s', (id) => {
    const puzzle = loadSample(id);
    expect(puzzle.id).toBe(id);
    expect(puzzle.variables.length).toBeGreaterThan(0);
  });

  it('should expand the mini sudoku into rows, columns, boxes and givens', () => {
    const definition = sampleDefinition('mini-sudoku');
    expect(definition.variables).toHaveLength(16);
    expect(definition.constraints).toHaveLength(17);
    expect(definition.constraints.filter((c) => c.kind === 'given').map((c) => c.id)).toEqual([
      'given-0,0',
      'given-0,1',
      'given-1,2',
      'given-2,1',
      'given-3,3',
    ]);
  });

  it('should expand region rules', () => {
    expect(sampleDefinition('region-sums').constraints.map((c) => c.id)).toEqual([
      'region-0-sum',
      'region-1-sum',
      'region-2-sum',
      'region-3-equal',
    ]);
  });

  it('should play the mini sudoku to a solved state', () => {
    const session = new ValidationSession(loadSample('mini-sudoku'));
    const states: string[] = [];
    MINI_SUDOKU_SOLUTION.forEach((row, r) =>
      row.forEach((value, c) => {
        states.push(session.edit(`${r},${c}`, value).state);
      })
    );

    expect(states.slice(0, -1).every((state) => state === 'InProgress')).toBe(true);
    expect(states[states.length - 1]).toBe('Solved');
  });

  it('should flag an edit against a given', () => {
    const session = new ValidationSession(loadSample('mini-sudoku'));
    expect(session.edit('0,0', 2)).toEqual({
      state: 'Violated',
      implicated: { variables: ['0,1'], constraints: ['row-0'] },
      caveat: false,
      pending: false,
    });
  });

  it('should flag a broken inequality', () => {
    const session = new ValidationSession(loadSample('futoshiki'));
    expect(session.edit('0,0', 3).implicated).toEqual({ variables: ['0,0'], constraints: ['compare-0'] });
  });

  it('should never let the pigeonhole complete', () => {
    const session = new ValidationSession(loadSample('pigeonhole'));
    expect(session.edit('0,0', 1).state).toBe('Infeasible');
    expect(session.edit('0,1', 2).state).toBe('Violated');
  });
});
