import { edit, loadPuzzle, openSession, undo } from '..';

describe('public API', () => {
  it('should drive a session through the function wrappers', () => {
    const loaded = loadPuzzle({
      variables: [{ id: 'x', domain: [1, 2] }],
      constraints: [{ kind: 'given', scope: ['x'], value: 2 }],
    });
    if (loaded.kind !== 'loaded') {
      throw loaded.error;
    }

    const session = openSession(loaded.puzzle);
    expect(session.status.state).toBe('InProgress');
    expect(session.candidates('x')).toEqual([2]);

    expect(edit(session, 'x', 2).state).toBe('Solved');
    expect(undo(session, 'x').state).toBe('InProgress');
    expect(session.value('x')).toBeNull();
  });
});
