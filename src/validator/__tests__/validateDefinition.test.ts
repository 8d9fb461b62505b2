import { constraintIdAt, validateDefinition } from '../validateDefinition';

describe('validateDefinition', () => {
  it('should pass a consistent definition', () => {
    expect(
      validateDefinition({
        variables: [
          { id: 'x', domain: [1, 2] },
          { id: 'y', domain: [1, 2] },
        ],
        constraints: [{ kind: 'all_different', scope: ['x', 'y'] }],
      })
    ).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('should collect every structural error', () => {
    const result = validateDefinition({
      variables: [
        { id: 'x', domain: [1] },
        { id: 'x', domain: [2] },
      ],
      constraints: [
        { kind: 'all_equal', id: 'e', scope: [] },
        { kind: 'all_equal', id: 'e', scope: ['x', 'x'] },
      ],
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Duplicate variable id "x"',
      'Constraint "e" has an empty scope',
      'Duplicate constraint id "e"',
      'Constraint "e" lists variable "x" more than once',
    ]);
  });

  it('should warn about givens outside the domain and uncovered variables', () => {
    const result = validateDefinition({
      variables: [
        { id: 'x', domain: [1, 2] },
        { id: 'y', domain: [1] },
      ],
      constraints: [{ kind: 'given', id: 'g', scope: ['x'], value: 3 }],
    });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'Given "g" fixes "x" to 3, which is outside its domain',
      'Variable "y" is not covered by any constraint',
    ]);
  });

  it('should name constraints without an id by kind and position', () => {
    expect(constraintIdAt({ kind: 'all_equal', scope: [] }, 4)).toBe('all_equal#4');
  });
});
