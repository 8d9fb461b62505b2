import type { Constraint, ConstraintCheckResult, PuzzleModel, ValidationResult } from '../model/types';
import { assertNever, checkConstraint } from '../solver/constraints';

/**
 * Check a full answer against every constraint of a loaded puzzle
 */
export function validateAssignment(puzzle: PuzzleModel, values: Record<string, number>): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const id of Object.keys(values)) {
    if (!puzzle.variableIndex.has(id)) {
      errors.push(`Unknown variable "${id}"`);
    }
  }

  const committed = puzzle.variables.map((variable) => {
    const value = values[variable.id];
    if (value === undefined) {
      errors.push(`Variable "${variable.id}" has no value`);
      return null;
    }
    if (!variable.domain.includes(value)) {
      errors.push(`Value ${value} for "${variable.id}" is outside its domain`);
    }
    return value;
  });

  const constraintChecks: ConstraintCheckResult[] = puzzle.constraints.map((constraint) => {
    const verdict = checkConstraint(constraint, committed);
    const actualValues = constraint.scope.map((v) => committed[v]);
    const message = `${constraint.id}: ${describeRule(constraint, puzzle)} is ${verdict}`;
    if (verdict === 'violated') {
      errors.push(message);
    }
    return { constraintId: constraint.id, verdict, actualValues, message };
  });

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    constraintChecks,
  };
}

function describeRule(constraint: Constraint, puzzle: PuzzleModel): string {
  const names = constraint.scope.map((v) => puzzle.variables[v].id);
  switch (constraint.kind) {
    case 'all_different':
      return `all different (${names.join(' ')})`;
    case 'all_equal':
      return `all equal (${names.join(' ')})`;
    case 'sum':
      return `sum (${names.join(' ')}) ${constraint.op} ${constraint.value}`;
    case 'compare':
      return `${names[0]} ${constraint.op} ${names[1]}`;
    case 'difference':
      return `|${names[0]} - ${names[1]}| ${constraint.op} ${constraint.value}`;
    case 'given':
      return `${names[0]} = ${constraint.value}`;
    default:
      return assertNever(constraint);
  }
}
