/**
 * Validate puzzle definitions
 */

import type { ConstraintDefinition, PuzzleDefinition, ValidationResult } from '../model/types';

/**
 * Identifier a constraint gets when the loader left it out
 */
export function constraintIdAt(constraint: ConstraintDefinition, position: number): string {
  return constraint.id ?? `${constraint.kind}#${position}`;
}

/**
 * Validate a puzzle definition for structural consistency
 */
export function validateDefinition(definition: PuzzleDefinition): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (definition.variables.length === 0) {
    errors.push('puzzle must declare at least one variable');
  }

  // Validate variables
  const domains = new Map<string, ReadonlySet<number>>();
  for (const variable of definition.variables) {
    if (domains.has(variable.id)) {
      errors.push(`Duplicate variable id "${variable.id}"`);
      continue;
    }

    const values = new Set(variable.domain);
    domains.set(variable.id, values);

    if (values.size === 0) {
      errors.push(`Variable "${variable.id}" has an empty domain`);
    } else if (values.size !== variable.domain.length) {
      warnings.push(`Variable "${variable.id}" lists duplicate domain values`);
    }
  }

  // Validate constraints
  const constraintIds = new Set<string>();
  const constrained = new Set<string>();

  definition.constraints.forEach((constraint, position) => {
    const id = constraintIdAt(constraint, position);

    if (constraintIds.has(id)) {
      errors.push(`Duplicate constraint id "${id}"`);
    }
    constraintIds.add(id);

    if (constraint.scope.length === 0) {
      errors.push(`Constraint "${id}" has an empty scope`);
      return;
    }

    const seen = new Set<string>();
    for (const ref of constraint.scope) {
      if (!domains.has(ref)) {
        errors.push(`Constraint "${id}" references unknown variable "${ref}"`);
      }
      if (seen.has(ref)) {
        errors.push(`Constraint "${id}" lists variable "${ref}" more than once`);
      }
      seen.add(ref);
      constrained.add(ref);
    }

    if (constraint.kind === 'given') {
      const [ref] = constraint.scope;
      const domain = domains.get(ref);
      if (domain && domain.size > 0 && !domain.has(constraint.value)) {
        warnings.push(
          `Given "${id}" fixes "${ref}" to ${constraint.value}, which is outside its domain`
        );
      }
    }
  });

  for (const variable of definition.variables) {
    if (!constrained.has(variable.id)) {
      warnings.push(`Variable "${variable.id}" is not covered by any constraint`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
