/**
 * Build the immutable puzzle model from a loader's definition
 */

import { MalformedPuzzleError } from './errors';
import { normalizeDomain } from './domain';
import { formatIssues, PuzzleDefinitionSchema } from './schema';
import type { Constraint, ConstraintDefinition, PuzzleDefinition, PuzzleModel, Variable } from './types';
import { constraintIdAt, validateDefinition } from '../validator/validateDefinition';

export type LoadResult =
  | { kind: 'loaded'; puzzle: PuzzleModel; warnings: string[] }
  | { kind: 'malformed'; error: MalformedPuzzleError };

/**
 * Validate and load a puzzle definition
 */
export function loadPuzzle(input: unknown): LoadResult {
  const parsed = PuzzleDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    return { kind: 'malformed', error: new MalformedPuzzleError(formatIssues(parsed.error)) };
  }

  const definition: PuzzleDefinition = parsed.data;
  const report = validateDefinition(definition);
  if (!report.valid) {
    return { kind: 'malformed', error: new MalformedPuzzleError(report.errors) };
  }

  return { kind: 'loaded', puzzle: buildModel(definition), warnings: report.warnings };
}

export function loadPuzzleOrThrow(input: unknown): PuzzleModel {
  const result = loadPuzzle(input);
  if (result.kind === 'malformed') {
    throw result.error;
  }
  return result.puzzle;
}

/**
 * Precompute indices, adjacency and tie-break ranks. Expects a validated definition.
 */
function buildModel(definition: PuzzleDefinition): PuzzleModel {
  const variables: Variable[] = definition.variables.map((v, index) =>
    Object.freeze({ id: v.id, index, domain: Object.freeze(normalizeDomain(v.domain)) })
  );

  const variableIndex = new Map<string, number>();
  for (const variable of variables) {
    variableIndex.set(variable.id, variable.index);
  }

  const lookup = (ref: string): number => {
    const index = variableIndex.get(ref);
    if (index === undefined) {
      throw new MalformedPuzzleError([`unknown variable "${ref}"`]);
    }
    return index;
  };

  const constraints = definition.constraints.map((def, index) =>
    Object.freeze(resolveConstraint(def, index, constraintIdAt(def, index), lookup))
  );

  const constraintIndex = new Map<string, number>();
  for (const constraint of constraints) {
    constraintIndex.set(constraint.id, constraint.index);
  }

  const constraintsByVariable: number[][] = variables.map(() => []);
  const neighborSets: Set<number>[] = variables.map(() => new Set<number>());

  for (const constraint of constraints) {
    for (const v of constraint.scope) {
      constraintsByVariable[v].push(constraint.index);
      for (const other of constraint.scope) {
        if (other !== v) neighborSets[v].add(other);
      }
    }
  }

  const neighbors = neighborSets.map((set) => Array.from(set).sort((a, b) => a - b));

  const byId = variables.map((v) => v.index).sort((a, b) => compareIds(variables[a].id, variables[b].id));
  const idRank: number[] = new Array<number>(variables.length);
  byId.forEach((variable, rank) => {
    idRank[variable] = rank;
  });

  return Object.freeze({
    id: definition.id,
    name: definition.name,
    variables: Object.freeze(variables),
    constraints: Object.freeze(constraints),
    variableIndex,
    constraintIndex,
    constraintsByVariable,
    neighbors,
    idRank,
  });
}

function resolveConstraint(
  def: ConstraintDefinition,
  index: number,
  id: string,
  lookup: (ref: string) => number
): Constraint {
  switch (def.kind) {
    case 'all_different':
      return { kind: 'all_different', id, index, scope: def.scope.map(lookup) };
    case 'all_equal':
      return { kind: 'all_equal', id, index, scope: def.scope.map(lookup) };
    case 'sum':
      return { kind: 'sum', id, index, scope: def.scope.map(lookup), op: def.op, value: def.value };
    case 'compare':
      return { kind: 'compare', id, index, scope: [lookup(def.scope[0]), lookup(def.scope[1])], op: def.op };
    case 'difference':
      return {
        kind: 'difference',
        id,
        index,
        scope: [lookup(def.scope[0]), lookup(def.scope[1])],
        op: def.op,
        value: def.value,
      };
    case 'given':
      return { kind: 'given', id, index, scope: [lookup(def.scope[0])], value: def.value };
  }
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
