/**
 * Grid puzzles: expand a rows x cols layout with region rules into a
 * variable/constraint definition.
 *
 * Cells become variables named "row,col" in row-major order. Region -1 marks
 * a hole with no variable.
 */

import { z } from 'zod';
import { MalformedPuzzleError } from './errors';
import { GridSpecSchema, RegionRuleSchema } from './schema';
import { cellKey, ConstraintDefinition, PuzzleDefinition, VariableDefinition } from './types';

export type GridSpec = z.infer<typeof GridSpecSchema>;
export type RegionRule = z.infer<typeof RegionRuleSchema>;

export const HOLE = -1;

/**
 * Build a puzzle definition from a grid spec.
 * Throws MalformedPuzzleError when the layout and the rules disagree.
 */
export function buildGridDefinition(spec: GridSpec): PuzzleDefinition {
  const issues: string[] = [];
  const { rows, cols } = spec;
  const domain = expandValues(spec.values);
  const regions = spec.regions ?? Array.from({ length: rows }, () => Array<number>(cols).fill(0));

  if (regions.length !== rows) {
    issues.push(`regions array must have ${rows} rows, got ${regions.length}`);
  }
  regions.forEach((row, r) => {
    if (row.length !== cols) {
      issues.push(`regions[${r}] must have ${cols} columns, got ${row.length}`);
    }
  });
  if (issues.length > 0) {
    throw new MalformedPuzzleError(issues);
  }

  const isCell = (r: number, c: number) =>
    r >= 0 && r < rows && c >= 0 && c < cols && regions[r][c] !== HOLE;
  const keyOf = (r: number, c: number) => cellKey({ row: r, col: c });

  const variables: VariableDefinition[] = [];
  const regionCells = new Map<number, string[]>();
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const region = regions[r][c];
      if (region === HOLE) continue;
      const key = keyOf(r, c);
      variables.push({ id: key, domain });
      const cells = regionCells.get(region) ?? [];
      cells.push(key);
      regionCells.set(region, cells);
    }
  }

  const constraints: ConstraintDefinition[] = [];

  if (spec.distinctRows) {
    for (let r = 0; r < rows; r++) {
      const scope: string[] = [];
      for (let c = 0; c < cols; c++) if (isCell(r, c)) scope.push(keyOf(r, c));
      if (scope.length > 1) constraints.push({ kind: 'all_different', id: `row-${r}`, scope });
    }
  }

  if (spec.distinctCols) {
    for (let c = 0; c < cols; c++) {
      const scope: string[] = [];
      for (let r = 0; r < rows; r++) if (isCell(r, c)) scope.push(keyOf(r, c));
      if (scope.length > 1) constraints.push({ kind: 'all_different', id: `col-${c}`, scope });
    }
  }

  for (const [regionKey, rule] of Object.entries(spec.constraints ?? {})) {
    const regionId = Number(regionKey);
    const scope = regionCells.get(regionId);
    if (!Number.isInteger(regionId) || !scope) {
      issues.push(`constraints refer to region ${regionKey}, which has no cells`);
      continue;
    }
    constraints.push(...regionConstraints(regionKey, rule, scope, issues));
  }

  if (spec.distinctNeighbors) {
    for (let r = 0; r < rows; r++) {
      for (let c = 0; c < cols; c++) {
        if (!isCell(r, c)) continue;
        if (isCell(r, c + 1)) {
          constraints.push({
            kind: 'compare',
            id: `adjacent-${keyOf(r, c)}-${keyOf(r, c + 1)}`,
            scope: [keyOf(r, c), keyOf(r, c + 1)],
            op: '≠',
          });
        }
        if (isCell(r + 1, c)) {
          constraints.push({
            kind: 'compare',
            id: `adjacent-${keyOf(r, c)}-${keyOf(r + 1, c)}`,
            scope: [keyOf(r, c), keyOf(r + 1, c)],
            op: '≠',
          });
        }
      }
    }
  }

  for (const [r, c, value] of spec.givens ?? []) {
    if (!isCell(r, c)) {
      issues.push(`given at ${keyOf(r, c)} is not a cell of the grid`);
      continue;
    }
    constraints.push({ kind: 'given', id: `given-${keyOf(r, c)}`, scope: [keyOf(r, c)], value });
  }

  (spec.inequalities ?? []).forEach(({ a, b, op }, i) => {
    if (!isCell(a[0], a[1]) || !isCell(b[0], b[1])) {
      issues.push(`inequalities[${i}] refers to a cell outside the grid`);
      return;
    }
    constraints.push({ kind: 'compare', id: `compare-${i}`, scope: [keyOf(a[0], a[1]), keyOf(b[0], b[1])], op });
  });

  (spec.differences ?? []).forEach(({ a, b, op, value }, i) => {
    if (!isCell(a[0], a[1]) || !isCell(b[0], b[1])) {
      issues.push(`differences[${i}] refers to a cell outside the grid`);
      return;
    }
    constraints.push({
      kind: 'difference',
      id: `difference-${i}`,
      scope: [keyOf(a[0], a[1]), keyOf(b[0], b[1])],
      op,
      value,
    });
  });

  if (issues.length > 0) {
    throw new MalformedPuzzleError(issues);
  }

  return { id: spec.id, name: spec.name, variables, constraints };
}

function regionConstraints(
  regionKey: string,
  rule: RegionRule,
  scope: string[],
  issues: string[]
): ConstraintDefinition[] {
  const out: ConstraintDefinition[] = [];

  if (rule.sum !== undefined) {
    out.push({ kind: 'sum', id: `region-${regionKey}-sum`, scope, op: '=', value: rule.sum });
  }
  if (rule.op !== undefined) {
    if (rule.value === undefined) {
      issues.push(`Operator constraint requires a "value" for region ${regionKey}`);
    } else {
      out.push({ kind: 'sum', id: `region-${regionKey}-op`, scope, op: rule.op, value: rule.value });
    }
  }
  if (rule.all_equal) {
    out.push({ kind: 'all_equal', id: `region-${regionKey}-equal`, scope });
  }
  if (rule.all_different) {
    out.push({ kind: 'all_different', id: `region-${regionKey}-different`, scope });
  }

  if (out.length === 0 && rule.op === undefined) {
    issues.push(`Region ${regionKey} has an empty rule`);
  }
  return out;
}

function expandValues(values: GridSpec['values']): number[] {
  if (Array.isArray(values)) {
    return values;
  }
  const out: number[] = [];
  for (let v = values.min; v <= values.max; v++) out.push(v);
  return out;
}
