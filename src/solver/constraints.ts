/**
 * Constraint checking and per-constraint propagation.
 *
 * Every rule family shares two capabilities:
 * - `checkConstraint`: verdict over the committed values only
 * - `propagateConstraint`: narrow candidate domains in place
 *
 * Propagators read committed values, not singleton domains: a variable whose
 * candidates shrank to one value is still open until the user commits it.
 */

import { DomainTable, domainMax, domainMin } from '../model/domain';
import type { Commitments, Constraint, ConstraintOp, Verdict } from '../model/types';

export interface PropagationView {
  domains: DomainTable;
  committed: Commitments;
}

export type PropagateOutcome =
  | { kind: 'ok'; changed: number[] }
  | { kind: 'contradiction'; variables: number[] };

/**
 * Check if a value satisfies an operator constraint
 */
export function compareValues(left: number, op: ConstraintOp, right: number): boolean {
  switch (op) {
    case '=':
      return left === right;
    case '<':
      return left < right;
    case '>':
      return left > right;
    case '≠':
      return left !== right;
  }
}

/**
 * Verdict of a constraint given the committed values
 */
export function checkConstraint(constraint: Constraint, committed: Commitments): Verdict {
  switch (constraint.kind) {
    case 'all_different': {
      const seen = new Set<number>();
      let open = false;
      for (const v of constraint.scope) {
        const value = committed[v];
        if (value === null) {
          open = true;
        } else if (seen.has(value)) {
          return 'violated';
        } else {
          seen.add(value);
        }
      }
      return open ? 'undetermined' : 'satisfied';
    }

    case 'all_equal': {
      let target: number | null = null;
      let open = false;
      for (const v of constraint.scope) {
        const value = committed[v];
        if (value === null) {
          open = true;
        } else if (target === null) {
          target = value;
        } else if (value !== target) {
          return 'violated';
        }
      }
      return open ? 'undetermined' : 'satisfied';
    }

    case 'sum': {
      let total = 0;
      for (const v of constraint.scope) {
        const value = committed[v];
        if (value === null) return 'undetermined';
        total += value;
      }
      return compareValues(total, constraint.op, constraint.value) ? 'satisfied' : 'violated';
    }

    case 'compare': {
      const a = committed[constraint.scope[0]];
      const b = committed[constraint.scope[1]];
      if (a === null || b === null) return 'undetermined';
      return compareValues(a, constraint.op, b) ? 'satisfied' : 'violated';
    }

    case 'difference': {
      const a = committed[constraint.scope[0]];
      const b = committed[constraint.scope[1]];
      if (a === null || b === null) return 'undetermined';
      return compareValues(Math.abs(a - b), constraint.op, constraint.value) ? 'satisfied' : 'violated';
    }

    case 'given': {
      const value = committed[constraint.scope[0]];
      if (value === null) return 'undetermined';
      return value === constraint.value ? 'satisfied' : 'violated';
    }

    default:
      return assertNever(constraint);
  }
}

/**
 * Variables to blame when committed values already break a constraint
 */
export function violatingVariables(constraint: Constraint, committed: Commitments): number[] {
  const assigned = constraint.scope.filter((v) => committed[v] !== null);
  if (constraint.kind !== 'all_different') {
    return assigned;
  }

  const counts = new Map<number, number>();
  for (const v of assigned) {
    const value = committed[v] ?? NaN;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return assigned.filter((v) => (counts.get(committed[v] ?? NaN) ?? 0) > 1);
}

/**
 * Narrow the domains of a constraint's scope.
 * Domains are replaced, never mutated; `changed` lists variables that shrank.
 */
export function propagateConstraint(constraint: Constraint, view: PropagationView): PropagateOutcome {
  const { domains, committed } = view;

  if (checkConstraint(constraint, committed) === 'violated') {
    return { kind: 'contradiction', variables: violatingVariables(constraint, committed) };
  }

  const changed: number[] = [];
  let emptied = -1;

  const restrict = (variable: number, keep: (value: number) => boolean): boolean => {
    const domain = domains.get(variable);
    const next = domain.filter(keep);
    if (next.length === domain.length) return true;
    domains.set(variable, next);
    changed.push(variable);
    if (next.length === 0) {
      emptied = variable;
      return false;
    }
    return true;
  };

  const ok = narrowScope(constraint, domains, committed, restrict);
  if (!ok) {
    return { kind: 'contradiction', variables: emptied >= 0 ? [emptied] : [] };
  }
  return { kind: 'ok', changed };
}

type Restrict = (variable: number, keep: (value: number) => boolean) => boolean;

function narrowScope(
  constraint: Constraint,
  domains: DomainTable,
  committed: Commitments,
  restrict: Restrict
): boolean {
  switch (constraint.kind) {
    case 'all_different': {
      // Forward check: committed values leave every open cell of the group
      const taken = new Set<number>();
      for (const v of constraint.scope) {
        const value = committed[v];
        if (value !== null) taken.add(value);
      }
      if (taken.size === 0) return true;
      for (const v of constraint.scope) {
        if (committed[v] !== null) continue;
        if (!restrict(v, (value) => !taken.has(value))) return false;
      }
      return true;
    }

    case 'all_equal': {
      // Every cell ends up with a value present in all domains
      let common = domains.get(constraint.scope[0]);
      for (const v of constraint.scope) {
        const inDomain = new Set(domains.get(v));
        common = common.filter((value) => inDomain.has(value));
      }
      const allowed = new Set(common);
      for (const v of constraint.scope) {
        if (!restrict(v, (value) => allowed.has(value))) return false;
      }
      return true;
    }

    case 'sum':
      return narrowSum(constraint.scope, constraint.op, constraint.value, domains, committed, restrict);

    case 'compare': {
      const [a, b] = constraint.scope;
      switch (constraint.op) {
        case '<':
          return (
            restrict(a, (value) => value < domainMax(domains.get(b))) &&
            restrict(b, (value) => value > domainMin(domains.get(a)))
          );
        case '>':
          return (
            restrict(a, (value) => value > domainMin(domains.get(b))) &&
            restrict(b, (value) => value < domainMax(domains.get(a)))
          );
        case '=': {
          const inB = new Set(domains.get(b));
          if (!restrict(a, (value) => inB.has(value))) return false;
          const inA = new Set(domains.get(a));
          return restrict(b, (value) => inA.has(value));
        }
        case '≠':
          return excludeCommitted(a, b, committed, restrict, (value, other) => value === other);
      }
    }

    case 'difference': {
      const [a, b] = constraint.scope;
      const { op, value: gap } = constraint;
      if (op === '≠') {
        return excludeCommitted(a, b, committed, restrict, (value, other) => Math.abs(value - other) === gap);
      }
      const supported = (value: number, other: readonly number[]): boolean =>
        other.some((w) => compareValues(Math.abs(value - w), op, gap));
      if (!restrict(a, (value) => supported(value, domains.get(b)))) return false;
      return restrict(b, (value) => supported(value, domains.get(a)));
    }

    case 'given':
      return restrict(constraint.scope[0], (value) => value === constraint.value);

    default:
      return assertNever(constraint);
  }
}

/**
 * Bounds reasoning on a sum: each cell must leave room for the others'
 * smallest and largest candidates.
 */
function narrowSum(
  scope: readonly number[],
  op: ConstraintOp,
  target: number,
  domains: DomainTable,
  committed: Commitments,
  restrict: Restrict
): boolean {
  if (op === '≠') {
    // Only decidable once a single cell is left open
    let open = -1;
    let committedSum = 0;
    for (const v of scope) {
      const value = committed[v];
      if (value === null) {
        if (open >= 0) return true;
        open = v;
      } else {
        committedSum += value;
      }
    }
    if (open < 0) return true;
    return restrict(open, (value) => value !== target - committedSum);
  }

  let totalMin = 0;
  let totalMax = 0;
  for (const v of scope) {
    totalMin += domainMin(domains.get(v));
    totalMax += domainMax(domains.get(v));
  }

  for (const v of scope) {
    const domain = domains.get(v);
    const othersMin = totalMin - domainMin(domain);
    const othersMax = totalMax - domainMax(domain);

    let ok: boolean;
    if (op === '=') {
      ok = restrict(v, (value) => value >= target - othersMax && value <= target - othersMin);
    } else if (op === '<') {
      ok = restrict(v, (value) => value + othersMin < target);
    } else {
      ok = restrict(v, (value) => value + othersMax > target);
    }
    if (!ok) return false;
  }
  return true;
}

/**
 * Remove from one side the values clashing with the other side's committed value
 */
function excludeCommitted(
  a: number,
  b: number,
  committed: Commitments,
  restrict: Restrict,
  clashes: (value: number, other: number) => boolean
): boolean {
  const valueA = committed[a];
  const valueB = committed[b];
  if (valueA !== null && valueB === null) {
    return restrict(b, (value) => !clashes(value, valueA));
  }
  if (valueB !== null && valueA === null) {
    return restrict(a, (value) => !clashes(value, valueB));
  }
  return true;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled constraint: ${JSON.stringify(value)}`);
}
