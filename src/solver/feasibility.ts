import { DomainTable } from '../model/domain';
import { AbortError, SearchCeilingExceeded } from '../model/errors';
import type { Commitments, FeasibilityResult, PuzzleModel, SearchProgress, SearchStats } from '../model/types';
import { checkConstraint } from './constraints';
import { selectNextVariable } from './heuristics';
import { checkPlausibility } from './plausibility';
import { propagate } from './propagate';

/** Domains and commitments the search starts from; never modified */
export interface SearchSnapshot {
  domains: DomainTable;
  committed: Commitments;
}

export interface FeasibilityOptions {
  /** Node ceiling; exceeding it gives an inconclusive result */
  maxNodes: number;
  debugLevel?: number;
}

export interface AsyncFeasibilityOptions extends FeasibilityOptions {
  /** Nodes explored between two yields to the event loop */
  yieldEvery: number;
  signal?: AbortSignal;
  onProgress?: (progress: SearchProgress) => void;
}

interface SearchContext {
  puzzle: PuzzleModel;
  maxNodes: number;
  yieldEvery: number;
  signal?: AbortSignal;
  debugLevel: number;
  stats: SearchStats;
  conflicts: Set<number>;
  startedAt: number;
}

type RootOutcome =
  | { kind: 'ready'; domains: DomainTable; committed: (number | null)[] }
  | { kind: 'refuted'; conflicts: number[] };

function sleep(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

function createContext(puzzle: PuzzleModel, options: FeasibilityOptions, yieldEvery: number, signal?: AbortSignal): SearchContext {
  return {
    puzzle,
    maxNodes: options.maxNodes,
    yieldEvery,
    signal,
    debugLevel: options.debugLevel ?? 0,
    stats: { nodes: 0, backtracks: 0, prunes: 0, timeMs: 0 },
    conflicts: new Set<number>(),
    startedAt: Date.now(),
  };
}

function progressOf(ctx: SearchContext, depth: number): SearchProgress {
  return {
    nodes: ctx.stats.nodes,
    backtracks: ctx.stats.backtracks,
    prunes: ctx.stats.prunes,
    depth,
    elapsedMs: Date.now() - ctx.startedAt,
  };
}

/**
 * Settle the snapshot again and run the counting check before branching.
 */
function prepareRoot(ctx: SearchContext, snapshot: SearchSnapshot): RootOutcome {
  const domains = snapshot.domains.fork();
  const committed = snapshot.committed.slice();
  const dirty = committed.flatMap((value, v) => (value === null ? [] : [v]));

  const result = propagate(ctx.puzzle, { domains, committed }, dirty, ctx.debugLevel);
  if (result.kind === 'contradiction') {
    return { kind: 'refuted', conflicts: result.constraints };
  }

  const implausible = checkPlausibility(ctx.puzzle, domains, committed);
  if (implausible.length > 0) {
    return { kind: 'refuted', conflicts: implausible };
  }

  return { kind: 'ready', domains, committed };
}

/**
 * Depth-first search for one completion. Yields progress every
 * `yieldEvery` nodes and returns whether a completion exists.
 */
function* explore(
  ctx: SearchContext,
  domains: DomainTable,
  committed: (number | null)[],
  depth: number
): Generator<SearchProgress, boolean, void> {
  const variable = selectNextVariable(ctx.puzzle, domains, committed);
  if (variable < 0) {
    return ctx.puzzle.constraints.every((c) => checkConstraint(c, committed) === 'satisfied');
  }

  for (const value of domains.get(variable)) {
    ctx.stats.nodes++;
    if (ctx.stats.nodes > ctx.maxNodes) {
      throw new SearchCeilingExceeded(ctx.stats.nodes);
    }
    if (ctx.stats.nodes % ctx.yieldEvery === 0) {
      yield progressOf(ctx, depth);
      if (ctx.signal?.aborted) {
        throw new AbortError();
      }
    }

    const child = domains.fork();
    child.set(variable, [value]);
    committed[variable] = value;

    let found = false;
    const result = propagate(ctx.puzzle, { domains: child, committed }, [variable]);
    if (result.kind === 'contradiction') {
      ctx.stats.prunes++;
      result.constraints.forEach((c) => ctx.conflicts.add(c));
    } else {
      const implausible = checkPlausibility(ctx.puzzle, child, committed);
      if (implausible.length > 0) {
        ctx.stats.prunes++;
        implausible.forEach((c) => ctx.conflicts.add(c));
      } else {
        found = yield* explore(ctx, child, committed, depth + 1);
      }
    }

    committed[variable] = null;
    if (found) return true;
    ctx.stats.backtracks++;
  }

  return false;
}

function finish(ctx: SearchContext, found: boolean): FeasibilityResult {
  const stats = { ...ctx.stats, timeMs: Date.now() - ctx.startedAt };
  if (ctx.debugLevel > 0) {
    console.log(
      `[FEASIBILITY] ${found ? 'Completion found' : 'No completion'} after ${stats.nodes} nodes, ${stats.backtracks} backtracks`
    );
  }
  if (found) {
    return { kind: 'feasible', stats };
  }
  return { kind: 'infeasible', conflicts: sortedConflicts(ctx.conflicts), stats };
}

function refuted(ctx: SearchContext, conflicts: number[]): FeasibilityResult {
  if (ctx.debugLevel > 0) {
    console.log(`[FEASIBILITY] Refuted before search: constraints ${conflicts.join(', ')}`);
  }
  return {
    kind: 'infeasible',
    conflicts: sortedConflicts(conflicts),
    stats: { ...ctx.stats, timeMs: Date.now() - ctx.startedAt },
  };
}

function interrupted(ctx: SearchContext, error: unknown): FeasibilityResult {
  const stats = { ...ctx.stats, timeMs: Date.now() - ctx.startedAt };
  if (error instanceof SearchCeilingExceeded) {
    if (ctx.debugLevel > 0) {
      console.log(`[FEASIBILITY] Node ceiling of ${ctx.maxNodes} reached`);
    }
    return { kind: 'inconclusive', stats };
  }
  if (error instanceof AbortError) {
    if (ctx.debugLevel > 1) {
      console.log(`[FEASIBILITY] Cancelled after ${stats.nodes} nodes`);
    }
    return { kind: 'cancelled', stats };
  }
  throw error;
}

function sortedConflicts(conflicts: Iterable<number>): number[] {
  return Array.from(new Set(conflicts)).sort((a, b) => a - b);
}

/**
 * Decide whether the snapshot extends to a full assignment satisfying every
 * constraint. Runs to completion on the calling thread.
 */
export function checkFeasibility(
  puzzle: PuzzleModel,
  snapshot: SearchSnapshot,
  options: FeasibilityOptions
): FeasibilityResult {
  const ctx = createContext(puzzle, options, Infinity);
  try {
    const root = prepareRoot(ctx, snapshot);
    if (root.kind === 'refuted') {
      return refuted(ctx, root.conflicts);
    }

    const search = explore(ctx, root.domains, root.committed, 0);
    let step = search.next();
    while (!step.done) {
      step = search.next();
    }
    return finish(ctx, step.value);
  } catch (error) {
    return interrupted(ctx, error);
  }
}

/**
 * Same search, yielding to the event loop every `yieldEvery` nodes so it can
 * run behind a session. Aborting the signal gives a cancelled result.
 */
export async function checkFeasibilityAsync(
  puzzle: PuzzleModel,
  snapshot: SearchSnapshot,
  options: AsyncFeasibilityOptions
): Promise<FeasibilityResult> {
  const ctx = createContext(puzzle, options, options.yieldEvery, options.signal);
  try {
    if (options.signal?.aborted) {
      throw new AbortError();
    }

    const root = prepareRoot(ctx, snapshot);
    if (root.kind === 'refuted') {
      return refuted(ctx, root.conflicts);
    }

    const search = explore(ctx, root.domains, root.committed, 0);
    let step = search.next();
    while (!step.done) {
      options.onProgress?.(step.value);
      await sleep();
      step = search.next();
    }
    return finish(ctx, step.value);
  } catch (error) {
    return interrupted(ctx, error);
  }
}
