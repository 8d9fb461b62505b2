import { createEngineConfig, EngineConfig } from '../config/engine';
import { InvalidEditError } from '../model/errors';
import type {
  AssignmentSnapshot,
  FeasibilityResult,
  PuzzleModel,
  SessionState,
  SessionStatus,
  Variable,
} from '../model/types';
import { checkConstraint } from '../solver/constraints';
import { checkFeasibility, checkFeasibilityAsync, SearchSnapshot } from '../solver/feasibility';
import { rootFixpoint } from '../solver/propagate';
import { AssignmentState } from './assignment';

export type StatusListener = (status: SessionStatus) => void;

export interface SessionOptions {
  config?: Partial<EngineConfig>;
  /** Committed values from an earlier `snapshot()` */
  restore?: AssignmentSnapshot;
  onStatus?: StatusListener;
}

/**
 * Validation session: takes edits against one puzzle and reports, after each
 * one, whether the assignment is still completable.
 */
export class ValidationSession {
  readonly puzzle: PuzzleModel;
  readonly config: EngineConfig;

  private readonly assignment: AssignmentState;
  private readonly listeners = new Set<StatusListener>();
  private current: SessionStatus;
  private generation = 0;
  private searching = false;
  private inFlight: Promise<void> = Promise.resolve();
  private controller: AbortController | null = null;
  private closed = false;

  constructor(puzzle: PuzzleModel, options: SessionOptions = {}) {
    this.puzzle = puzzle;
    this.config = createEngineConfig(options.config);
    this.assignment = new AssignmentState(puzzle, rootFixpoint(puzzle, this.config.debugLevel), this.config.debugLevel);
    this.current = makeStatus('InProgress');

    if (options.onStatus) {
      this.listeners.add(options.onStatus);
    }

    if (options.restore) {
      this.assignment.restore(this.resolveSnapshot(options.restore));
      this.evaluate(false);
    } else if (this.assignment.contradiction) {
      this.current = this.violatedStatus();
    }
  }

  get status(): SessionStatus {
    return this.current;
  }

  /**
   * Commit a value to a variable, or clear it with `null`
   */
  edit(variableId: string, value: number | null): SessionStatus {
    const variable = this.resolveVariable(variableId);
    if (value !== null && !variable.domain.includes(value)) {
      throw new InvalidEditError(`Value ${value} is outside the domain of "${variableId}"`);
    }

    const narrowing = this.assignment.apply(variable.index, value);
    const status = this.evaluate(narrowing);
    if (this.config.debugLevel > 0) {
      console.log(`[SESSION] edit ${variableId}=${value ?? 'clear'} -> ${summarize(status)}`);
    }
    return status;
  }

  /**
   * Walk back the variable's last edit. Always accepted.
   */
  undo(variableId: string): SessionStatus {
    const variable = this.resolveVariable(variableId);
    this.assignment.revert(variable.index);
    const status = this.evaluate(false);
    if (this.config.debugLevel > 0) {
      console.log(`[SESSION] undo ${variableId} -> ${summarize(status)}`);
    }
    return status;
  }

  value(variableId: string): number | null {
    return this.assignment.committed[this.resolveVariable(variableId).index];
  }

  /** Current candidate values of a variable, ascending */
  candidates(variableId: string): readonly number[] {
    return this.assignment.domains.get(this.resolveVariable(variableId).index);
  }

  snapshot(): AssignmentSnapshot {
    const committed: Record<string, number> = {};
    this.assignment.committed.forEach((value, v) => {
      if (value !== null) committed[this.puzzle.variables[v].id] = value;
    });
    return { puzzleId: this.puzzle.id, committed };
  }

  /**
   * Listen for status changes, including background results. Returns an unsubscribe function.
   */
  onStatus(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves with the status once no background search is running */
  async settled(): Promise<SessionStatus> {
    while (this.searching) {
      await this.inFlight;
    }
    return this.current;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.generation++;
    this.controller?.abort();
    this.listeners.clear();
  }

  // ===== Pipeline =====

  private evaluate(narrowing: boolean): SessionStatus {
    this.generation++;

    if (this.assignment.contradiction) {
      return this.publish(this.violatedStatus());
    }

    if (this.isSolved()) {
      return this.publish(makeStatus('Solved'));
    }

    // Committing more values cannot make an infeasible assignment feasible
    if (narrowing && this.current.state === 'Infeasible') {
      return this.publish(makeStatus('Infeasible', this.current.implicated));
    }

    switch (this.config.feasibility) {
      case 'off':
        return this.publish(makeStatus('InProgress'));
      case 'sync': {
        const result = checkFeasibility(this.puzzle, this.searchSnapshot(), {
          maxNodes: this.config.maxSearchNodes,
          debugLevel: this.config.debugLevel,
        });
        return this.publish(this.feasibilityStatus(result));
      }
      case 'background': {
        const status = this.publish({ ...makeStatus('InProgress'), pending: true });
        this.scheduleSearch();
        return status;
      }
    }
  }

  private isSolved(): boolean {
    const committed = this.assignment.committed;
    return (
      this.assignment.isComplete() &&
      this.puzzle.constraints.every((c) => checkConstraint(c, committed) === 'satisfied')
    );
  }

  private scheduleSearch(): void {
    if (this.searching || this.closed) return;
    this.searching = true;
    this.inFlight = this.runSearches();
  }

  /**
   * Search until a result matches the latest generation. At most one search
   * runs at a time; a stale result is dropped and the search restarts.
   */
  private async runSearches(): Promise<void> {
    try {
      while (!this.closed && this.current.pending) {
        const generation = this.generation;
        const controller = new AbortController();
        this.controller = controller;

        let result: FeasibilityResult;
        try {
          result = await checkFeasibilityAsync(this.puzzle, this.searchSnapshot(), {
            maxNodes: this.config.maxSearchNodes,
            yieldEvery: this.config.yieldEvery,
            signal: controller.signal,
            debugLevel: this.config.debugLevel,
          });
        } catch (error) {
          console.error('[SESSION] Background feasibility search failed:', error);
          if (generation !== this.generation) continue;
          this.publish({ ...makeStatus('InProgress'), caveat: true });
          return;
        }

        if (result.kind === 'cancelled') return;

        if (generation !== this.generation) {
          if (this.config.debugLevel > 1) {
            console.log(`[SESSION] Discarding stale result of generation ${generation}`);
          }
          continue;
        }

        this.publish(this.feasibilityStatus(result));
      }
    } finally {
      this.searching = false;
      this.controller = null;
    }
  }

  private searchSnapshot(): SearchSnapshot {
    return {
      domains: this.assignment.domains.fork(),
      committed: this.assignment.committed.slice(),
    };
  }

  private feasibilityStatus(result: FeasibilityResult): SessionStatus {
    switch (result.kind) {
      case 'feasible':
        return makeStatus('InProgress');
      case 'infeasible': {
        const variables = new Set<number>();
        for (const ci of result.conflicts) {
          for (const v of this.puzzle.constraints[ci].scope) variables.add(v);
        }
        return makeStatus('Infeasible', this.implicated(variables, result.conflicts));
      }
      case 'inconclusive':
      case 'cancelled':
        return { ...makeStatus('InProgress'), caveat: true };
    }
  }

  private violatedStatus(): SessionStatus {
    const contradiction = this.assignment.contradiction;
    if (!contradiction) {
      return makeStatus('InProgress');
    }
    return makeStatus('Violated', this.implicated(contradiction.variables, contradiction.constraints));
  }

  /** Ids in model order */
  private implicated(variables: Iterable<number>, constraints: Iterable<number>): SessionStatus['implicated'] {
    const ordered = (indices: Iterable<number>) => Array.from(new Set(indices)).sort((a, b) => a - b);
    return {
      variables: ordered(variables).map((v) => this.puzzle.variables[v].id),
      constraints: ordered(constraints).map((c) => this.puzzle.constraints[c].id),
    };
  }

  private publish(status: SessionStatus): SessionStatus {
    this.current = status;
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(status);
      } catch (error) {
        console.error('[SESSION] Status listener failed:', error);
      }
    }
    return status;
  }

  private resolveVariable(variableId: string): Variable {
    if (this.closed) {
      throw new InvalidEditError('Session is closed');
    }
    const index = this.puzzle.variableIndex.get(variableId);
    if (index === undefined) {
      throw new InvalidEditError(`Unknown variable "${variableId}"`);
    }
    return this.puzzle.variables[index];
  }

  private resolveSnapshot(snapshot: AssignmentSnapshot): (number | null)[] {
    if (snapshot.puzzleId !== undefined && this.puzzle.id !== undefined && snapshot.puzzleId !== this.puzzle.id) {
      throw new InvalidEditError(`Snapshot belongs to puzzle "${snapshot.puzzleId}", not "${this.puzzle.id}"`);
    }
    const values: (number | null)[] = this.puzzle.variables.map(() => null);
    for (const [variableId, value] of Object.entries(snapshot.committed)) {
      const variable = this.resolveVariable(variableId);
      if (!variable.domain.includes(value)) {
        throw new InvalidEditError(`Value ${value} is outside the domain of "${variableId}"`);
      }
      values[variable.index] = value;
    }
    return values;
  }
}

function makeStatus(state: SessionState, implicated: SessionStatus['implicated'] = { variables: [], constraints: [] }): SessionStatus {
  return {
    state,
    implicated: { variables: [...implicated.variables], constraints: [...implicated.constraints] },
    caveat: false,
    pending: false,
  };
}

function summarize(status: SessionStatus): string {
  const flags = [status.caveat ? 'caveat' : '', status.pending ? 'pending' : ''].filter(Boolean);
  return flags.length > 0 ? `${status.state} (${flags.join(', ')})` : status.state;
}
