import { DomainTable } from '../model/domain';
import type { Commitments, PropagationResult, PuzzleModel } from '../model/types';
import { emptyCommitments, initialDomains, propagate, RootState, settleCommitments } from '../solver/propagate';

export type Contradiction = Extract<PropagationResult, { kind: 'contradiction' }>;

/**
 * Committed values and candidate domains of one session.
 *
 * Each variable keeps a history of the values it held before every edit, so
 * `revert` walks back one edit at a time.
 */
export class AssignmentState {
  private readonly values: (number | null)[];
  private readonly history: (number | null)[][];
  private live: DomainTable;
  private conflict: Contradiction | null;

  constructor(
    private readonly puzzle: PuzzleModel,
    private readonly root: RootState,
    private readonly debugLevel = 0
  ) {
    this.values = emptyCommitments(puzzle);
    this.history = puzzle.variables.map(() => []);
    this.live = root.domains.fork();
    this.conflict = root.result.kind === 'contradiction' ? root.result : null;
  }

  get committed(): Commitments {
    return this.values;
  }

  get domains(): DomainTable {
    return this.live;
  }

  get contradiction(): Contradiction | null {
    return this.conflict;
  }

  isComplete(): boolean {
    return this.values.every((value) => value !== null);
  }

  /**
   * Set or clear a variable and settle. Returns whether the edit only
   * committed a previously open variable.
   */
  apply(variable: number, value: number | null): boolean {
    const previous = this.values[variable];
    this.history[variable].push(previous);
    this.values[variable] = value;

    const narrowing = value !== null && previous === null;
    if (narrowing && this.conflict === null) {
      const domains = this.live.fork();
      domains.set(variable, [value]);
      const result = propagate(this.puzzle, { domains, committed: this.values }, [variable], this.debugLevel);
      this.live = domains;
      this.conflict = result.kind === 'contradiction' ? result : null;
    } else {
      this.rebuild();
    }
    return narrowing;
  }

  /**
   * Undo the variable's last edit. With no edit left the variable is cleared.
   */
  revert(variable: number): void {
    this.values[variable] = this.history[variable].pop() ?? null;
    this.rebuild();
  }

  /** Load committed values without recording history */
  restore(values: Commitments): void {
    values.forEach((value, v) => {
      this.values[v] = value;
    });
    this.history.forEach((entries) => {
      entries.length = 0;
    });
    this.rebuild();
  }

  /**
   * Recompute from the root fixed point with every commitment as a singleton
   */
  private rebuild(): void {
    if (this.root.result.kind === 'contradiction') {
      const domains = initialDomains(this.puzzle);
      const dirty = this.puzzle.variables.map((v) => v.index);
      this.values.forEach((value, v) => {
        if (value !== null) domains.set(v, [value]);
      });
      const result = propagate(this.puzzle, { domains, committed: this.values }, dirty, this.debugLevel);
      this.live = domains;
      this.conflict = result.kind === 'contradiction' ? result : null;
      return;
    }

    const settled = settleCommitments(this.puzzle, this.root.domains, this.values, this.debugLevel);
    this.live = settled.domains;
    this.conflict = settled.result.kind === 'contradiction' ? settled.result : null;
  }
}
