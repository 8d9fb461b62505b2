/**
 * Error kinds raised by the engine
 */

/**
 * Structural defect in a puzzle definition. Returned by `loadPuzzle`,
 * thrown only by `loadPuzzleOrThrow`.
 */
export class MalformedPuzzleError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Malformed puzzle: ${issues.join('; ')}`);
    this.name = 'MalformedPuzzleError';
    this.issues = issues;
  }
}

/** Feasibility search went past its node ceiling */
export class SearchCeilingExceeded extends Error {
  readonly nodes: number;

  constructor(nodes: number) {
    super(`Search ceiling exceeded after ${nodes} nodes`);
    this.name = 'SearchCeilingExceeded';
    this.nodes = nodes;
  }
}

export class AbortError extends Error {
  constructor() {
    super('Feasibility search aborted');
    this.name = 'AbortError';
  }
}

/** Edit names an unknown variable or a value outside its starting domain */
export class InvalidEditError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidEditError';
  }
}
