/**
 * Puzzle feasibility engine
 *
 * Load a puzzle, open a validation session, and read a status after every edit.
 */

import type { PuzzleModel, SessionStatus } from './model/types';
import { SessionOptions, ValidationSession } from './session/session';

export * from './model/types';
export { MalformedPuzzleError, SearchCeilingExceeded, AbortError, InvalidEditError } from './model/errors';
export { DomainTable } from './model/domain';
export { loadPuzzle, loadPuzzleOrThrow } from './model/load';
export type { LoadResult } from './model/load';
export { buildGridDefinition, HOLE } from './model/grid';
export type { GridSpec, RegionRule } from './model/grid';
export { parseDefinitionYaml, parseGridSpecYaml, definitionToYaml } from './model/parser';
export type { ParseResult } from './model/parser';
export { PuzzleDefinitionSchema, GridSpecSchema } from './model/schema';
export { createEngineConfig, DEFAULT_ENGINE_CONFIG, EngineConfigSchema } from './config/engine';
export type { EngineConfig, FeasibilityMode } from './config/engine';
export { checkConstraint } from './solver/constraints';
export { propagate, rootFixpoint } from './solver/propagate';
export { checkFeasibility, checkFeasibilityAsync } from './solver/feasibility';
export type { SearchSnapshot, FeasibilityOptions, AsyncFeasibilityOptions } from './solver/feasibility';
export { ValidationSession } from './session/session';
export type { SessionOptions, StatusListener } from './session/session';
export { validateDefinition } from './validator/validateDefinition';
export { validateAssignment } from './validator/validateAssignment';
export { SAMPLE_IDS, loadSample, sampleDefinition } from './samples';
export type { SampleId } from './samples';

export function openSession(puzzle: PuzzleModel, options?: SessionOptions): ValidationSession {
  return new ValidationSession(puzzle, options);
}

/** Commit `value` to a variable, or clear it with `null` */
export function edit(session: ValidationSession, variableId: string, value: number | null): SessionStatus {
  return session.edit(variableId, value);
}

export function undo(session: ValidationSession, variableId: string): SessionStatus {
  return session.undo(variableId);
}
