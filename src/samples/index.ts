/**
 * Sample puzzles shipped with the engine
 */

import { readFileSync } from 'fs';
import path from 'path';
import { MalformedPuzzleError } from '../model/errors';
import { loadPuzzleOrThrow } from '../model/load';
import { parseGridSpecYaml } from '../model/parser';
import type { PuzzleDefinition, PuzzleModel } from '../model/types';

export const SAMPLE_IDS = ['mini-sudoku', 'region-sums', 'futoshiki', 'pigeonhole'] as const;

export type SampleId = (typeof SAMPLE_IDS)[number];

const SAMPLES_DIR = path.resolve(__dirname, '../../samples');

export function sampleYaml(id: SampleId): string {
  return readFileSync(path.join(SAMPLES_DIR, `${id}.yaml`), 'utf8');
}

export function sampleDefinition(id: SampleId): PuzzleDefinition {
  const result = parseGridSpecYaml(sampleYaml(id));
  if (!result.success) {
    throw new MalformedPuzzleError([`sample ${id}: ${result.error}`]);
  }
  return result.value;
}

export function loadSample(id: SampleId): PuzzleModel {
  return loadPuzzleOrThrow(sampleDefinition(id));
}
