/**
 * Parser for YAML/JSON puzzle files
 */

import YAML from 'yaml';
import { MalformedPuzzleError } from './errors';
import { buildGridDefinition } from './grid';
import { formatIssues, GridSpecSchema, PuzzleDefinitionSchema } from './schema';
import type { ConstraintDefinition, PuzzleDefinition } from './types';

export type ParseResult<T> = { success: true; value: T } | { success: false; error: string };

function readDocument(input: string): ParseResult<unknown> {
  let data: unknown;
  try {
    // JSON is valid YAML, so one parser covers both
    data = YAML.parse(input);
  } catch (error) {
    return { success: false, error: `Invalid YAML: ${error instanceof Error ? error.message : String(error)}` };
  }
  if (data === null || data === undefined) {
    return { success: false, error: 'Empty puzzle specification' };
  }
  return { success: true, value: data };
}

/**
 * Parse a variable/constraint definition
 */
export function parseDefinitionYaml(input: string): ParseResult<PuzzleDefinition> {
  const document = readDocument(input);
  if (!document.success) return document;

  const parsed = PuzzleDefinitionSchema.safeParse(document.value);
  if (!parsed.success) {
    return { success: false, error: formatIssues(parsed.error).join('; ') };
  }
  return { success: true, value: parsed.data };
}

/**
 * Parse a grid spec and expand it into a definition
 */
export function parseGridSpecYaml(input: string): ParseResult<PuzzleDefinition> {
  const document = readDocument(input);
  if (!document.success) return document;

  const parsed = GridSpecSchema.safeParse(document.value);
  if (!parsed.success) {
    return { success: false, error: formatIssues(parsed.error).join('; ') };
  }

  try {
    return { success: true, value: buildGridDefinition(parsed.data) };
  } catch (error) {
    if (error instanceof MalformedPuzzleError) {
      return { success: false, error: error.issues.join('; ') };
    }
    throw error;
  }
}

/**
 * Serialize a definition to YAML; `parseDefinitionYaml` reads it back
 */
export function definitionToYaml(definition: PuzzleDefinition): string {
  const document: Record<string, unknown> = {};
  if (definition.id !== undefined) document.id = definition.id;
  if (definition.name !== undefined) document.name = definition.name;
  document.variables = definition.variables.map((v) => ({ id: v.id, domain: [...v.domain] }));
  document.constraints = definition.constraints.map(toPlainConstraint);
  return YAML.stringify(document);
}

function toPlainConstraint(constraint: ConstraintDefinition): Record<string, unknown> {
  const plain: Record<string, unknown> = { ...constraint, scope: [...constraint.scope] };
  if (constraint.id === undefined) delete plain.id;
  return plain;
}
