/**
 * Zod schemas for loader input
 */

import { z } from 'zod';
import type { ConstraintOp } from './types';

/** Accepts the ASCII spellings loaders commonly emit */
export const ConstraintOpSchema = z
  .enum(['=', '==', '<', '>', '≠', '!='])
  .transform((op): ConstraintOp => {
    if (op === '==') return '=';
    if (op === '!=') return '≠';
    return op;
  });

const VariableRefSchema = z.string().min(1);
const ConstraintIdSchema = z.string().min(1).optional();
const IntSchema = z.number().int();

export const VariableDefinitionSchema = z.object({
  id: z.string().min(1),
  domain: z.array(IntSchema),
});

export const ConstraintDefinitionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('all_different'),
    id: ConstraintIdSchema,
    scope: z.array(VariableRefSchema),
  }),
  z.object({
    kind: z.literal('all_equal'),
    id: ConstraintIdSchema,
    scope: z.array(VariableRefSchema),
  }),
  z.object({
    kind: z.literal('sum'),
    id: ConstraintIdSchema,
    scope: z.array(VariableRefSchema),
    op: ConstraintOpSchema.default('='),
    value: IntSchema,
  }),
  z.object({
    kind: z.literal('compare'),
    id: ConstraintIdSchema,
    scope: z.tuple([VariableRefSchema, VariableRefSchema]),
    op: ConstraintOpSchema,
  }),
  z.object({
    kind: z.literal('difference'),
    id: ConstraintIdSchema,
    scope: z.tuple([VariableRefSchema, VariableRefSchema]),
    op: ConstraintOpSchema.default('='),
    value: IntSchema,
  }),
  z.object({
    kind: z.literal('given'),
    id: ConstraintIdSchema,
    scope: z.tuple([VariableRefSchema]),
    value: IntSchema,
  }),
]);

export const PuzzleDefinitionSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  variables: z.array(VariableDefinitionSchema),
  constraints: z.array(ConstraintDefinitionSchema).default([]),
});

export type PuzzleDefinitionInput = z.input<typeof PuzzleDefinitionSchema>;

// ===== Grid spec =====

const GridCellSchema = z.tuple([IntSchema, IntSchema]);

/** Per-region rule, same vocabulary as region clues on a grid */
export const RegionRuleSchema = z.object({
  sum: IntSchema.optional(),
  op: ConstraintOpSchema.optional(),
  value: IntSchema.optional(),
  all_equal: z.boolean().optional(),
  all_different: z.boolean().optional(),
});

export const GridSpecSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  rows: IntSchema.positive(),
  cols: IntSchema.positive(),
  values: z.union([
    z.array(IntSchema).min(1),
    z.object({ min: IntSchema, max: IntSchema }),
  ]),
  /** Region id grid; -1 marks a hole */
  regions: z.array(z.array(IntSchema)).optional(),
  constraints: z.record(z.string(), RegionRuleSchema).optional(),
  distinctRows: z.boolean().optional(),
  distinctCols: z.boolean().optional(),
  distinctNeighbors: z.boolean().optional(),
  givens: z.array(z.tuple([IntSchema, IntSchema, IntSchema])).optional(),
  inequalities: z
    .array(z.object({ a: GridCellSchema, b: GridCellSchema, op: ConstraintOpSchema }))
    .optional(),
  differences: z
    .array(
      z.object({
        a: GridCellSchema,
        b: GridCellSchema,
        op: ConstraintOpSchema.default('='),
        value: IntSchema,
      })
    )
    .optional(),
});

/**
 * Flatten zod issues into "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
