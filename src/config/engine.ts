/**
 * Engine Configuration
 *
 * Defaults and factory for the settings a validation session runs with.
 */

import { z } from 'zod';

// =============================================================================
// Schema
// =============================================================================

export const EngineConfigSchema = z.object({
  /**
   * How feasibility is checked after each edit:
   * - sync: on the calling thread, before `edit` returns
   * - background: after `edit` returns; the status is marked pending until it reports
   * - off: propagation only
   */
  feasibility: z.enum(['sync', 'background', 'off']),
  /** Search nodes before the verdict is reported as inconclusive */
  maxSearchNodes: z.number().int().positive(),
  /** Nodes between two yields to the event loop in background mode */
  yieldEvery: z.number().int().positive(),
  debugLevel: z.union([z.literal(0), z.literal(1), z.literal(2)]), // 0=off, 1=basic, 2=verbose
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type FeasibilityMode = EngineConfig['feasibility'];

// =============================================================================
// Default Configuration
// =============================================================================

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  feasibility: 'sync',
  maxSearchNodes: 200_000,
  yieldEvery: 500,
  debugLevel: 0,
};

// =============================================================================
// Configuration Factory
// =============================================================================

/**
 * Create engine config with overrides. Throws a ZodError on out-of-range values.
 */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return EngineConfigSchema.parse({
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
  });
}
