import { ZodError } from 'zod';
import { createEngineConfig, DEFAULT_ENGINE_CONFIG } from '../engine';

describe('createEngineConfig', () => {
  it('should return the defaults without overrides', () => {
    expect(createEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(DEFAULT_ENGINE_CONFIG).toEqual({
      feasibility: 'sync',
      maxSearchNodes: 200_000,
      yieldEvery: 500,
      debugLevel: 0,
    });
  });

  it('should merge overrides', () => {
    expect(createEngineConfig({ feasibility: 'background', debugLevel: 2 })).toEqual({
      feasibility: 'background',
      maxSearchNodes: 200_000,
      yieldEvery: 500,
      debugLevel: 2,
    });
  });

  it('should reject out-of-range values', () => {
    expect(() => createEngineConfig({ maxSearchNodes: 0 })).toThrow(ZodError);
    expect(() => createEngineConfig({ yieldEvery: 1.5 })).toThrow(ZodError);
  });
});
