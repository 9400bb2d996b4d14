import { describe, it, expect } from 'vitest';
import { DEFAULT_CATALOG, loadConfig } from './config';

describe('loadConfig', () => {
  it('reads scale and seed from the environment', () => {
    expect(loadConfig({ WORLDGEN_SCALE: '2.5', WORLDGEN_SEED: '7' })).toEqual({ scale: 2.5, seed: 7 });
  });

  it('falls back to defaults for missing or invalid values', () => {
    const config = loadConfig({ WORLDGEN_SCALE: '-1', WORLDGEN_SEED: 'abc' });
    expect(config.scale).toBe(1);
    expect(config.seed).toBeUndefined();
    expect(loadConfig({}).scale).toBe(1);
  });
});

describe('DEFAULT_CATALOG', () => {
  it('has three distinct model URIs', () => {
    const uris = Object.values(DEFAULT_CATALOG);
    expect(uris).toHaveLength(3);
    expect(new Set(uris).size).toBe(3);
  });
});
