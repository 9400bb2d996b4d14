import type { ModelCatalog } from './types/scene';

export const EARTH_RADIUS_M = 6_371_000;

export const DEFAULT_CATALOG: Readonly<ModelCatalog> = {
  bench: 'model://FoodCourtBenchLong',
  deciduous: 'model://Tree',
  coniferous: 'model://PineTree',
};

export const DEFAULT_TREE_HEIGHT_M = 5.0;

export const WOOD_SYNTHESIS = {
  largeAreaM2: 5000, // strictly above this a wood gets a grid of proxies
  areaPerProxyM2: 500,
  maxProxies: 20,
  gridCellM: 10,
  jitterM: 5,
  minProxyScale: 0.8,
  maxProxyScale: 1.3,
  smallAreaDivisor: 1000,
  minSmallScale: 1.0,
  maxSmallScale: 2.0,
} as const;

export const WORLD_CLOSING_TAG = '</world>';
export const FEATURES_MARKER = '<!-- Enhanced nature features -->';
export const BACKUP_SUFFIX = '.bak';

export interface WorldgenConfig {
  scale: number;
  seed?: number;
}

// WORLDGEN_SCALE must match the scale the terrain mesh was written with
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorldgenConfig {
  const scale = Number(env.WORLDGEN_SCALE);
  const seed = Number.parseInt(env.WORLDGEN_SEED ?? '', 10);
  return {
    scale: Number.isFinite(scale) && scale > 0 ? scale : 1.0,
    seed: Number.isFinite(seed) ? seed : undefined,
  };
}
