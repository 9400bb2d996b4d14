import fs from 'node:fs';
import type { FeatureSummary } from '../types/osm';
import type { ModelCatalog, PlacementRecord } from '../types/scene';
import { resolveRng, type Rng } from '../utils/random';
import { extractFeaturesFromXml, hasFeatures, summarizeFeatures } from './extractor';
import { planPlacements } from './placements';
import { patchSceneFile } from './scenePatcher';

export interface EnhanceOptions {
  osmPath: string;
  worldPath: string;
  scale?: number; // must match the scale the terrain mesh was written with
  seed?: number;
  rng?: Rng; // takes precedence over seed
  catalog?: ModelCatalog;
}

export interface EnhanceResult {
  ok: boolean;
  changed: boolean;
  message: string;
  summary?: FeatureSummary;
  backupPath?: string;
  placements?: PlacementRecord[];
}

const fail = (message: string): EnhanceResult => {
  console.error(`[ENHANCE] ${message}`);
  return { ok: false, changed: false, message };
};

/**
 * Add benches, trees and woods from an OSM extract to an existing world file.
 * Every failure comes back as `{ ok: false }`; nothing is thrown.
 */
export function enhanceWorld({ osmPath, worldPath, scale = 1.0, seed, rng, catalog }: EnhanceOptions): EnhanceResult {
  if (!(Number.isFinite(scale) && scale > 0)) {
    return fail(`Invalid scale: ${scale} (must be a positive number)`);
  }

  if (!fs.existsSync(worldPath)) {
    return fail(`World file not found: ${worldPath}`);
  }

  let xml: string;
  try {
    xml = fs.readFileSync(osmPath, 'utf8');
  } catch (error) {
    return fail(`Could not read OSM file ${osmPath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }

  const { features, error } = extractFeaturesFromXml(xml, scale);
  if (error !== undefined) {
    return fail(`Failed to extract features: ${error}`);
  }

  const summary = summarizeFeatures(features);
  if (!hasFeatures(features)) {
    const message = 'No nature features found to add';
    console.warn(`[ENHANCE] ${message}`);
    return { ok: true, changed: false, message, summary };
  }

  try {
    const placements = planPlacements(features, { scale, rng: rng ?? resolveRng(seed), catalog });
    const { backupPath } = patchSceneFile(worldPath, placements);
    const message = `Enhanced world file with ${placements.length} nature models (backup saved as ${backupPath})`;
    console.log(`[ENHANCE] ${message}`);
    return { ok: true, changed: true, message, summary, backupPath, placements };
  } catch (error) {
    return fail(error instanceof Error ? error.message : 'Unknown error');
  }
}
