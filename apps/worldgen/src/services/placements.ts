import { DEFAULT_CATALOG, DEFAULT_TREE_HEIGHT_M } from '../config';
import type { ExtractedFeatures } from '../types/osm';
import type { ModelCatalog, PlacementRecord } from '../types/scene';
import type { Rng } from '../utils/random';
import { createProjector } from './projector';
import { synthesizeWood } from './synthesizer';

export interface PlanOptions {
  scale: number;
  rng: Rng;
  catalog?: ModelCatalog;
}

/**
 * Lay out every extracted feature as a placement: benches first, then
 * individual trees, then woods. Names carry the category and a 1-based index
 * so they stay unique within one run.
 */
export function planPlacements(features: ExtractedFeatures, { scale, rng, catalog = DEFAULT_CATALOG }: PlanOptions): PlacementRecord[] {
  const project = createProjector(features.reference, scale);
  const records: PlacementRecord[] = [];

  features.benches.forEach((bench, i) => {
    const [x, y] = project(bench);
    records.push({ name: `bench_${i + 1}`, category: 'bench', modelUri: catalog.bench, x, y, scale: 1, static: true });
  });

  features.trees.forEach((tree, i) => {
    const [x, y] = project(tree);
    records.push({
      name: `tree_${i + 1}`,
      category: 'tree',
      modelUri: tree.species === 'coniferous' ? catalog.coniferous : catalog.deciduous,
      x,
      y,
      scale: tree.heightMeters / DEFAULT_TREE_HEIGHT_M,
      static: true,
    });
  });

  features.woods.forEach((wood, i) => {
    records.push(...synthesizeWood(wood, i + 1, project, rng, catalog));
  });

  return records;
}
