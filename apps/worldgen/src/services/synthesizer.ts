import { WOOD_SYNTHESIS as W } from '../config';
import type { Projector } from '../types/geo';
import type { TreeSpecies, WoodPolygon } from '../types/osm';
import type { ModelCatalog, PlacementRecord } from '../types/scene';
import { centroid, clamp } from '../utils/geometry';
import { randRange, type Rng } from '../utils/random';

export const isLargeWood = (wood: WoodPolygon): boolean => wood.areaM2 > W.largeAreaM2;

export const proxyCount = (areaM2: number): number =>
  Math.min(W.maxProxies, Math.floor(areaM2 / W.areaPerProxyM2));

export const smallWoodScale = (areaM2: number): number =>
  clamp(areaM2 / W.smallAreaDivisor, W.minSmallScale, W.maxSmallScale);

const treeModel = (species: TreeSpecies, catalog: ModelCatalog) =>
  species === 'coniferous' ? catalog.coniferous : catalog.deciduous;

/**
 * Turn one wood polygon into placements.
 *
 * Large woods get a capped grid of proxy trees around the centroid, each with
 * jitter and a random scale drawn from `rng`; mixed woods alternate
 * deciduous/coniferous by index. Small woods get one representative tree
 * scaled by area.
 *
 * @param woodIndex 1-based position of the wood in the extraction, used for names
 */
export function synthesizeWood(
  wood: WoodPolygon,
  woodIndex: number,
  project: Projector,
  rng: Rng,
  catalog: ModelCatalog,
): PlacementRecord[] {
  const [cx, cy] = project(centroid(wood.vertices));

  if (!isLargeWood(wood)) {
    const species: TreeSpecies = wood.species === 'coniferous' ? 'coniferous' : 'deciduous';
    return [{
      name: `wood_${woodIndex}`,
      category: 'wood',
      modelUri: treeModel(species, catalog),
      x: cx,
      y: cy,
      scale: smallWoodScale(wood.areaM2),
      static: true,
    }];
  }

  const count = proxyCount(wood.areaM2);
  const gridSize = Math.floor(Math.sqrt(count));
  const placements: PlacementRecord[] = [];

  for (let j = 0; j < count; j++) {
    const row = Math.floor(j / gridSize);
    const col = j % gridSize;
    const offsetX = (row - gridSize / 2) * W.gridCellM;
    const offsetY = (col - gridSize / 2) * W.gridCellM;
    const jitterX = randRange(rng, -W.jitterM, W.jitterM);
    const jitterY = randRange(rng, -W.jitterM, W.jitterM);

    let species: TreeSpecies;
    if (wood.species === 'mixed') species = j % 2 === 0 ? 'deciduous' : 'coniferous';
    else species = wood.species;

    placements.push({
      name: `tree_wood_${woodIndex}_${j + 1}`,
      category: 'wood_tree',
      modelUri: treeModel(species, catalog),
      x: cx + offsetX + jitterX,
      y: cy + offsetY + jitterY,
      scale: randRange(rng, W.minProxyScale, W.maxProxyScale),
      static: true,
    });
  }
  return placements;
}
