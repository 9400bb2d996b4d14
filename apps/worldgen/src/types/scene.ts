export type PlacementCategory = 'bench' | 'tree' | 'wood' | 'wood_tree';

export interface ModelCatalog {
  bench: string;
  deciduous: string;
  coniferous: string;
}

// One <model> block in the world file
export interface PlacementRecord {
  name: string;
  category: PlacementCategory;
  modelUri: string;
  x: number;
  y: number;
  scale: number; // > 0, written only when != 1
  static: true;
}
