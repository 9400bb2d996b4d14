import type { LatLon, ReferencePoint } from './geo';

export interface OsmTag {
  k: string;
  v: string;
}

export interface OsmNode extends LatLon {
  id: string;
  tags: OsmTag[];
}

export interface OsmWay {
  id: string;
  refs: string[]; // node ids, in way order
  tags: OsmTag[];
}

export interface OsmDocument {
  nodes: OsmNode[];
  ways: OsmWay[];
  skippedNodes: number; // nodes without usable lat/lon
}

export type TreeSpecies = 'deciduous' | 'coniferous';
export type WoodSpecies = TreeSpecies | 'mixed';

export type BenchPoint = Readonly<LatLon>;

export interface TreePoint extends Readonly<LatLon> {
  readonly species: TreeSpecies;
  readonly heightMeters: number;
}

export interface WoodPolygon {
  readonly vertices: readonly LatLon[];
  readonly species: WoodSpecies;
  readonly areaM2: number;
}

export interface ExtractionStats {
  unresolvedRefs: number;
  discardedWoods: number;
  invalidHeights: number;
  skippedNodes: number;
}

export interface ExtractedFeatures {
  benches: BenchPoint[];
  trees: TreePoint[];
  woods: WoodPolygon[];
  reference: ReferencePoint;
  stats: ExtractionStats;
}

export interface FeatureSummary {
  benchCount: number;
  treeCount: number;
  woodCount: number;
  totalWoodArea: number;
}
