import { DEFAULT_TREE_HEIGHT_M } from '../config';
import type { LatLon } from '../types/geo';
import type {
  BenchPoint,
  ExtractedFeatures,
  ExtractionStats,
  FeatureSummary,
  OsmDocument,
  OsmTag,
  TreePoint,
  TreeSpecies,
  WoodPolygon,
  WoodSpecies,
} from '../types/osm';
import { area } from '../utils/geometry';
import { parseOsmDocument } from './osmDocument';
import { createProjector } from './projector';

const hasTag = (tags: OsmTag[], k: string, v: string) => tags.some(t => t.k === k && t.v === v);

function treeSpecies(tags: OsmTag[]): TreeSpecies {
  return hasTag(tags, 'leaf_type', 'needleleaved') ? 'coniferous' : 'deciduous';
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

// default height when the tag is missing, not a decimal number or not positive
function treeHeight(tags: OsmTag[]): { height: number; invalid: boolean } {
  let height = DEFAULT_TREE_HEIGHT_M;
  let invalid = false;
  for (const { k, v } of tags) {
    if (k !== 'height') continue;
    const trimmed = v.trim();
    const parsed = DECIMAL.test(trimmed) ? Number(trimmed) : NaN;
    if (Number.isFinite(parsed) && parsed > 0) {
      height = parsed;
      invalid = false;
    } else {
      height = DEFAULT_TREE_HEIGHT_M;
      invalid = true;
    }
  }
  return { height, invalid };
}

const isWood = (tags: OsmTag[]) => hasTag(tags, 'natural', 'wood') || hasTag(tags, 'landuse', 'forest');

// later wood/leaf_type tags win; unknown values leave the class alone
function woodSpecies(tags: OsmTag[]): WoodSpecies {
  let species: WoodSpecies = 'mixed';
  for (const { k, v } of tags) {
    if (k !== 'wood' && k !== 'leaf_type') continue;
    if (v === 'deciduous' || v === 'broadleaved') species = 'deciduous';
    else if (v === 'coniferous' || v === 'needleleaved') species = 'coniferous';
    else if (v === 'mixed') species = 'mixed';
  }
  return species;
}

/**
 * Classify nodes and ways of a parsed OSM document into benches, individual
 * trees and wood polygons. Wood area is measured in the local frame, so it
 * follows `scale` the same way placements do.
 */
export function extractFeatures(doc: OsmDocument, scale: number): ExtractedFeatures {
  const reference = doc.nodes.length > 0 ? { lat: doc.nodes[0].lat, lon: doc.nodes[0].lon } : null;
  const project = createProjector(reference, scale);
  const stats: ExtractionStats = { unresolvedRefs: 0, discardedWoods: 0, invalidHeights: 0, skippedNodes: doc.skippedNodes };

  const benches: BenchPoint[] = [];
  const trees: TreePoint[] = [];
  const coords = new Map<string, LatLon>();

  for (const node of doc.nodes) {
    if (node.id !== '') coords.set(node.id, { lat: node.lat, lon: node.lon });

    if (hasTag(node.tags, 'amenity', 'bench')) {
      benches.push({ lat: node.lat, lon: node.lon });
    }
    if (hasTag(node.tags, 'natural', 'tree')) {
      const { height, invalid } = treeHeight(node.tags);
      if (invalid) stats.invalidHeights++;
      trees.push({ lat: node.lat, lon: node.lon, species: treeSpecies(node.tags), heightMeters: height });
    }
  }

  const woods: WoodPolygon[] = [];
  for (const way of doc.ways) {
    if (!isWood(way.tags)) continue;

    const vertices: LatLon[] = [];
    for (const ref of way.refs) {
      const c = coords.get(ref);
      if (c) vertices.push(c);
      else stats.unresolvedRefs++;
    }
    if (vertices.length < 3) {
      stats.discardedWoods++;
      continue;
    }
    woods.push({ vertices, species: woodSpecies(way.tags), areaM2: area(vertices.map(project)) });
  }

  return { benches, trees, woods, reference, stats };
}

export const emptyFeatures = (): ExtractedFeatures => ({
  benches: [],
  trees: [],
  woods: [],
  reference: null,
  stats: { unresolvedRefs: 0, discardedWoods: 0, invalidHeights: 0, skippedNodes: 0 },
});

export function summarizeFeatures(features: ExtractedFeatures): FeatureSummary {
  return {
    benchCount: features.benches.length,
    treeCount: features.trees.length,
    woodCount: features.woods.length,
    totalWoodArea: features.woods.reduce((sum, w) => sum + w.areaM2, 0),
  };
}

export const formatSummary = (s: FeatureSummary): string =>
  `Found ${s.benchCount} benches, ${s.treeCount} individual trees, and ${s.woodCount} wooded areas (${s.totalWoodArea.toFixed(1)} m²)`;

export const hasFeatures = (features: ExtractedFeatures): boolean =>
  features.benches.length + features.trees.length + features.woods.length > 0;

/**
 * Parse and extract in one step. A document that fails to parse yields empty
 * feature lists and the error message instead of throwing.
 */
export function extractFeaturesFromXml(xml: string, scale: number): { features: ExtractedFeatures; error?: string } {
  console.log('[EXTRACT] Scanning OSM document for nature features...');
  let features: ExtractedFeatures;
  try {
    features = extractFeatures(parseOsmDocument(xml), scale);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`[EXTRACT] Failed to extract features: ${message}`);
    return { features: emptyFeatures(), error: message };
  }

  const { stats } = features;
  if (stats.skippedNodes > 0) console.warn(`[EXTRACT] Skipped ${stats.skippedNodes} nodes without valid coordinates`);
  if (stats.unresolvedRefs > 0) console.warn(`[EXTRACT] ${stats.unresolvedRefs} wood node references could not be resolved`);
  if (stats.discardedWoods > 0) console.warn(`[EXTRACT] Discarded ${stats.discardedWoods} woods with fewer than 3 vertices`);
  if (stats.invalidHeights > 0) console.warn(`[EXTRACT] ${stats.invalidHeights} tree height tags were unusable, defaulted to ${DEFAULT_TREE_HEIGHT_M} m`);

  console.log(`[EXTRACT] ${formatSummary(summarizeFeatures(features))}`);
  return { features };
}
