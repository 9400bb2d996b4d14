import { describe, it, expect } from 'vitest';
import { DEFAULT_CATALOG as catalog } from '../config';
import type { Projector } from '../types/geo';
import type { WoodPolygon, WoodSpecies } from '../types/osm';
import { createRng } from '../utils/random';
import { proxyCount, smallWoodScale, synthesizeWood } from './synthesizer';

// vertices are already metres: lon -> x, lat -> y
const flat: Projector = (p) => [p.lon, p.lat];
const half = () => 0.5;

const wood = (areaM2: number, species: WoodSpecies = 'mixed'): WoodPolygon => ({
  vertices: [{ lat: 0, lon: 0 }, { lat: 0, lon: 100 }, { lat: 100, lon: 100 }, { lat: 100, lon: 0 }],
  species,
  areaM2,
});

describe('proxyCount', () => {
  it('allows one proxy per 500 m² up to 20', () => {
    expect(proxyCount(5001)).toBe(10);
    expect(proxyCount(7499)).toBe(14);
    expect(proxyCount(10000)).toBe(20);
    expect(proxyCount(1_000_000)).toBe(20);
  });
});

describe('smallWoodScale', () => {
  it('clamps area / 1000 into [1, 2]', () => {
    expect(smallWoodScale(0)).toBe(1);
    expect(smallWoodScale(1500)).toBe(1.5);
    expect(smallWoodScale(5000)).toBe(2);
  });
});

describe('synthesizeWood', () => {
  it('places one tree at the centroid of a small wood', () => {
    expect(synthesizeWood(wood(1500, 'deciduous'), 3, flat, half, catalog)).toEqual([{
      name: 'wood_3',
      category: 'wood',
      modelUri: 'model://Tree',
      x: 50,
      y: 50,
      scale: 1.5,
      static: true,
    }]);
  });

  it('treats exactly 5000 m² as small', () => {
    const placements = synthesizeWood(wood(5000), 1, flat, half, catalog);
    expect(placements).toHaveLength(1);
    expect(placements[0].scale).toBe(2);
  });

  it.each([
    ['deciduous', 'model://Tree'],
    ['mixed', 'model://Tree'],
    ['coniferous', 'model://PineTree'],
  ] as const)('uses the right model for a small %s wood', (species, uri) => {
    expect(synthesizeWood(wood(800, species), 1, flat, half, catalog)[0].modelUri).toBe(uri);
  });

  it('generates a capped number of proxies for a large wood', () => {
    expect(synthesizeWood(wood(5001), 1, flat, half, catalog)).toHaveLength(10);
    expect(synthesizeWood(wood(9999), 1, flat, half, catalog)).toHaveLength(19);
    expect(synthesizeWood(wood(250_000), 1, flat, half, catalog)).toHaveLength(20);
  });

  it('lays proxies out on a 10 m grid around the centroid', () => {
    const placements = synthesizeWood(wood(12000), 2, flat, half, catalog);
    // 20 proxies on a 4-wide grid: rows 0..4, columns 0..3, offsets start at -20 m
    expect(placements[0]).toMatchObject({ name: 'tree_wood_2_1', x: 30, y: 30 });
    expect(placements[5]).toMatchObject({ name: 'tree_wood_2_6', x: 40, y: 40 });
    expect(placements[19]).toMatchObject({ name: 'tree_wood_2_20', x: 70, y: 60 });
    for (const p of placements) {
      expect(p.category).toBe('wood_tree');
      expect(p.scale).toBeCloseTo(1.05, 9);
    }
  });

  it('alternates species in mixed woods', () => {
    const uris = synthesizeWood(wood(6000, 'mixed'), 1, flat, half, catalog).slice(0, 4).map(p => p.modelUri);
    expect(uris).toEqual(['model://Tree', 'model://PineTree', 'model://Tree', 'model://PineTree']);
  });

  it('uses the wood class for every proxy otherwise', () => {
    const placements = synthesizeWood(wood(6000, 'coniferous'), 1, flat, half, catalog);
    expect(placements.every(p => p.modelUri === 'model://PineTree')).toBe(true);
  });

  it('keeps jitter within 5 m and scale within [0.8, 1.3]', () => {
    const placements = synthesizeWood(wood(12000), 1, flat, createRng(99), catalog);
    const exact = synthesizeWood(wood(12000), 1, flat, half, catalog);
    placements.forEach((p, i) => {
      expect(Math.abs(p.x - exact[i].x)).toBeLessThanOrEqual(5);
      expect(Math.abs(p.y - exact[i].y)).toBeLessThanOrEqual(5);
      expect(p.scale).toBeGreaterThanOrEqual(0.8);
      expect(p.scale).toBeLessThan(1.3);
    });
  });

  it('is reproducible with the same seed', () => {
    expect(synthesizeWood(wood(12000), 1, flat, createRng(5), catalog))
      .toEqual(synthesizeWood(wood(12000), 1, flat, createRng(5), catalog));
  });
});
