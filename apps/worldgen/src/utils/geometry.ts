import type { LatLon, LinearRing } from '../types/geo';

// Shoelace formula, indices wrap so the ring may be open or closed
export const area = (ring: LinearRing): number => {
  let a = 0;
  for (let i = 0; i < ring.length; i++) {
    const [x1,y1] = ring[i];
    const [x2,y2] = ring[(i + 1) % ring.length];
    a += (x1*y2 - x2*y1);
  }
  return Math.abs(a) / 2;
};

// Unweighted vertex mean; a closing duplicate vertex counts twice
export const centroid = (vertices: readonly LatLon[]): LatLon => {
  let lat = 0;
  let lon = 0;
  for (const v of vertices) {
    lat += v.lat;
    lon += v.lon;
  }
  return { lat: lat / vertices.length, lon: lon / vertices.length };
};

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));
