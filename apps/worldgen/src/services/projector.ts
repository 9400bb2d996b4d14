import { EARTH_RADIUS_M } from '../config';
import type { LatLon, Position, Projector, ReferencePoint } from '../types/geo';

const DEG_TO_RAD = Math.PI / 180;

/**
 * Equirectangular projection of a lat/lon pair into metres relative to the
 * reference point. No datum or high-latitude correction, so only meaningful
 * for extracts that are small compared to the Earth's radius.
 *
 * With no reference the point is treated as its own origin and lands on (0,0).
 */
export function projectPoint(point: LatLon, reference: ReferencePoint, scale: number): Position {
  const ref = reference ?? point;
  const x = EARTH_RADIUS_M * (point.lon - ref.lon) * DEG_TO_RAD * scale * Math.cos(point.lat * DEG_TO_RAD);
  const y = EARTH_RADIUS_M * (point.lat - ref.lat) * DEG_TO_RAD * scale;
  return [x, y];
}

export const createProjector = (reference: ReferencePoint, scale: number): Projector =>
  (point) => projectPoint(point, reference, scale);
