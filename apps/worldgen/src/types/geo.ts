export type Position = [number, number]; // local planar [x,y] in metres
export type LinearRing = Position[]; // open or closed, area uses indices modulo length

export interface LatLon {
  lat: number;
  lon: number;
}

// Origin of the local frame: the first node of the OSM document, or null when it has none
export type ReferencePoint = LatLon | null;

export type Projector = (point: LatLon) => Position;
