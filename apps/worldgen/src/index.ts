export * from './config';
export * from './services/osmDocument';
export * from './services/projector';
export * from './services/extractor';
export * from './services/synthesizer';
export * from './services/placements';
export * from './services/scenePatcher';
export * from './services/enhancer';
export * from './services/osmFixer';
export * from './services/worldTemplate';
export * from './utils/geometry';
export * from './utils/random';
export type * from './types/geo';
export type * from './types/osm';
export type * from './types/scene';
