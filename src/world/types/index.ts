export type { Coordinate, CoordKey } from './coords.js';
export { coordKey, parseCoordKey, CARDINAL_OFFSETS } from './coords.js';

export type { TileId, TileCatalog } from './tile-catalog.js';

export type { TerrainChunk, TerrainMap, LegendEntry } from './terrain-chunk.js';
