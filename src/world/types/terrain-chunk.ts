import type { CoordKey } from './coords.js';
import type { TileId } from './tile-catalog.js';

/** Solved chunk: one tile per coordinate of the requested square */
export type TerrainChunk = Map<CoordKey, TileId>;

/** Flattened rectangle of chunks produced by the pipeline */
export interface TerrainMap {
  seed: string;
  width: number;            // total tiles horizontally
  height: number;           // total tiles vertically
  chunkSize: number;        // tiles per chunk side
  terrain: TileId[];        // flat 2D array, row-major
  themes: Array<string | null>; // one per chunk, row-major
  legend: Partial<Record<TileId, LegendEntry>>;
}

/** How a tile is drawn and whether it can be walked on */
export interface LegendEntry {
  glyph: string;
  color: [number, number, number, number]; // RGBA
  passable: boolean;
  category: string;
}
