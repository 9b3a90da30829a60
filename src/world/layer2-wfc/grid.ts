import { coordKey, type Coordinate, type CoordKey, type TerrainChunk, type TileId } from '../types/index.js';
import { WfcCell } from './cell.js';

export type WfcGrid = Map<CoordKey, WfcCell>;

/** Every cell of the size x size square at `origin`, in full superposition. Column-major. */
export function createGrid(origin: Coordinate, size: number, tiles: Iterable<TileId>): WfcGrid {
  const all = [...tiles];
  const grid: WfcGrid = new Map();
  for (let x = origin.x; x < origin.x + size; x++) {
    for (let y = origin.y; y < origin.y + size; y++) {
      grid.set(coordKey(x, y), new WfcCell({ x, y }, all));
    }
  }
  return grid;
}

export function gridToChunk(grid: WfcGrid): TerrainChunk {
  const chunk: TerrainChunk = new Map();
  for (const [key, cell] of grid) {
    if (cell.resolvedTile === null) {
      throw new Error(`Cell ${key} was never collapsed`);
    }
    chunk.set(key, cell.resolvedTile);
  }
  return chunk;
}
