import type { Coordinate, TerrainChunk, TileCatalog } from '../types/index.js';
import { collapseCell } from './collapse.js';
import { selectMinimumEntropyCell, type WeightFn } from './entropy.js';
import { createGrid, gridToChunk } from './grid.js';
import { propagate } from './propagate.js';
import type { Rng } from './rng.js';

export interface AttemptContext {
  catalog: TileCatalog;
  weightOf: WeightFn;
  rng: Rng;
}

/**
 * One solve attempt over a fresh grid.
 * Returns the solved chunk, or null if the attempt hit a contradiction.
 */
export function runAttempt(
  context: AttemptContext,
  origin: Coordinate,
  size: number
): TerrainChunk | null {
  const { catalog, weightOf, rng } = context;
  const grid = createGrid(origin, size, catalog.allTileIds());

  for (;;) {
    const cell = selectMinimumEntropyCell(grid.values(), weightOf, rng);
    if (!cell) break;

    collapseCell(cell, weightOf, rng);

    if (!propagate(grid, cell.coordinates, catalog)) {
      return null;
    }
  }

  return gridToChunk(grid);
}
