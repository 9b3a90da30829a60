import type { TileId } from '../types/index.js';
import type { WfcCell } from './cell.js';
import type { WeightFn } from './entropy.js';
import type { Rng } from './rng.js';

function byTileId(a: TileId, b: TileId): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Weighted draw over `candidates`. Candidates are walked in sorted order so
 * a given stream always lands on the same tile. Consumes exactly one draw.
 */
export function weightedPick(candidates: ReadonlySet<TileId>, weightOf: WeightFn, rng: Rng): TileId {
  const tiles = [...candidates].sort(byTileId);
  if (tiles.length === 0) {
    throw new Error('Cannot pick from an empty candidate set');
  }

  const weights = tiles.map(weightOf);
  const total = weights.reduce((s, w) => s + w, 0);
  const target = rng() * total;

  let cumulative = 0;
  for (let i = 0; i < tiles.length; i++) {
    cumulative += weights[i];
    if (target < cumulative) return tiles[i];
  }
  // float round-off
  return tiles[tiles.length - 1];
}

export function collapseCell(cell: WfcCell, weightOf: WeightFn, rng: Rng): TileId {
  if (cell.candidates.size === 0) {
    const { x, y } = cell.coordinates;
    throw new Error(`Cannot collapse cell (${x}, ${y}) with no options`);
  }
  const tile = weightedPick(cell.candidates, weightOf, rng);
  cell.collapseTo(tile);
  return tile;
}
