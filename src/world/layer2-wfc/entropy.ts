import type { TileId } from '../types/index.js';
import type { WfcCell } from './cell.js';
import type { Rng } from './rng.js';

export type WeightFn = (tile: TileId) => number;

// Small enough never to outweigh a real entropy difference
export const TIE_BREAK_NOISE = 1e-4;

/**
 * Shannon entropy of the weight-normalized distribution over `candidates`.
 * A single candidate is 0 by definition.
 */
export function calculateEntropy(candidates: ReadonlySet<TileId>, weightOf: WeightFn): number {
  if (candidates.size <= 1) return 0;

  const weights = [...candidates].map(weightOf);
  const total = weights.reduce((s, w) => s + w, 0);
  if (total <= 0) return 0;

  let entropy = 0;
  for (const weight of weights) {
    if (weight <= 0) continue;
    const p = weight / total;
    entropy -= p * Math.log(p);
  }
  return entropy;
}

/**
 * Pick the uncollapsed cell with lowest entropy. Draws one noise value per
 * uncollapsed cell, in iteration order, to break ties.
 */
export function selectMinimumEntropyCell(
  cells: Iterable<WfcCell>,
  weightOf: WeightFn,
  rng: Rng
): WfcCell | null {
  let best: WfcCell | null = null;
  let bestEntropy = Infinity;

  for (const cell of cells) {
    if (cell.collapsed) continue;
    const adjusted = calculateEntropy(cell.candidates, weightOf) + rng() * TIE_BREAK_NOISE;
    if (adjusted < bestEntropy) {
      bestEntropy = adjusted;
      best = cell;
    }
  }
  return best;
}
