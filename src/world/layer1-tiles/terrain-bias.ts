import type { TileCatalog, TileId } from '../types/index.js';

export const REGION_THEMES = ['mountains', 'forest', 'coast', 'desert', 'swamp'] as const;

export type RegionTheme = (typeof REGION_THEMES)[number];

export interface TerrainBias {
  boosted: TileId[];
  reduced: TileId[];
}

export const BOOST_MULTIPLIER = 3.0;
export const REDUCE_MULTIPLIER = 0.3;

export const REGION_TERRAIN_BIASES: ReadonlyMap<RegionTheme, TerrainBias> = new Map<RegionTheme, TerrainBias>([
  ['mountains', { boosted: ['mountain', 'foothills', 'hills'], reduced: ['beach', 'swamp', 'desert'] }],
  ['forest', { boosted: ['forest'], reduced: ['mountain', 'desert', 'beach'] }],
  ['coast', { boosted: ['water', 'beach'], reduced: ['mountain', 'foothills', 'desert'] }],
  ['desert', { boosted: ['desert'], reduced: ['water', 'swamp', 'forest'] }],
  ['swamp', { boosted: ['swamp', 'water'], reduced: ['desert', 'mountain'] }],
]);

export function isRegionTheme(value: string): value is RegionTheme {
  return REGION_THEMES.some(theme => theme === value);
}

/**
 * Catalog weights scaled for a region theme.
 * Unknown themes get the base weights back unchanged.
 */
export function getBiasedWeights(catalog: TileCatalog, theme: string): Record<TileId, number> {
  const weights: Record<TileId, number> = {};
  for (const tile of catalog.allTileIds()) {
    weights[tile] = catalog.weight(tile);
  }

  if (!isRegionTheme(theme)) return weights;
  const bias = REGION_TERRAIN_BIASES.get(theme);
  if (!bias) return weights;

  for (const tile of bias.boosted) {
    if (tile in weights) weights[tile] *= BOOST_MULTIPLIER;
  }
  for (const tile of bias.reduced) {
    if (tile in weights) weights[tile] *= REDUCE_MULTIPLIER;
  }
  return weights;
}
