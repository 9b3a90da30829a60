export type TileId = string;

/**
 * Read-only view of the tile universe the solver works over.
 * The adjacency table may be asymmetric as authored.
 */
export interface TileCatalog {
  allTileIds(): ReadonlySet<TileId>;
  /** Positive selection weight */
  weight(tile: TileId): number;
  neighborsAllowed(tile: TileId): ReadonlySet<TileId>;
}
