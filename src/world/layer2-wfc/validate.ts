import { coordKey, parseCoordKey, type Coordinate, type TerrainChunk, type TileCatalog, type TileId } from '../types/index.js';
import { ChunkValidationError } from './errors.js';

export type ChunkViolation =
  | { kind: 'unknown-tile'; at: Coordinate; tile: TileId }
  | { kind: 'adjacency'; at: Coordinate; neighbor: Coordinate; tile: TileId; neighborTile: TileId };

function mutuallyAllowed(catalog: TileCatalog, a: TileId, b: TileId): boolean {
  return catalog.neighborsAllowed(a).has(b) && catalog.neighborsAllowed(b).has(a);
}

/**
 * Every unknown tile and every adjacent pair that is not allowed both ways.
 * Each pair is reported once, from its west or north member.
 */
export function findAdjacencyViolations(chunk: TerrainChunk, catalog: TileCatalog): ChunkViolation[] {
  const known = catalog.allTileIds();
  const violations: ChunkViolation[] = [];

  for (const [key, tile] of chunk) {
    const at = parseCoordKey(key);
    if (!known.has(tile)) {
      violations.push({ kind: 'unknown-tile', at, tile });
      continue;
    }

    for (const neighbor of [{ x: at.x + 1, y: at.y }, { x: at.x, y: at.y + 1 }]) {
      const neighborTile = chunk.get(coordKey(neighbor.x, neighbor.y));
      if (neighborTile === undefined || !known.has(neighborTile)) continue;
      if (!mutuallyAllowed(catalog, tile, neighborTile)) {
        violations.push({ kind: 'adjacency', at, neighbor, tile, neighborTile });
      }
    }
  }
  return violations;
}

export function describeViolation(violation: ChunkViolation): string {
  const { at } = violation;
  if (violation.kind === 'unknown-tile') {
    return `(${at.x}, ${at.y}) has unknown tile "${violation.tile}"`;
  }
  const { neighbor } = violation;
  return `${violation.tile} at (${at.x}, ${at.y}) cannot border ${violation.neighborTile} at (${neighbor.x}, ${neighbor.y})`;
}

export function assertValidChunk(chunk: TerrainChunk, catalog: TileCatalog): void {
  const violations = findAdjacencyViolations(chunk, catalog);
  if (violations.length > 0) {
    throw new ChunkValidationError(
      `Chunk has ${violations.length} violation(s): ${violations.map(describeViolation).join('; ')}`
    );
  }
}
