import { CARDINAL_OFFSETS, coordKey, type Coordinate, type CoordKey, type TileCatalog, type TileId } from '../types/index.js';
import type { WfcGrid } from './grid.js';

/**
 * Members of `target` that can sit next to at least one member of `source`,
 * checked in both directions since the table may be asymmetric.
 */
export function compatibleCandidates(
  target: ReadonlySet<TileId>,
  source: ReadonlySet<TileId>,
  catalog: TileCatalog
): Set<TileId> {
  const result = new Set<TileId>();
  for (const t of target) {
    const allowedByT = catalog.neighborsAllowed(t);
    for (const s of source) {
      if (allowedByT.has(s) && catalog.neighborsAllowed(s).has(t)) {
        result.add(t);
        break;
      }
    }
  }
  return result;
}

/**
 * Arc-consistency sweep outward from `start`. Returns false as soon as any
 * cell runs out of candidates.
 */
export function propagate(grid: WfcGrid, start: Coordinate, catalog: TileCatalog): boolean {
  const queue: Coordinate[] = [start];
  const queued = new Set<CoordKey>([coordKey(start.x, start.y)]);
  let head = 0;

  while (head < queue.length) {
    const current = queue[head++];
    const currentKey = coordKey(current.x, current.y);
    queued.delete(currentKey);

    const cell = grid.get(currentKey);
    if (!cell) continue;

    for (const [dx, dy] of CARDINAL_OFFSETS) {
      const nx = current.x + dx;
      const ny = current.y + dy;
      const neighborKey = coordKey(nx, ny);
      const neighbor = grid.get(neighborKey);
      if (!neighbor || neighbor.collapsed) continue;

      const next = compatibleCandidates(neighbor.candidates, cell.candidates, catalog);
      if (next.size === 0) return false;

      // next is a subset, so equal size means unchanged
      if (next.size !== neighbor.candidates.size) {
        neighbor.restrict(next);
        if (!queued.has(neighborKey)) {
          queued.add(neighborKey);
          queue.push({ x: nx, y: ny });
        }
      }
    }
  }

  return true;
}
