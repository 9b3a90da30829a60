import type { Coordinate, TileId } from '../types/index.js';

/**
 * One grid position during a solve attempt.
 *
 * `candidates` only ever shrinks. `resolvedTile` is set by collapseTo() and
 * is then the sole candidate. A cell narrowed to one candidate by
 * propagation stays uncollapsed (entropy 0) until it is selected.
 */
export class WfcCell {
  readonly coordinates: Readonly<Coordinate>;
  private candidateSet: Set<TileId>;
  private resolved: TileId | null = null;

  constructor(coordinates: Coordinate, candidates: Iterable<TileId>) {
    this.coordinates = Object.freeze({ x: coordinates.x, y: coordinates.y });
    this.candidateSet = new Set(candidates);
  }

  get candidates(): ReadonlySet<TileId> {
    return this.candidateSet;
  }

  get collapsed(): boolean {
    return this.resolved !== null;
  }

  get resolvedTile(): TileId | null {
    return this.resolved;
  }

  collapseTo(tile: TileId): void {
    if (this.resolved !== null) {
      throw new Error(`Cell (${this.coordinates.x}, ${this.coordinates.y}) is already collapsed`);
    }
    if (!this.candidateSet.has(tile)) {
      throw new Error(
        `Tile "${tile}" is not a candidate of cell (${this.coordinates.x}, ${this.coordinates.y})`
      );
    }
    this.candidateSet = new Set([tile]);
    this.resolved = tile;
  }

  /** Narrow to `next`, which must be a non-empty subset of the current candidates. */
  restrict(next: ReadonlySet<TileId>): void {
    if (this.resolved !== null) {
      throw new Error(`Cannot restrict collapsed cell (${this.coordinates.x}, ${this.coordinates.y})`);
    }
    if (next.size === 0) {
      throw new Error(`Cannot empty cell (${this.coordinates.x}, ${this.coordinates.y})`);
    }
    for (const tile of next) {
      if (!this.candidateSet.has(tile)) {
        throw new Error(`Tile "${tile}" would grow cell (${this.coordinates.x}, ${this.coordinates.y})`);
      }
    }
    this.candidateSet = new Set(next);
  }
}
