import type { Coordinate, TerrainChunk, TileCatalog, TileId } from '../types/index.js';
import type { WeightFn } from './entropy.js';
import { WfcGenerationError } from './errors.js';
import { createRng, type Rng, type WfcSeed } from './rng.js';
import { runAttempt } from './wfc-runner.js';

export const DEFAULT_MAX_ATTEMPTS = 100;
export const DEFAULT_CHUNK_SIZE = 8;

export interface WfcGeneratorOptions {
  maxAttempts?: number;
  /** Replaces catalog weights for the listed tiles */
  weightOverrides?: Record<TileId, number>;
}

function buildWeightFn(catalog: TileCatalog, overrides: Record<TileId, number>): WeightFn {
  const table = new Map<TileId, number>();
  for (const tile of catalog.allTileIds()) {
    table.set(tile, catalog.weight(tile));
  }
  for (const [tile, weight] of Object.entries(overrides)) {
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new RangeError(`Weight override for "${tile}" must be positive, got ${weight}`);
    }
    if (table.has(tile)) table.set(tile, weight);
  }
  return (tile) => table.get(tile) ?? catalog.weight(tile);
}

/**
 * Seeded Wave Function Collapse over a TileCatalog.
 *
 * Owns a single Alea stream. Each generateChunk() call advances it, so two
 * calls on one generator differ, while two generators built with the same
 * seed produce the same chunks call for call.
 */
export class WfcGenerator {
  readonly seed: WfcSeed;
  readonly maxAttempts: number;
  private readonly catalog: TileCatalog;
  private readonly rng: Rng;
  private readonly weightOf: WeightFn;
  private attempts = 0;

  constructor(catalog: TileCatalog, seed: WfcSeed, options: WfcGeneratorOptions = {}) {
    const { maxAttempts = DEFAULT_MAX_ATTEMPTS, weightOverrides = {} } = options;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    this.catalog = catalog;
    this.seed = seed;
    this.maxAttempts = maxAttempts;
    this.rng = createRng(seed);
    this.weightOf = buildWeightFn(catalog, weightOverrides);
  }

  /** Attempts consumed by the most recent generateChunk() call */
  get attemptsUsed(): number {
    return this.attempts;
  }

  /**
   * Solve the size x size square whose top-left corner is `origin`.
   * Contradictions restart the whole grid; after maxAttempts of them a
   * WfcGenerationError is thrown.
   */
  generateChunk(origin: Coordinate, size: number = DEFAULT_CHUNK_SIZE): TerrainChunk {
    if (!Number.isInteger(origin.x) || !Number.isInteger(origin.y)) {
      throw new RangeError(`Chunk origin must be integral, got (${origin.x}, ${origin.y})`);
    }
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
    }

    const context = { catalog: this.catalog, weightOf: this.weightOf, rng: this.rng };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      this.attempts = attempt;
      const chunk = runAttempt(context, origin, size);
      if (chunk) return chunk;

      // advance the stream so the retry differs
      this.rng();
    }

    throw new WfcGenerationError(this.maxAttempts, origin, size);
  }
}
