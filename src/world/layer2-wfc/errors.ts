import type { Coordinate } from '../types/index.js';

/**
 * Every solve attempt for a chunk ended in contradiction. Points at an
 * adjacency table that cannot tile the requested square.
 */
export class WfcGenerationError extends Error {
  readonly attempts: number;
  readonly origin: Coordinate;
  readonly size: number;

  constructor(attempts: number, origin: Coordinate, size: number) {
    super(
      `WFC failed to generate ${size}x${size} chunk at (${origin.x}, ${origin.y}) after ${attempts} attempts`
    );
    this.name = 'WfcGenerationError';
    this.attempts = attempts;
    this.origin = { ...origin };
    this.size = size;
  }
}

export class ChunkValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkValidationError';
  }
}
