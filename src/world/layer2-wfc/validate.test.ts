import { describe, it, expect } from 'vitest';
import { assertValidChunk, describeViolation, findAdjacencyViolations } from './validate.js';
import { ChunkValidationError } from './errors.js';
import { createTileRegistry } from '../layer1-tiles/tile-registry.js';
import { coordKey, type TerrainChunk } from '../types/index.js';

const registry = createTileRegistry();

function chunkOf(entries: Array<[number, number, string]>): TerrainChunk {
  const chunk: TerrainChunk = new Map();
  for (const [x, y, tile] of entries) chunk.set(coordKey(x, y), tile);
  return chunk;
}

describe('findAdjacencyViolations', () => {
  it('accepts a compatible chunk', () => {
    const chunk = chunkOf([[0, 0, 'water'], [1, 0, 'beach'], [0, 1, 'swamp'], [1, 1, 'water']]);
    expect(findAdjacencyViolations(chunk, registry)).toEqual([]);
    expect(() => assertValidChunk(chunk, registry)).not.toThrow();
  });

  it('reports each incompatible pair once', () => {
    const chunk = chunkOf([[0, 0, 'water'], [1, 0, 'mountain']]);
    expect(findAdjacencyViolations(chunk, registry)).toEqual([
      { kind: 'adjacency', at: { x: 0, y: 0 }, neighbor: { x: 1, y: 0 }, tile: 'water', neighborTile: 'mountain' },
    ]);
  });

  it('flags pairs allowed in only one direction', () => {
    const chunk = chunkOf([[0, 0, 'plains'], [0, 1, 'swamp']]);
    const violations = findAdjacencyViolations(chunk, registry);
    expect(violations).toHaveLength(1);
    expect(describeViolation(violations[0])).toBe('plains at (0, 0) cannot border swamp at (0, 1)');
  });

  it('flags tiles the catalog does not know', () => {
    const chunk = chunkOf([[0, 0, 'lava'], [1, 0, 'plains']]);
    const violations = findAdjacencyViolations(chunk, registry);
    expect(violations).toEqual([{ kind: 'unknown-tile', at: { x: 0, y: 0 }, tile: 'lava' }]);
    expect(describeViolation(violations[0])).toBe('(0, 0) has unknown tile "lava"');
  });
});

describe('assertValidChunk', () => {
  it('throws with every violation listed', () => {
    const chunk = chunkOf([[0, 0, 'water'], [1, 0, 'mountain']]);
    expect(() => assertValidChunk(chunk, registry)).toThrow(ChunkValidationError);
    expect(() => assertValidChunk(chunk, registry)).toThrow(
      'Chunk has 1 violation(s): water at (0, 0) cannot border mountain at (1, 0)'
    );
  });
});
