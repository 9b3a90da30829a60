import { describe, it, expect } from 'vitest';
import { createGrid, type WfcGrid } from './grid.js';
import { compatibleCandidates, propagate } from './propagate.js';
import { createTileRegistry } from '../layer1-tiles/tile-registry.js';
import type { TerrainTileRule } from '../layer1-tiles/tile-rules.js';
import { coordKey } from '../types/index.js';

function rule(name: string, neighbors: string[]): TerrainTileRule {
  return { name, weight: 1, passable: true, category: 'wilderness', glyph: name[0], color: [0, 0, 0, 255], neighbors };
}

function cellAt(grid: WfcGrid, x: number, y: number) {
  const cell = grid.get(coordKey(x, y));
  if (!cell) throw new Error(`no cell at ${x},${y}`);
  return cell;
}

describe('compatibleCandidates', () => {
  const registry = createTileRegistry();

  it('requires each side to allow the other', () => {
    // swamp allows plains, plains does not allow swamp
    expect(compatibleCandidates(new Set(['plains', 'swamp']), new Set(['swamp']), registry)).toEqual(
      new Set(['swamp'])
    );
  });

  it('keeps a candidate if any source tile accepts it', () => {
    expect(compatibleCandidates(new Set(['mountain', 'water']), new Set(['hills', 'beach']), registry)).toEqual(
      new Set(['mountain', 'water'])
    );
  });
});

describe('propagate', () => {
  it('narrows neighbors and cascades outward', () => {
    const registry = createTileRegistry();
    const grid = createGrid({ x: 0, y: 0 }, 3, registry.allTileIds());
    const center = cellAt(grid, 1, 1);
    center.collapseTo('water');

    expect(propagate(grid, center.coordinates, registry)).toBe(true);

    const waterside = new Set(['water', 'beach', 'swamp']);
    for (const [x, y] of [[1, 0], [1, 2], [0, 1], [2, 1]]) {
      expect(cellAt(grid, x, y).candidates).toEqual(waterside);
      expect(cellAt(grid, x, y).collapsed).toBe(false);
    }

    const corner = new Set(['forest', 'plains', 'water', 'desert', 'swamp', 'beach']);
    for (const [x, y] of [[0, 0], [2, 0], [0, 2], [2, 2]]) {
      expect(cellAt(grid, x, y).candidates).toEqual(corner);
    }
  });

  it('enforces one-sided rules from both directions', () => {
    const registry = createTileRegistry([rule('a', ['a', 'b']), rule('b', ['b'])]);
    const grid = createGrid({ x: 0, y: 0 }, 2, registry.allTileIds());
    cellAt(grid, 0, 0).collapseTo('a');

    expect(propagate(grid, { x: 0, y: 0 }, registry)).toBe(true);
    for (const [x, y] of [[1, 0], [0, 1], [1, 1]]) {
      expect(cellAt(grid, x, y).candidates).toEqual(new Set(['a']));
    }
  });

  it('reports a contradiction when a neighbor runs out of candidates', () => {
    const registry = createTileRegistry([rule('x', [])]);
    const grid = createGrid({ x: 5, y: 5 }, 2, registry.allTileIds());
    cellAt(grid, 5, 5).collapseTo('x');

    expect(propagate(grid, { x: 5, y: 5 }, registry)).toBe(false);
  });

  it('leaves collapsed neighbors alone', () => {
    const registry = createTileRegistry();
    const grid = createGrid({ x: 0, y: 0 }, 2, registry.allTileIds());
    cellAt(grid, 1, 0).collapseTo('mountain');
    cellAt(grid, 0, 0).collapseTo('plains');

    expect(propagate(grid, { x: 0, y: 0 }, registry)).toBe(true);
    expect(cellAt(grid, 1, 0).resolvedTile).toBe('mountain');
  });
});
