import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { generateTerrain } from './pipeline.js';
import { renderTerrain } from './render.js';
import { createTileRegistry } from '../layer1-tiles/tile-registry.js';
import { createThemeSampler } from '../layer3-noise/theme-map.js';
import { ChunkManager } from '../layer4-chunks/chunk-manager.js';
import type { TerrainMap } from '../types/index.js';

describe('generateTerrain', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lays chunks out as one row-major map', () => {
    const map = generateTerrain({ seed: 'test-seed', chunksWide: 2, chunksHigh: 1, chunkSize: 4 });
    expect(map.width).toBe(8);
    expect(map.height).toBe(4);
    expect(map.chunkSize).toBe(4);
    expect(map.terrain).toHaveLength(32);
    expect(map.themes).toHaveLength(2);
    expect(map.legend.water).toEqual({ glyph: '~', color: [20, 60, 140, 255], passable: false, category: 'water' });
    expect(map.legend.foothills).toEqual({ glyph: 'h', color: [150, 140, 110, 255], passable: true, category: 'mountain' });
    expect(Object.keys(map.legend)).toHaveLength(9);
  });

  it('is deterministic for a seed', () => {
    const config = { seed: 'test-seed', chunksWide: 2, chunksHigh: 2, chunkSize: 4 };
    expect(generateTerrain(config)).toEqual(generateTerrain(config));
  });

  it('matches what a chunk manager yields for the same world', () => {
    const map = generateTerrain({
      seed: 'test-seed',
      chunksWide: 1,
      chunksHigh: 1,
      chunkSize: 4,
      originChunk: { x: -1, y: -1 },
    });
    const manager = new ChunkManager(createTileRegistry(), {
      chunkSize: 4,
      worldSeed: 'test-seed',
      themeSource: createThemeSampler('test-seed'),
    });
    expect(map.terrain[0]).toBe(manager.getTileAt(-4, -4));
    expect(map.terrain[15]).toBe(manager.getTileAt(-1, -1));
    expect(map.themes).toEqual([manager.themeForChunk(-1, -1) ?? null]);
  });

  it('records no themes when they are disabled', () => {
    const map = generateTerrain({ seed: 'flat', chunksWide: 2, chunksHigh: 2, chunkSize: 3, useThemes: false });
    expect(map.themes).toEqual([null, null, null, null]);
  });

  it('logs progress per stage', () => {
    generateTerrain({ seed: 'test-seed', chunksWide: 1, chunksHigh: 1, chunkSize: 2 });
    expect(console.log).toHaveBeenCalledWith('[Layer 1] Loaded 9 tile types');
    expect(console.log).toHaveBeenCalledWith('[Layer 2] Generated 1 chunks');
  });

  it('rejects an empty chunk grid', () => {
    expect(() => generateTerrain({ seed: 'x', chunksWide: 0, chunksHigh: 1 })).toThrow(RangeError);
  });
});

describe('renderTerrain', () => {
  it('draws each tile as its glyph and unknown tiles as ?', () => {
    const map: TerrainMap = {
      seed: 's',
      width: 2,
      height: 2,
      chunkSize: 2,
      terrain: ['water', 'beach', 'plains', 'lava'],
      themes: [null],
      legend: {
        water: { glyph: '~', color: [0, 0, 255, 255], passable: false, category: 'water' },
        beach: { glyph: ',', color: [255, 255, 0, 255], passable: true, category: 'beach' },
        plains: { glyph: '.', color: [0, 255, 0, 255], passable: true, category: 'wilderness' },
      },
    };
    expect(renderTerrain(map)).toEqual(['~,', '.?']);
  });

  it('renders generated maps at full size', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const rows = renderTerrain(generateTerrain({ seed: 'render', chunksWide: 1, chunksHigh: 1, chunkSize: 3 }));
    vi.restoreAllMocks();
    expect(rows).toHaveLength(3);
    for (const row of rows) expect(row).toHaveLength(3);
  });
});
