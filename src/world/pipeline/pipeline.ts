import type { Coordinate, TerrainMap, TileId } from '../types/index.js';
import { createTileRegistry, type TileRegistry } from '../layer1-tiles/tile-registry.js';
import { DEFAULT_CHUNK_SIZE, DEFAULT_MAX_ATTEMPTS } from '../layer2-wfc/generator.js';
import { assertValidChunk } from '../layer2-wfc/validate.js';
import { createThemeSampler } from '../layer3-noise/theme-map.js';
import { ChunkManager } from '../layer4-chunks/chunk-manager.js';

export interface TerrainConfig {
  seed: string;
  chunksWide: number;
  chunksHigh: number;
  chunkSize?: number;
  maxAttempts?: number;
  useThemes?: boolean;
  /** Chunk coordinate of the top-left chunk */
  originChunk?: Coordinate;
  registry?: TileRegistry;
}

export function generateTerrain(config: TerrainConfig): TerrainMap {
  const {
    seed,
    chunksWide,
    chunksHigh,
    chunkSize = DEFAULT_CHUNK_SIZE,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    useThemes = true,
    originChunk = { x: 0, y: 0 },
  } = config;
  if (!Number.isInteger(chunksWide) || chunksWide < 1 || !Number.isInteger(chunksHigh) || chunksHigh < 1) {
    throw new RangeError(`Chunk grid must be at least 1x1, got ${chunksWide}x${chunksHigh}`);
  }

  // Layer 1: Tile catalog
  const registry = config.registry ?? createTileRegistry();
  console.log(`[Layer 1] Loaded ${registry.allTileIds().size} tile types`);

  // Layer 3: Region themes (sampled per chunk, consumed by layer 2)
  const themeSource = useThemes ? createThemeSampler(seed) : undefined;
  console.log(`[Layer 3] Region themes ${themeSource ? 'enabled' : 'disabled'}`);

  const manager = new ChunkManager(registry, { chunkSize, worldSeed: seed, maxAttempts, themeSource });

  // Layer 2: WFC per chunk
  console.log(`[Layer 2] Running WFC for ${chunksWide}x${chunksHigh} chunks (chunk size: ${chunkSize})...`);
  const themes: Array<string | null> = [];
  for (let cy = originChunk.y; cy < originChunk.y + chunksHigh; cy++) {
    for (let cx = originChunk.x; cx < originChunk.x + chunksWide; cx++) {
      const chunk = manager.getOrGenerateChunk(cx, cy);
      assertValidChunk(chunk, registry);
      themes.push(manager.themeForChunk(cx, cy) ?? null);
    }
  }
  console.log(`[Layer 2] Generated ${manager.cachedChunkCount} chunks`);

  const width = chunksWide * chunkSize;
  const height = chunksHigh * chunkSize;
  const baseX = originChunk.x * chunkSize;
  const baseY = originChunk.y * chunkSize;
  const terrain = new Array<TileId>(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      terrain[y * width + x] = manager.getTileAt(baseX + x, baseY + y);
    }
  }

  const legend: TerrainMap['legend'] = {};
  for (const rule of registry.rules()) {
    legend[rule.name] = {
      glyph: rule.glyph,
      color: [...rule.color],
      passable: rule.passable,
      category: rule.category,
    };
  }

  return { seed, width, height, chunkSize, terrain, themes, legend };
}
