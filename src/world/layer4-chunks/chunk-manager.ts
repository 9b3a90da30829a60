import { coordKey, type Coordinate, type TerrainChunk, type TileCatalog, type TileId } from '../types/index.js';
import { getBiasedWeights, type RegionTheme } from '../layer1-tiles/terrain-bias.js';
import { DEFAULT_CHUNK_SIZE, DEFAULT_MAX_ATTEMPTS, WfcGenerator } from '../layer2-wfc/generator.js';
import type { ThemeSource } from '../layer3-noise/theme-map.js';

export interface ChunkManagerOptions {
  chunkSize?: number;
  worldSeed?: number | string;
  maxAttempts?: number;
  /** Per-chunk region theme; a theme set with setRegionTheme() wins */
  themeSource?: ThemeSource;
}

/**
 * Unbounded terrain as a cache of independently solved chunks.
 * Each chunk gets its own generator seeded from the world seed and its
 * chunk coordinates, so a chunk's contents never depend on visit order.
 */
export class ChunkManager {
  readonly chunkSize: number;
  readonly worldSeed: number | string;
  private readonly catalog: TileCatalog;
  private readonly maxAttempts: number;
  private readonly themeSource: ThemeSource | undefined;
  private regionTheme: RegionTheme | undefined;
  private readonly chunks = new Map<string, TerrainChunk>();

  constructor(catalog: TileCatalog, options: ChunkManagerOptions = {}) {
    const {
      chunkSize = DEFAULT_CHUNK_SIZE,
      worldSeed = 0,
      maxAttempts = DEFAULT_MAX_ATTEMPTS,
      themeSource,
    } = options;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }

    this.catalog = catalog;
    this.chunkSize = chunkSize;
    this.worldSeed = worldSeed;
    this.maxAttempts = maxAttempts;
    this.themeSource = themeSource;
  }

  get cachedChunkCount(): number {
    return this.chunks.size;
  }

  /** Bias chunks generated from now on toward `theme`; undefined clears it. */
  setRegionTheme(theme: RegionTheme | undefined): void {
    this.regionTheme = theme;
  }

  themeForChunk(chunkX: number, chunkY: number): RegionTheme | undefined {
    return this.regionTheme ?? this.themeSource?.(chunkX, chunkY);
  }

  worldToChunk(worldX: number, worldY: number): Coordinate {
    return {
      x: Math.floor(worldX / this.chunkSize),
      y: Math.floor(worldY / this.chunkSize),
    };
  }

  chunkSeed(chunkX: number, chunkY: number): string {
    return `${this.worldSeed}-c${chunkX},${chunkY}`;
  }

  getOrGenerateChunk(chunkX: number, chunkY: number): TerrainChunk {
    const key = coordKey(chunkX, chunkY);
    let chunk = this.chunks.get(key);
    if (!chunk) {
      chunk = this.generateChunk(chunkX, chunkY);
      this.chunks.set(key, chunk);
    }
    return chunk;
  }

  getTileAt(worldX: number, worldY: number): TileId {
    const { x, y } = this.worldToChunk(worldX, worldY);
    const tile = this.getOrGenerateChunk(x, y).get(coordKey(worldX, worldY));
    if (tile === undefined) {
      throw new Error(`Chunk (${x}, ${y}) has no tile at (${worldX}, ${worldY})`);
    }
    return tile;
  }

  private generateChunk(chunkX: number, chunkY: number): TerrainChunk {
    const theme = this.themeForChunk(chunkX, chunkY);
    const generator = new WfcGenerator(this.catalog, this.chunkSeed(chunkX, chunkY), {
      maxAttempts: this.maxAttempts,
      weightOverrides: theme ? getBiasedWeights(this.catalog, theme) : {},
    });
    const origin = { x: chunkX * this.chunkSize, y: chunkY * this.chunkSize };
    return generator.generateChunk(origin, this.chunkSize);
  }
}
