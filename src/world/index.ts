export * from './types/index.js';

export type { TerrainTileRule, TerrainCategory } from './layer1-tiles/tile-rules.js';
export { DEFAULT_TERRAIN_RULES } from './layer1-tiles/tile-rules.js';
export { TileRegistry, TileCatalogError, createTileRegistry } from './layer1-tiles/tile-registry.js';
export type { RegionTheme, TerrainBias } from './layer1-tiles/terrain-bias.js';
export { REGION_THEMES, REGION_TERRAIN_BIASES, getBiasedWeights, isRegionTheme } from './layer1-tiles/terrain-bias.js';

export type { WfcGeneratorOptions } from './layer2-wfc/generator.js';
export { WfcGenerator, DEFAULT_CHUNK_SIZE, DEFAULT_MAX_ATTEMPTS } from './layer2-wfc/generator.js';
export type { WfcSeed } from './layer2-wfc/rng.js';
export { WfcGenerationError, ChunkValidationError } from './layer2-wfc/errors.js';
export type { ChunkViolation } from './layer2-wfc/validate.js';
export { findAdjacencyViolations, assertValidChunk, describeViolation } from './layer2-wfc/validate.js';

export type { ThemeSource } from './layer3-noise/theme-map.js';
export { createThemeSampler } from './layer3-noise/theme-map.js';

export type { ChunkManagerOptions } from './layer4-chunks/chunk-manager.js';
export { ChunkManager } from './layer4-chunks/chunk-manager.js';

export type { TerrainConfig } from './pipeline/pipeline.js';
export { generateTerrain } from './pipeline/pipeline.js';
export { renderTerrain } from './pipeline/render.js';
