import type { RegionTheme } from '../layer1-tiles/terrain-bias.js';
import {
  createFractalNoise,
  defaultElevationConfig,
  defaultMoistureConfig,
  type NoiseConfig,
} from './noise-map.js';

interface ThemeRule {
  theme: RegionTheme;
  minElevation?: number;
  maxElevation?: number;
  minMoisture?: number;
  maxMoisture?: number;
}

// First match wins; chunks matching nothing keep the base weights
export const THEME_RULES: readonly ThemeRule[] = [
  { theme: 'mountains', minElevation: 0.68 },
  { theme: 'coast', maxElevation: 0.3 },
  { theme: 'swamp', maxElevation: 0.45, minMoisture: 0.65 },
  { theme: 'desert', maxMoisture: 0.3 },
  { theme: 'forest', minMoisture: 0.58 },
];

function matchesRule(rule: ThemeRule, elevation: number, moisture: number): boolean {
  if (rule.minElevation !== undefined && elevation < rule.minElevation) return false;
  if (rule.maxElevation !== undefined && elevation > rule.maxElevation) return false;
  if (rule.minMoisture !== undefined && moisture < rule.minMoisture) return false;
  if (rule.maxMoisture !== undefined && moisture > rule.maxMoisture) return false;
  return true;
}

export function themeFor(elevation: number, moisture: number): RegionTheme | undefined {
  return THEME_RULES.find(rule => matchesRule(rule, elevation, moisture))?.theme;
}

export type ThemeSource = (chunkX: number, chunkY: number) => RegionTheme | undefined;

/**
 * Region themes from elevation and moisture noise sampled at chunk
 * coordinates. Same seed, same themes.
 */
export function createThemeSampler(
  seed: string,
  elevationConfig: NoiseConfig = defaultElevationConfig,
  moistureConfig: NoiseConfig = defaultMoistureConfig,
): ThemeSource {
  const elevation = createFractalNoise(`${seed}-elevation`, elevationConfig);
  const moisture = createFractalNoise(`${seed}-moisture`, moistureConfig);
  return (chunkX, chunkY) => themeFor(elevation(chunkX, chunkY), moisture(chunkX, chunkY));
}
