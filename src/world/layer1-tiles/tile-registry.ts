import type { TileCatalog, TileId } from '../types/index.js';
import { DEFAULT_TERRAIN_RULES, type TerrainTileRule } from './tile-rules.js';

export class TileCatalogError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid tile catalog: ${problems.join('; ')}`);
    this.name = 'TileCatalogError';
    this.problems = problems;
  }
}

/**
 * Terrain tile definitions keyed by name. Serves as the solver's TileCatalog.
 * Construct through createTileRegistry() so the rules are checked first.
 */
export class TileRegistry implements TileCatalog {
  private readonly tiles = new Map<TileId, TerrainTileRule>();
  private readonly neighborSets = new Map<TileId, ReadonlySet<TileId>>();
  private readonly ids: ReadonlySet<TileId>;

  constructor(rules: readonly TerrainTileRule[]) {
    for (const rule of rules) {
      this.tiles.set(rule.name, rule);
      this.neighborSets.set(rule.name, new Set(rule.neighbors));
    }
    this.ids = new Set(this.tiles.keys());
  }

  allTileIds(): ReadonlySet<TileId> {
    return this.ids;
  }

  weight(tile: TileId): number {
    const rule = this.tiles.get(tile);
    if (!rule) throw new RangeError(`Unknown tile: "${tile}"`);
    return rule.weight;
  }

  neighborsAllowed(tile: TileId): ReadonlySet<TileId> {
    return this.neighborSets.get(tile) ?? new Set<TileId>();
  }

  rules(): TerrainTileRule[] {
    return [...this.tiles.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}

function collectProblems(rules: readonly TerrainTileRule[]): string[] {
  const problems: string[] = [];
  if (rules.length === 0) {
    problems.push('no tiles defined');
    return problems;
  }

  const names = new Set<TileId>();
  for (const rule of rules) {
    if (names.has(rule.name)) problems.push(`duplicate tile "${rule.name}"`);
    names.add(rule.name);
  }

  for (const rule of rules) {
    if (!Number.isFinite(rule.weight) || rule.weight <= 0) {
      problems.push(`tile "${rule.name}" has non-positive weight ${rule.weight}`);
    }
    if ([...rule.glyph].length !== 1) {
      problems.push(`tile "${rule.name}" glyph must be one character`);
    }
    for (const neighbor of rule.neighbors) {
      if (!names.has(neighbor)) {
        problems.push(`tile "${rule.name}" references unknown neighbor "${neighbor}"`);
      }
    }
  }
  return problems;
}

/**
 * Build a registry from tile rules, defaulting to the built-in terrain set.
 * Throws TileCatalogError listing every problem found.
 */
export function createTileRegistry(
  rules: readonly TerrainTileRule[] = DEFAULT_TERRAIN_RULES
): TileRegistry {
  const problems = collectProblems(rules);
  if (problems.length > 0) {
    throw new TileCatalogError(problems);
  }
  return new TileRegistry(rules);
}
