import type { TileId } from '../types/index.js';

export type TerrainCategory =
  | 'wilderness'
  | 'forest'
  | 'mountain'
  | 'water'
  | 'desert'
  | 'swamp'
  | 'beach';

export interface TerrainTileRule {
  name: TileId;
  weight: number;
  passable: boolean;
  category: TerrainCategory;
  glyph: string;                           // single character for text maps
  color: [number, number, number, number]; // RGBA
  /** Tiles this one accepts as a direct neighbor. Not necessarily symmetric. */
  neighbors: TileId[];
}

// Weights: higher = more common
export const DEFAULT_TERRAIN_RULES: readonly TerrainTileRule[] = [
  {
    name: 'forest', weight: 2.0, passable: true, category: 'forest', glyph: 'T',
    color: [30, 90, 25, 255],
    neighbors: ['forest', 'plains', 'hills', 'swamp', 'foothills'],
  },
  {
    name: 'mountain', weight: 0.8, passable: true, category: 'mountain', glyph: '^',
    color: [130, 130, 130, 255],
    neighbors: ['mountain', 'hills', 'foothills'],
  },
  {
    name: 'plains', weight: 2.5, passable: true, category: 'wilderness', glyph: '.',
    color: [90, 170, 60, 255],
    neighbors: ['plains', 'forest', 'hills', 'desert', 'beach', 'foothills'],
  },
  {
    name: 'water', weight: 1.0, passable: false, category: 'water', glyph: '~',
    color: [20, 60, 140, 255],
    neighbors: ['water', 'beach', 'swamp'],
  },
  {
    name: 'desert', weight: 0.6, passable: true, category: 'desert', glyph: ':',
    color: [215, 185, 95, 255],
    neighbors: ['desert', 'plains', 'hills', 'beach'],
  },
  {
    // swamp lists plains but plains does not list swamp; the solver checks both ways
    name: 'swamp', weight: 0.5, passable: true, category: 'swamp', glyph: '%',
    color: [70, 85, 50, 255],
    neighbors: ['swamp', 'forest', 'water', 'plains'],
  },
  {
    name: 'hills', weight: 1.5, passable: true, category: 'wilderness', glyph: 'n',
    color: [120, 150, 80, 255],
    neighbors: ['hills', 'forest', 'plains', 'mountain', 'foothills', 'desert'],
  },
  {
    name: 'beach', weight: 0.4, passable: true, category: 'beach', glyph: ',',
    color: [225, 210, 140, 255],
    neighbors: ['beach', 'water', 'plains', 'forest', 'desert'],
  },
  {
    name: 'foothills', weight: 0.8, passable: true, category: 'mountain', glyph: 'h',
    color: [150, 140, 110, 255],
    neighbors: ['foothills', 'hills', 'mountain', 'plains', 'forest'],
  },
];
