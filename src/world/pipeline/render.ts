import type { TerrainMap } from '../types/index.js';

const UNKNOWN_GLYPH = '?';

/** One string per map row, each tile drawn as its legend glyph. */
export function renderTerrain(map: TerrainMap): string[] {
  const rows: string[] = [];
  for (let y = 0; y < map.height; y++) {
    let row = '';
    for (let x = 0; x < map.width; x++) {
      const tile = map.terrain[y * map.width + x];
      row += map.legend[tile]?.glyph ?? UNKNOWN_GLYPH;
    }
    rows.push(row);
  }
  return rows;
}
