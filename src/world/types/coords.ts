export interface Coordinate {
  x: number;
  y: number;
}

/** `"x,y"` — Map key for a grid coordinate */
export type CoordKey = `${number},${number}`;

export function coordKey(x: number, y: number): CoordKey {
  return `${x},${y}`;
}

export function parseCoordKey(key: string): Coordinate {
  const match = /^(-?\d+),(-?\d+)$/.exec(key);
  if (!match) {
    throw new RangeError(`Malformed coordinate key: "${key}"`);
  }
  return { x: Number(match[1]), y: Number(match[2]) };
}

// 4-directional neighborhood: north, south, east, west
export const CARDINAL_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [0, -1],
  [0, 1],
  [1, 0],
  [-1, 0],
];
