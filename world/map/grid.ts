// ============================================================================
// GRID - Fixed 16x16 tile grid addressing
// ============================================================================

import { PreconditionError } from '../errors';

export const DIMX = 16;
export const DIMY = 16;

export type Orientation = 'LEFT' | 'RIGHT' | 'UP' | 'DOWN';

export const ORIENTATIONS: readonly Orientation[] = ['LEFT', 'RIGHT', 'UP', 'DOWN'];

export interface Coord {
  /** Column, 0 at the left edge */
  readonly x: number;
  /** Row, 0 at the bottom edge */
  readonly y: number;
}

export function makeCoord(x: number, y: number): Coord {
  return { x, y };
}

/** Check if coordinates are within grid bounds */
export function isInBounds(coord: Coord): boolean {
  return (
    Number.isInteger(coord.x) &&
    Number.isInteger(coord.y) &&
    coord.x >= 0 && coord.x < DIMX &&
    coord.y >= 0 && coord.y < DIMY
  );
}

export function assertInBounds(coord: Coord): void {
  if (!isInBounds(coord)) {
    throw new PreconditionError(`Coordinate ${formatCoord(coord)} is outside the ${DIMX}x${DIMY} grid`);
  }
}

/** Row-major: index = x + DIMX * y */
export function indexOfCoord(coord: Coord): number {
  assertInBounds(coord);
  return coord.x + DIMX * coord.y;
}

export function coordOfIndex(index: number): Coord {
  if (!Number.isInteger(index) || index < 0 || index >= DIMX * DIMY) {
    throw new PreconditionError(`Index ${index} is outside the ${DIMX}x${DIMY} grid`);
  }
  return { x: index % DIMX, y: Math.floor(index / DIMX) };
}

const DELTAS: Record<Orientation, { readonly dx: number; readonly dy: number }> = {
  LEFT: { dx: -1, dy: 0 },
  RIGHT: { dx: 1, dy: 0 },
  UP: { dx: 0, dy: 1 },
  DOWN: { dx: 0, dy: -1 },
};

/** The neighbouring cell in the given direction. May fall outside the grid. */
export function stepCoord(coord: Coord, orientation: Orientation): Coord {
  const { dx, dy } = DELTAS[orientation];
  return { x: coord.x + dx, y: coord.y + dy };
}

export function sameCoord(a: Coord, b: Coord): boolean {
  return a.x === b.x && a.y === b.y;
}

export function manhattan(a: Coord, b: Coord): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function formatCoord(coord: Coord): string {
  return `(${coord.x}, ${coord.y})`;
}
