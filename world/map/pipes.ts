import type { Coord, Orientation } from './grid';
import { DIMX, DIMY } from './grid';
import type { Color, Tile } from './tile';
import { makeTile } from './tile';

type PipeTransform = (orientation: Orientation, start: Coord) => Coord;

/** Mirror along the facing axis. */
function reflectGreen(orientation: Orientation, start: Coord): Coord {
  switch (orientation) {
    case 'RIGHT':
      return { x: DIMX - start.x - 2, y: start.y };
    case 'LEFT':
      return { x: DIMX - start.x, y: start.y };
    case 'UP':
      return { x: start.x, y: DIMY - start.y - 2 };
    case 'DOWN':
      return { x: start.x, y: DIMY - start.y };
  }
}

/** Mirror the perpendicular axis, one cell forward along the facing axis. */
function reflectRed(orientation: Orientation, start: Coord): Coord {
  switch (orientation) {
    case 'RIGHT':
      return { x: start.x + 1, y: DIMY - start.y - 1 };
    case 'LEFT':
      return { x: start.x - 1, y: DIMY - start.y - 1 };
    case 'UP':
      return { x: DIMX - start.x - 1, y: start.y + 1 };
    case 'DOWN':
      return { x: DIMX - start.x - 1, y: start.y - 1 };
  }
}

/** Mirror both axes. */
function reflectGold(orientation: Orientation, start: Coord): Coord {
  switch (orientation) {
    case 'RIGHT':
      return { x: DIMX - start.x - 2, y: DIMY - start.y - 1 };
    case 'LEFT':
      return { x: DIMX - start.x, y: DIMY - start.y - 1 };
    case 'UP':
      return { x: DIMX - start.x - 1, y: DIMY - start.y - 2 };
    case 'DOWN':
      return { x: DIMX - start.x - 1, y: DIMY - start.y };
  }
}

/** Swap the axes, then mirror. */
function rotateBlue(orientation: Orientation, start: Coord): Coord {
  switch (orientation) {
    case 'RIGHT':
      return { x: start.y, y: DIMX - start.x - 2 };
    case 'LEFT':
      return { x: start.y, y: DIMX - start.x };
    case 'UP':
      return { x: start.y + 1, y: DIMX - start.x - 1 };
    case 'DOWN':
      return { x: start.y - 1, y: DIMX - start.x - 1 };
  }
}

function blackEnd(orientation: Orientation, start: Coord): Coord {
  switch (orientation) {
    case 'RIGHT':
      return { x: start.x + 1, y: start.y };
    case 'LEFT':
      return { x: start.x - 1, y: start.y };
    case 'UP':
      return { x: start.x, y: start.y + 1 };
    case 'DOWN':
      return { x: start.x, y: start.y - 1 };
  }
}

const TRANSFORMS: Record<Color, PipeTransform> = {
  GREEN: reflectGreen,
  RED: reflectRed,
  GOLD: reflectGold,
  BLUE: rotateBlue,
  BLACK: blackEnd,
};

/**
 * The cell a pipe at `start` facing `orientation` leads to.
 * The result is not bounds-checked; level construction rejects pipes that leave the grid.
 */
export function pipeEnd(start: Coord, color: Color, orientation: Orientation): Coord {
  return TRANSFORMS[color](orientation, start);
}

export function makePipeTile(start: Coord, color: Color, orientation: Orientation): Tile {
  return makeTile(
    { kind: 'PIPE', pipe: { color, orientation, end: pipeEnd(start, color, orientation) } },
    start
  );
}
