import { describe, expect, it } from 'vitest';

import {
  COIN,
  LevelDefinitionError,
  PreconditionError,
  SeededRandom,
  addTiles,
  boardToString,
  countTiles,
  entrance,
  exit,
  getSize,
  getTile,
  getTileAt,
  makeBoard,
  makePipeTile,
  makeTile,
  placeRandomItems,
  roomOfCoords,
  setTile,
  WALL,
} from '../../world';
import type { Board } from '../../world';

function smallBoard(): Board {
  return makeBoard(
    makeTile(entrance('RIGHT'), { x: 0, y: 1 }),
    makeTile(exit('UP'), { x: 1, y: 0 }),
    [roomOfCoords({ x: 1, y: 1 }, { x: 2, y: 2 })]
  );
}

describe('board construction', () => {
  it('starts from walls, carves rooms and places the doors', () => {
    const board = smallBoard();
    expect(getSize(board)).toBe(256);
    expect(countTiles(board, 'EMPTY')).toBe(4);
    expect(countTiles(board, 'WALL')).toBe(250);
    expect(getTileAt(board, { x: 0, y: 1 })).toEqual({
      coord: { x: 0, y: 1 },
      type: { kind: 'ENTRANCE', orientation: 'RIGHT' },
    });
    expect(getTileAt(board, { x: 1, y: 0 }).type).toEqual({ kind: 'EXIT', orientation: 'UP' });
    expect(getTileAt(board, { x: 2, y: 2 }).type.kind).toBe('EMPTY');
    expect(getTileAt(board, { x: 3, y: 2 }).type.kind).toBe('WALL');
  });

  it('stores every tile at its own coordinate', () => {
    const board = smallBoard();
    board.tiles.forEach((tile, index) => {
      expect(getTile(board, index).coord).toEqual(tile.coord);
      expect(tile.coord.x + 16 * tile.coord.y).toBe(index);
    });
  });

  it('builds the same board from the same input', () => {
    expect(smallBoard()).toEqual(smallBoard());
  });

  it('overwrites a cell with setTile', () => {
    const board = smallBoard();
    setTile(board, makeTile(COIN, { x: 2, y: 1 }));
    expect(getTileAt(board, { x: 2, y: 1 }).type.kind).toBe('COIN');
  });

  it('adds pipes and coins but nothing else', () => {
    const board = smallBoard();
    addTiles(board, [makePipeTile({ x: 2, y: 2 }, 'BLACK', 'LEFT'), makeTile(COIN, { x: 1, y: 2 })]);
    expect(getTileAt(board, { x: 2, y: 2 }).type.kind).toBe('PIPE');
    expect(countTiles(board, 'COIN')).toBe(1);
    expect(() => addTiles(board, [makeTile(WALL, { x: 1, y: 1 })])).toThrow(PreconditionError);
  });

  it('fails fast on out-of-range lookups', () => {
    const board = smallBoard();
    expect(() => getTile(board, 256)).toThrow(PreconditionError);
    expect(() => getTileAt(board, { x: 16, y: 0 })).toThrow('Coordinate (16, 0) is outside the 16x16 grid');
  });
});

describe('random items', () => {
  it('places the same items for the same seed', () => {
    const first = placeRandomItems(smallBoard(), 2, new SeededRandom(9));
    const second = placeRandomItems(smallBoard(), 2, new SeededRandom(9));
    expect(countTiles(first, 'ITEM')).toBe(2);
    expect(countTiles(first, 'EMPTY')).toBe(2);
    expect(first).toEqual(second);
  });

  it('only turns empty floor into items', () => {
    const board = placeRandomItems(smallBoard(), 4, new SeededRandom(3));
    expect(countTiles(board, 'ITEM')).toBe(4);
    expect(countTiles(board, 'WALL')).toBe(250);
    expect(getTileAt(board, { x: 0, y: 1 }).type.kind).toBe('ENTRANCE');
  });

  it('fails when the floor runs out', () => {
    expect(() => placeRandomItems(smallBoard(), 5, new SeededRandom(1))).toThrow(LevelDefinitionError);
    expect(() => placeRandomItems(smallBoard(), 5, new SeededRandom(1))).toThrow('No empty tile left for item 5 of 5');
  });
});

describe('board rendering', () => {
  it('prints the top row first with one cell per tile', () => {
    const board = smallBoard();
    setTile(board, makeTile(COIN, { x: 2, y: 2 }));
    const lines = boardToString(board).split('\n');
    expect(lines).toHaveLength(18);
    expect(lines[0]).toBe('');
    expect(lines[1]).toBe('|W'.repeat(16) + '|');
    expect(lines[14]).toBe('|W| |c' + '|W'.repeat(13) + '|');
    expect(lines[15]).toBe('|I| | ' + '|W'.repeat(13) + '|');
    expect(lines[16]).toBe('|W|O' + '|W'.repeat(14) + '|');
    expect(lines[17]).toBe('');
  });
});
