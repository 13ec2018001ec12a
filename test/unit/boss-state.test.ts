import { describe, expect, it } from 'vitest';

import { EMPTY, PreconditionError, decreaseHealth, getBoard, isDefeated, makeBossState, moveBoss } from '../../world';
import type { BossState, Coord } from '../../world';
import { loadBasicLevels } from '../helpers';

const board = getBoard(loadBasicLevels(), 4);

function chase(player: Coord, boss: BossState): Coord {
  return moveBoss(player, boss, board).coord;
}

describe('boss construction', () => {
  it('keeps position, tile and health', () => {
    const boss = makeBossState(10, 10, EMPTY, 75);
    expect(boss.coord).toEqual({ x: 10, y: 10 });
    expect(boss.tile).toEqual(EMPTY);
    expect(boss.health).toBe(75);
  });

  it('rejects negative health', () => {
    expect(() => makeBossState(10, 10, EMPTY, -1)).toThrow(PreconditionError);
  });
});

describe('decreaseHealth', () => {
  const boss = makeBossState(10, 10, EMPTY, 75);

  it.each([
    [0, 75],
    [25, 50],
    [75, 0],
    [100, 0],
  ])('takes %i damage down to %i', (amount, health) => {
    expect(decreaseHealth(boss, amount)).toEqual(makeBossState(10, 10, EMPTY, health));
  });

  it('never changes the original snapshot', () => {
    decreaseHealth(boss, 30);
    expect(boss.health).toBe(75);
  });

  it('refuses negative damage', () => {
    expect(() => decreaseHealth(boss, -5)).toThrow('Damage must be a non-negative integer, got -5');
  });

  it('is defeated exactly at zero', () => {
    expect(isDefeated(decreaseHealth(boss, 74))).toBe(false);
    expect(isDefeated(decreaseHealth(boss, 75))).toBe(true);
  });
});

describe('moveBoss', () => {
  const boss = makeBossState(9, 9, EMPTY, 100);

  it('steps one cell toward the player along a single axis', () => {
    expect(chase({ x: 11, y: 9 }, boss)).toEqual({ x: 10, y: 9 });
    expect(chase({ x: 7, y: 9 }, boss)).toEqual({ x: 8, y: 9 });
    expect(chase({ x: 9, y: 11 }, boss)).toEqual({ x: 9, y: 10 });
    expect(chase({ x: 9, y: 7 }, boss)).toEqual({ x: 9, y: 8 });
  });

  it('closes the larger gap first', () => {
    expect(chase({ x: 10, y: 13 }, boss)).toEqual({ x: 9, y: 10 });
    expect(chase({ x: 4, y: 8 }, boss)).toEqual({ x: 8, y: 9 });
  });

  it('moves along x when both gaps are equal', () => {
    expect(chase({ x: 10, y: 10 }, boss)).toEqual({ x: 10, y: 9 });
    expect(chase({ x: 8, y: 8 }, boss)).toEqual({ x: 8, y: 9 });
    expect(chase({ x: 12, y: 6 }, boss)).toEqual({ x: 10, y: 9 });
  });

  it('follows a player step by step', () => {
    const once = moveBoss({ x: 12, y: 9 }, boss, board);
    const twice = moveBoss({ x: 12, y: 9 }, once, board);
    expect(twice.coord).toEqual({ x: 11, y: 9 });
    expect(moveBoss({ x: 9, y: 9 }, twice, board).coord).toEqual({ x: 10, y: 9 });
  });

  it('stays put on the player cell', () => {
    expect(moveBoss({ x: 9, y: 9 }, boss, board)).toBe(boss);
  });

  it('stops at a wall without trying the other axis', () => {
    const walled = makeBossState(12, 2, EMPTY, 100);
    expect(moveBoss({ x: 12, y: 5 }, walled, board)).toBe(walled);

    const corner = makeBossState(1, 4, EMPTY, 100);
    expect(moveBoss({ x: 0, y: 5 }, corner, board)).toBe(corner);
  });

  it('takes on the tile it lands on', () => {
    const nearCoin = makeBossState(4, 10, EMPTY, 100);
    expect(moveBoss({ x: 1, y: 10 }, nearCoin, board).tile).toEqual({ kind: 'COIN' });
  });

  it('keeps health while moving', () => {
    expect(moveBoss({ x: 11, y: 9 }, makeBossState(9, 9, EMPTY, 40), board).health).toBe(40);
  });
});
