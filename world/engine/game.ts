// ============================================================================
// GAME ENGINE - The main API for driving the simulation
// ============================================================================

import type { GameEvent, Result } from '../actions/types';
import { err, moveOrientation, ok, parseMove } from '../actions/types';
import type { Board } from '../map/board';
import { getTileAt } from '../map/board';
import { formatCoord, isInBounds, sameCoord, stepCoord } from '../map/grid';
import type { Level, Levels } from '../levels/levels';
import { finalLevelId, getBoard, getLevel, isFinalLevel } from '../levels/levels';
import type { BossState } from '../state/bossState';
import { isDefeated, makeBossState } from '../state/bossState';
import type { EncounterRule, PlayerState } from '../state/playerState';
import { finalLevelUpdate, initState, noEncounterEffect, update } from '../state/playerState';
import { UnknownLevelError } from '../errors';

// ============================================================================
// SNAPSHOT TYPE
// ============================================================================

export interface GameSnapshot {
  readonly player: PlayerState;
  readonly boss: BossState | undefined;
  readonly level: Level;
  readonly board: Board;
}

export interface GameOptions {
  /** Forwarded to `finalLevelUpdate` on the final level */
  readonly encounter?: EncounterRule;
  /** Receives one plain-text line per processed input */
  readonly trace?: (line: string) => void;
}

// ============================================================================
// GAME CLASS
// ============================================================================

/**
 * Game holds the current snapshots and replaces them on every input.
 *
 * Invariants:
 * - All operations are synchronous
 * - All operations are deterministic
 * - Gameplay input never throws - errors are returned as Result
 */
export class Game {
  private player: PlayerState;
  private boss: BossState | undefined;
  private readonly encounter: EncounterRule;
  private readonly trace: ((line: string) => void) | undefined;

  constructor(private readonly levels: Levels, options: GameOptions = {}) {
    this.encounter = options.encounter ?? noEncounterEffect;
    this.trace = options.trace;
    this.player = initState(levels, getBoard(levels, 0));
    this.boss = undefined;
    this.spawnBossIfDue();
  }

  /**
   * Feed one input through the transition for the current level.
   * Returns the events describing what changed.
   */
  submitMove(input: string): Result<GameEvent[]> {
    if (this.boss && isDefeated(this.boss)) {
      return err('GAME_OVER', 'The boss is already defeated');
    }

    const before = this.player;
    const bossBefore = this.boss;
    const board = getBoard(this.levels, before.levelId);

    const stepped = this.step(input, before, bossBefore, board);
    if (!stepped.ok) {
      return stepped;
    }
    const [after, bossAfter] = stepped.value;

    this.player = after;
    this.boss = bossAfter;

    const events = this.describePlayer(input, before, after, board);
    events.push(...this.describeBoss(bossBefore, bossAfter));
    events.push(...this.spawnBossIfDue());

    this.trace?.(
      `[Game] step ${after.steps}: '${input}' -> level ${after.levelId} ${formatCoord(after.coord)}, coins ${after.coins}` +
        (this.boss ? `, boss ${formatCoord(this.boss.coord)} hp ${this.boss.health}` : '')
    );
    return ok(events);
  }

  private step(
    input: string,
    player: PlayerState,
    boss: BossState | undefined,
    board: Board
  ): Result<readonly [PlayerState, BossState | undefined]> {
    try {
      if (boss && isFinalLevel(this.levels, player.levelId)) {
        return ok(finalLevelUpdate(input, player, this.levels, board, boss, this.encounter));
      }
      const next: readonly [PlayerState, BossState | undefined] = [update(input, player, this.levels, board), boss];
      return ok(next);
    } catch (error) {
      if (error instanceof UnknownLevelError) {
        this.trace?.(`[Game] step ${player.steps + 1}: '${input}' leads to missing level ${error.levelId}`);
        return err('UNKNOWN_LEVEL', error.message);
      }
      throw error;
    }
  }

  getSnapshot(): GameSnapshot {
    return {
      player: this.player,
      boss: this.boss,
      level: getLevel(this.levels, this.player.levelId),
      board: getBoard(this.levels, this.player.levelId),
    };
  }

  isOver(): boolean {
    return this.boss !== undefined && isDefeated(this.boss);
  }

  // ==========================================================================
  // EVENT DERIVATION
  // ==========================================================================

  private describePlayer(input: string, before: PlayerState, after: PlayerState, board: Board): GameEvent[] {
    const events: GameEvent[] = [];
    const move = parseMove(input);
    const dest = move ? stepCoord(before.coord, moveOrientation(move)) : undefined;
    const entered = dest && isInBounds(dest) ? getTileAt(board, dest) : undefined;
    const pipe = entered && entered.type.kind === 'PIPE' ? entered.type.pipe : undefined;

    if (after.levelId !== before.levelId) {
      events.push({ type: 'LEVEL_CHANGED', from: before.levelId, to: after.levelId });
    } else if (entered && pipe) {
      events.push({
        type: 'PIPE_TRAVELED',
        levelId: after.levelId,
        color: pipe.color,
        from: entered.coord,
        to: after.coord,
      });
    } else if (sameCoord(after.coord, before.coord)) {
      events.push({ type: 'MOVE_BLOCKED', input, steps: after.steps });
      return events;
    }

    events.push({ type: 'PLAYER_MOVED', levelId: after.levelId, x: after.coord.x, y: after.coord.y });
    if (after.coins > before.coins) {
      events.push({ type: 'COIN_COLLECTED', levelId: after.levelId, coins: after.coins });
    }
    return events;
  }

  private describeBoss(before: BossState | undefined, after: BossState | undefined): GameEvent[] {
    if (!before || !after) return [];
    const events: GameEvent[] = [];
    if (!sameCoord(before.coord, after.coord)) {
      events.push({ type: 'BOSS_MOVED', x: after.coord.x, y: after.coord.y });
    }
    if (after.health < before.health) {
      events.push({ type: 'BOSS_DAMAGED', health: after.health });
      if (isDefeated(after)) {
        events.push({ type: 'BOSS_DEFEATED' });
      }
    }
    return events;
  }

  private spawnBossIfDue(): GameEvent[] {
    const spawn = this.levels.boss;
    if (this.boss || !spawn || this.player.levelId !== finalLevelId(this.levels)) {
      return [];
    }
    const board = getBoard(this.levels, this.player.levelId);
    this.boss = makeBossState(spawn.x, spawn.y, getTileAt(board, spawn).type, spawn.health);
    return [{ type: 'BOSS_SPAWNED', x: spawn.x, y: spawn.y, health: spawn.health }];
  }
}
