import * as readline from 'node:readline';
import {
  Game,
  boardToString,
  checkLevels,
  formatCoord,
  fromDefinition,
  getErrorMessage,
  loadLevelsFile,
} from '../../world/index.ts';
import type { GameEvent } from '../../world/index.ts';
import { LEVELS_FILE, TRACE } from './config';

// ============================================================================
// RENDERING
// ============================================================================

function render(game: Game): void {
  const { player, boss, board } = game.getSnapshot();
  console.log(boardToString(board));
  console.log(
    `level ${player.levelId}  at ${formatCoord(player.coord)}  coins ${player.coins}  steps ${player.steps}` +
      (boss ? `  boss ${formatCoord(boss.coord)} hp ${boss.health}` : '')
  );
}

function describe(event: GameEvent): string | undefined {
  switch (event.type) {
    case 'COIN_COLLECTED':
      return `Coin! ${event.coins} collected`;
    case 'PIPE_TRAVELED':
      return `Rode a ${event.color.toLowerCase()} pipe to ${formatCoord(event.to)}`;
    case 'LEVEL_CHANGED':
      return `Level ${event.from} -> ${event.to}`;
    case 'BOSS_SPAWNED':
      return `The boss appears at (${event.x}, ${event.y}) with ${event.health} hp`;
    case 'BOSS_DAMAGED':
      return `Boss hit, ${event.health} hp left`;
    case 'BOSS_DEFEATED':
      return 'Boss defeated!';
    default:
      return undefined;
  }
}

// ============================================================================
// MAIN LOOP
// ============================================================================

async function main(): Promise<void> {
  const definition = await loadLevelsFile(LEVELS_FILE);
  const levels = fromDefinition(definition);
  for (const issue of checkLevels(levels)) {
    console.warn(`[Levels] level ${issue.levelId}: ${issue.message}`);
  }

  const game = new Game(levels, { trace: TRACE ? (line) => console.log(line) : undefined });
  console.log(`[CLI] Loaded ${levels.levels.length} levels from ${LEVELS_FILE}. w/a/s/d to move, q to quit.`);
  render(game);

  readline.emitKeypressEvents(process.stdin);
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }

  const stop = (): void => {
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
  };

  process.stdin.on('keypress', (str: string | undefined, key: readline.Key | undefined) => {
    if (key?.ctrl && key.name === 'c') {
      stop();
      return;
    }
    const input = key?.name ?? str ?? '';
    if (input === 'q') {
      stop();
      return;
    }

    const result = game.submitMove(input);
    if (!result.ok) {
      console.log(`[CLI] ${result.error.code}: ${result.error.message}`);
      if (game.isOver()) stop();
      return;
    }
    for (const event of result.value) {
      const line = describe(event);
      if (line) console.log(line);
    }
    render(game);
    if (game.isOver()) {
      console.log('[CLI] You win.');
      stop();
    }
  });
}

main().catch((error: unknown) => {
  console.error(`[CLI] ${getErrorMessage(error)}`);
  process.exitCode = 1;
});
