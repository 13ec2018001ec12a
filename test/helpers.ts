import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { fromDefinition, parseLevelsDefinition } from '../world';
import type { Levels } from '../world';

export const BASIC_LEVELS_PATH = fileURLToPath(new URL('./fixtures/basic-levels.json', import.meta.url));

export function loadBasicLevels(): Levels {
  const data: unknown = JSON.parse(readFileSync(BASIC_LEVELS_PATH, 'utf8'));
  return fromDefinition(parseLevelsDefinition(data));
}
