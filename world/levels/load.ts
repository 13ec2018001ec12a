import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { LevelDefinitionError, getErrorMessage } from '../errors';
import type { LevelsDefinition } from './definition';
import { parseLevelsDefinition } from './definition';

/** Read and validate a JSON level-definition file */
export async function loadLevelsFile(filePath: string): Promise<LevelsDefinition> {
  const resolvedPath = path.resolve(filePath);

  let raw: string;
  try {
    raw = await readFile(resolvedPath, 'utf8');
  } catch (error) {
    throw new LevelDefinitionError(`Failed to read levels at ${resolvedPath}: ${getErrorMessage(error)}`, {
      code: 'level_definition_read_failed',
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new LevelDefinitionError(`Failed to parse JSON in ${resolvedPath}: ${getErrorMessage(error)}`, {
      code: 'level_definition_json_invalid',
      cause: error,
    });
  }

  return parseLevelsDefinition(data);
}
