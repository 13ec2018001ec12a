// ============================================================================
// ERRORS - Typed failures raised by the pure core
// ============================================================================

export interface GameErrorOptions {
  code?: string;
  cause?: unknown;
}

export class GameError extends Error {
  readonly code: string;
  declare readonly cause?: unknown;

  constructor(message: string, options: GameErrorOptions = {}) {
    super(message);
    this.name = 'GameError';
    this.code = options.code ?? 'game_error';
    this.cause = options.cause;
  }
}

/** A caller broke a contract: bad index, wrong tile variant, bad amount. */
export class PreconditionError extends GameError {
  constructor(message: string) {
    super(message, { code: 'precondition_failed' });
    this.name = 'PreconditionError';
  }
}

/** Level traversal left the defined range. Carries the would-be target id. */
export class UnknownLevelError extends GameError {
  readonly levelId: number;

  constructor(levelId: number) {
    super(`Unknown level ${levelId}`, { code: 'unknown_level' });
    this.name = 'UnknownLevelError';
    this.levelId = levelId;
  }
}

export class LevelDefinitionError extends GameError {
  constructor(message: string, options: GameErrorOptions = {}) {
    super(message, { code: options.code ?? 'level_definition_invalid', cause: options.cause });
    this.name = 'LevelDefinitionError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
