import { z } from 'zod';

import { LevelDefinitionError } from '../errors';

const cell = z.number().int().min(0).max(15);

export const OrientationSchema = z.enum(['LEFT', 'RIGHT', 'UP', 'DOWN']);

export const ColorSchema = z.enum(['GREEN', 'RED', 'GOLD', 'BLUE', 'BLACK']);

export const CoordSchema = z.object({
  x: cell,
  y: cell,
});

export const DoorSchema = CoordSchema.extend({
  orientation: OrientationSchema,
});

export const RoomSchema = z
  .object({
    bottomLeft: CoordSchema,
    topRight: CoordSchema,
  })
  .refine((room) => room.bottomLeft.x <= room.topRight.x && room.bottomLeft.y <= room.topRight.y, {
    message: 'bottomLeft must not lie above or right of topRight',
  });

export const PipeSchema = CoordSchema.extend({
  color: ColorSchema,
  orientation: OrientationSchema,
});

export const LevelSchema = z.object({
  id: z.number().int().min(0),
  entrance: DoorSchema,
  exit: DoorSchema,
  rooms: z.array(RoomSchema).default([]),
  pipes: z.array(PipeSchema).default([]),
  coins: z.array(CoordSchema).default([]),
  items: z.number().int().min(0).default(0),
});

export const BossSpawnSchema = CoordSchema.extend({
  health: z.number().int().min(0),
});

export const LevelsDefinitionSchema = z.object({
  seed: z.number().int().optional(),
  levels: z.array(LevelSchema).min(1),
  boss: BossSpawnSchema.optional(),
});

export type DoorDefinition = z.infer<typeof DoorSchema>;
export type RoomDefinition = z.infer<typeof RoomSchema>;
export type PipeDefinition = z.infer<typeof PipeSchema>;
export type LevelDefinition = z.infer<typeof LevelSchema>;
export type BossSpawn = z.infer<typeof BossSpawnSchema>;
export type LevelsDefinition = z.infer<typeof LevelsDefinitionSchema>;
/** Shape accepted before defaults are applied */
export type LevelsDefinitionInput = z.input<typeof LevelsDefinitionSchema>;

function formatIssuePath(pathItems: Array<string | number>): string {
  if (pathItems.length === 0) {
    return '$';
  }

  return pathItems
    .map((item, index) => {
      if (typeof item === 'number') {
        return `[${item}]`;
      }
      return index === 0 ? item : `.${item}`;
    })
    .join('');
}

export function parseLevelsDefinition(data: unknown): LevelsDefinition {
  const parsed = LevelsDefinitionSchema.safeParse(data);
  if (!parsed.success) {
    const firstIssue = parsed.error.issues.at(0);
    const where = firstIssue ? formatIssuePath(firstIssue.path) : '$';
    const what = firstIssue ? firstIssue.message : 'Schema validation failed.';
    throw new LevelDefinitionError(`Level definition invalid at ${where}: ${what}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
