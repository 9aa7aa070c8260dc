import { z } from 'zod';
import { DUNGEON_DIFFICULTY } from '../../db/types/index.js';

export const StartRunBodySchema = z.object({
  dungeonId: z.string().min(1).max(100),
  difficulty: z.enum(DUNGEON_DIFFICULTY).default('NORMAL'),
});

export type StartRunBody = z.infer<typeof StartRunBodySchema>;
