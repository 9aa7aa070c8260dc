import { z } from 'zod';
import { CONTENT_TYPE, EQUIPMENT_SLOT } from '../../db/types/index.js';

export const RollDropBodySchema = z.object({
  contentType: z.enum(CONTENT_TYPE),
  tier: z.number().int().min(1).max(10),
  // 미지정 시 contentType 기본값
  baseChance: z.number().min(0).max(1).optional(),
  slot: z.enum(EQUIPMENT_SLOT).optional(),
});

export type RollDropBody = z.infer<typeof RollDropBodySchema>;
