// 카탈로그 JSON 스키마: 서버 배포(remote) / 번들(static) 공통

import { z } from 'zod';
import {
  AFFIX_KIND,
  CARD_BONUS_TYPE,
  CARD_SOURCE_TYPE,
  CHARACTER_CLASS,
  CONTENT_TYPE,
  DUNGEON_DIFFICULTY,
  ENCOUNTER_TYPE,
  EQUIPMENT_SLOT,
  RARITY,
  STAT_BONUS_RANGE,
  STAT_TYPE,
} from '../db/types/index.js';
import type { CardDefinition, DungeonDefinition } from '../db/types/index.js';

export const EquipmentTemplateSchema = z
  .object({
    templateId: z.string().min(1),
    name: z.string().min(1),
    descriptionKey: z.string().default(''),
    slot: z.enum(EQUIPMENT_SLOT),
    rarity: z.enum(RARITY),
    primaryStat: z.enum(STAT_TYPE),
    statBonus: z.number().int(),
    secondaryStat: z.enum(STAT_TYPE).nullable().default(null),
    secondaryStatBonus: z.number().int().min(0).default(0),
    levelRequirement: z.number().int().min(1),
    active: z.boolean().default(true),
  })
  .superRefine((tpl, ctx) => {
    const [min, max] = STAT_BONUS_RANGE[tpl.rarity];
    if (tpl.statBonus < min || tpl.statBonus > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['statBonus'],
        message: `${tpl.rarity} statBonus must be within [${min}, ${max}]`,
      });
    }
  });
export type EquipmentTemplate = z.infer<typeof EquipmentTemplateSchema>;

export const AffixDefinitionSchema = z
  .object({
    affixId: z.string().min(1),
    name: z.string().min(1),
    kind: z.enum(AFFIX_KIND),
    bonusType: z.string().min(1),
    minValue: z.number(),
    maxValue: z.number(),
    // 이 희귀도 미만 아이템에는 붙지 않음
    minRarity: z.enum(RARITY).default('COMMON'),
    active: z.boolean().default(true),
  })
  .refine((a) => a.minValue <= a.maxValue, {
    message: 'minValue must not exceed maxValue',
    path: ['maxValue'],
  });
export type AffixDefinition = z.infer<typeof AffixDefinitionSchema>;

export const CardDefinitionSchema = z.object({
  cardId: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  theme: z.string().min(1),
  rarity: z.enum(RARITY),
  bonusType: z.enum(CARD_BONUS_TYPE),
  bonusValue: z.number().positive(),
  sourceType: z.enum(CARD_SOURCE_TYPE),
  sourceName: z.string().min(1),
  dropChance: z.number().min(0).max(1).default(0),
  active: z.boolean().default(true),
});

export const DropRateRuleSchema = z.object({
  contentType: z.enum(CONTENT_TYPE),
  baseChance: z.number().min(0).max(1).optional(),
  pityThreshold: z.number().int().positive().optional(),
  pityMinRarity: z.enum(RARITY).optional(),
  luckScaling: z.number().min(0).optional(),
});
export type DropRateRule = z.infer<typeof DropRateRuleSchema>;

export const RoomApproachSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  primaryStat: z.enum(STAT_TYPE),
  powerModifier: z.number().positive(),
  riskModifier: z.number().positive(),
});

export const DungeonRoomSchema = z.object({
  name: z.string().min(1),
  encounterType: z.enum(ENCOUNTER_TYPE),
  primaryStat: z.enum(STAT_TYPE),
  difficultyRating: z.number().int().positive(),
  isBossRoom: z.boolean().default(false),
  bonusLootChance: z.number().min(0).max(1).default(0),
  isBonusRoom: z.boolean().default(false),
  classGate: z.enum(CHARACTER_CLASS).nullable().default(null),
});

export const DungeonDefinitionSchema = z.object({
  dungeonId: z.string().min(1),
  name: z.string().min(1),
  theme: z.string().min(1),
  difficulty: z.enum(DUNGEON_DIFFICULTY).default('NORMAL'),
  levelRequirement: z.number().int().min(1).default(1),
  lootTier: z.number().int().min(1),
  baseExpReward: z.number().int().min(0),
  baseGoldReward: z.number().int().min(0),
  statRequirements: z
    .array(z.object({ stat: z.enum(STAT_TYPE), minimum: z.number().int().min(0) }))
    .default([]),
  rooms: z.array(DungeonRoomSchema).min(1),
  active: z.boolean().default(true),
});

export const ApproachTableSchema = z.record(z.enum(ENCOUNTER_TYPE), z.array(RoomApproachSchema));
export type ApproachTable = z.infer<typeof ApproachTableSchema>;

export const NameTablesSchema = z.object({
  rarityWords: z.record(z.enum(RARITY), z.array(z.string().min(1))),
  slotBases: z.record(z.enum(EQUIPMENT_SLOT), z.array(z.string().min(1))),
  statSuffixes: z.record(z.enum(STAT_TYPE), z.array(z.string().min(1))),
});
export type NameTables = z.infer<typeof NameTablesSchema>;

export const CatalogSchema = z.object({
  version: z.string().default('unversioned'),
  equipment: z.array(EquipmentTemplateSchema).default([]),
  affixes: z.array(AffixDefinitionSchema).default([]),
  cards: z.array(CardDefinitionSchema).default([]),
  dropRates: z.array(DropRateRuleSchema).default([]),
  dungeons: z.array(DungeonDefinitionSchema).default([]),
  approaches: ApproachTableSchema.default({}),
  names: NameTablesSchema.optional(),
});

export interface Catalog {
  equipment: EquipmentTemplate[];
  affixes: AffixDefinition[];
  cards: CardDefinition[];
  dropRates: DropRateRule[];
  dungeons: DungeonDefinition[];
  approaches: ApproachTable;
  names: NameTables;
}

export type CatalogSource =
  | { kind: 'REMOTE'; version: string; loadedAt: string; catalog: Catalog }
  | { kind: 'STATIC'; catalog: Catalog };

export const EMPTY_NAME_TABLES: NameTables = {
  rarityWords: {},
  slotBases: {},
  statSuffixes: {},
};

export function emptyCatalog(): Catalog {
  return {
    equipment: [],
    affixes: [],
    cards: [],
    dropRates: [],
    dungeons: [],
    approaches: {},
    names: EMPTY_NAME_TABLES,
  };
}
