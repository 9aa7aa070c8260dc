import { index, integer, jsonb, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';
import { EQUIPMENT_SLOT, RARITY, STAT_TYPE } from '../types/index.js';
import type { RolledAffix } from '../types/index.js';
import { characters } from './characters.js';

export const equipmentItems = pgTable(
  'equipment_items',
  {
    id: uuid('id').primaryKey(),
    ownerId: uuid('owner_id').references(() => characters.id),
    name: text('name').notNull(),
    descriptionKey: text('description_key').notNull(),
    slot: text('slot', { enum: EQUIPMENT_SLOT }).notNull(),
    rarity: text('rarity', { enum: RARITY }).notNull(),
    primaryStat: text('primary_stat', { enum: STAT_TYPE }).notNull(),
    statBonus: integer('stat_bonus').notNull(),
    secondaryStat: text('secondary_stat', { enum: STAT_TYPE }),
    secondaryStatBonus: integer('secondary_stat_bonus').notNull().default(0),
    levelRequirement: integer('level_requirement').notNull(),
    enhancementLevel: integer('enhancement_level').notNull().default(0),
    prefix: jsonb('prefix').$type<RolledAffix>(),
    suffix: jsonb('suffix').$type<RolledAffix>(),
    templateId: text('template_id'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => [index('equipment_items_owner_idx').on(table.ownerId)],
);
