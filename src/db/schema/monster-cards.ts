import { integer, pgTable, real, text, timestamp, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { CARD_BONUS_TYPE, CARD_SOURCE_TYPE, RARITY } from '../types/index.js';
import { characters } from './characters.js';

export const monsterCards = pgTable(
  'monster_cards',
  {
    id: uuid('id').primaryKey(),
    ownerId: uuid('owner_id')
      .notNull()
      .references(() => characters.id),
    cardId: text('card_id').notNull(),
    name: text('name').notNull(),
    theme: text('theme').notNull(),
    rarity: text('rarity', { enum: RARITY }).notNull(),
    bonusType: text('bonus_type', { enum: CARD_BONUS_TYPE }).notNull(),
    bonusValue: real('bonus_value').notNull(),
    baseBonusValue: real('base_bonus_value').notNull(),
    sourceType: text('source_type', { enum: CARD_SOURCE_TYPE }).notNull(),
    sourceName: text('source_name').notNull(),
    duplicateCount: integer('duplicate_count').notNull().default(0),
    upgradeLevel: integer('upgrade_level').notNull().default(0),
    collectedAt: timestamp('collected_at', { mode: 'string' }).notNull(),
  },
  (table) => [uniqueIndex('monster_cards_owner_card_idx').on(table.ownerId, table.cardId)],
);
