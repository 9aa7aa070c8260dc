import { integer, jsonb, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';
import { CHARACTER_CLASS } from '../types/index.js';
import type { PityCounters, StatBlock } from '../types/index.js';

export const characters = pgTable('characters', {
  id: uuid('id').primaryKey().defaultRandom(),
  userId: uuid('user_id').notNull(),
  name: text('name').notNull(),
  level: integer('level').notNull().default(1),
  characterClass: text('character_class', { enum: CHARACTER_CLASS }),
  // 장비·버프 반영된 유효 스탯
  stats: jsonb('stats').$type<StatBlock>().notNull(),
  currentHp: integer('current_hp').notNull(),
  maxHp: integer('max_hp').notNull(),
  gold: integer('gold').notNull().default(0),
  exp: integer('exp').notNull().default(0),
  pityCounters: jsonb('pity_counters').$type<PityCounters>().notNull().default({}),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});
