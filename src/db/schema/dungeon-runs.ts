import { index, integer, jsonb, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';
import { DUNGEON_DIFFICULTY, RUN_STATUS } from '../types/index.js';
import type { DungeonRoom, RoomResult } from '../types/index.js';
import { characters } from './characters.js';

export const dungeonRuns = pgTable(
  'dungeon_runs',
  {
    id: uuid('id').primaryKey(),
    characterId: uuid('character_id')
      .notNull()
      .references(() => characters.id),
    dungeonId: text('dungeon_id').notNull(),
    difficulty: text('difficulty', { enum: DUNGEON_DIFFICULTY }).notNull(),
    rooms: jsonb('rooms').$type<DungeonRoom[]>().notNull(),
    currentRoomIndex: integer('current_room_index').notNull().default(0),
    roomResults: jsonb('room_results').$type<RoomResult[]>().notNull().default([]),
    partyHp: integer('party_hp').notNull(),
    maxPartyHp: integer('max_party_hp').notNull(),
    totalExpEarned: integer('total_exp_earned').notNull().default(0),
    totalGoldEarned: integer('total_gold_earned').notNull().default(0),
    lootItemIds: text('loot_item_ids').array().notNull().default([]),
    cardIds: text('card_ids').array().notNull().default([]),
    status: text('status', { enum: RUN_STATUS }).notNull().default('IN_PROGRESS'),
    secondsPerRoom: integer('seconds_per_room').notNull(),
    startedAt: timestamp('started_at', { mode: 'string' }).notNull(),
    completedAt: timestamp('completed_at', { mode: 'string' }),
  },
  (table) => [index('dungeon_runs_character_status_idx').on(table.characterId, table.status)],
);
