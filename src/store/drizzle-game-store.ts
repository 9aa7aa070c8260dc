// Postgres(drizzle) 저장소: 중첩 값은 jsonb, 쓰기는 id 기준 upsert

import { Inject, Injectable } from '@nestjs/common';
import { and, eq } from 'drizzle-orm';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { DB, type DrizzleDB } from '../db/drizzle.module.js';
import * as schema from '../db/schema/index.js';
import { characters, dungeonRuns, equipmentItems, monsterCards } from '../db/schema/index.js';
import type {
  CharacterSnapshot,
  DungeonRun,
  EquipmentItem,
  MonsterCard,
} from '../db/types/index.js';
import type { GameStore } from './game-store.js';

// DB 핸들과 트랜잭션 핸들 공통 타입
type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

type CharacterRow = typeof characters.$inferSelect;
type EquipmentRow = typeof equipmentItems.$inferSelect;
type CardRow = typeof monsterCards.$inferSelect;
type RunRow = typeof dungeonRuns.$inferSelect;

class DrizzleStoreOps implements GameStore {
  constructor(protected readonly db: Executor) {}

  async getCharacter(id: string): Promise<CharacterSnapshot | null> {
    const row = await this.db.query.characters.findFirst({ where: eq(characters.id, id) });
    return row ? toCharacter(row) : null;
  }

  async saveCharacter(character: CharacterSnapshot): Promise<void> {
    const { id, ...values } = character;
    await this.db
      .insert(characters)
      .values({ id, ...values })
      .onConflictDoUpdate({ target: characters.id, set: { ...values, updatedAt: new Date() } });
  }

  async addEquipment(item: EquipmentItem): Promise<void> {
    await this.db.insert(equipmentItems).values(item);
  }

  async listEquipment(ownerId: string): Promise<EquipmentItem[]> {
    const rows = await this.db.query.equipmentItems.findMany({
      where: eq(equipmentItems.ownerId, ownerId),
    });
    return rows.map(toEquipment);
  }

  async findCard(ownerId: string, cardId: string): Promise<MonsterCard | null> {
    const row = await this.db.query.monsterCards.findFirst({
      where: and(eq(monsterCards.ownerId, ownerId), eq(monsterCards.cardId, cardId)),
    });
    return row ? toCard(row) : null;
  }

  async listCards(ownerId: string): Promise<MonsterCard[]> {
    const rows = await this.db.query.monsterCards.findMany({
      where: eq(monsterCards.ownerId, ownerId),
    });
    return rows.map(toCard);
  }

  async saveCard(card: MonsterCard): Promise<void> {
    const { id, ...values } = card;
    await this.db
      .insert(monsterCards)
      .values({ id, ...values })
      .onConflictDoUpdate({ target: monsterCards.id, set: values });
  }

  async getRun(id: string): Promise<DungeonRun | null> {
    const row = await this.db.query.dungeonRuns.findFirst({ where: eq(dungeonRuns.id, id) });
    return row ? toRun(row) : null;
  }

  async findActiveRun(characterId: string): Promise<DungeonRun | null> {
    const row = await this.db.query.dungeonRuns.findFirst({
      where: and(eq(dungeonRuns.characterId, characterId), eq(dungeonRuns.status, 'IN_PROGRESS')),
    });
    return row ? toRun(row) : null;
  }

  async saveRun(run: DungeonRun): Promise<void> {
    const { id, ...values } = run;
    await this.db
      .insert(dungeonRuns)
      .values({ id, ...values })
      .onConflictDoUpdate({ target: dungeonRuns.id, set: values });
  }

  async saveRunIfAt(run: DungeonRun, expectedRoomIndex: number): Promise<boolean> {
    const { id, ...values } = run;
    const updated = await this.db
      .update(dungeonRuns)
      .set(values)
      .where(
        and(
          eq(dungeonRuns.id, id),
          eq(dungeonRuns.status, 'IN_PROGRESS'),
          eq(dungeonRuns.currentRoomIndex, expectedRoomIndex),
        ),
      )
      .returning({ id: dungeonRuns.id });
    return updated.length > 0;
  }

  async transaction<T>(work: (store: GameStore) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new DrizzleStoreOps(tx)));
  }
}

@Injectable()
export class DrizzleGameStore extends DrizzleStoreOps {
  constructor(@Inject(DB) db: DrizzleDB) {
    super(db);
  }
}

function toCharacter(row: CharacterRow): CharacterSnapshot {
  return {
    id: row.id,
    userId: row.userId,
    name: row.name,
    level: row.level,
    characterClass: row.characterClass,
    stats: row.stats,
    currentHp: row.currentHp,
    maxHp: row.maxHp,
    gold: row.gold,
    exp: row.exp,
    pityCounters: row.pityCounters,
  };
}

function toEquipment(row: EquipmentRow): EquipmentItem {
  return {
    id: row.id,
    ownerId: row.ownerId,
    name: row.name,
    descriptionKey: row.descriptionKey,
    slot: row.slot,
    rarity: row.rarity,
    primaryStat: row.primaryStat,
    statBonus: row.statBonus,
    secondaryStat: row.secondaryStat,
    secondaryStatBonus: row.secondaryStatBonus,
    levelRequirement: row.levelRequirement,
    enhancementLevel: row.enhancementLevel,
    prefix: row.prefix,
    suffix: row.suffix,
    templateId: row.templateId,
  };
}

function toCard(row: CardRow): MonsterCard {
  return { ...row };
}

function toRun(row: RunRow): DungeonRun {
  return { ...row };
}
