// 던전 런 진행: 시작(방 구성) → 방 단위 진행(판정·보상·드랍) → 완료/실패/포기

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BadRequestError,
  ForbiddenError,
  InvalidInputError,
  NotFoundError,
  RunStateConflictError,
} from '../common/errors/game-errors.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import type {
  CharacterSnapshot,
  DungeonDefinition,
  DungeonRoom,
  DungeonRun,
  EquipmentItem,
  MonsterCard,
  RoomApproach,
  RoomResult,
} from '../db/types/index.js';
import { CardDropService } from '../engine/cards/card-drop.service.js';
import { DungeonRunService, type PerformanceRating } from '../engine/dungeon/dungeon-run.service.js';
import { EncounterService, type PartyMember } from '../engine/dungeon/encounter.service.js';
import { RoomPlannerService } from '../engine/planner/room-planner.service.js';
import { LootService, type PityDrop } from '../engine/rewards/loot.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import { loadOwnedCharacter } from '../store/character-access.js';
import { GAME_STORE, type GameStore } from '../store/game-store.js';
import type { AdvanceRunBody } from './dto/advance-run.dto.js';
import type { StartRunBody } from './dto/start-run.dto.js';

export interface CardAward {
  card: MonsterCard;
  isNew: boolean;
  rarityUpgraded: boolean;
}

export interface AdvanceResponse {
  run: DungeonRun;
  result: RoomResult;
  loot: EquipmentItem[];
  card: CardAward | null;
  // 종료 시에만
  rating: PerformanceRating | null;
}

@Injectable()
export class DungeonsService {
  private readonly logger = new Logger(DungeonsService.name);

  constructor(
    @Inject(GAME_STORE) private readonly store: GameStore,
    private readonly content: ContentLoaderService,
    private readonly rngService: RngService,
    private readonly planner: RoomPlannerService,
    private readonly encounters: EncounterService,
    private readonly runs: DungeonRunService,
    private readonly loot: LootService,
    private readonly cardDrops: CardDropService,
  ) {}

  async startRun(
    userId: string,
    characterId: string,
    body: StartRunBody,
    now: Date = new Date(),
  ): Promise<DungeonRun> {
    const character = await loadOwnedCharacter(this.store, userId, characterId);
    const dungeon = this.requireDungeon(body.dungeonId);

    if (character.level < dungeon.levelRequirement) {
      throw new BadRequestError('Character level is below the dungeon requirement', {
        level: character.level,
        levelRequirement: dungeon.levelRequirement,
      });
    }

    const active = await this.store.findActiveRun(character.id);
    if (active) {
      throw new RunStateConflictError('RUN_ALREADY_ACTIVE', 'Character already has a run in progress', {
        runId: active.id,
      });
    }

    const rooms = this.planner.selectRoomsForRun(
      dungeon.rooms,
      [character.characterClass],
      this.rngService.create(),
    );
    const run = this.runs.startRun(
      {
        characterId: character.id,
        dungeonId: dungeon.dungeonId,
        difficulty: body.difficulty,
        rooms,
        // 런 HP 는 캐릭터 HP 와 별개로 최대치에서 시작
        maxPartyHp: character.maxHp,
      },
      now,
    );
    await this.store.saveRun(run);

    this.logger.log(
      `run started: ${run.id} character=${character.id} dungeon=${dungeon.dungeonId} ${run.difficulty} rooms=${rooms.length}`,
    );
    return run;
  }

  /** 현재 방 타이머가 끝났으면 한 방을 판정하고 결과를 기록 */
  async advance(
    userId: string,
    runId: string,
    body: AdvanceRunBody,
    now: Date = new Date(),
  ): Promise<AdvanceResponse> {
    const run = await this.requireRun(runId);
    const character = await loadOwnedCharacter(this.store, userId, run.characterId);
    this.runs.assertCanAdvance(run, now, body.expectedRoomIndex);

    const dungeon = this.requireDungeon(run.dungeonId);
    const room = run.rooms[run.currentRoomIndex];
    const party: PartyMember[] = [{ characterClass: character.characterClass, stats: character.stats }];
    const approach = this.chooseApproach(party, room, body.approachName);

    const ownedCards = await this.store.listCards(character.id);
    const bonuses = this.cardDrops.totalBonuses(ownedCards).totals;
    const readiness = this.encounters.calculateStatReadiness(party, dungeon.statRequirements);
    const cardPool = this.content.cardPool();
    const rng = this.rngService.create();
    const tier = dungeon.lootTier;

    // 방 루트는 pity(dungeons) 를 거쳐 판정
    const roomLoot: { pity: PityDrop | null } = { pity: null };
    const result = this.encounters.resolve(
      room,
      approach,
      this.encounters.calculatePartyPower(party, room, approach.primaryStat),
      run.difficulty,
      rng,
      {
        roomIndex: run.currentRoomIndex,
        partySize: party.length,
        partyClasses: party.map((m) => m.characterClass),
        tier,
        luck: character.stats.LUCK,
        successBonus: bonuses.DUNGEON_SUCCESS,
        statReadiness: readiness,
        baseExpReward: dungeon.baseExpReward,
        baseGoldReward: dungeon.baseGoldReward,
        roomCount: run.rooms.length,
        theme: dungeon.theme,
        cardPool,
        lootDecider: (chance) => {
          roomLoot.pity = this.loot.rollPityDrop(character, 'dungeons', tier, rng, {
            baseChance: Math.min(1, chance + bonuses.LOOT_CHANCE),
          });
          return roomLoot.pity.dropped;
        },
      },
    );

    const loot: EquipmentItem[] = [];
    if (roomLoot.pity?.item) {
      loot.push(roomLoot.pity.item);
    }

    let card: CardAward | null = null;
    const cardDef = result.cardDroppedId ? cardPool.find((c) => c.cardId === result.cardDroppedId) : undefined;
    if (cardDef) {
      const collected = this.cardDrops.collectCard(
        ownedCards.find((c) => c.cardId === cardDef.cardId) ?? null,
        cardDef,
        character.id,
        now,
      );
      card = {
        card: collected.card,
        isNew: collected.kind === 'NEW',
        rarityUpgraded: collected.kind === 'DUPLICATE' && collected.rarityUpgraded,
      };
      if (card.rarityUpgraded) {
        this.logger.log(`card upgraded: ${cardDef.cardId} → ${collected.card.rarity} (character=${character.id})`);
      }
    }

    let next = this.runs.recordStageResult(
      run,
      result,
      { lootItemIds: loot.map((i) => i.id), cardId: card?.card.id ?? null },
      now,
    );
    this.logger.debug(
      `room ${result.roomIndex} ${result.roomName}: ${result.success ? 'success' : 'failure'} (${result.playerPower}/${result.requiredPower}, p=${result.successChance.toFixed(2)})`,
    );

    let rating: PerformanceRating | null = null;
    if (next.status === 'COMPLETED') {
      const bonusItem = this.loot.generateCompletionBonus(tier, character.stats.LUCK, run.difficulty, rng, {
        characterClass: character.characterClass,
        playerLevel: character.level,
        ownerId: character.id,
      });
      if (bonusItem) {
        loot.push(bonusItem);
        next = { ...next, lootItemIds: [...next.lootItemIds, bonusItem.id] };
      }
    }
    if (next.status !== 'IN_PROGRESS') {
      rating = this.runs.calculatePerformanceRating(next, readiness);
      this.logger.log(
        `run ${next.status.toLowerCase()}: ${next.id} rooms=${next.currentRoomIndex}/${next.rooms.length} hp=${next.partyHp} grade=${rating.grade}`,
      );
    }

    const updatedCharacter: CharacterSnapshot = {
      ...character,
      exp: character.exp + result.expEarned,
      gold: character.gold + result.goldEarned,
      pityCounters: roomLoot.pity?.counters ?? character.pityCounters,
    };

    await this.store.transaction(async (store) => {
      // 같은 방을 먼저 판정한 요청이 있으면 아무것도 쓰지 않고 중단
      await this.claimRun(store, next, run.currentRoomIndex);
      for (const item of loot) {
        await store.addEquipment(item);
      }
      if (card) {
        await store.saveCard(card.card);
      }
      await store.saveCharacter(updatedCharacter);
    });

    return { run: next, result, loot, card, rating };
  }

  async abandon(userId: string, runId: string, now: Date = new Date()): Promise<DungeonRun> {
    const run = await this.requireRun(runId);
    await loadOwnedCharacter(this.store, userId, run.characterId);

    const abandoned = this.runs.abandon(run, now);
    await this.claimRun(this.store, abandoned, run.currentRoomIndex);
    this.logger.log(`run abandoned: ${run.id} at room ${run.currentRoomIndex}/${run.rooms.length}`);
    return abandoned;
  }

  async getRun(userId: string, runId: string): Promise<DungeonRun> {
    const run = await this.requireRun(runId);
    const character = await this.store.getCharacter(run.characterId);
    if (!character || character.userId !== userId) {
      throw new ForbiddenError('Run belongs to another user', { runId });
    }
    return run;
  }

  private chooseApproach(party: readonly PartyMember[], room: DungeonRoom, approachName?: string): RoomApproach {
    const approaches = this.content.approaches(room.encounterType);
    if (!approachName) {
      return this.encounters.autoSelectBestApproach(party, room, approaches);
    }

    const chosen = approaches.find((a) => a.name === approachName);
    if (chosen) return chosen;
    if (approaches.length === 0) {
      return this.encounters.autoSelectBestApproach(party, room, approaches);
    }
    throw new InvalidInputError(`Unknown approach for ${room.encounterType}: ${approachName}`, {
      available: approaches.map((a) => a.name),
    });
  }

  /** 읽어 온 시점의 방 번호 그대로일 때만 런을 갱신 */
  private async claimRun(store: GameStore, next: DungeonRun, readAtRoomIndex: number): Promise<void> {
    const saved = await store.saveRunIfAt(next, readAtRoomIndex);
    if (!saved) {
      throw new RunStateConflictError('ROOM_INDEX_MISMATCH', 'Run was changed by another request', {
        runId: next.id,
        roomIndex: readAtRoomIndex,
      });
    }
  }

  private requireDungeon(dungeonId: string): DungeonDefinition {
    const dungeon = this.content.dungeon(dungeonId);
    if (!dungeon) {
      throw new NotFoundError(`Dungeon not found: ${dungeonId}`, { dungeonId });
    }
    return dungeon;
  }

  private async requireRun(runId: string): Promise<DungeonRun> {
    const run = await this.store.getRun(runId);
    if (!run) {
      throw new NotFoundError('Run not found', { runId });
    }
    return run;
  }
}
