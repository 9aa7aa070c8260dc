// 던전 방 판정: 파티 전투력 vs 요구 전투력, 성공 보상 / 실패 피해

import { Injectable } from '@nestjs/common';
import type {
  CardDefinition,
  CharacterClass,
  DungeonDifficulty,
  DungeonRoom,
  RoomApproach,
  RoomResult,
  StatBlock,
  StatRequirement,
  StatType,
} from '../../db/types/index.js';
import { CardDropService } from '../cards/card-drop.service.js';
import {
  ENCHANTER_PARTY_POWER_BONUS,
  PALADIN_DAMAGE_REDUCTION,
  TRICKSTER_LOOT_BONUS,
  encounterMultiplier,
} from '../classes/class-traits.js';
import type { Rng } from '../rng/rng.service.js';
import { DIFFICULTY_PROFILES, SUCCESS_CEILING } from './difficulty.js';

export interface PartyMember {
  characterClass: CharacterClass | null;
  stats: StatBlock;
}

export interface EncounterContext {
  roomIndex?: number;
  partySize?: number;
  partyClasses?: readonly (CharacterClass | null)[];
  tier?: number;
  luck?: number;
  // 카드·affix 성공 보너스 (파티 평균, 가산)
  successBonus?: number;
  statReadiness?: number;
  baseExpReward?: number;
  baseGoldReward?: number;
  roomCount?: number;
  theme?: string;
  cardPool?: readonly CardDefinition[];
  // 지정 시 방 루트 드랍 판정을 위임 (pity 연동)
  lootDecider?: (chance: number) => boolean;
}

export interface SuccessEstimate {
  chance: number;
  effectivePower: number;
  requiredPower: number;
}

const MIN_FAILURE_DAMAGE = 5;
const FAILURE_EXP_SHARE = 0.02;
const RISKY_APPROACH_THRESHOLD = 1.1;
const READINESS_PENALTY = 0.4;
const BASE_ROOM_LOOT_CHANCE = 0.15;
const TIER_LOOT_STEP = 0.05;
const LUCK_LOOT_STEP = 0.005;

export const DIRECT_APPROACH_NAME = 'Direct';

@Injectable()
export class EncounterService {
  constructor(private readonly cardDrops: CardDropService) {}

  /**
   * 파티 전투력 = Σ(멤버 스탯 + 특화 보너스), Enchanter 가 있으면 +20%.
   * statOverride(접근법 스탯)가 없으면 방의 주 스탯.
   */
  calculatePartyPower(
    party: readonly PartyMember[],
    room: DungeonRoom,
    statOverride?: StatType,
  ): number {
    const stat = statOverride ?? room.primaryStat;
    let total = 0;
    for (const member of party) {
      const value = member.stats[stat];
      total += value + Math.floor(value * encounterMultiplier(member.characterClass, room.encounterType));
    }
    if (party.some((m) => m.characterClass === 'ENCHANTER')) {
      total += Math.floor(total * ENCHANTER_PARTY_POWER_BONUS);
    }
    return total;
  }

  /** 요구 스탯별 (최고 멤버 값 / 최소치, 1 로 캡)의 평균. 요구 없음 → 1 */
  calculateStatReadiness(party: readonly PartyMember[], requirements: readonly StatRequirement[]): number {
    if (requirements.length === 0) return 1;
    const total = requirements.reduce((sum, req) => {
      const best = party.reduce((max, m) => Math.max(max, m.stats[req.stat]), 0);
      return sum + Math.min(1, best / Math.max(1, req.minimum));
    }, 0);
    return total / requirements.length;
  }

  /**
   * chance = 유효 전투력 / 요구 전투력 + successBonus - (1 - readiness) * 0.4
   * 요구 전투력 = rating × 난이도 배율 × (1 + 0.5 × (파티 수 - 1)), [floor, 0.95] 로 클램프
   */
  calculateSuccessChance(
    room: DungeonRoom,
    approach: RoomApproach,
    characterPower: number,
    difficulty: DungeonDifficulty,
    context: EncounterContext = {},
  ): SuccessEstimate {
    const profile = DIFFICULTY_PROFILES[difficulty];
    const partySize = Math.max(1, context.partySize ?? 1);
    const effectivePower = characterPower * approach.powerModifier;
    const requiredPower = room.difficultyRating * profile.scalar * (1 + 0.5 * (partySize - 1));

    let chance = requiredPower > 0 ? effectivePower / requiredPower : SUCCESS_CEILING;
    chance += context.successBonus ?? 0;
    const readiness = context.statReadiness ?? 1;
    if (readiness < 1) {
      chance -= (1 - readiness) * READINESS_PENALTY;
    }

    return {
      chance: Math.min(SUCCESS_CEILING, Math.max(profile.successFloor, chance)),
      effectivePower: Math.floor(effectivePower),
      requiredPower: Math.floor(requiredPower),
    };
  }

  resolve(
    room: DungeonRoom,
    approach: RoomApproach,
    characterPower: number,
    difficulty: DungeonDifficulty,
    rng: Rng,
    context: EncounterContext = {},
  ): RoomResult {
    const profile = DIFFICULTY_PROFILES[difficulty];
    const estimate = this.calculateSuccessChance(room, approach, characterPower, difficulty, context);
    const success = rng.chance(estimate.chance);
    const classes = context.partyClasses ?? [];
    const baseExp = context.baseExpReward ?? 0;

    const result: RoomResult = {
      roomIndex: context.roomIndex ?? 0,
      roomName: room.name,
      encounterType: room.encounterType,
      approachName: approach.name,
      success,
      successChance: estimate.chance,
      playerPower: estimate.effectivePower,
      requiredPower: estimate.requiredPower,
      expEarned: 0,
      goldEarned: 0,
      hpLost: 0,
      lootChance: 0,
      lootDropped: false,
      cardDroppedId: null,
      narrativeTag: `${room.encounterType.toLowerCase()}.${success ? 'success' : 'failure'}`,
    };

    if (!success) {
      const baseDamage = Math.max(MIN_FAILURE_DAMAGE, estimate.requiredPower - estimate.effectivePower);
      const risked = Math.floor(baseDamage * approach.riskModifier * profile.damageMultiplier);
      const reduction = classes.includes('PALADIN') ? PALADIN_DAMAGE_REDUCTION : 0;
      result.hpLost = Math.max(1, Math.floor(risked * (1 - reduction)));
      result.expEarned = Math.floor(baseExp * FAILURE_EXP_SHARE);
      return result;
    }

    const roomCount = context.roomCount ?? 1;
    const roomShare = roomCount > 0 ? 1 / roomCount : 1;
    let exp = Math.floor(baseExp * roomShare * profile.rewardMultiplier);
    let gold = Math.floor((context.baseGoldReward ?? 0) * roomShare * profile.rewardMultiplier);
    if (room.isBossRoom) {
      exp *= 2;
      gold *= 2;
    }
    if (approach.powerModifier > RISKY_APPROACH_THRESHOLD) {
      const bonus = 1 + (approach.powerModifier - 1) * 0.5;
      exp = Math.floor(exp * bonus);
      gold = Math.floor(gold * bonus);
    }
    result.expEarned = exp;
    result.goldEarned = gold;

    const tricksterBonus = classes.includes('TRICKSTER') ? TRICKSTER_LOOT_BONUS : 0;
    result.lootChance = Math.min(
      profile.dropChanceCap,
      BASE_ROOM_LOOT_CHANCE +
        (context.tier ?? 1) * TIER_LOOT_STEP +
        (context.luck ?? 0) * LUCK_LOOT_STEP +
        room.bonusLootChance +
        tricksterBonus,
    );
    result.lootDropped = context.lootDecider
      ? context.lootDecider(result.lootChance)
      : rng.chance(result.lootChance);

    if (context.cardPool && context.theme) {
      const card = this.cardDrops.rollCardDrop(
        { sourceType: 'DUNGEON', theme: context.theme, isBossRoom: room.isBossRoom },
        context.cardPool,
        rng,
      );
      result.cardDroppedId = card?.cardId ?? null;
    }

    return result;
  }

  /** 파티 전투력 × powerModifier 가 가장 큰 접근법, 후보가 없으면 방 주 스탯의 Direct */
  autoSelectBestApproach(
    party: readonly PartyMember[],
    room: DungeonRoom,
    approaches: readonly RoomApproach[],
  ): RoomApproach {
    if (approaches.length === 0) {
      return {
        name: DIRECT_APPROACH_NAME,
        description: 'A straightforward attempt',
        primaryStat: room.primaryStat,
        powerModifier: 1,
        riskModifier: 1,
      };
    }

    let best = approaches[0];
    let bestPower = 0;
    for (const approach of approaches) {
      const power = this.calculatePartyPower(party, room, approach.primaryStat) * approach.powerModifier;
      if (power > bestPower) {
        bestPower = power;
        best = approach;
      }
    }
    return best;
  }
}
