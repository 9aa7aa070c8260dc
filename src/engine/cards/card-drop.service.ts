// 몬스터 카드 드랍 · 중복 흡수 · 보너스 합산

import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { InvalidInputError } from '../../common/errors/game-errors.js';
import {
  nextRarity,
  type CardBonusType,
  type CardDefinition,
  type CardSourceType,
  type MonsterCard,
  type Rarity,
} from '../../db/types/index.js';
import type { Rng } from '../rng/rng.service.js';

export type CardDropContext =
  | { sourceType: 'DUNGEON'; theme: string; isBossRoom: boolean }
  | { sourceType: 'ARENA'; wave: number }
  | { sourceType: 'EXPEDITION' }
  | { sourceType: 'RAID'; bossName: string };

const RARITY_WEIGHT: Record<Rarity, number> = {
  COMMON: 5,
  UNCOMMON: 3,
  RARE: 1.5,
  EPIC: 0.5,
  LEGENDARY: 0.1,
};

// 중복 수 → 강화 단계 (index + 1)
export const UPGRADE_THRESHOLDS: readonly number[] = [3, 7, 12, 18];
const DUPLICATE_BONUS_STEP = 0.25;

const PERCENT_BONUS_TYPES: readonly CardBonusType[] = [
  'EXP_PERCENT',
  'GOLD_PERCENT',
  'DUNGEON_SUCCESS',
  'LOOT_CHANCE',
  'MISSION_SPEED',
];

export type CollectResult =
  | { kind: 'NEW'; card: MonsterCard }
  | { kind: 'DUPLICATE'; card: MonsterCard; rarityUpgraded: boolean };

export interface CardBonusSummary {
  totals: Record<CardBonusType, number>;
  powerScoreBonus: number;
}

export function upgradeLevelFor(duplicateCount: number): number {
  return UPGRADE_THRESHOLDS.filter((t) => duplicateCount >= t).length;
}

export function isArenaMilestone(wave: number): boolean {
  return wave >= 15 && (wave % 10 === 5 || wave === 15 || wave === 25);
}

@Injectable()
export class CardDropService {
  /**
   * 출처별 후보를 고르고, 후보 평균 dropChance(0 이면 기본값)로 판정 후
   * 희귀도 가중치로 한 장 선택. RAID 는 항상 드랍.
   */
  rollCardDrop(context: CardDropContext, cardPool: readonly CardDefinition[], rng: Rng): CardDefinition | null {
    const bySource = (sourceType: CardSourceType) =>
      cardPool.filter((c) => c.active && c.sourceType === sourceType);

    switch (context.sourceType) {
      case 'DUNGEON': {
        const theme = context.theme.toLowerCase();
        const candidates = bySource('DUNGEON').filter((c) => c.theme.toLowerCase() === theme);
        return this.rollFromCandidates(candidates, context.isBossRoom ? 0.15 : 0.1, rng);
      }
      case 'ARENA':
        if (!isArenaMilestone(context.wave)) return null;
        return this.rollFromCandidates(bySource('ARENA'), 0.2, rng);
      case 'EXPEDITION':
        return this.rollFromCandidates(bySource('EXPEDITION'), 0.15, rng);
      case 'RAID': {
        const raidCards = bySource('RAID');
        if (raidCards.length === 0) return null;
        const boss = context.bossName.toLowerCase();
        return raidCards.find((c) => c.sourceName.toLowerCase().includes(boss)) ?? rng.pick(raidCards);
      }
    }
  }

  /** 희귀도 가중치 누적 선택: 빈 풀은 호출 계약 위반 */
  weightedRandomCard(cards: readonly CardDefinition[], rng: Rng): CardDefinition {
    const picked = rng.weighted(cards.map((card) => ({ item: card, weight: RARITY_WEIGHT[card.rarity] })));
    if (!picked) {
      throw new InvalidInputError('weightedRandomCard requires a non-empty card pool');
    }
    return picked;
  }

  /**
   * 중복 +1, 보너스 = base × (1 + 0.25 × 중복 수).
   * 강화 단계가 올라가면 희귀도 한 단계 상승 (Legendary 는 단계만 기록, false 반환).
   */
  absorbDuplicate(card: MonsterCard): { card: MonsterCard; rarityUpgraded: boolean } {
    const duplicateCount = card.duplicateCount + 1;
    const bonusValue = card.baseBonusValue * (1 + DUPLICATE_BONUS_STEP * duplicateCount);
    const targetLevel = upgradeLevelFor(duplicateCount);
    const updated: MonsterCard = { ...card, duplicateCount, bonusValue };

    if (targetLevel <= card.upgradeLevel) {
      return { card: updated, rarityUpgraded: false };
    }

    const raised = nextRarity(card.rarity);
    return {
      card: { ...updated, upgradeLevel: targetLevel, rarity: raised ?? card.rarity },
      rarityUpgraded: raised !== null,
    };
  }

  collectCard(
    owned: MonsterCard | null,
    definition: CardDefinition,
    ownerId: string,
    now: Date = new Date(),
  ): CollectResult {
    if (owned) {
      return { kind: 'DUPLICATE', ...this.absorbDuplicate(owned) };
    }
    return {
      kind: 'NEW',
      card: {
        id: randomUUID(),
        ownerId,
        cardId: definition.cardId,
        name: definition.name,
        theme: definition.theme,
        rarity: definition.rarity,
        bonusType: definition.bonusType,
        bonusValue: definition.bonusValue,
        baseBonusValue: definition.bonusValue,
        sourceType: definition.sourceType,
        sourceName: definition.sourceName,
        duplicateCount: 0,
        upgradeLevel: 0,
        collectedAt: now.toISOString(),
      },
    };
  }

  /** 보너스 타입별 합계 + powerScore = floor(퍼센트 합 × 100 + 방어 × 5) */
  totalBonuses(cards: readonly MonsterCard[]): CardBonusSummary {
    const totals: Record<CardBonusType, number> = {
      EXP_PERCENT: 0,
      GOLD_PERCENT: 0,
      DUNGEON_SUCCESS: 0,
      LOOT_CHANCE: 0,
      MISSION_SPEED: 0,
      FLAT_DEFENSE: 0,
    };
    for (const card of cards) {
      totals[card.bonusType] += card.bonusValue;
    }
    const percentSum = PERCENT_BONUS_TYPES.reduce((sum, t) => sum + totals[t], 0);
    return {
      totals,
      powerScoreBonus: Math.floor(percentSum * 100 + totals.FLAT_DEFENSE * 5),
    };
  }

  private rollFromCandidates(
    candidates: readonly CardDefinition[],
    fallbackChance: number,
    rng: Rng,
  ): CardDefinition | null {
    if (candidates.length === 0) return null;
    const average = candidates.reduce((sum, c) => sum + c.dropChance, 0) / candidates.length;
    const dropChance = average > 0 ? average : fallbackChance;
    if (!rng.chance(dropChance)) return null;
    return this.weightedRandomCard(candidates, rng);
  }
}
