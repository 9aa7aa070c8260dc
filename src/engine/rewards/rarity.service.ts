// 희귀도·스탯 롤: tier/luck 보정 + 저티어 하드/소프트 캡

import { Injectable } from '@nestjs/common';
import { InvalidInputError } from '../../common/errors/game-errors.js';
import {
  STAT_BONUS_RANGE,
  STAT_TYPE,
  isRarity,
  type Rarity,
  type StatType,
} from '../../db/types/index.js';
import type { Rng } from '../rng/rng.service.js';

// 보정 롤이 이 값 이상이면 해당 희귀도 (내림차순)
const RARITY_THRESHOLDS: ReadonlyArray<readonly [number, Rarity]> = [
  [95, 'LEGENDARY'],
  [82, 'EPIC'],
  [65, 'RARE'],
  [40, 'UNCOMMON'],
];

const LUCK_WEIGHT = 0.5;
const TIER_WEIGHT = 3.0;
const LEGENDARY_MIN_TIER = 4;
const EPIC_SOFT_CAP_MAX_TIER = 2;

const SECONDARY_STAT: Record<Rarity, { chance: number; range: readonly [number, number] }> = {
  COMMON: { chance: 0, range: [0, 0] },
  UNCOMMON: { chance: 0.3, range: [1, 2] },
  RARE: { chance: 0.6, range: [2, 4] },
  EPIC: { chance: 0.8, range: [3, 6] },
  LEGENDARY: { chance: 1.0, range: [5, 10] },
};

export interface RarityRoll {
  rarity: Rarity;
  // 캡 적용 전 희귀도
  rawRarity: Rarity;
  downgraded: boolean;
}

export interface SecondaryStatRoll {
  stat: StatType;
  bonus: number;
}

export function assertTier(tier: number): void {
  if (!Number.isInteger(tier) || tier < 1) {
    throw new InvalidInputError(`tier must be an integer >= 1`, { tier });
  }
}

export function assertLuck(luck: number): void {
  if (!Number.isFinite(luck) || luck < 0) {
    throw new InvalidInputError(`luck must be a non-negative number`, { luck });
  }
}

export function assertRarity(rarity: unknown): asserts rarity is Rarity {
  if (!isRarity(rarity)) {
    throw new InvalidInputError(`unknown rarity`, { rarity });
  }
}

/** Epic 유지 확률: tier 1/2 전용 */
export function epicKeepChance(tier: number, luck: number): number {
  return tier === 1 ? 0.02 + luck * 0.003 : 0.05 + luck * 0.005;
}

@Injectable()
export class RarityService {
  rollRarity(tier: number, luck: number, rng: Rng): Rarity {
    return this.rollRarityDetailed(tier, luck, rng).rarity;
  }

  /**
   * 0~100 균등 롤 + luck*0.5 + tier*3 을 임계값 표에 대입.
   * - tier < 4 에서는 Legendary 불가 (Epic으로)
   * - tier <= 2 의 Epic은 유지 확률을 통과해야 하며, 실패 시 tier 1 → Uncommon, tier 2 → Rare
   */
  rollRarityDetailed(tier: number, luck: number, rng: Rng): RarityRoll {
    assertTier(tier);
    assertLuck(luck);

    const adjusted = rng.float(0, 100) + luck * LUCK_WEIGHT + tier * TIER_WEIGHT;
    const rawRarity = RARITY_THRESHOLDS.find(([min]) => adjusted >= min)?.[1] ?? 'COMMON';

    let rarity = rawRarity;
    if (rarity === 'LEGENDARY' && tier < LEGENDARY_MIN_TIER) {
      rarity = 'EPIC';
    }
    if (rarity === 'EPIC' && tier <= EPIC_SOFT_CAP_MAX_TIER) {
      if (!rng.chance(epicKeepChance(tier, luck))) {
        rarity = tier === 1 ? 'UNCOMMON' : 'RARE';
      }
    }

    return { rarity, rawRarity, downgraded: rarity !== rawRarity };
  }

  rollStatBonus(rarity: Rarity, rng: Rng): number {
    assertRarity(rarity);
    const [min, max] = STAT_BONUS_RANGE[rarity];
    return rng.range(min, max);
  }

  /** 주 스탯과 다른 보조 스탯: Common은 항상 null */
  rollSecondaryStat(rarity: Rarity, excluding: StatType, rng: Rng): SecondaryStatRoll | null {
    assertRarity(rarity);
    const { chance, range } = SECONDARY_STAT[rarity];
    if (chance <= 0 || !rng.chance(chance)) return null;

    const pool = STAT_TYPE.filter((s) => s !== excluding);
    const stat = rng.pick(pool);
    return { stat, bonus: rng.range(range[0], range[1]) };
  }
}
