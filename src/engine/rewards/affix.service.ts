// 장비 접두사/접미사 롤링: 희귀도별 확률, 클래스 주 스탯 가중치, 레벨·희귀도 스케일

import { Injectable } from '@nestjs/common';
import type { AffixDefinition } from '../../content/content.types.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import {
  rarityRank,
  type AffixKind,
  type CharacterClass,
  type Rarity,
  type RolledAffix,
  type StatType,
} from '../../db/types/index.js';
import { CLASS_PRIMARY_STAT } from '../classes/class-traits.js';
import type { Rng, Weighted } from '../rng/rng.service.js';

export const AFFIX_PROBABILITY: Record<Rarity, { prefix: number; suffix: number }> = {
  COMMON: { prefix: 0, suffix: 0 },
  UNCOMMON: { prefix: 0.2, suffix: 0 },
  RARE: { prefix: 0.5, suffix: 0.3 },
  EPIC: { prefix: 0.8, suffix: 0.6 },
  LEGENDARY: { prefix: 1.0, suffix: 0.8 },
};

const RARITY_VALUE_SCALE: Record<Rarity, number> = {
  COMMON: 0.5,
  UNCOMMON: 0.75,
  RARE: 1.0,
  EPIC: 1.25,
  LEGENDARY: 1.5,
};

const ITEM_LEVEL_SCALE = 0.02;
const GREATER_AFFIX_CHANCE = 0.1;
const GREATER_AFFIX_MULTIPLIER = 1.5;

// bonusType 에 포함되면 해당 주 스탯 클래스에 가중치
export const STAT_AFFIX_KEYWORDS: Record<StatType, readonly string[]> = {
  STRENGTH: ['physical', 'strength'],
  WISDOM: ['mental', 'wisdom', 'mission_speed'],
  DEXTERITY: ['mission_duration', 'dexterity', 'haste'],
  CHARISMA: ['social', 'charisma', 'party_bond'],
  LUCK: ['loot', 'luck', 'drop_chance', 'fortune'],
  DEFENSE: ['defense', 'dungeon_success', 'warding'],
};

export interface AffixRoll {
  prefix: RolledAffix | null;
  suffix: RolledAffix | null;
}

export interface AffixRollOptions {
  characterClass?: CharacterClass | null;
  itemLevel?: number;
}

@Injectable()
export class AffixService {
  constructor(private readonly contentLoader: ContentLoaderService) {}

  /**
   * 희귀도 확률표로 prefix → suffix 순서로 게이트 판정 후 롤.
   * 확률 0 인 게이트는 난수를 소비하지 않는다.
   */
  rollAffixes(rarity: Rarity, rng: Rng, options: AffixRollOptions = {}): AffixRoll {
    const prob = AFFIX_PROBABILITY[rarity];
    const itemLevel = options.itemLevel ?? 1;
    const classStat = options.characterClass ? CLASS_PRIMARY_STAT[options.characterClass] : null;

    let prefix: RolledAffix | null = null;
    if (prob.prefix > 0 && rng.next() < prob.prefix) {
      prefix = this.rollOne('PREFIX', rarity, itemLevel, classStat, rng);
    }

    let suffix: RolledAffix | null = null;
    if (prob.suffix > 0 && rng.next() < prob.suffix) {
      suffix = this.rollOne('SUFFIX', rarity, itemLevel, classStat, rng);
    }

    return { prefix, suffix };
  }

  /**
   * 선택 가중치 표: 기본 1, 클래스 주 스탯 키워드와 맞는 항목은
   * 풀 크기 10개당 1씩(최소 1) 추가.
   */
  buildWeights(pool: readonly AffixDefinition[], classStat: StatType | null): Weighted<AffixDefinition>[] {
    const extra = Math.max(1, Math.floor(pool.length / 10));
    return pool.map((def) => ({
      item: def,
      weight: classStat && matchesStat(def.bonusType, classStat) ? 1 + extra : 1,
    }));
  }

  /** uniform(min,max) × (1 + itemLevel*0.02) × 희귀도 배율, Legendary 10% 확률로 ×1.5 */
  rollValue(def: AffixDefinition, rarity: Rarity, itemLevel: number, rng: Rng): { value: number; isGreater: boolean } {
    let value =
      rng.float(def.minValue, def.maxValue) *
      (1 + itemLevel * ITEM_LEVEL_SCALE) *
      RARITY_VALUE_SCALE[rarity];

    let isGreater = false;
    if (rarity === 'LEGENDARY' && rng.chance(GREATER_AFFIX_CHANCE)) {
      value *= GREATER_AFFIX_MULTIPLIER;
      isGreater = true;
    }

    return { value: Math.round(value * 10) / 10, isGreater };
  }

  private rollOne(
    kind: AffixKind,
    rarity: Rarity,
    itemLevel: number,
    classStat: StatType | null,
    rng: Rng,
  ): RolledAffix | null {
    const pool = this.contentLoader
      .affixes(kind)
      .filter((a) => rarityRank(a.minRarity) <= rarityRank(rarity));
    const def = rng.weighted(this.buildWeights(pool, classStat));
    if (!def) return null;

    const { value, isGreater } = this.rollValue(def, rarity, itemLevel, rng);
    return {
      kind,
      affixId: def.affixId,
      name: def.name,
      bonusType: def.bonusType,
      value,
      isGreater,
    };
  }
}

function matchesStat(bonusType: string, stat: StatType): boolean {
  const lower = bonusType.toLowerCase();
  return STAT_AFFIX_KEYWORDS[stat].some((keyword) => lower.includes(keyword));
}
