// 장비: 생성된 아이템 인스턴스와 희귀도별 스탯 밴드

import type {
  AffixKind,
  EquipmentSlot,
  Rarity,
  StatType,
} from './enums.js';

export const MAX_ENHANCEMENT_LEVEL = 10;

/** 희귀도별 주 스탯 보너스 범위 (inclusive) */
export const STAT_BONUS_RANGE: Record<Rarity, readonly [number, number]> = {
  COMMON: [1, 3],
  UNCOMMON: [2, 5],
  RARE: [4, 8],
  EPIC: [7, 12],
  LEGENDARY: [10, 18],
};

export interface RolledAffix {
  kind: AffixKind;
  affixId: string;
  name: string;
  bonusType: string;
  value: number; // 소수점 1자리
  isGreater: boolean;
}

export interface EquipmentItem {
  id: string;
  ownerId: string | null;
  name: string;
  descriptionKey: string;
  slot: EquipmentSlot;
  rarity: Rarity;
  primaryStat: StatType;
  statBonus: number;
  secondaryStat: StatType | null;
  secondaryStatBonus: number;
  levelRequirement: number;
  enhancementLevel: number;
  prefix: RolledAffix | null;
  suffix: RolledAffix | null;
  // 카탈로그 템플릿에서 나온 경우 templateId
  templateId: string | null;
}

export function effectivePrimaryBonus(item: EquipmentItem): number {
  return item.statBonus + item.enhancementLevel;
}

/** "[prefix] 이름 [suffix]" */
export function displayName(item: EquipmentItem): string {
  const parts: string[] = [];
  if (item.prefix) parts.push(item.prefix.name);
  parts.push(item.name);
  if (item.suffix) parts.push(item.suffix.name);
  return parts.join(' ');
}
