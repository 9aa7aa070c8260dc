// 몬스터 카드: 카탈로그 정의와 보유 인스턴스

import type {
  CardBonusType,
  CardSourceType,
  Rarity,
} from './enums.js';

export interface CardDefinition {
  cardId: string;
  name: string;
  description: string;
  theme: string;
  rarity: Rarity;
  bonusType: CardBonusType;
  bonusValue: number;
  sourceType: CardSourceType;
  sourceName: string;
  dropChance: number;
  active: boolean;
}

export interface MonsterCard {
  id: string;
  ownerId: string;
  cardId: string;
  name: string;
  theme: string;
  rarity: Rarity;
  bonusType: CardBonusType;
  // 항상 baseBonusValue * (1 + 0.25 * duplicateCount)
  bonusValue: number;
  baseBonusValue: number;
  sourceType: CardSourceType;
  sourceName: string;
  duplicateCount: number;
  upgradeLevel: number;
  collectedAt: string;
}
