// 진행(progression) 도메인 공통 열거형

export const RARITY = ['COMMON', 'UNCOMMON', 'RARE', 'EPIC', 'LEGENDARY'] as const;
export type Rarity = (typeof RARITY)[number];

export const STAT_TYPE = [
  'STRENGTH',
  'WISDOM',
  'CHARISMA',
  'DEXTERITY',
  'LUCK',
  'DEFENSE',
] as const;
export type StatType = (typeof STAT_TYPE)[number];

export const EQUIPMENT_SLOT = ['WEAPON', 'ARMOR', 'ACCESSORY', 'TRINKET'] as const;
export type EquipmentSlot = (typeof EQUIPMENT_SLOT)[number];

export const CHARACTER_CLASS = [
  'WARRIOR',
  'MAGE',
  'ARCHER',
  'BERSERKER',
  'PALADIN',
  'SORCERER',
  'ENCHANTER',
  'RANGER',
  'TRICKSTER',
] as const;
export type CharacterClass = (typeof CHARACTER_CLASS)[number];

export const ENCOUNTER_TYPE = ['COMBAT', 'PUZZLE', 'TRAP', 'TREASURE', 'BOSS'] as const;
export type EncounterType = (typeof ENCOUNTER_TYPE)[number];

export const DUNGEON_DIFFICULTY = ['NORMAL', 'HARD', 'HEROIC', 'MYTHIC'] as const;
export type DungeonDifficulty = (typeof DUNGEON_DIFFICULTY)[number];

export const RUN_STATUS = ['IN_PROGRESS', 'COMPLETED', 'FAILED', 'ABANDONED'] as const;
export type RunStatus = (typeof RUN_STATUS)[number];

// pity 카운터 키: 저장 포맷과 동일하게 소문자
export const CONTENT_TYPE = ['tasks', 'dungeons', 'missions', 'expeditions'] as const;
export type ContentType = (typeof CONTENT_TYPE)[number];

export const CARD_SOURCE_TYPE = ['DUNGEON', 'ARENA', 'EXPEDITION', 'RAID'] as const;
export type CardSourceType = (typeof CARD_SOURCE_TYPE)[number];

export const CARD_BONUS_TYPE = [
  'EXP_PERCENT',
  'GOLD_PERCENT',
  'DUNGEON_SUCCESS',
  'LOOT_CHANCE',
  'MISSION_SPEED',
  'FLAT_DEFENSE',
] as const;
export type CardBonusType = (typeof CARD_BONUS_TYPE)[number];

export const AFFIX_KIND = ['PREFIX', 'SUFFIX'] as const;
export type AffixKind = (typeof AFFIX_KIND)[number];

export function rarityRank(rarity: Rarity): number {
  return RARITY.indexOf(rarity);
}

/** 두 희귀도 중 높은 쪽 */
export function maxRarity(a: Rarity, b: Rarity): Rarity {
  return rarityRank(a) >= rarityRank(b) ? a : b;
}

/** 한 단계 위 희귀도: LEGENDARY면 null */
export function nextRarity(rarity: Rarity): Rarity | null {
  return RARITY[rarityRank(rarity) + 1] ?? null;
}

export function isRarity(value: unknown): value is Rarity {
  return RARITY.some((r) => r === value);
}
