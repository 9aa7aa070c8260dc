// 클래스별 고정 보정치: 주 스탯, 인카운터 특화, 파티 특성

import type { CharacterClass, EncounterType, StatType } from '../../db/types/index.js';

export const CLASS_PRIMARY_STAT: Record<CharacterClass, StatType> = {
  WARRIOR: 'STRENGTH',
  BERSERKER: 'STRENGTH',
  MAGE: 'WISDOM',
  SORCERER: 'WISDOM',
  ARCHER: 'DEXTERITY',
  RANGER: 'DEXTERITY',
  PALADIN: 'DEXTERITY',
  ENCHANTER: 'CHARISMA',
  TRICKSTER: 'LUCK',
};

// 기본 클래스 계열: 보너스 방 classGate 판정에 사용
export const CLASS_LINE: Record<CharacterClass, CharacterClass> = {
  WARRIOR: 'WARRIOR',
  BERSERKER: 'WARRIOR',
  PALADIN: 'WARRIOR',
  MAGE: 'MAGE',
  SORCERER: 'MAGE',
  ENCHANTER: 'MAGE',
  ARCHER: 'ARCHER',
  RANGER: 'ARCHER',
  TRICKSTER: 'ARCHER',
};

interface EncounterSpecialty {
  encounters: readonly EncounterType[];
  multiplier: number;
}

const ENCOUNTER_SPECIALTY: Partial<Record<CharacterClass, EncounterSpecialty>> = {
  WARRIOR: { encounters: ['COMBAT', 'BOSS'], multiplier: 0.25 },
  BERSERKER: { encounters: ['COMBAT'], multiplier: 0.4 },
  MAGE: { encounters: ['PUZZLE'], multiplier: 0.25 },
  SORCERER: { encounters: ['PUZZLE'], multiplier: 0.4 },
  ARCHER: { encounters: ['TRAP'], multiplier: 0.2 },
  RANGER: { encounters: ['TRAP'], multiplier: 0.3 },
};

export const ENCHANTER_PARTY_POWER_BONUS = 0.2;
export const PALADIN_DAMAGE_REDUCTION = 0.5;
export const TRICKSTER_LOOT_BONUS = 0.25;

/** 해당 인카운터에서 클래스 스탯 추가 배율 (특화 아님 → 0) */
export function encounterMultiplier(
  characterClass: CharacterClass | null,
  encounterType: EncounterType,
): number {
  if (!characterClass) return 0;
  const specialty = ENCOUNTER_SPECIALTY[characterClass];
  return specialty?.encounters.includes(encounterType) ? specialty.multiplier : 0;
}

export function isInClassLine(
  characterClass: CharacterClass | null,
  gate: CharacterClass,
): boolean {
  return characterClass !== null && CLASS_LINE[characterClass] === CLASS_LINE[gate];
}
