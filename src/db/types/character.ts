// 캐릭터 스냅샷: 엔진이 읽는 최소 진행 상태

import type { CharacterClass, ContentType, StatType } from './enums.js';

export type StatBlock = Record<StatType, number>;

/** contentType별 연속 미획득 횟수 */
export type PityCounters = Partial<Record<ContentType, number>>;

export interface CharacterSnapshot {
  id: string;
  userId: string;
  name: string;
  level: number;
  characterClass: CharacterClass | null;
  // 장비·버프 반영된 유효 스탯
  stats: StatBlock;
  currentHp: number;
  maxHp: number;
  gold: number;
  exp: number;
  pityCounters: PityCounters;
}

export function emptyStatBlock(): StatBlock {
  return {
    STRENGTH: 0,
    WISDOM: 0,
    CHARISMA: 0,
    DEXTERITY: 0,
    LUCK: 0,
    DEFENSE: 0,
  };
}
