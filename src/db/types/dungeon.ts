// 던전 정의 · 방 · 런 상태

import type {
  CharacterClass,
  DungeonDifficulty,
  EncounterType,
  RunStatus,
  StatType,
} from './enums.js';

export interface RoomApproach {
  name: string;
  description?: string;
  primaryStat: StatType;
  powerModifier: number;
  riskModifier: number;
}

export interface DungeonRoom {
  name: string;
  encounterType: EncounterType;
  primaryStat: StatType;
  difficultyRating: number;
  isBossRoom: boolean;
  bonusLootChance: number;
  // 보너스 방은 classGate 계열 클래스가 파티에 있어야 등장
  isBonusRoom: boolean;
  classGate: CharacterClass | null;
}

export interface StatRequirement {
  stat: StatType;
  minimum: number;
}

export interface DungeonDefinition {
  dungeonId: string;
  name: string;
  theme: string;
  difficulty: DungeonDifficulty;
  levelRequirement: number;
  lootTier: number;
  baseExpReward: number;
  baseGoldReward: number;
  statRequirements: StatRequirement[];
  rooms: DungeonRoom[];
  active: boolean;
}

export interface RoomResult {
  roomIndex: number;
  roomName: string;
  encounterType: EncounterType;
  approachName: string;
  success: boolean;
  successChance: number;
  playerPower: number;
  requiredPower: number;
  expEarned: number;
  goldEarned: number;
  hpLost: number;
  lootChance: number;
  lootDropped: boolean;
  cardDroppedId: string | null;
  // 프레젠테이션 레이어가 서술 텍스트로 치환
  narrativeTag: string;
}

export interface DungeonRun {
  id: string;
  characterId: string;
  dungeonId: string;
  difficulty: DungeonDifficulty;
  rooms: DungeonRoom[];
  currentRoomIndex: number;
  roomResults: RoomResult[];
  partyHp: number;
  maxPartyHp: number;
  totalExpEarned: number;
  totalGoldEarned: number;
  lootItemIds: string[];
  cardIds: string[];
  status: RunStatus;
  secondsPerRoom: number;
  startedAt: string; // ISO-8601
  completedAt: string | null;
}
