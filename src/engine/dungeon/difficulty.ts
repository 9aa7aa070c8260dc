import type { DungeonDifficulty } from '../../db/types/index.js';

export interface DifficultyProfile {
  // 요구 전투력 배율
  scalar: number;
  rewardMultiplier: number;
  secondsPerRoom: number;
  dropChanceCap: number;
  damageMultiplier: number;
  successFloor: number;
}

export const SUCCESS_CEILING = 0.95;

export const DIFFICULTY_PROFILES: Record<DungeonDifficulty, DifficultyProfile> = {
  NORMAL: {
    scalar: 1.0,
    rewardMultiplier: 1.0,
    secondsPerRoom: 600,
    dropChanceCap: 0.4,
    damageMultiplier: 1.0,
    successFloor: 0.25,
  },
  HARD: {
    scalar: 1.5,
    rewardMultiplier: 1.5,
    secondsPerRoom: 900,
    dropChanceCap: 0.55,
    damageMultiplier: 1.5,
    successFloor: 0.15,
  },
  HEROIC: {
    scalar: 2.5,
    rewardMultiplier: 2.5,
    secondsPerRoom: 1200,
    dropChanceCap: 0.7,
    damageMultiplier: 2.5,
    successFloor: 0.1,
  },
  MYTHIC: {
    scalar: 4.0,
    rewardMultiplier: 4.0,
    secondsPerRoom: 1800,
    dropChanceCap: 0.8,
    damageMultiplier: 4.0,
    successFloor: 0.05,
  },
};
