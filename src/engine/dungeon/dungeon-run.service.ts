// 던전 런 상태 머신: IN_PROGRESS → COMPLETED | FAILED | ABANDONED (단방향)

import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { InvalidInputError, RunStateConflictError } from '../../common/errors/game-errors.js';
import type {
  DungeonDifficulty,
  DungeonRoom,
  DungeonRun,
  RoomResult,
  RunStatus,
} from '../../db/types/index.js';
import { DIFFICULTY_PROFILES } from './difficulty.js';

export interface StartRunInput {
  characterId: string;
  dungeonId: string;
  difficulty: DungeonDifficulty;
  rooms: readonly DungeonRoom[];
  maxPartyHp: number;
  partyHp?: number;
}

/** 방 결과와 함께 런에 붙는 드랍 식별자 */
export interface StageDrops {
  lootItemIds?: readonly string[];
  cardId?: string | null;
}

export const PERFORMANCE_GRADE = ['S', 'A', 'B', 'C', 'D', 'F'] as const;
export type PerformanceGrade = (typeof PERFORMANCE_GRADE)[number];

export interface PerformanceRating {
  grade: PerformanceGrade;
  score: number;
  lootMultiplier: number;
}

const GRADE_TABLE: readonly { grade: PerformanceGrade; minScore: number; lootMultiplier: number }[] = [
  { grade: 'S', minScore: 0.95, lootMultiplier: 1.5 },
  { grade: 'A', minScore: 0.85, lootMultiplier: 1.25 },
  { grade: 'B', minScore: 0.7, lootMultiplier: 1.1 },
  { grade: 'C', minScore: 0.5, lootMultiplier: 1.0 },
  { grade: 'D', minScore: 0.3, lootMultiplier: 0.8 },
];

const TERMINAL_STATUSES: readonly RunStatus[] = ['COMPLETED', 'FAILED', 'ABANDONED'];

@Injectable()
export class DungeonRunService {
  startRun(input: StartRunInput, now: Date = new Date()): DungeonRun {
    if (input.rooms.length === 0) {
      throw new InvalidInputError('A dungeon run needs at least one room', { dungeonId: input.dungeonId });
    }
    if (!Number.isInteger(input.maxPartyHp) || input.maxPartyHp < 1) {
      throw new InvalidInputError('maxPartyHp must be a positive integer', { maxPartyHp: input.maxPartyHp });
    }

    return {
      id: randomUUID(),
      characterId: input.characterId,
      dungeonId: input.dungeonId,
      difficulty: input.difficulty,
      rooms: [...input.rooms],
      currentRoomIndex: 0,
      roomResults: [],
      partyHp: Math.min(input.maxPartyHp, input.partyHp ?? input.maxPartyHp),
      maxPartyHp: input.maxPartyHp,
      totalExpEarned: 0,
      totalGoldEarned: 0,
      lootItemIds: [],
      cardIds: [],
      status: 'IN_PROGRESS',
      secondsPerRoom: DIFFICULTY_PROFILES[input.difficulty].secondsPerRoom,
      startedAt: now.toISOString(),
      completedAt: null,
    };
  }

  isTerminal(run: DungeonRun): boolean {
    return TERMINAL_STATUSES.includes(run.status);
  }

  /** 방 i 의 타이머 만료 시각 = 시작 + (i + 1) × 방당 초 */
  roomCompletesAt(run: DungeonRun, roomIndex: number = run.currentRoomIndex): Date {
    return new Date(Date.parse(run.startedAt) + (roomIndex + 1) * run.secondsPerRoom * 1000);
  }

  isRoomReady(run: DungeonRun, now: Date = new Date()): boolean {
    return now.getTime() >= this.roomCompletesAt(run).getTime();
  }

  assertCanAdvance(run: DungeonRun, now: Date = new Date(), expectedRoomIndex?: number): void {
    if (this.isTerminal(run)) {
      throw new RunStateConflictError('RUN_TERMINAL', `Run is already ${run.status}`, {
        runId: run.id,
        status: run.status,
      });
    }
    if (expectedRoomIndex !== undefined && expectedRoomIndex !== run.currentRoomIndex) {
      throw new RunStateConflictError('ROOM_INDEX_MISMATCH', 'Run is at a different room', {
        runId: run.id,
        expectedRoomIndex,
        currentRoomIndex: run.currentRoomIndex,
      });
    }
    if (!this.isRoomReady(run, now)) {
      throw new RunStateConflictError('ROOM_NOT_READY', 'Room timer has not elapsed', {
        runId: run.id,
        roomIndex: run.currentRoomIndex,
        completesAt: this.roomCompletesAt(run).toISOString(),
      });
    }
  }

  /**
   * 결과 추가 후 인덱스 +1. HP 0 → FAILED (남은 방 무시),
   * 마지막 방까지 HP > 0 → COMPLETED. 입력 run 은 변경하지 않는다.
   */
  recordStageResult(
    run: DungeonRun,
    result: RoomResult,
    drops: StageDrops = {},
    now: Date = new Date(),
  ): DungeonRun {
    if (this.isTerminal(run)) {
      throw new RunStateConflictError('RUN_TERMINAL', `Run is already ${run.status}`, {
        runId: run.id,
        status: run.status,
      });
    }
    if (result.roomIndex !== run.currentRoomIndex) {
      throw new InvalidInputError('Room result is out of order', {
        expected: run.currentRoomIndex,
        received: result.roomIndex,
      });
    }

    const partyHp = Math.max(0, run.partyHp - result.hpLost);
    const currentRoomIndex = run.currentRoomIndex + 1;
    let status: RunStatus = 'IN_PROGRESS';
    if (partyHp === 0) {
      status = 'FAILED';
    } else if (currentRoomIndex >= run.rooms.length) {
      status = 'COMPLETED';
    }

    return {
      ...run,
      currentRoomIndex,
      roomResults: [...run.roomResults, result],
      partyHp,
      totalExpEarned: run.totalExpEarned + result.expEarned,
      totalGoldEarned: run.totalGoldEarned + result.goldEarned,
      lootItemIds: [...run.lootItemIds, ...(drops.lootItemIds ?? [])],
      cardIds: drops.cardId ? [...run.cardIds, drops.cardId] : run.cardIds,
      status,
      completedAt: status === 'IN_PROGRESS' ? null : now.toISOString(),
    };
  }

  abandon(run: DungeonRun, now: Date = new Date()): DungeonRun {
    if (this.isTerminal(run)) {
      throw new RunStateConflictError('RUN_TERMINAL', `Run is already ${run.status}`, {
        runId: run.id,
        status: run.status,
      });
    }
    return { ...run, status: 'ABANDONED', completedAt: now.toISOString() };
  }

  /** score = 0.5 × 성공 방 비율 + 0.3 × 남은 HP 비율 + 0.2 × 준비도 */
  calculatePerformanceRating(run: DungeonRun, statReadiness: number = 1): PerformanceRating {
    const cleared = run.roomResults.filter((r) => r.success).length;
    const roomShare = run.rooms.length > 0 ? cleared / run.rooms.length : 0;
    const hpShare = run.maxPartyHp > 0 ? run.partyHp / run.maxPartyHp : 0;
    const score = 0.5 * roomShare + 0.3 * hpShare + 0.2 * statReadiness;

    const row = GRADE_TABLE.find((g) => score >= g.minScore);
    return row
      ? { grade: row.grade, score, lootMultiplier: row.lootMultiplier }
      : { grade: 'F', score, lootMultiplier: 0.5 };
  }
}
