// 런 단위 방 구성: 보스 고정, 보너스 방 30%, 일반 방으로 목표 수 채움

import { Injectable } from '@nestjs/common';
import { InvalidInputError } from '../../common/errors/game-errors.js';
import type { CharacterClass, DungeonRoom } from '../../db/types/index.js';
import { isInClassLine } from '../classes/class-traits.js';
import type { Rng } from '../rng/rng.service.js';

export const BONUS_ROOM_CHANCE = 0.3;
const MIN_ROOMS = 5;
const MAX_ROOMS = 7;

@Injectable()
export class RoomPlannerService {
  /**
   * 반환 순서: 보스가 아닌 방(섞음) → 보스 방.
   * classGate 가 있는 일반·보너스 방은 파티 중 같은 클래스 계열이 있을 때만 후보.
   */
  selectRoomsForRun(
    allRooms: readonly DungeonRoom[],
    partyClasses: readonly (CharacterClass | null)[],
    rng: Rng,
    targetRoomCount?: number,
  ): DungeonRoom[] {
    if (targetRoomCount !== undefined && (!Number.isInteger(targetRoomCount) || targetRoomCount < 1)) {
      throw new InvalidInputError('targetRoomCount must be a positive integer', { targetRoomCount });
    }

    const canEnter = (room: DungeonRoom) => {
      const gate = room.classGate;
      return gate === null || partyClasses.some((c) => isInClassLine(c, gate));
    };
    const bossRooms = allRooms.filter((r) => r.isBossRoom);
    const bonusRooms = allRooms.filter((r) => r.isBonusRoom && !r.isBossRoom && canEnter(r));
    const regularRooms = allRooms.filter((r) => !r.isBonusRoom && !r.isBossRoom && canEnter(r));

    const target = targetRoomCount ?? Math.min(MAX_ROOMS, Math.max(MIN_ROOMS, allRooms.length - 2));

    const selected: DungeonRoom[] = [...bossRooms];
    for (const bonus of rng.shuffle(bonusRooms)) {
      if (rng.chance(BONUS_ROOM_CHANCE)) {
        selected.push(bonus);
      }
    }

    const remainingSlots = Math.max(0, target - selected.length);
    selected.push(...rng.shuffle(regularRooms).slice(0, remainingSlots));

    const nonBoss = rng.shuffle(selected.filter((r) => !r.isBossRoom));
    return [...nonBoss, ...selected.filter((r) => r.isBossRoom)];
  }
}
