import { RoomPlannerService } from './room-planner.service.js';
import { RngService } from '../rng/rng.service.js';
import { InvalidInputError } from '../../common/errors/game-errors.js';
import { scriptedRng } from '../../testing/scripted-rng.js';
import { roomDef } from '../../testing/fixtures.js';

const ROOMS = [
  roomDef({ name: 'R1' }),
  roomDef({ name: 'R2' }),
  roomDef({ name: 'R3' }),
  roomDef({ name: 'R4' }),
  roomDef({ name: 'B1', isBonusRoom: true }),
  roomDef({ name: 'G1', isBonusRoom: true, classGate: 'MAGE' }),
  roomDef({ name: 'Boss', isBossRoom: true, encounterType: 'BOSS' }),
];

describe('RoomPlannerService', () => {
  let service: RoomPlannerService;

  beforeEach(() => {
    service = new RoomPlannerService();
  });

  it('보너스 방 포함 후 일반 방으로 목표 5개를 채우고 보스는 마지막', () => {
    const rng = scriptedRng(0, 0, 0, 0, 0, 0, 0);
    const rooms = service.selectRoomsForRun(ROOMS, ['WARRIOR'], rng);

    expect(rooms.map((r) => r.name)).toEqual(['R2', 'R3', 'R4', 'B1', 'Boss']);
    expect(rng.consumed).toBe(7);
  });

  it('보너스 방 판정 실패 시 일반 방만', () => {
    const rng = scriptedRng(0.5, 0, 0, 0, 0, 0, 0);
    const rooms = service.selectRoomsForRun(ROOMS, ['WARRIOR'], rng);

    expect(rooms).toHaveLength(5);
    expect(rooms.map((r) => r.name).sort()).toEqual(['Boss', 'R1', 'R2', 'R3', 'R4']);
  });

  it('같은 클래스 계열이 있으면 게이트 방도 후보', () => {
    const names = new Set<string>();
    const rngs = new RngService();
    for (let i = 0; i < 50; i++) {
      for (const room of service.selectRoomsForRun(ROOMS, ['SORCERER'], rngs.seeded(`party-${i}`))) {
        names.add(room.name);
      }
    }
    expect(names.has('G1')).toBe(true);
  });

  it('게이트 방은 자격 없는 파티에 나오지 않고, 보스는 항상 마지막', () => {
    const rngs = new RngService();
    for (let i = 0; i < 50; i++) {
      const rooms = service.selectRoomsForRun(ROOMS, ['WARRIOR', null], rngs.seeded(`party-${i}`));
      const names = rooms.map((r) => r.name);
      expect(names).not.toContain('G1');
      expect(names[names.length - 1]).toBe('Boss');
      expect(new Set(names).size).toBe(names.length);
    }
  });

  it('targetRoomCount 지정', () => {
    const rooms = service.selectRoomsForRun(ROOMS, [], scriptedRng(0.9, 0, 0, 0, 0), 3);
    expect(rooms).toHaveLength(3);
    expect(rooms[2].name).toBe('Boss');
  });

  it('targetRoomCount 가 양의 정수가 아니면 InvalidInputError', () => {
    expect(() => service.selectRoomsForRun(ROOMS, [], scriptedRng(), 0)).toThrow(InvalidInputError);
  });
});
