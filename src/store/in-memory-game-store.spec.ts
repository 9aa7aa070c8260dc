import { InMemoryGameStore } from './in-memory-game-store.js';
import type { DungeonRun, MonsterCard } from '../db/types/index.js';
import { characterWith } from '../testing/fixtures.js';

function card(overrides: Partial<MonsterCard> = {}): MonsterCard {
  return {
    id: 'mc-1',
    ownerId: 'char-1',
    cardId: 'cave-bat',
    name: 'Cave Bat',
    theme: 'Cave',
    rarity: 'COMMON',
    bonusType: 'EXP_PERCENT',
    bonusValue: 0.01,
    baseBonusValue: 0.01,
    sourceType: 'DUNGEON',
    sourceName: 'Dungeon: Test Grotto',
    duplicateCount: 0,
    upgradeLevel: 0,
    collectedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function run(overrides: Partial<DungeonRun> = {}): DungeonRun {
  return {
    id: 'run-1',
    characterId: 'char-1',
    dungeonId: 'test-grotto',
    difficulty: 'NORMAL',
    rooms: [],
    currentRoomIndex: 0,
    roomResults: [],
    partyHp: 100,
    maxPartyHp: 100,
    totalExpEarned: 0,
    totalGoldEarned: 0,
    lootItemIds: [],
    cardIds: [],
    status: 'IN_PROGRESS',
    secondsPerRoom: 600,
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: null,
    ...overrides,
  };
}

describe('InMemoryGameStore', () => {
  let store: InMemoryGameStore;

  beforeEach(() => {
    store = new InMemoryGameStore();
  });

  it('저장한 캐릭터는 복사본으로 돌려준다', async () => {
    const character = characterWith({ pityCounters: { dungeons: 2 } });
    await store.saveCharacter(character);
    character.pityCounters.dungeons = 9;

    const loaded = await store.getCharacter('char-1');
    expect(loaded?.pityCounters).toEqual({ dungeons: 2 });
    expect(await store.getCharacter('missing')).toBeNull();
  });

  it('카드는 (소유자, cardId) 로 찾는다', async () => {
    await store.saveCard(card());
    await store.saveCard(card({ id: 'mc-2', ownerId: 'char-2' }));

    expect((await store.findCard('char-2', 'cave-bat'))?.id).toBe('mc-2');
    expect(await store.findCard('char-1', 'ice-wisp')).toBeNull();
    expect(await store.listCards('char-1')).toHaveLength(1);
  });

  it('진행 중인 런만 active 로 조회', async () => {
    await store.saveRun(run({ id: 'run-old', status: 'COMPLETED' }));
    expect(await store.findActiveRun('char-1')).toBeNull();

    await store.saveRun(run());
    expect((await store.findActiveRun('char-1'))?.id).toBe('run-1');
  });

  it('saveRunIfAt 은 진행 중이고 방 번호가 같을 때만 덮어쓴다', async () => {
    await store.saveRun(run());

    expect(await store.saveRunIfAt(run({ currentRoomIndex: 1 }), 0)).toBe(true);
    expect(await store.saveRunIfAt(run({ currentRoomIndex: 2 }), 0)).toBe(false);
    expect((await store.getRun('run-1'))?.currentRoomIndex).toBe(1);

    await store.saveRun(run({ currentRoomIndex: 1, status: 'ABANDONED' }));
    expect(await store.saveRunIfAt(run({ currentRoomIndex: 2 }), 1)).toBe(false);
    expect(await store.saveRunIfAt(run({ id: 'missing' }), 0)).toBe(false);
  });
});
