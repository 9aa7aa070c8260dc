import { DropsService } from './drops.service.js';
import { ForbiddenError, NotFoundError } from '../common/errors/game-errors.js';
import { rarityRank } from '../db/types/index.js';
import { RngService } from '../engine/rng/rng.service.js';
import { InMemoryGameStore } from '../store/in-memory-game-store.js';
import { rngServiceWith, scriptedRng } from '../testing/scripted-rng.js';
import { characterWith, configWith, contentWith, lootServiceWith } from '../testing/fixtures.js';

describe('DropsService', () => {
  let store: InMemoryGameStore;

  function serviceWith(rngService: RngService): DropsService {
    const config = configWith({ catalogTemplateChance: 0 });
    return new DropsService(store, lootServiceWith(contentWith({}, config), config), rngService);
  }

  beforeEach(async () => {
    store = new InMemoryGameStore();
    await store.saveCharacter(characterWith({ pityCounters: { tasks: 4 } }));
  });

  it('미획득이면 카운터 +1 만 저장', async () => {
    const rng = scriptedRng(0.5);
    const response = await serviceWith(rngServiceWith(rng)).rollDrop('user-1', 'char-1', {
      contentType: 'tasks',
      tier: 1,
      baseChance: 0,
    });

    expect(response).toEqual({
      dropped: false,
      forcedMinRarity: null,
      item: null,
      pityCounters: { tasks: 5 },
    });
    expect((await store.getCharacter('char-1'))?.pityCounters).toEqual({ tasks: 5 });
    expect(await store.listEquipment('char-1')).toEqual([]);
    expect(rng.consumed).toBe(1);
  });

  it('임계값 도달 시 최소 희귀도 이상 아이템을 강제 지급하고 저장', async () => {
    await store.saveCharacter(characterWith({ pityCounters: { expeditions: 3 } }));
    const response = await serviceWith(new RngService()).rollDrop('user-1', 'char-1', {
      contentType: 'expeditions',
      tier: 2,
      slot: 'ARMOR',
    });

    expect(response.dropped).toBe(true);
    expect(response.forcedMinRarity).toBe('EPIC');
    expect(response.pityCounters).toEqual({ expeditions: 0 });
    expect(response.item?.slot).toBe('ARMOR');
    expect(response.item?.ownerId).toBe('char-1');
    expect(rarityRank(response.item?.rarity ?? 'COMMON')).toBeGreaterThanOrEqual(rarityRank('EPIC'));

    const saved = await store.listEquipment('char-1');
    expect(saved.map((i) => i.id)).toEqual([response.item?.id]);
  });

  it('다른 유저의 캐릭터는 ForbiddenError', async () => {
    await expect(
      serviceWith(new RngService()).rollDrop('user-2', 'char-1', { contentType: 'tasks', tier: 1 }),
    ).rejects.toThrow(ForbiddenError);
  });

  it('없는 캐릭터는 NotFoundError', async () => {
    await expect(
      serviceWith(new RngService()).rollDrop('user-1', 'missing', { contentType: 'tasks', tier: 1 }),
    ).rejects.toThrow(NotFoundError);
  });
});
