import { CardsService } from './cards.service.js';
import { ForbiddenError } from '../common/errors/game-errors.js';
import type { MonsterCard } from '../db/types/index.js';
import { CardDropService } from '../engine/cards/card-drop.service.js';
import { InMemoryGameStore } from '../store/in-memory-game-store.js';
import { characterWith } from '../testing/fixtures.js';

function ownedCard(overrides: Partial<MonsterCard> & Pick<MonsterCard, 'id' | 'cardId'>): MonsterCard {
  return {
    ownerId: 'char-1',
    name: overrides.cardId,
    theme: 'Cave',
    rarity: 'COMMON',
    bonusType: 'EXP_PERCENT',
    bonusValue: 0.02,
    baseBonusValue: 0.02,
    sourceType: 'DUNGEON',
    sourceName: 'Dungeon: Test Grotto',
    duplicateCount: 0,
    upgradeLevel: 0,
    collectedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('CardsService', () => {
  let store: InMemoryGameStore;
  let service: CardsService;

  beforeEach(async () => {
    store = new InMemoryGameStore();
    service = new CardsService(store, new CardDropService());
    await store.saveCharacter(characterWith());
  });

  it('수집 순으로 정렬하고 보너스 합계를 함께 반환', async () => {
    await store.saveCard(ownedCard({ id: 'mc-2', cardId: 'stone-golem', bonusType: 'FLAT_DEFENSE', bonusValue: 2, baseBonusValue: 2, collectedAt: '2026-02-01T00:00:00.000Z' }));
    await store.saveCard(ownedCard({ id: 'mc-1', cardId: 'cave-bat' }));
    await store.saveCard(ownedCard({ id: 'mc-3', cardId: 'other', ownerId: 'char-2' }));

    const collection = await service.listCards('user-1', 'char-1');

    expect(collection.cards.map((c) => c.id)).toEqual(['mc-1', 'mc-2']);
    expect(collection.bonuses.totals.EXP_PERCENT).toBe(0.02);
    expect(collection.bonuses.totals.FLAT_DEFENSE).toBe(2);
    // floor(0.02 * 100 + 2 * 5)
    expect(collection.bonuses.powerScoreBonus).toBe(12);
  });

  it('다른 유저의 캐릭터는 ForbiddenError', async () => {
    await expect(service.listCards('user-2', 'char-1')).rejects.toThrow(ForbiddenError);
  });
});
