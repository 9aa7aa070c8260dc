import { Inject, Injectable } from '@nestjs/common';
import type { MonsterCard } from '../db/types/index.js';
import { CardDropService, type CardBonusSummary } from '../engine/cards/card-drop.service.js';
import { loadOwnedCharacter } from '../store/character-access.js';
import { GAME_STORE, type GameStore } from '../store/game-store.js';

export interface CardCollection {
  cards: MonsterCard[];
  bonuses: CardBonusSummary;
}

@Injectable()
export class CardsService {
  constructor(
    @Inject(GAME_STORE) private readonly store: GameStore,
    private readonly cardDrops: CardDropService,
  ) {}

  async listCards(userId: string, characterId: string): Promise<CardCollection> {
    const character = await loadOwnedCharacter(this.store, userId, characterId);
    const cards = await this.store.listCards(character.id);
    cards.sort((a, b) => a.collectedAt.localeCompare(b.collectedAt));
    return { cards, bonuses: this.cardDrops.totalBonuses(cards) };
  }
}
