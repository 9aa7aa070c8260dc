import { Inject, Injectable, Logger } from '@nestjs/common';
import type { EquipmentItem, PityCounters, Rarity } from '../db/types/index.js';
import { LootService } from '../engine/rewards/loot.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import { loadOwnedCharacter } from '../store/character-access.js';
import { GAME_STORE, type GameStore } from '../store/game-store.js';
import type { RollDropBody } from './dto/roll-drop.dto.js';

export interface DropResponse {
  dropped: boolean;
  forcedMinRarity: Rarity | null;
  item: EquipmentItem | null;
  pityCounters: PityCounters;
}

@Injectable()
export class DropsService {
  private readonly logger = new Logger(DropsService.name);

  constructor(
    @Inject(GAME_STORE) private readonly store: GameStore,
    private readonly loot: LootService,
    private readonly rngService: RngService,
  ) {}

  /** pity 로 감싼 장비 드랍 1회 + 카운터 기록 */
  async rollDrop(userId: string, characterId: string, body: RollDropBody): Promise<DropResponse> {
    const character = await loadOwnedCharacter(this.store, userId, characterId);
    const outcome = this.loot.rollPityDrop(character, body.contentType, body.tier, this.rngService.create(), {
      baseChance: body.baseChance,
      slot: body.slot,
    });

    await this.store.transaction(async (store) => {
      if (outcome.item) {
        await store.addEquipment(outcome.item);
      }
      await store.saveCharacter({ ...character, pityCounters: outcome.counters });
    });

    if (outcome.item) {
      this.logger.debug(
        `drop: character=${character.id} ${body.contentType} → ${outcome.item.rarity} ${outcome.item.slot}`,
      );
    }

    return {
      dropped: outcome.dropped,
      forcedMinRarity: outcome.forcedMinRarity,
      item: outcome.item,
      pityCounters: outcome.counters,
    };
  }
}
