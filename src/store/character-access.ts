import { ForbiddenError, NotFoundError } from '../common/errors/game-errors.js';
import type { CharacterSnapshot } from '../db/types/index.js';
import type { GameStore } from './game-store.js';

/** 캐릭터 조회 + 소유자 확인 */
export async function loadOwnedCharacter(
  store: GameStore,
  userId: string,
  characterId: string,
): Promise<CharacterSnapshot> {
  const character = await store.getCharacter(characterId);
  if (!character) {
    throw new NotFoundError('Character not found', { characterId });
  }
  if (character.userId !== userId) {
    throw new ForbiddenError('Character belongs to another user', { characterId });
  }
  return character;
}
