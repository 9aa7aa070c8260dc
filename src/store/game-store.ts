// 영속화 경계: 엔진이 만든 값 객체를 저장·조회

import type {
  CharacterSnapshot,
  DungeonRun,
  EquipmentItem,
  MonsterCard,
} from '../db/types/index.js';

export const GAME_STORE = Symbol('GAME_STORE');

export interface GameStore {
  getCharacter(id: string): Promise<CharacterSnapshot | null>;
  saveCharacter(character: CharacterSnapshot): Promise<void>;

  addEquipment(item: EquipmentItem): Promise<void>;
  listEquipment(ownerId: string): Promise<EquipmentItem[]>;

  findCard(ownerId: string, cardId: string): Promise<MonsterCard | null>;
  listCards(ownerId: string): Promise<MonsterCard[]>;
  saveCard(card: MonsterCard): Promise<void>;

  getRun(id: string): Promise<DungeonRun | null>;
  findActiveRun(characterId: string): Promise<DungeonRun | null>;
  saveRun(run: DungeonRun): Promise<void>;
  /**
   * 저장된 런이 아직 IN_PROGRESS 이고 currentRoomIndex 가 expectedRoomIndex 일 때만 덮어쓴다.
   * 갱신된 행이 없으면 false.
   */
  saveRunIfAt(run: DungeonRun, expectedRoomIndex: number): Promise<boolean>;

  /** work 안의 쓰기를 한 단위로 커밋 */
  transaction<T>(work: (store: GameStore) => Promise<T>): Promise<T>;
}
